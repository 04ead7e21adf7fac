import {
  matchRequestSchema,
  networkProfileSchema,
  userObjectiveSchema,
  userProfileInfoSchema,
  type MatchRequest,
  type MatchRequestInput,
  type NetworkProfile,
  type UserObjective,
  type UserProfileInfo,
} from '@matchgraph/schemas';

export function makeUserProfile(overrides: Record<string, unknown> = {}): UserProfileInfo {
  return userProfileInfoSchema.parse({
    current_role: { title: 'Data Scientist', company: 'Northwind' },
    top_skills: [],
    ...overrides,
  });
}

export function makeObjective(overrides: Record<string, unknown> = {}): UserObjective {
  return userObjectiveSchema.parse({
    person_id: 'user-1',
    primary_goal: 'Find a technical co-founder',
    target_profiles: [],
    ...overrides,
  });
}

export function makeCandidate(
  profileId: string,
  overrides: Record<string, unknown> = {},
): NetworkProfile {
  return networkProfileSchema.parse({
    profile_id: profileId,
    name: `Person ${profileId}`,
    title: 'Consultant',
    ...overrides,
  });
}

export function makeRequest(input: Partial<MatchRequestInput> = {}): MatchRequest {
  return matchRequestSchema.parse({
    user_profile: { current_role: { title: 'Data Scientist' }, top_skills: [{ skill: 'python' }] },
    user_objective: {
      person_id: 'user-1',
      primary_goal: 'Find a technical co-founder',
      target_profiles: [{ type: 'co-founder', titles: ['CTO'] }],
    },
    network_profiles: [],
    ...input,
  });
}
