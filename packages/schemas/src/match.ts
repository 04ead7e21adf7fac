import { z } from 'zod';

/** Optional string that also accepts `null` from JSON clients; normalized to `undefined`. */
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value): z.output<T>[] => value ?? []);
}

export const roleSchema = z.object({
  title: z.string(),
  company: optionalString,
  location: optionalString,
});

export const skillSchema = z.object({
  skill: z.string(),
  applied_in: optionalString,
});

export const userProfileInfoSchema = z.object({
  current_role: roleSchema,
  previous_roles: listOf(roleSchema),
  top_skills: listOf(skillSchema),
  solutions_offered: listOf(z.string()),
  career_highlights: listOf(z.string()),
});

export const targetProfileSchema = z.object({
  type: z.string(),
  titles: z.array(z.string()),
  why: optionalString,
});

export const userObjectiveSchema = z.object({
  person_id: z.string().min(1),
  primary_goal: z.string(),
  secondary_goals: listOf(z.string()),
  target_profiles: z.array(targetProfileSchema),
  exclude: listOf(z.string()),
  success_signals: listOf(z.string()),
});

export const networkProfileSchema = z.object({
  profile_id: z.string().min(1),
  name: z.string(),
  title: z.string(),
  company: optionalString,
  industry: optionalString,
  skills: listOf(z.string()),
  summary: optionalString,
});

export const matchRequestSchema = z.object({
  user_profile: userProfileInfoSchema,
  user_objective: userObjectiveSchema,
  network_profiles: z.array(networkProfileSchema),
});

export const matchResultSchema = z.object({
  profile_id: z.string(),
  name: z.string(),
  score: z.number().min(0).max(100),
  reason: z.string().min(1),
  /** Knowledge graph matched signals */
  kg_signals: z.array(z.string()).default([]),
  /** Semantic retrieval rank; null when the candidate was not retrieved */
  retrieval_rank: z.number().int().positive().nullable().default(null),
});

export type Role = z.infer<typeof roleSchema>;
export type Skill = z.infer<typeof skillSchema>;
export type UserProfileInfo = z.infer<typeof userProfileInfoSchema>;
export type TargetProfile = z.infer<typeof targetProfileSchema>;
export type UserObjective = z.infer<typeof userObjectiveSchema>;
export type NetworkProfile = z.infer<typeof networkProfileSchema>;
export type MatchRequest = z.infer<typeof matchRequestSchema>;
export type MatchResult = z.infer<typeof matchResultSchema>;

/** Raw request body before validation (nullable/omitted optionals allowed) */
export type MatchRequestInput = z.input<typeof matchRequestSchema>;
