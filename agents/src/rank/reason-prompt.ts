/**
 * Prompt for one-sentence match justifications.
 */

import { createPromptTemplate, executeTemplate } from '@matchgraph/llm';
import type { NetworkProfile, UserObjective, UserProfileInfo } from '@matchgraph/schemas';

const REASON_TEMPLATE = createPromptTemplate(`<s>[INST]
You are an AI recruitment assistant. Given the context below, write a single concise sentence
(max 25 words) explaining why this candidate is a good match for the user's objective.
Be specific. Do not repeat the candidate's name in the reason.

USER CONTEXT
  Goal: {goal}
  Seeking: {titles}
  User skills: {userSkills}
  Success signals: {successSignals}

CANDIDATE
  Title: {title}
  Company: {company}
  Industry: {industry}
  Skills: {skills}
  Summary: {summary}

MATCH SIGNALS (from knowledge graph): {signals}
KG Score: {kgScore}/100   Semantic Score: {similarityScore}/100

Respond with ONLY the reason sentence, nothing else.
[/INST]`);

export interface ReasonPromptInput {
  userProfile: UserProfileInfo;
  userObjective: UserObjective;
  candidate: NetworkProfile;
  signals: string[];
  kgScore: number;
  similarityScore: number;
}

export function buildReasonPrompt(input: ReasonPromptInput): string {
  const { userProfile, userObjective, candidate } = input;

  const { prompt } = executeTemplate(REASON_TEMPLATE, {
    goal: userObjective.primary_goal,
    titles: userObjective.target_profiles.flatMap((tp) => tp.titles).join(', '),
    userSkills: userProfile.top_skills.map((sk) => sk.skill).join(', '),
    successSignals: userObjective.success_signals.join(', '),
    title: candidate.title,
    company: candidate.company || 'N/A',
    industry: candidate.industry || 'N/A',
    skills: candidate.skills.join(', '),
    summary: candidate.summary || 'N/A',
    signals: input.signals.length > 0 ? input.signals.join('; ') : 'none',
    kgScore: input.kgScore.toFixed(1),
    similarityScore: input.similarityScore.toFixed(1),
  });

  return prompt;
}
