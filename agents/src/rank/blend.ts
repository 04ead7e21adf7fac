/**
 * Blend Orchestrator - merges structural and semantic scores, attaches reasons, filters and sorts.
 *
 *   final = kgWeight × structural + similarityWeight × similarity   (rounded once, to 2 decimals)
 */

import { scoreAllCandidates, type StructuralScore } from '@matchgraph/core';
import type { MatchRequest, MatchResult } from '@matchgraph/schemas';
import { mapWithConcurrency } from '../shared/concurrency.js';
import { noopLog, type AgentLogFn } from '../shared/types.js';
import type { ReasonGenerator } from './reason-generator.js';
import {
  MISSING_RETRIEVAL_SCORE,
  RankingConfigSchema,
  type RankingConfig,
  type SimilarityMap,
} from './types.js';

const NO_STRUCTURAL_MATCH: StructuralScore = { score: 0, signals: [] };

/**
 * Combine structural and similarity scores
 */
export function combineScores(
  kgScore: number,
  similarityScore: number,
  kgWeight: number,
  similarityWeight: number,
): number {
  return Number((kgWeight * kgScore + similarityWeight * similarityScore).toFixed(2));
}

/**
 * Drop results under the threshold, then sort by score descending.
 * Array.prototype.sort is stable, so tied candidates keep their input order.
 */
export function filterAndSort(results: MatchResult[], minScore: number): MatchResult[] {
  return results.filter((r) => r.score >= minScore).sort((a, b) => b.score - a.score);
}

export interface BlendDependencies {
  reasonGenerator: ReasonGenerator;
  ranking?: Partial<RankingConfig>;
  log?: AgentLogFn;
}

export async function blendCandidates(
  request: MatchRequest,
  externalSimilarity: SimilarityMap,
  deps: BlendDependencies,
): Promise<MatchResult[]> {
  const { user_profile: userProfile, user_objective: userObjective } = request;
  const candidates = request.network_profiles;
  if (candidates.length === 0) return [];

  const log = deps.log ?? noopLog;
  const ranking = RankingConfigSchema.parse(deps.ranking ?? {});

  log('info', 'Knowledge graph scoring', { candidates: candidates.length });
  const structural = scoreAllCandidates(userProfile, userObjective, candidates);

  log('info', 'Generating reasons', { concurrency: ranking.reasonConcurrency ?? 'unbounded' });
  const results = await mapWithConcurrency(
    candidates,
    async (candidate): Promise<MatchResult> => {
      const { score: kgScore, signals } =
        structural.get(candidate.profile_id) ?? NO_STRUCTURAL_MATCH;
      const { similarity, rank } =
        externalSimilarity.get(candidate.profile_id) ?? MISSING_RETRIEVAL_SCORE;

      const { reason } = await deps.reasonGenerator.generate(
        {
          userProfile,
          userObjective,
          candidate,
          signals,
          kgScore,
          similarityScore: similarity,
        },
        log,
      );

      return Object.freeze({
        profile_id: candidate.profile_id,
        name: candidate.name,
        score: combineScores(kgScore, similarity, ranking.kgWeight, ranking.similarityWeight),
        reason,
        kg_signals: [...signals],
        retrieval_rank: rank,
      });
    },
    ranking.reasonConcurrency,
  );

  const ranked = filterAndSort(results, ranking.minScore);
  log('info', 'Matching complete', { scored: results.length, returned: ranked.length });
  return ranked;
}
