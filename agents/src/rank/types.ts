/**
 * Types for Rank agents
 */

import { z } from 'zod';
import { reasonBackendModeEnum, retrievalFailurePolicyEnum } from '@matchgraph/schemas';

export const DEFAULT_KG_WEIGHT = 0.45;
export const DEFAULT_SIMILARITY_WEIGHT = 0.55;

const WEIGHT_SUM_TOLERANCE = 1e-9;

/** Largest delay setTimeout honours; longer delays fire immediately. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const RankingConfigSchema = z
  .object({
    kgWeight: z.number().min(0).max(1).default(DEFAULT_KG_WEIGHT),
    similarityWeight: z.number().min(0).max(1).default(DEFAULT_SIMILARITY_WEIGHT),
    /** Results below this final score are dropped (inclusive lower bound). */
    minScore: z.number().min(0).max(100).default(0),
    /** Max reason-generation tasks in flight; unset means one per candidate at once. */
    reasonConcurrency: z.number().int().positive().optional(),
  })
  .refine((cfg) => Math.abs(cfg.kgWeight + cfg.similarityWeight - 1) <= WEIGHT_SUM_TOLERANCE, {
    message: 'kgWeight and similarityWeight must sum to 1',
  });

export type RankingConfig = z.infer<typeof RankingConfigSchema>;

export const ReasonConfigSchema = z.object({
  mode: reasonBackendModeEnum.default('auto'),
  /** Per-attempt bound on each remote call */
  timeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(30000),
});

export type ReasonConfig = z.infer<typeof ReasonConfigSchema>;

export const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().default(5),
  failurePolicy: retrievalFailurePolicyEnum.default('zero_fill'),
});

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

export const MatchingConfigSchema = z.object({
  ranking: RankingConfigSchema,
  reason: ReasonConfigSchema,
  retrieval: RetrievalConfigSchema,
});

export type MatchingConfig = z.infer<typeof MatchingConfigSchema>;

/** Externally supplied semantic signal for one candidate. */
export interface RetrievalScore {
  /** 0-100 */
  similarity: number;
  /** 1-based rank among retrieved candidates; null when not retrieved */
  rank: number | null;
}

export type SimilarityMap = Map<string, RetrievalScore>;

export const MISSING_RETRIEVAL_SCORE: Readonly<RetrievalScore> = Object.freeze({
  similarity: 0,
  rank: null,
});
