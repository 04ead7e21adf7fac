/**
 * Matching configuration loaded from environment variables.
 */

import { MatchingConfigSchema, type MatchingConfig } from './types.js';

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function readLower(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim().toLowerCase();
  return raw ? raw : undefined;
}

function readBackendMode(env: Env): string | undefined {
  const raw = readLower(env, 'LLM_BACKEND');
  return raw === 'hf' ? 'huggingface' : raw;
}

/** When only one weight is set, the other is its complement. */
function readWeights(env: Env): { kgWeight?: number; similarityWeight?: number } {
  const kgWeight = readNumber(env, 'KG_WEIGHT');
  const similarityWeight = readNumber(env, 'SIM_WEIGHT');
  if (kgWeight !== undefined && similarityWeight === undefined) {
    return { kgWeight, similarityWeight: 1 - kgWeight };
  }
  if (kgWeight === undefined && similarityWeight !== undefined) {
    return { kgWeight: 1 - similarityWeight, similarityWeight };
  }
  return { kgWeight, similarityWeight };
}

export function loadMatchingConfig(env: Env = process.env): MatchingConfig {
  const timeoutSeconds = readNumber(env, 'LLM_TIMEOUT');

  const parsed = MatchingConfigSchema.safeParse({
    ranking: {
      ...readWeights(env),
      minScore: readNumber(env, 'MIN_SCORE_THRESHOLD'),
      reasonConcurrency: readNumber(env, 'REASON_CONCURRENCY'),
    },
    reason: {
      mode: readBackendMode(env),
      timeoutMs: timeoutSeconds === undefined ? undefined : Math.round(timeoutSeconds * 1000),
    },
    retrieval: {
      topK: readNumber(env, 'RETRIEVAL_TOP_K'),
      failurePolicy: readLower(env, 'RETRIEVAL_FAILURE_POLICY'),
    },
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid matching configuration: ${issues}`);
  }

  return parsed.data;
}
