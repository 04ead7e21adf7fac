/**
 * Semantic retrieval - embeds candidate profiles and the user's intent, ranks by cosine similarity.
 *
 * The embedding model is injected (loaded once, reused across requests); nothing is
 * persisted between calls.
 */

import type { NetworkProfile, UserObjective, UserProfileInfo } from '@matchgraph/schemas';
import { noopLog, type AgentLogFn } from '../shared/types.js';
import type { RetrievalScore, SimilarityMap } from './types.js';

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

export interface SimilarityRetriever {
  retrieve(
    userProfile: UserProfileInfo,
    userObjective: UserObjective,
    candidates: NetworkProfile[],
  ): Promise<SimilarityMap>;
}

export class RetrievalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RetrievalError';
  }
}

/** Rich text document for one candidate. */
export function buildCandidateDocument(candidate: NetworkProfile): string {
  const parts = [`Name: ${candidate.name}`, `Title: ${candidate.title}`];
  if (candidate.company) parts.push(`Company: ${candidate.company}`);
  if (candidate.industry) parts.push(`Industry: ${candidate.industry}`);
  if (candidate.skills.length > 0) parts.push(`Skills: ${candidate.skills.join(', ')}`);
  if (candidate.summary) parts.push(`Summary: ${candidate.summary}`);
  return parts.join('. ');
}

/** The user's intent as one retrieval query. */
export function buildQueryDocument(
  userProfile: UserProfileInfo,
  userObjective: UserObjective,
): string {
  const parts = [`Goal: ${userObjective.primary_goal}`];
  for (const target of userObjective.target_profiles) {
    parts.push(`Seeking: ${target.titles.join(', ')} — ${target.why ?? ''}`);
  }
  if (userObjective.success_signals.length > 0) {
    parts.push(`Success signals: ${userObjective.success_signals.join(', ')}`);
  }
  if (userProfile.top_skills.length > 0) {
    parts.push(`User skills: ${userProfile.top_skills.map((sk) => sk.skill).join(', ')}`);
  }
  if (userProfile.solutions_offered.length > 0) {
    parts.push(`Solutions offered: ${userProfile.solutions_offered.join(', ')}`);
  }
  return parts.join('. ');
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  const denom = Math.sqrt(na) * Math.sqrt(nb);
  return denom === 0 ? 0 : dot / denom;
}

/** Cosine similarity on a 0-100 scale, 4 decimals, negatives floored at 0. */
export function toSimilarityScore(cosine: number): number {
  const scaled = Math.round(cosine * 100 * 10000) / 10000;
  return Math.min(100, Math.max(0, scaled));
}

export interface EmbeddingRetrieverOptions {
  topK?: number;
  log?: AgentLogFn;
}

export class EmbeddingSimilarityRetriever implements SimilarityRetriever {
  private readonly topK: number;
  private readonly log: AgentLogFn;
  private ready = false;

  constructor(
    private readonly embedder: Embedder,
    options: EmbeddingRetrieverOptions = {},
  ) {
    this.topK = options.topK ?? 5;
    this.log = options.log ?? noopLog;
  }

  /**
   * Load the embedding model ahead of the first request.
   * A failed warm-up is logged; the retriever still reports ready so requests can proceed.
   */
  async warmUp(): Promise<void> {
    try {
      await this.embedder.embed(['warm-up']);
      this.log('info', 'Embedding model ready');
    } catch (err) {
      this.log('warn', 'Embedding model warm-up failed', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    this.ready = true;
  }

  isReady(): boolean {
    return this.ready;
  }

  async retrieve(
    userProfile: UserProfileInfo,
    userObjective: UserObjective,
    candidates: NetworkProfile[],
  ): Promise<SimilarityMap> {
    const scores: SimilarityMap = new Map();
    if (candidates.length === 0) return scores;

    const query = buildQueryDocument(userProfile, userObjective);
    const documents = candidates.map(buildCandidateDocument);

    let embeddings: number[][];
    try {
      embeddings = await this.embedder.embed([query, ...documents]);
    } catch (err) {
      throw new RetrievalError(
        `Embedding failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    if (embeddings.length !== documents.length + 1) {
      throw new RetrievalError(
        `Embedding count mismatch: expected ${documents.length + 1}, got ${embeddings.length}`,
      );
    }

    const [queryEmbedding = [], ...candidateEmbeddings] = embeddings;
    const ranked = candidates
      .map((candidate, index) => ({
        profileId: candidate.profile_id,
        similarity: toSimilarityScore(cosineSimilarity(queryEmbedding, candidateEmbeddings[index] ?? [])),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, Math.min(this.topK, candidates.length));

    ranked.forEach((entry, index) => {
      const score: RetrievalScore = { similarity: entry.similarity, rank: index + 1 };
      if (!scores.has(entry.profileId)) scores.set(entry.profileId, score);
    });

    this.log('debug', 'Semantic retrieval complete', {
      candidates: candidates.length,
      retrieved: scores.size,
    });
    return scores;
  }
}
