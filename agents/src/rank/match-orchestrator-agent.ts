/**
 * Match Orchestrator Agent - runs the three-stage matching pipeline for one request
 *
 *   Stage 1 - Knowledge graph   -> structural scores + typed signals
 *   Stage 2 - Semantic retrieval -> similarity scores + retrieval rank
 *   Stage 3 - LLM reasoning      -> one-sentence reason per candidate (concurrent)
 *
 * Retrieval runs first so that a failure there is settled before fan-out. Any other
 * failure is reported as a single failed AgentResult; partial lists are never returned.
 */

import { z } from 'zod';
import { matchRequestSchema, matchResultSchema, type MatchRequest, type MatchResult } from '@matchgraph/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig } from '../shared/types.js';
import { blendCandidates } from './blend.js';
import type { ReasonGenerator } from './reason-generator.js';
import { RetrievalError, type SimilarityRetriever } from './semantic-retriever.js';
import type { MatchingConfig, SimilarityMap } from './types.js';

export interface MatchOrchestratorDependencies {
  retriever: SimilarityRetriever;
  reasonGenerator: ReasonGenerator;
  config: Pick<MatchingConfig, 'ranking' | 'retrieval'>;
}

export class MatchOrchestratorAgent extends BaseAgent<MatchRequest, MatchResult[]> {
  config: AgentConfig = {
    name: 'MatchOrchestrator',
    description: 'Ranks candidate profiles against a user objective with graph, semantic and LLM stages',
    version: '1.0.0',
  };

  inputSchema = matchRequestSchema;
  outputSchema = z.array(matchResultSchema);

  constructor(private readonly deps: MatchOrchestratorDependencies) {
    super();
  }

  protected async run(request: MatchRequest): Promise<MatchResult[]> {
    if (request.network_profiles.length === 0) {
      this.info('No candidates supplied; nothing to rank');
      return [];
    }

    const similarity = await this.retrieveSimilarity(request);

    return blendCandidates(request, similarity, {
      reasonGenerator: this.deps.reasonGenerator,
      ranking: this.deps.config.ranking,
      log: this.logFn,
    });
  }

  private async retrieveSimilarity(request: MatchRequest): Promise<SimilarityMap> {
    this.info('Running semantic retrieval');
    try {
      return await this.deps.retriever.retrieve(
        request.user_profile,
        request.user_objective,
        request.network_profiles,
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (this.deps.config.retrieval.failurePolicy === 'abort') {
        throw err instanceof RetrievalError
          ? err
          : new RetrievalError(`Semantic retrieval failed: ${message}`, { cause: err });
      }
      this.warn('Semantic retrieval failed; using zero similarity for every candidate', {
        error: message,
      });
      return new Map();
    }
  }
}
