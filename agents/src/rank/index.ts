/**
 * Rank Agents - candidate scoring and ranking
 *
 * Modules:
 * - ReasonGenerator: Resilient LLM justification chain with deterministic fallback
 * - EmbeddingSimilarityRetriever: Semantic similarity + retrieval rank
 * - blendCandidates: Weighted blend of structural and semantic scores, filter, sort
 * - MatchOrchestratorAgent: Retrieval + blend behind the agent contract
 * - createMatchPipeline: Wires clients and config into a ready agent
 */

export * from './types.js';
export * from './config.js';
export * from './reason-prompt.js';
export * from './reason-generator.js';
export * from './semantic-retriever.js';
export * from './blend.js';
export * from './match-orchestrator-agent.js';
export * from './pipeline.js';
