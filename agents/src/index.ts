/**
 * @matchgraph/agents - Agent implementations
 *
 * - rank/   : Semantic retrieval, score blending, reason generation, orchestration
 * - shared/ : Base agent, logging types, concurrency helper
 */

export * from './shared/index.js';
export * from './rank/index.js';
