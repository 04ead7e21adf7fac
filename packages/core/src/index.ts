/**
 * @matchgraph/core - knowledge graph model and structural scoring
 */

export const APP_NAME = 'MatchGraph';

export { KnowledgeGraph } from './graph/knowledge-graph';
export { normalizeLabel, labelNodeId, userNodeId, candidateNodeId } from './graph/normalize';
export { buildGraph, titleTokens, MIN_TITLE_TOKEN_LENGTH } from './graph/build-graph';
export {
  scoreCandidate,
  scoreAllCandidates,
  SHARED_SKILL_POINTS,
  EXACT_TITLE_POINTS,
  PARTIAL_TITLE_POINTS,
  GOAL_SIGNAL_POINTS,
  MAX_STRUCTURAL_SCORE,
} from './graph/structural-scorer';
export type {
  NodeType,
  EdgeRelation,
  GraphNode,
  GraphEdge,
  StructuralScore,
} from './graph/types';
