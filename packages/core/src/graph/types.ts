/**
 * Typed property graph over one user's intent and a batch of candidates.
 */

export type NodeType = 'USER' | 'CANDIDATE' | 'SKILL' | 'TITLE' | 'INDUSTRY' | 'GOAL';

export type EdgeRelation = 'HAS_SKILL' | 'SEEKS_TITLE' | 'HAS_GOAL' | 'HAS_TITLE' | 'IN_INDUSTRY';

export interface GraphNode {
  id: string;
  type: NodeType;
  /** Label as given on first insertion */
  label: string;
  attributes: Record<string, string>;
}

export interface GraphEdge {
  source: string;
  target: string;
  relation: EdgeRelation;
  /** SEEKS_TITLE carries the target profile's rationale */
  why?: string;
}

export interface StructuralScore {
  score: number;
  signals: string[];
}
