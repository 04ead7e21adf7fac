/**
 * Graph Builder
 *
 * Nodes: USER, CANDIDATE, SKILL, TITLE, INDUSTRY, GOAL
 * Edges:
 *   USER      -[HAS_SKILL]->   SKILL
 *   USER      -[SEEKS_TITLE]-> TITLE
 *   USER      -[HAS_GOAL]->    GOAL
 *   CANDIDATE -[HAS_SKILL]->   SKILL
 *   CANDIDATE -[HAS_TITLE]->   TITLE   (one per title token longer than 3 chars, plus the full title)
 *   CANDIDATE -[IN_INDUSTRY]-> INDUSTRY
 */

import type { NetworkProfile, UserObjective, UserProfileInfo } from '@matchgraph/schemas';
import { KnowledgeGraph } from './knowledge-graph';
import { candidateNodeId, labelNodeId, userNodeId } from './normalize';
import type { EdgeRelation } from './types';

/** Title tokens of this length or shorter ("VP", "of", "Sr.") are noise and never become nodes. */
export const MIN_TITLE_TOKEN_LENGTH = 4;

export function titleTokens(title: string): string[] {
  return title
    .split(/\s+/)
    .filter((word) => word.length >= MIN_TITLE_TOKEN_LENGTH);
}

function linkLabel(
  graph: KnowledgeGraph,
  sourceId: string,
  type: 'SKILL' | 'TITLE' | 'INDUSTRY' | 'GOAL',
  label: string,
  relation: EdgeRelation,
  why?: string,
): void {
  const nodeId = labelNodeId(type, label);
  if (!nodeId) return;
  graph.addNode(nodeId, type, label);
  graph.addEdge(sourceId, nodeId, relation, why);
}

export function buildGraph(
  userProfile: UserProfileInfo,
  userObjective: UserObjective,
  candidates: NetworkProfile[],
): KnowledgeGraph {
  const graph = new KnowledgeGraph();

  const userId = userNodeId(userObjective.person_id);
  graph.addNode(userId, 'USER', userProfile.current_role.title);

  for (const skill of userProfile.top_skills) {
    linkLabel(graph, userId, 'SKILL', skill.skill, 'HAS_SKILL');
  }

  for (const target of userObjective.target_profiles) {
    for (const title of target.titles) {
      linkLabel(graph, userId, 'TITLE', title, 'SEEKS_TITLE', target.why ?? '');
    }
  }

  for (const signal of userObjective.success_signals) {
    linkLabel(graph, userId, 'GOAL', signal, 'HAS_GOAL');
  }

  for (const candidate of candidates) {
    const candidateId = candidateNodeId(candidate.profile_id);
    graph.addNode(candidateId, 'CANDIDATE', candidate.name, {
      title: candidate.title,
      company: candidate.company ?? '',
      industry: candidate.industry ?? '',
    });

    for (const skill of candidate.skills) {
      linkLabel(graph, candidateId, 'SKILL', skill, 'HAS_SKILL');
    }

    for (const word of titleTokens(candidate.title)) {
      linkLabel(graph, candidateId, 'TITLE', word, 'HAS_TITLE');
    }
    linkLabel(graph, candidateId, 'TITLE', candidate.title, 'HAS_TITLE');

    if (candidate.industry) {
      linkLabel(graph, candidateId, 'INDUSTRY', candidate.industry, 'IN_INDUSTRY');
    }
  }

  return graph;
}
