/**
 * Structural Scorer - overlap between USER intent nodes and one CANDIDATE's nodes.
 *
 * Scoring breakdown
 *   Shared SKILL node            : 15 pts each
 *   Exact SEEKS_TITLE hit        : 20 pts each
 *   Partial title (substring)    : 10 pts per sought title
 *   GOAL keyword overlap         : 10 pts per goal
 *   Cap                          : 100
 *
 * LLM Usage: None (pure code logic)
 */

import type { NetworkProfile, UserObjective, UserProfileInfo } from '@matchgraph/schemas';
import { buildGraph } from './build-graph';
import type { KnowledgeGraph } from './knowledge-graph';
import { candidateNodeId, userNodeId } from './normalize';
import type { StructuralScore } from './types';

export const SHARED_SKILL_POINTS = 15;
export const EXACT_TITLE_POINTS = 20;
export const PARTIAL_TITLE_POINTS = 10;
export const GOAL_SIGNAL_POINTS = 10;
export const MAX_STRUCTURAL_SCORE = 100;

function labelOf(graph: KnowledgeGraph, nodeId: string): string {
  return graph.getNode(nodeId)?.label ?? nodeId;
}

function foldedLabel(graph: KnowledgeGraph, nodeId: string): string {
  return (graph.getNode(nodeId)?.label ?? '').toLowerCase();
}

function overlaps(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

export function scoreCandidate(
  graph: KnowledgeGraph,
  userId: string,
  candidateId: string,
): StructuralScore {
  const signals: string[] = [];
  let score = 0;

  const candidateSkills = graph.successors(candidateId, 'HAS_SKILL');
  const candidateTitles = graph.successors(candidateId, 'HAS_TITLE');
  const candidateSkillSet = new Set(candidateSkills);
  const candidateTitleSet = new Set(candidateTitles);

  // Skill overlap
  for (const skill of graph.successors(userId, 'HAS_SKILL')) {
    if (!candidateSkillSet.has(skill)) continue;
    signals.push(`Shared skill: ${labelOf(graph, skill)}`);
    score += SHARED_SKILL_POINTS;
  }

  // Exact title match: USER -[SEEKS_TITLE]-> t <-[HAS_TITLE]- CANDIDATE
  const soughtTitles = graph.successors(userId, 'SEEKS_TITLE');
  const matchedTitles = new Set<string>();
  for (const title of soughtTitles) {
    if (!candidateTitleSet.has(title)) continue;
    signals.push(`Title match: ${labelOf(graph, title)}`);
    score += EXACT_TITLE_POINTS;
    matchedTitles.add(title);
  }

  // Partial title match, at most once per sought title
  for (const title of soughtTitles) {
    if (matchedTitles.has(title)) continue;
    const sought = foldedLabel(graph, title);
    for (const candidateTitle of candidateTitles) {
      const held = foldedLabel(graph, candidateTitle);
      if (!overlaps(sought, held)) continue;
      signals.push(`Partial title match: ${sought} ↔ ${held}`);
      score += PARTIAL_TITLE_POINTS;
      matchedTitles.add(title);
      break;
    }
  }

  // Goal signals against candidate skill and title labels
  const candidateNodes = [...candidateSkills, ...candidateTitles];
  for (const goal of graph.successors(userId, 'HAS_GOAL')) {
    const goalLabel = foldedLabel(graph, goal);
    const hit = candidateNodes.some((nodeId) => overlaps(goalLabel, foldedLabel(graph, nodeId)));
    if (!hit) continue;
    signals.push(`Goal signal match: ${goalLabel}`);
    score += GOAL_SIGNAL_POINTS;
  }

  return { score: Math.min(score, MAX_STRUCTURAL_SCORE), signals };
}

/**
 * Build one graph for the request and score every candidate against it.
 * Keyed by profile_id, in candidate input order.
 */
export function scoreAllCandidates(
  userProfile: UserProfileInfo,
  userObjective: UserObjective,
  candidates: NetworkProfile[],
): Map<string, StructuralScore> {
  const graph = buildGraph(userProfile, userObjective, candidates);
  const userId = userNodeId(userObjective.person_id);
  const results = new Map<string, StructuralScore>();
  for (const candidate of candidates) {
    results.set(
      candidate.profile_id,
      scoreCandidate(graph, userId, candidateNodeId(candidate.profile_id)),
    );
  }
  return results;
}
