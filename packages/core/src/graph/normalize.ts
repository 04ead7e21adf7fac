/**
 * Label normalization and node id construction.
 * The normalized label is the dedupe key: "Machine Learning" and "  machine   learning "
 * both become `skill::machine_learning`.
 */

import type { NodeType } from './types';

export function normalizeLabel(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, '_');
}

const NODE_PREFIX: Record<Exclude<NodeType, 'USER' | 'CANDIDATE'>, string> = {
  SKILL: 'skill',
  TITLE: 'title',
  INDUSTRY: 'industry',
  GOAL: 'goal',
};

/**
 * Id for a label-keyed node. Returns null when the label normalizes to nothing,
 * so blank skills/titles/goals never become nodes.
 */
export function labelNodeId(type: keyof typeof NODE_PREFIX, label: string): string | null {
  const normalized = normalizeLabel(label);
  if (!normalized) return null;
  return `${NODE_PREFIX[type]}::${normalized}`;
}

export function userNodeId(personId: string): string {
  return `user::${personId}`;
}

export function candidateNodeId(profileId: string): string {
  return `candidate::${profileId}`;
}
