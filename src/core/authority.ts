/**
 * Authority hierarchy
 *
 * Fixed ordinal ranking of artifact types (1 = highest authority). Decisions
 * annotate precedence over conflicting evidence through OVERRIDES edges; the
 * overridden chunks stay in the graph.
 */

import { isAnsweredQuestion } from './entities.js';
import type { KnowledgeGraph } from './graph.js';
import type { ChunkEntity, DecisionEntity, KnowledgeEntity } from './types.js';

export const AUTHORITY_LEVELS = {
  decision: 1,
  answered_question: 2,
  assessment: 3,
  roadmap_item: 4,
  gap: 5,
  chunk: 6,
  pending_question: 7
} as const;

export type AuthorityLevel = keyof typeof AUTHORITY_LEVELS;

/**
 * Result categories, in authority order
 */
export const AUTHORITY_ORDER = [
  'decisions',
  'answered_questions',
  'assessments',
  'roadmap_items',
  'gaps',
  'chunks',
  'pending_questions'
] as const;

export type AuthorityCategory = typeof AUTHORITY_ORDER[number];

const CATEGORY_LEVEL: Record<AuthorityCategory, AuthorityLevel> = {
  decisions: 'decision',
  answered_questions: 'answered_question',
  assessments: 'assessment',
  roadmap_items: 'roadmap_item',
  gaps: 'gap',
  chunks: 'chunk',
  pending_questions: 'pending_question'
};

/**
 * Category an entity is surfaced under. Questions that are not answered
 * (pending, deferred, obsolete) rank lowest.
 */
export function authorityCategoryOf(entity: KnowledgeEntity): AuthorityCategory {
  switch (entity.kind) {
    case 'decision':
      return 'decisions';
    case 'question':
      return isAnsweredQuestion(entity) ? 'answered_questions' : 'pending_questions';
    case 'assessment':
      return 'assessments';
    case 'roadmap_item':
      return 'roadmap_items';
    case 'gap':
      return 'gaps';
    case 'chunk':
      return 'chunks';
  }
}

export function categoryRank(category: AuthorityCategory): number {
  return AUTHORITY_LEVELS[CATEGORY_LEVEL[category]];
}

export function authorityRank(entity: KnowledgeEntity): number {
  return categoryRank(authorityCategoryOf(entity));
}

/**
 * Sort comparator: higher authority first
 */
export function compareAuthority(a: KnowledgeEntity, b: KnowledgeEntity): number {
  return authorityRank(a) - authorityRank(b);
}

/**
 * Decision that supersedes a chunk, if any
 *
 * Walks the chunk's predecessors for OVERRIDES edges. When several decisions
 * override the same chunk the most similar one wins.
 */
export function getSupersedingDecision(graph: KnowledgeGraph, chunkId: string): DecisionEntity | undefined {
  let best: { decision: DecisionEntity; weight: number } | undefined;

  for (const edge of graph.getIncomingEdges(chunkId, ['OVERRIDES'])) {
    const decision = graph.getNodesByType('decision').get(edge.source);
    if (decision && (!best || edge.weight > best.weight)) {
      best = { decision, weight: edge.weight };
    }
  }

  return best?.decision;
}

/**
 * Chunks a decision overrides, most similar first
 */
export function getDecisionOverrides(graph: KnowledgeGraph, decisionId: string): ChunkEntity[] {
  const chunks = graph.getNodesByType('chunk');

  return graph
    .getOutgoingEdges(decisionId, ['OVERRIDES'])
    .sort((a, b) => b.weight - a.weight)
    .flatMap(edge => {
      const chunk = chunks.get(edge.target);
      return chunk ? [chunk] : [];
    });
}
