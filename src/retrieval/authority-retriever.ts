/**
 * Authority-ordered retrieval
 *
 * Matches are grouped by authority category so synthesis consumers always
 * see decisions before answered questions, assessments, roadmap items, gaps,
 * chunks and finally open questions. Within a category, matches are ordered
 * by similarity.
 */

import { AUTHORITY_ORDER, getSupersedingDecision } from '../core/authority.js';
import { isAnsweredQuestion } from '../core/entities.js';
import type { KnowledgeGraph } from '../core/graph.js';
import type { KnowledgeGraphConfig } from '../config/config.js';
import type { EmbeddingProvider } from '../utils/embedding-service.js';
import { ConfigurationError } from '../utils/error-handler.js';
import { EmbeddingMatcher } from './embedding-matcher.js';
import { KeywordMatcher } from './keyword-matcher.js';
import type {
  AuthorityResults,
  RetrievalMatch,
  RetrievalMatcher,
  RetrievalOptions,
  RetrievedItem
} from './types.js';

export const DEFAULT_TOP_K = 20;

export function createEmptyResults(): AuthorityResults {
  return {
    decisions: [],
    answered_questions: [],
    assessments: [],
    roadmap_items: [],
    gaps: [],
    chunks: [],
    pending_questions: []
  };
}

const bySimilarity = (a: { similarity: number }, b: { similarity: number }) => b.similarity - a.similarity;

function place(results: AuthorityResults, match: RetrievalMatch, graph: KnowledgeGraph, includeSuperseded: boolean): void {
  const { entity, similarity } = match;

  switch (entity.kind) {
    case 'decision':
      results.decisions.push({ id: entity.id, data: entity, similarity });
      break;
    case 'question':
      if (isAnsweredQuestion(entity)) {
        results.answered_questions.push({ id: entity.id, data: entity, similarity });
      } else {
        results.pending_questions.push({ id: entity.id, data: entity, similarity });
      }
      break;
    case 'assessment':
      results.assessments.push({ id: entity.id, data: entity, similarity });
      break;
    case 'roadmap_item':
      results.roadmap_items.push({ id: entity.id, data: entity, similarity });
      break;
    case 'gap':
      results.gaps.push({ id: entity.id, data: entity, similarity });
      break;
    case 'chunk': {
      const superseding = getSupersedingDecision(graph, entity.id);
      if (superseding && !includeSuperseded) {
        break;
      }
      const item: RetrievedItem<typeof entity> = { id: entity.id, data: entity, similarity };
      if (superseding) {
        item.supersededBy = superseding.id;
      }
      results.chunks.push(item);
      break;
    }
  }
}

function rankAndCap<T extends { similarity: number }>(items: T[], topK: number): T[] {
  return [...items].sort(bySimilarity).slice(0, topK);
}

/**
 * Retrieve matches for `query`, grouped by authority category
 */
export async function retrieveWithAuthority(
  query: string,
  graph: KnowledgeGraph,
  options: RetrievalOptions = {}
): Promise<AuthorityResults> {
  const topK = Math.max(0, Math.floor(options.topK ?? DEFAULT_TOP_K));
  const matcher = options.matcher ?? new KeywordMatcher();
  const includeSuperseded = options.includeSuperseded ?? true;

  const results = createEmptyResults();
  for (const match of await matcher.match(query, graph)) {
    place(results, match, graph, includeSuperseded);
  }

  return {
    decisions: rankAndCap(results.decisions, topK),
    answered_questions: rankAndCap(results.answered_questions, topK),
    assessments: rankAndCap(results.assessments, topK),
    roadmap_items: rankAndCap(results.roadmap_items, topK),
    gaps: rankAndCap(results.gaps, topK),
    chunks: rankAndCap(results.chunks, topK),
    pending_questions: rankAndCap(results.pending_questions, topK)
  };
}

/**
 * Matcher selected by `retrieval.matcher`
 */
export function createMatcher(
  retrieval: KnowledgeGraphConfig['retrieval'],
  embedder?: EmbeddingProvider
): RetrievalMatcher {
  switch (retrieval.matcher) {
    case 'keyword':
      return new KeywordMatcher();
    case 'embedding':
      if (!embedder) {
        throw new ConfigurationError('The embedding matcher needs an embedding provider');
      }
      return new EmbeddingMatcher(embedder, { minSimilarity: retrieval.minSimilarity });
  }
}

export function countResults(results: AuthorityResults): number {
  return AUTHORITY_ORDER.reduce((total, category) => total + results[category].length, 0);
}
