import { authorityCategoryOf, type AuthorityCategory } from '../core/authority.js';
import { entityMatches } from '../core/entities.js';
import type { KnowledgeGraph } from '../core/graph.js';
import type { RetrievalMatch, RetrievalMatcher } from './types.js';

/**
 * Fixed scores per category; keyword containment carries no graded relevance
 */
export const KEYWORD_SCORES: Record<AuthorityCategory, number> = {
  decisions: 0.9,
  answered_questions: 0.8,
  assessments: 0.8,
  roadmap_items: 0.7,
  gaps: 0.7,
  chunks: 0.7,
  pending_questions: 0.7
};

/**
 * Case-insensitive containment of the query in the serialized entity.
 * The query is used as given, so the empty string matches every node.
 */
export class KeywordMatcher implements RetrievalMatcher {
  readonly name = 'keyword';

  async match(query: string, graph: KnowledgeGraph): Promise<RetrievalMatch[]> {
    const matches: RetrievalMatch[] = [];
    for (const node of graph.getAllNodes()) {
      if (entityMatches(node.entity, query)) {
        matches.push({ entity: node.entity, similarity: KEYWORD_SCORES[authorityCategoryOf(node.entity)] });
      }
    }
    return matches;
  }
}
