/**
 * Retrieval types
 */

import type { KnowledgeGraph } from '../core/graph.js';
import type {
  AssessmentEntity,
  ChunkEntity,
  DecisionEntity,
  GapEntity,
  KnowledgeEntity,
  QuestionEntity,
  RoadmapItemEntity
} from '../core/types.js';

export interface RetrievedItem<E extends KnowledgeEntity = KnowledgeEntity> {
  id: string;
  data: E;
  similarity: number;
  /** Chunks only: id of the decision overriding this chunk */
  supersededBy?: string;
}

/**
 * Matches grouped by authority category. Keys are created in authority
 * order, so iterating the object walks from highest to lowest authority.
 */
export interface AuthorityResults {
  decisions: RetrievedItem<DecisionEntity>[];
  answered_questions: RetrievedItem<QuestionEntity>[];
  assessments: RetrievedItem<AssessmentEntity>[];
  roadmap_items: RetrievedItem<RoadmapItemEntity>[];
  gaps: RetrievedItem<GapEntity>[];
  chunks: RetrievedItem<ChunkEntity>[];
  pending_questions: RetrievedItem<QuestionEntity>[];
}

export interface RetrievalMatch {
  entity: KnowledgeEntity;
  similarity: number;
}

/**
 * Strategy deciding which entities match a query and how well
 */
export interface RetrievalMatcher {
  readonly name: string;
  match(query: string, graph: KnowledgeGraph): Promise<RetrievalMatch[]>;
}

export interface RetrievalOptions {
  /** Per-category cap */
  topK?: number;
  matcher?: RetrievalMatcher;
  /** When false, chunks overridden by a decision are left out */
  includeSuperseded?: boolean;
}
