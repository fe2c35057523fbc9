/**
 * Contracts for the external artifact stores the sync procedure reads
 */

import type {
  ChunkEntity,
  DecisionEntity,
  Embedding,
  JsonObject,
  QuestionEntity,
  RoadmapItemEntity
} from '../core/types.js';

export interface ChunkRecord {
  entity: ChunkEntity;
  embedding?: Embedding;
}

/**
 * Read side of every store feeding the graph. An empty store yields an empty
 * result; unreadable data rejects with a `SourceError`.
 */
export interface KnowledgeSources {
  loadRoadmapItems(): Promise<RoadmapItemEntity[]>;
  loadQuestions(): Promise<QuestionEntity[]>;
  loadDecisions(): Promise<DecisionEntity[]>;
  /** Single architecture alignment payload, if one has been produced */
  loadArchitectureAssessment(): Promise<JsonObject | undefined>;
  loadCompetitiveAssessments(): Promise<JsonObject[]>;
  loadChunks(): Promise<ChunkRecord[]>;
}
