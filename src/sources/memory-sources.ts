/**
 * In-memory artifact stores for programmatic use and tests
 */

import type { DecisionEntity, JsonObject, QuestionEntity, RoadmapItemEntity } from '../core/types.js';
import type { ChunkRecord, KnowledgeSources } from './types.js';

export interface MemorySourceData {
  roadmapItems: RoadmapItemEntity[];
  questions: QuestionEntity[];
  decisions: DecisionEntity[];
  architecture?: JsonObject;
  competitive: JsonObject[];
  chunks: ChunkRecord[];
}

export class InMemoryKnowledgeSources implements KnowledgeSources {
  data: MemorySourceData;

  constructor(data: Partial<MemorySourceData> = {}) {
    this.data = {
      roadmapItems: [],
      questions: [],
      decisions: [],
      competitive: [],
      chunks: [],
      ...data
    };
  }

  async loadRoadmapItems(): Promise<RoadmapItemEntity[]> {
    return [...this.data.roadmapItems];
  }

  async loadQuestions(): Promise<QuestionEntity[]> {
    return [...this.data.questions];
  }

  async loadDecisions(): Promise<DecisionEntity[]> {
    return [...this.data.decisions];
  }

  async loadArchitectureAssessment(): Promise<JsonObject | undefined> {
    return this.data.architecture;
  }

  async loadCompetitiveAssessments(): Promise<JsonObject[]> {
    return [...this.data.competitive];
  }

  async loadChunks(): Promise<ChunkRecord[]> {
    return [...this.data.chunks];
  }
}
