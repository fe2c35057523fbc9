/**
 * Integration of store artifacts into the graph
 *
 * Each integrator adds only artifacts whose id is not yet indexed and reports
 * the number of nodes it created. An artifact whose id is already held by a
 * node of another type is skipped and listed under `conflicts`; the rest of
 * the batch is still integrated. Embeddings are requested in one batch per
 * integrator call, before any node is added, so a failing embedding call
 * leaves the graph untouched.
 */

import {
  decisionEmbeddingText,
  roadmapEmbeddingText,
  sameItemName
} from '../core/entities.js';
import type { KnowledgeGraph } from '../core/graph.js';
import type {
  AssessmentEntity,
  KnowledgeEntity,
  AssessmentType,
  DecisionEntity,
  Embedding,
  GapEntity,
  JsonObject,
  JsonValue,
  QuestionEntity,
  RoadmapItemEntity
} from '../core/types.js';
import type { ChunkRecord } from '../sources/types.js';
import type { EmbeddingProvider } from '../utils/embedding-service.js';

export const ARCHITECTURE_ASSESSMENT_ID = 'arch_alignment_001';
export const SUMMARY_LENGTH = 200;

export const EDGE_WEIGHTS = {
  RESOLVES: 1.0,
  IMPACTS: 1.0,
  IDENTIFIES_GAP: 0.9,
  ABOUT_ITEM: 0.8
} as const;

export interface IntegrationResult {
  added: number;
  /** Ids skipped because a node of another type already holds them */
  conflicts: string[];
}

function conflictsWith(graph: KnowledgeGraph, entity: KnowledgeEntity): boolean {
  const existing = graph.getEntity(entity.id);
  return existing !== undefined && existing.kind !== entity.kind;
}

function uniqueNew<T extends KnowledgeEntity>(
  graph: KnowledgeGraph,
  records: readonly T[]
): { pending: T[]; conflicts: string[] } {
  const seen = new Set<string>();
  const pending: T[] = [];
  const conflicts: string[] = [];

  for (const record of records) {
    if (conflictsWith(graph, record)) {
      conflicts.push(record.id);
    } else if (!graph.hasNode(record.id) && !seen.has(record.id)) {
      seen.add(record.id);
      pending.push(record);
    }
  }
  return { pending, conflicts };
}

function matchingRoadmapItems(graph: KnowledgeGraph, names: readonly string[]): string[] {
  const ids: string[] = [];
  for (const item of graph.getNodesByType('roadmap_item').values()) {
    if (names.some(name => sameItemName(name, item.name))) {
      ids.push(item.id);
    }
  }
  return ids;
}

/**
 * Roadmap items, embedded as "name. description"
 */
export async function integrateRoadmapItems(
  graph: KnowledgeGraph,
  items: readonly RoadmapItemEntity[],
  embedder: EmbeddingProvider
): Promise<IntegrationResult> {
  const { pending, conflicts } = uniqueNew(graph, items);
  if (pending.length === 0) {
    return { added: 0, conflicts };
  }

  const embeddings = await embedder.embed(pending.map(roadmapEmbeddingText));

  let added = 0;
  pending.forEach((item, index) => {
    if (graph.addNode(item, embeddings[index])) {
      added++;
    }
  });
  return { added, conflicts };
}

/**
 * Questions, linked to the roadmap items they name. A question resolved by a
 * decision already in the graph is marked answered on arrival.
 */
export function integrateQuestions(graph: KnowledgeGraph, questions: readonly QuestionEntity[]): IntegrationResult {
  const { pending, conflicts } = uniqueNew(graph, questions);
  let added = 0;

  for (const question of pending) {
    graph.addNode(question);
    added++;

    for (const itemId of matchingRoadmapItems(graph, question.relatedRoadmapItems)) {
      graph.addEdge(question.id, itemId, 'ABOUT_ITEM', EDGE_WEIGHTS.ABOUT_ITEM);
    }

    for (const decision of graph.getNodesByType('decision').values()) {
      if (decision.questionId === question.id) {
        graph.addEdge(decision.id, question.id, 'RESOLVES', EDGE_WEIGHTS.RESOLVES);
        graph.markQuestionAnswered(question.id, decision.id);
      }
    }
  }

  return { added, conflicts };
}

/**
 * Decisions, embedded as "statement. rationale" when they carry text
 */
export async function integrateDecisions(
  graph: KnowledgeGraph,
  decisions: readonly DecisionEntity[],
  embedder: EmbeddingProvider
): Promise<IntegrationResult> {
  const { pending, conflicts } = uniqueNew(graph, decisions);
  if (pending.length === 0) {
    return { added: 0, conflicts };
  }

  const embeddable = pending.filter(decision => decisionEmbeddingText(decision).length > 0);
  const vectors = embeddable.length > 0 ? await embedder.embed(embeddable.map(decisionEmbeddingText)) : [];
  const embeddings = new Map<string, Embedding>();
  embeddable.forEach((decision, index) => embeddings.set(decision.id, vectors[index]));

  for (const decision of pending) {
    graph.addNode(decision, embeddings.get(decision.id));

    if (decision.questionId && graph.getNodesByType('question').has(decision.questionId)) {
      graph.addEdge(decision.id, decision.questionId, 'RESOLVES', EDGE_WEIGHTS.RESOLVES);
      graph.markQuestionAnswered(decision.questionId, decision.id);
    }

    for (const itemId of matchingRoadmapItems(graph, decision.relatedRoadmapItems)) {
      graph.addEdge(decision.id, itemId, 'IMPACTS', EDGE_WEIGHTS.IMPACTS);
    }
  }

  return { added: pending.length, conflicts };
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function analysisOf(payload: JsonObject): JsonObject {
  const analysis = payload.analysis;
  return isJsonObject(analysis) ? analysis : {};
}

function firstText(record: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

/**
 * Assessment summary: the executive summary when present, else the
 * serialized payload, truncated
 */
export function summarizeAssessment(payload: JsonObject): string {
  const summary = firstText(analysisOf(payload), ['executive_summary', 'summary']) ?? JSON.stringify(payload);
  return summary.slice(0, SUMMARY_LENGTH);
}

/**
 * Gaps listed under `analysis.roadmap_gaps`
 */
export function extractGaps(assessmentId: string, assessmentType: AssessmentType, payload: JsonObject): GapEntity[] {
  const gaps = analysisOf(payload).roadmap_gaps;
  if (!Array.isArray(gaps)) {
    return [];
  }

  const entities: GapEntity[] = [];
  gaps.forEach((gap, index) => {
    let description: string;
    let severity = 'medium';

    if (typeof gap === 'string') {
      description = gap;
    } else if (isJsonObject(gap)) {
      description = firstText(gap, ['gap_description', 'gap', 'description']) ?? '';
      severity = firstText(gap, ['severity']) ?? severity;
    } else {
      return;
    }

    entities.push({
      kind: 'gap',
      id: `gap_${assessmentId}_${index}`,
      description,
      severity,
      assessmentType,
      identifiedBy: assessmentId
    });
  });

  return entities;
}

/**
 * One assessment with the gaps it identifies
 */
export function integrateAssessment(
  graph: KnowledgeGraph,
  assessmentId: string,
  assessmentType: AssessmentType,
  payload: JsonObject
): IntegrationResult {
  const assessment: AssessmentEntity = {
    kind: 'assessment',
    id: assessmentId,
    assessmentType,
    summary: summarizeAssessment(payload),
    payload
  };
  if (conflictsWith(graph, assessment)) {
    return { added: 0, conflicts: [assessmentId] };
  }
  if (graph.hasNode(assessmentId)) {
    return { added: 0, conflicts: [] };
  }

  graph.addNode(assessment);
  let added = 1;
  const conflicts: string[] = [];

  for (const gap of extractGaps(assessmentId, assessmentType, payload)) {
    if (conflictsWith(graph, gap)) {
      conflicts.push(gap.id);
      continue;
    }
    if (graph.addNode(gap)) {
      added++;
    }
    graph.addEdge(assessmentId, gap.id, 'IDENTIFIES_GAP', EDGE_WEIGHTS.IDENTIFIES_GAP);
  }

  return { added, conflicts };
}

export function integrateArchitectureAssessment(
  graph: KnowledgeGraph,
  payload: JsonObject | undefined
): IntegrationResult {
  if (!payload || Object.keys(payload).length === 0) {
    return { added: 0, conflicts: [] };
  }
  const id = payload.id;
  return integrateAssessment(
    graph,
    typeof id === 'string' && id.length > 0 ? id : ARCHITECTURE_ASSESSMENT_ID,
    'architecture',
    payload
  );
}

/**
 * Competitive assessments; entries without an id are skipped
 */
export function integrateCompetitiveAssessments(
  graph: KnowledgeGraph,
  payloads: readonly JsonObject[]
): IntegrationResult {
  const total: IntegrationResult = { added: 0, conflicts: [] };
  for (const payload of payloads) {
    const id = payload.id;
    if (typeof id === 'string' && id.length > 0) {
      const result = integrateAssessment(graph, id, 'competitive', payload);
      total.added += result.added;
      total.conflicts.push(...result.conflicts);
    }
  }
  return total;
}

/**
 * Chunks with the embeddings exported alongside them
 */
export function integrateChunks(graph: KnowledgeGraph, records: readonly ChunkRecord[]): IntegrationResult {
  let added = 0;
  const conflicts: string[] = [];
  for (const record of records) {
    if (conflictsWith(graph, record.entity)) {
      conflicts.push(record.entity.id);
    } else if (graph.addNode(record.entity, record.embedding)) {
      added++;
    }
  }
  return { added, conflicts };
}
