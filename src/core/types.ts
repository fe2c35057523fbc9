/**
 * Core type definitions for the unified knowledge graph
 *
 * Every artifact the graph holds is one variant of the `KnowledgeEntity`
 * tagged union, discriminated by `kind`. Relationships between artifacts are
 * expressed purely as ids; the graph owns all node and edge storage.
 */

/**
 * JSON-compatible value, used for raw collaborator payloads and edge metadata
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Embedding = number[];

export const ENTITY_KINDS = [
  'chunk',
  'decision',
  'question',
  'assessment',
  'roadmap_item',
  'gap'
] as const;

export type EntityKind = typeof ENTITY_KINDS[number];

/**
 * Source excerpt produced by the chunking collaborator
 */
export interface ChunkEntity {
  kind: 'chunk';
  id: string;
  content: string;
  /** Origin/authority tag of the source material */
  lens: string;
  sourceName: string;
  sourcePath: string;
  chunkIndex: number;
  tokenCount: number;
}

export const DECISION_STATUSES = ['active', 'superseded', 'revisiting'] as const;
export type DecisionStatus = typeof DECISION_STATUSES[number];

/**
 * Recorded decision. Highest authority artifact in the graph.
 */
export interface DecisionEntity {
  kind: 'decision';
  id: string;
  statement: string;
  rationale: string;
  implications: string[];
  owner: string;
  status: DecisionStatus;
  /** Question this decision resolves, if any */
  questionId?: string;
  /** Roadmap item names the decision impacts */
  relatedRoadmapItems: string[];
  createdAt?: string;
}

export const QUESTION_STATUSES = ['pending', 'answered', 'obsolete', 'deferred'] as const;
export type QuestionStatus = typeof QUESTION_STATUSES[number];

export interface QuestionEntity {
  kind: 'question';
  id: string;
  text: string;
  audience: string;
  category: string;
  priority: string;
  status: QuestionStatus;
  relatedRoadmapItems: string[];
  /** Set when a decision resolving this question is integrated */
  answeredByDecision?: string;
  createdAt?: string;
}

export const ASSESSMENT_TYPES = ['architecture', 'competitive'] as const;
export type AssessmentType = typeof ASSESSMENT_TYPES[number];

export interface AssessmentEntity {
  kind: 'assessment';
  id: string;
  assessmentType: AssessmentType;
  summary: string;
  /** Raw payload as delivered by the assessment collaborator */
  payload: JsonObject;
}

export const HORIZONS = ['now', 'next', 'later', 'future'] as const;
export type Horizon = typeof HORIZONS[number];

export interface RoadmapItemEntity {
  kind: 'roadmap_item';
  id: string;
  name: string;
  description: string;
  horizon: Horizon;
  dependencies: string[];
}

export interface GapEntity {
  kind: 'gap';
  id: string;
  description: string;
  severity: string;
  assessmentType: AssessmentType;
  /** Id of the assessment that identified the gap */
  identifiedBy: string;
}

export type KnowledgeEntity =
  | ChunkEntity
  | DecisionEntity
  | QuestionEntity
  | AssessmentEntity
  | RoadmapItemEntity
  | GapEntity;

export type EntityOfKind<K extends EntityKind> = Extract<KnowledgeEntity, { kind: K }>;

/**
 * Per-type id → entity index
 */
export type EntityIndex = { [K in EntityKind]: Map<string, EntityOfKind<K>> };

/**
 * A node in the graph: the entity record plus its optional embedding
 */
export interface GraphNode {
  id: string;
  entity: KnowledgeEntity;
  embedding?: Embedding;
  createdAt: Date;
}

export const EDGE_TYPES = [
  'RESOLVES',
  'IMPACTS',
  'IDENTIFIES_GAP',
  'ABOUT_ITEM',
  'SUPPORTED_BY',
  'MENTIONED_IN',
  'OVERRIDES'
] as const;

export type EdgeType = typeof EDGE_TYPES[number];

/**
 * Endpoint kinds each edge type may connect. `addEdge` rejects anything else.
 */
export const EDGE_ENDPOINTS: Record<EdgeType, { from: EntityKind; to: EntityKind }> = {
  RESOLVES: { from: 'decision', to: 'question' },
  IMPACTS: { from: 'decision', to: 'roadmap_item' },
  IDENTIFIES_GAP: { from: 'assessment', to: 'gap' },
  ABOUT_ITEM: { from: 'question', to: 'roadmap_item' },
  SUPPORTED_BY: { from: 'roadmap_item', to: 'chunk' },
  MENTIONED_IN: { from: 'roadmap_item', to: 'chunk' },
  OVERRIDES: { from: 'decision', to: 'chunk' }
};

/** Edge types produced by embedding similarity and recomputed every sync pass */
export const SEMANTIC_EDGE_TYPES: readonly EdgeType[] = ['SUPPORTED_BY', 'MENTIONED_IN', 'OVERRIDES'];

/**
 * Directed, typed, weighted edge. At most one edge exists per ordered pair.
 */
export interface GraphEdge {
  /** `${source}->${target}` */
  id: string;
  source: string;
  target: string;
  type: EdgeType;
  weight: number;
  metadata: JsonObject;
  createdAt: Date;
  updatedAt: Date;
}

export interface GraphMetrics {
  nodeCount: number;
  edgeCount: number;
  /** edges / possible directed edges */
  density: number;
  nodesByKind: Record<EntityKind, number>;
  edgesByType: Record<EdgeType, number>;
}

export interface GraphOptions {
  /** Maximum number of nodes the graph accepts */
  maxNodes: number;
}
