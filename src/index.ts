/**
 * Public exports for the authority-aware knowledge graph
 */

// Core graph components
export { KnowledgeGraph, edgeId } from './core/graph.js';
export { GraphTraversal, multiHopTraversal, createEmptyGroups } from './core/traversal.js';
export {
  AUTHORITY_LEVELS,
  AUTHORITY_ORDER,
  authorityCategoryOf,
  authorityRank,
  categoryRank,
  compareAuthority,
  getDecisionOverrides,
  getSupersedingDecision
} from './core/authority.js';
export {
  entityText,
  entityLabel,
  serializeEntity,
  entityMatches,
  roadmapItemId
} from './core/entities.js';
export {
  ENTITY_KINDS,
  EDGE_TYPES,
  EDGE_ENDPOINTS,
  SEMANTIC_EDGE_TYPES,
  DECISION_STATUSES,
  QUESTION_STATUSES,
  ASSESSMENT_TYPES,
  HORIZONS
} from './core/types.js';

// Type definitions
export type {
  JsonValue,
  JsonObject,
  Embedding,
  EntityKind,
  ChunkEntity,
  DecisionEntity,
  QuestionEntity,
  AssessmentEntity,
  RoadmapItemEntity,
  GapEntity,
  KnowledgeEntity,
  EntityOfKind,
  GraphNode,
  GraphEdge,
  EdgeType,
  GraphMetrics,
  GraphOptions
} from './core/types.js';
export type { AuthorityCategory, AuthorityLevel } from './core/authority.js';
export type {
  MultiHopOptions,
  MultiHopResult,
  EntityGroups
} from './core/traversal.js';

// Configuration
export {
  createDefaultConfig,
  resolveConfig,
  validateConfig,
  loadConfigFromEnv
} from './config/config.js';
export type { KnowledgeGraphConfig, PartialConfig, RetrievalMatcherKind } from './config/config.js';

// Inference
export { SemanticEdgeInferencer, DEFAULT_THRESHOLDS } from './inference/semantic-edge-inferencer.js';
export type { InferenceThresholds, InferenceReport } from './inference/semantic-edge-inferencer.js';

// Sources
export { FileKnowledgeSources } from './sources/file-sources.js';
export { InMemoryKnowledgeSources } from './sources/memory-sources.js';
export { parseRoadmap } from './sources/roadmap-parser.js';
export type { KnowledgeSources, ChunkRecord } from './sources/types.js';

// Sync
export { GraphSyncOrchestrator, needsSync, failedStages, SYNC_STAGES } from './sync/sync-orchestrator.js';
export type { SyncReport, StageResult, SyncStage } from './sync/sync-orchestrator.js';

// Storage
export { JsonGraphStore } from './storage/graph-store.js';
export type { GraphStorage, StorageResult, PersistedGraph } from './storage/types.js';

// Retrieval
export { retrieveWithAuthority, createMatcher } from './retrieval/authority-retriever.js';
export { KeywordMatcher } from './retrieval/keyword-matcher.js';
export { EmbeddingMatcher } from './retrieval/embedding-matcher.js';
export { formatContextWithAuthority } from './retrieval/context-formatter.js';
export { getGraphStats } from './retrieval/graph-stats.js';
export type {
  AuthorityResults,
  RetrievedItem,
  RetrievalMatcher,
  RetrievalMatch,
  RetrievalOptions
} from './retrieval/types.js';
export type { GraphStats, AuthorityCoverage } from './retrieval/graph-stats.js';

// Engine and HTTP
export { KnowledgeContextEngine } from './engine/context-engine.js';
export type { ContextQueryOptions, ContextQueryResult, ContextEngineDependencies } from './engine/context-engine.js';
export { createApp } from './server/api.js';

// Utilities
export { OllamaEmbeddingProvider } from './utils/embedding-service.js';
export type { EmbeddingProvider } from './utils/embedding-service.js';
export { VectorUtils } from './utils/vector-utils.js';
export {
  ErrorHandler,
  ErrorCategory,
  ErrorSeverity,
  KnowledgeGraphError,
  GraphError,
  StorageError,
  SourceError,
  EmbeddingError,
  ConfigurationError
} from './utils/error-handler.js';
export type { ErrorInfo, ErrorResult, SuccessResult, OperationResult } from './utils/error-handler.js';
