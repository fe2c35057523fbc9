/**
 * Storage types for graph persistence
 *
 * The graph is persisted as a whole: every save rewrites the node-link
 * document and the per-type index files.
 */

import type { KnowledgeGraph } from '../core/graph.js';
import type { EdgeType, EntityKind, JsonObject, KnowledgeEntity } from '../core/types.js';

/**
 * Storage operation result with metadata
 */
export interface StorageResult {
  /** Number of nodes written */
  nodeCount: number;
  /** Number of edges written */
  edgeCount: number;
  /** Processing time in milliseconds */
  processingTime: number;
  /** Files written, relative to the storage directory */
  files: string[];
}

/**
 * Node entry of the node-link document
 */
export interface PersistedNode {
  id: string;
  node_type: EntityKind;
  data: KnowledgeEntity;
  embedding?: number[] | null;
}

/**
 * Link entry of the node-link document
 */
export interface PersistedLink {
  source: string;
  target: string;
  edge_type: EdgeType;
  weight: number;
  metadata: JsonObject;
}

export interface PersistedGraph {
  directed: boolean;
  multigraph: boolean;
  graph: JsonObject;
  nodes: PersistedNode[];
  links: PersistedLink[];
}

/**
 * Base storage interface for graph persistence
 */
export interface GraphStorage {
  /**
   * Load the persisted graph. A store that was never written yields an
   * empty graph; malformed data rejects with a `StorageError`.
   */
  load(): Promise<KnowledgeGraph>;

  /**
   * Rewrite the persisted graph from the in-memory one
   */
  save(graph: KnowledgeGraph): Promise<StorageResult>;

  /**
   * Time of the last save, if the graph was ever persisted
   */
  lastSaved(): Promise<Date | undefined>;
}
