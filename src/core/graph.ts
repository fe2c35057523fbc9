/**
 * Core knowledge graph implementation using adjacency maps
 *
 * Sparse, typed, directed graph. Each node carries one entity record and an
 * optional embedding; each ordered node pair carries at most one edge.
 * Forward and reverse adjacency maps are kept in sync for bidirectional
 * traversal, and a per-type entity index mirrors the node store.
 *
 * Memory complexity: O(n + m) where n=nodes, m=edges
 */

import {
  EDGE_ENDPOINTS,
  ENTITY_KINDS,
  type EdgeType,
  type Embedding,
  type EntityIndex,
  type EntityKind,
  type EntityOfKind,
  type GraphEdge,
  type GraphMetrics,
  type GraphNode,
  type GraphOptions,
  type JsonObject,
  type KnowledgeEntity
} from './types.js';
import { GraphError } from '../utils/error-handler.js';

export interface Neighbor {
  node: GraphNode;
  edge: GraphEdge;
  direction: 'out' | 'in';
}

function createEmptyIndex(): EntityIndex {
  return {
    chunk: new Map(),
    decision: new Map(),
    question: new Map(),
    assessment: new Map(),
    roadmap_item: new Map(),
    gap: new Map()
  };
}

function indexFor<K extends EntityKind>(index: EntityIndex, kind: K): Map<string, EntityOfKind<K>> {
  return index[kind];
}

export function edgeId(source: string, target: string): string {
  return `${source}->${target}`;
}

/**
 * Unified knowledge graph
 *
 * The graph is the sole owner of node and edge storage. Other components
 * hold ids only, which keeps cyclic relationships (decision → chunk → ...)
 * safe to store and traverse.
 */
export class KnowledgeGraph {
  private nodes: Map<string, GraphNode> = new Map();
  private index: EntityIndex = createEmptyIndex();
  // source -> target -> edge
  private adjacencyList: Map<string, Map<string, GraphEdge>> = new Map();
  // target -> source -> edge
  private reverseAdjacencyList: Map<string, Map<string, GraphEdge>> = new Map();
  private edgeTotal = 0;

  private options: GraphOptions;

  constructor(options: Partial<GraphOptions> = {}) {
    this.options = {
      maxNodes: options.maxNodes ?? 100000
    };
  }

  /**
   * Add a node for an entity
   *
   * Idempotent: when a node with the same id already exists the call is a
   * no-op and the stored record is left untouched. Returns whether a node
   * was created.
   */
  addNode(entity: KnowledgeEntity, embedding?: Embedding): boolean {
    const existing = this.nodes.get(entity.id);
    if (existing) {
      if (existing.entity.kind !== entity.kind) {
        throw new GraphError(
          `Node ${entity.id} already exists as ${existing.entity.kind}, cannot add it as ${entity.kind}`
        );
      }
      return false;
    }

    if (this.nodes.size >= this.options.maxNodes) {
      throw new GraphError(`Graph capacity exceeded. Maximum nodes: ${this.options.maxNodes}`);
    }

    // The graph owns its records; later edits to the caller's object do not reach it
    const stored = structuredClone(entity);
    this.nodes.set(stored.id, {
      id: stored.id,
      entity: stored,
      embedding: embedding && embedding.length > 0 ? [...embedding] : undefined,
      createdAt: new Date()
    });
    indexFor(this.index, stored.kind).set(stored.id, stored);
    this.adjacencyList.set(entity.id, new Map());
    this.reverseAdjacencyList.set(entity.id, new Map());

    return true;
  }

  /**
   * Create or overwrite the directed edge between two nodes
   *
   * Both endpoints must exist and match the kinds declared for the edge
   * type in `EDGE_ENDPOINTS`.
   */
  addEdge(
    source: string,
    target: string,
    type: EdgeType,
    weight: number = 1.0,
    metadata: JsonObject = {}
  ): GraphEdge {
    const sourceNode = this.nodes.get(source);
    const targetNode = this.nodes.get(target);
    if (!sourceNode) {
      throw new GraphError(`Source node ${source} does not exist`);
    }
    if (!targetNode) {
      throw new GraphError(`Target node ${target} does not exist`);
    }

    const endpoints = EDGE_ENDPOINTS[type];
    if (sourceNode.entity.kind !== endpoints.from || targetNode.entity.kind !== endpoints.to) {
      throw new GraphError(
        `${type} edges connect ${endpoints.from} → ${endpoints.to}, got ${sourceNode.entity.kind} → ${targetNode.entity.kind}`
      );
    }
    if (!Number.isFinite(weight)) {
      throw new GraphError(`Edge weight must be a finite number, got ${weight}`);
    }

    const outgoing = this.adjacencyList.get(source) ?? new Map<string, GraphEdge>();
    const incoming = this.reverseAdjacencyList.get(target) ?? new Map<string, GraphEdge>();
    const previous = outgoing.get(target);
    const now = new Date();

    const edge: GraphEdge = {
      id: edgeId(source, target),
      source,
      target,
      type,
      weight,
      metadata: { ...metadata },
      createdAt: previous?.createdAt ?? now,
      updatedAt: now
    };

    outgoing.set(target, edge);
    incoming.set(source, edge);
    this.adjacencyList.set(source, outgoing);
    this.reverseAdjacencyList.set(target, incoming);

    if (!previous) {
      this.edgeTotal++;
    }

    return edge;
  }

  /**
   * Mark a question as answered by a decision
   *
   * This is the one in-place field change the graph supports: the decision
   * outranks the question store, so its resolution is reflected on the
   * existing question record.
   */
  markQuestionAnswered(questionId: string, decisionId: string): boolean {
    const question = this.index.question.get(questionId);
    const node = this.nodes.get(questionId);
    if (!question || !node) {
      return false;
    }

    const answered = { ...question, status: 'answered' as const, answeredByDecision: decisionId };
    this.index.question.set(questionId, answered);
    node.entity = answered;
    return true;
  }

  getNode(nodeId: string): GraphNode | undefined {
    return this.nodes.get(nodeId);
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  getEntity(nodeId: string): KnowledgeEntity | undefined {
    return this.nodes.get(nodeId)?.entity;
  }

  getEmbedding(nodeId: string): Embedding | undefined {
    return this.nodes.get(nodeId)?.embedding;
  }

  /**
   * Typed index of all entities of one kind
   */
  getNodesByType<K extends EntityKind>(kind: K): ReadonlyMap<string, EntityOfKind<K>> {
    return indexFor(this.index, kind);
  }

  hasEdge(source: string, target: string): boolean {
    return this.adjacencyList.get(source)?.has(target) ?? false;
  }

  getEdge(source: string, target: string): GraphEdge | undefined {
    return this.adjacencyList.get(source)?.get(target);
  }

  /**
   * Outgoing edges of a node, optionally filtered by edge type
   */
  getOutgoingEdges(nodeId: string, edgeTypes?: readonly EdgeType[]): GraphEdge[] {
    const edges = Array.from(this.adjacencyList.get(nodeId)?.values() ?? []);
    if (!edgeTypes || edgeTypes.length === 0) {
      return edges;
    }
    return edges.filter(edge => edgeTypes.includes(edge.type));
  }

  /**
   * Incoming edges of a node, optionally filtered by edge type
   */
  getIncomingEdges(nodeId: string, edgeTypes?: readonly EdgeType[]): GraphEdge[] {
    const edges = Array.from(this.reverseAdjacencyList.get(nodeId)?.values() ?? []);
    if (!edgeTypes || edgeTypes.length === 0) {
      return edges;
    }
    return edges.filter(edge => edgeTypes.includes(edge.type));
  }

  /**
   * Ids of nodes with an edge into `nodeId`
   */
  getPredecessors(nodeId: string): string[] {
    return Array.from(this.reverseAdjacencyList.get(nodeId)?.keys() ?? []);
  }

  /**
   * Neighbor nodes over both outgoing and incoming edges
   */
  getNeighbors(nodeId: string, edgeTypes?: readonly EdgeType[]): Neighbor[] {
    const neighbors: Neighbor[] = [];

    for (const edge of this.getOutgoingEdges(nodeId, edgeTypes)) {
      const node = this.nodes.get(edge.target);
      if (node) {
        neighbors.push({ node, edge, direction: 'out' });
      }
    }

    for (const edge of this.getIncomingEdges(nodeId, edgeTypes)) {
      const node = this.nodes.get(edge.source);
      if (node) {
        neighbors.push({ node, edge, direction: 'in' });
      }
    }

    return neighbors;
  }

  removeEdge(source: string, target: string): boolean {
    const outgoing = this.adjacencyList.get(source);
    if (!outgoing?.has(target)) {
      return false;
    }
    outgoing.delete(target);
    this.reverseAdjacencyList.get(target)?.delete(source);
    this.edgeTotal--;
    return true;
  }

  /**
   * Remove every edge of the given types. Returns the number removed.
   */
  removeEdgesOfType(edgeTypes: readonly EdgeType[]): number {
    let removed = 0;
    for (const edge of this.getAllEdges()) {
      if (edgeTypes.includes(edge.type) && this.removeEdge(edge.source, edge.target)) {
        removed++;
      }
    }
    return removed;
  }

  getAllNodes(): GraphNode[] {
    return Array.from(this.nodes.values());
  }

  getAllEdges(): GraphEdge[] {
    const allEdges: GraphEdge[] = [];
    for (const edges of this.adjacencyList.values()) {
      allEdges.push(...edges.values());
    }
    return allEdges;
  }

  nodeCount(): number {
    return this.nodes.size;
  }

  edgeCount(): number {
    return this.edgeTotal;
  }

  /**
   * Counts by node kind and edge type, plus directed density
   */
  getMetrics(): GraphMetrics {
    const nodesByKind: Record<EntityKind, number> = {
      chunk: this.index.chunk.size,
      decision: this.index.decision.size,
      question: this.index.question.size,
      assessment: this.index.assessment.size,
      roadmap_item: this.index.roadmap_item.size,
      gap: this.index.gap.size
    };

    const edgesByType: Record<EdgeType, number> = {
      RESOLVES: 0,
      IMPACTS: 0,
      IDENTIFIES_GAP: 0,
      ABOUT_ITEM: 0,
      SUPPORTED_BY: 0,
      MENTIONED_IN: 0,
      OVERRIDES: 0
    };
    for (const edge of this.getAllEdges()) {
      edgesByType[edge.type]++;
    }

    const nodeCount = this.nodes.size;
    const possibleEdges = nodeCount * (nodeCount - 1);

    return {
      nodeCount,
      edgeCount: this.edgeTotal,
      density: possibleEdges > 0 ? this.edgeTotal / possibleEdges : 0,
      nodesByKind,
      edgesByType
    };
  }

  /**
   * Remove all nodes and edges. A full rebuild is the only way nodes leave
   * the graph.
   */
  clear(): void {
    this.nodes.clear();
    this.index = createEmptyIndex();
    this.adjacencyList.clear();
    this.reverseAdjacencyList.clear();
    this.edgeTotal = 0;
  }

  /**
   * Check that adjacency maps, the node store and the typed indices agree
   */
  validateConsistency(): string[] {
    const errors: string[] = [];

    for (const [sourceId, edges] of this.adjacencyList.entries()) {
      if (!this.nodes.has(sourceId)) {
        errors.push(`Adjacency list contains non-existent source node: ${sourceId}`);
      }
      for (const [targetId, edge] of edges.entries()) {
        if (!this.nodes.has(targetId)) {
          errors.push(`Edge ${edge.id} references non-existent target node: ${targetId}`);
        }
        if (edge.source !== sourceId || edge.target !== targetId) {
          errors.push(`Edge ${edge.id} is stored under ${sourceId}->${targetId}`);
        }
        if (this.reverseAdjacencyList.get(targetId)?.get(sourceId) !== edge) {
          errors.push(`Edge ${edge.id} is missing from the reverse adjacency list`);
        }
        const endpoints = EDGE_ENDPOINTS[edge.type];
        const sourceKind = this.nodes.get(sourceId)?.entity.kind;
        const targetKind = this.nodes.get(targetId)?.entity.kind;
        if (sourceKind !== endpoints.from || targetKind !== endpoints.to) {
          errors.push(`Edge ${edge.id} of type ${edge.type} connects ${sourceKind} → ${targetKind}`);
        }
      }
    }

    for (const [nodeId, node] of this.nodes.entries()) {
      if (this.index[node.entity.kind].get(nodeId) !== node.entity) {
        errors.push(`Node ${nodeId} is missing from the ${node.entity.kind} index`);
      }
    }

    for (const kind of ENTITY_KINDS) {
      for (const id of this.index[kind].keys()) {
        if (this.nodes.get(id)?.entity.kind !== kind) {
          errors.push(`${kind} index contains ${id} which is not a ${kind} node`);
        }
      }
    }

    return errors;
  }
}
