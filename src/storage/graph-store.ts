/**
 * JSON file storage for the knowledge graph
 *
 * Layout under the storage directory:
 * - graph.json: node-link document (nodes with type, record and embedding;
 *   links with type, weight and metadata)
 * - {type}_nodes.json: id → record index for each entity type
 *
 * Every save rewrites all files. Loading cross-checks the index files
 * against the node-link document.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { KnowledgeGraph } from '../core/graph.js';
import { ENTITY_KINDS, type EntityKind, type GraphOptions } from '../core/types.js';
import { describeIssues } from '../sources/schemas.js';
import { StorageError, toError } from '../utils/error-handler.js';
import { EntityIndexFileSchema, PersistedGraphSchema } from './schemas.js';
import type { GraphStorage, PersistedGraph, StorageResult } from './types.js';

export const GRAPH_FILE = 'graph.json';

export function indexFileName(kind: EntityKind): string {
  return `${kind}_nodes.json`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-backed graph storage
 */
export class JsonGraphStore implements GraphStorage {
  private directory: string;
  private graphOptions: Partial<GraphOptions>;

  constructor(directory: string, graphOptions: Partial<GraphOptions> = {}) {
    this.directory = directory;
    this.graphOptions = graphOptions;
  }

  getDirectory(): string {
    return this.directory;
  }

  async save(graph: KnowledgeGraph): Promise<StorageResult> {
    const startTime = Date.now();

    const document: PersistedGraph = {
      directed: true,
      multigraph: false,
      graph: {},
      nodes: graph.getAllNodes().map(node => ({
        id: node.id,
        node_type: node.entity.kind,
        data: node.entity,
        ...(node.embedding ? { embedding: node.embedding } : {})
      })),
      links: graph.getAllEdges().map(edge => ({
        source: edge.source,
        target: edge.target,
        edge_type: edge.type,
        weight: edge.weight,
        metadata: edge.metadata
      }))
    };

    const files = [GRAPH_FILE, ...ENTITY_KINDS.map(indexFileName)];

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await this.writeAtomically(GRAPH_FILE, document);
      for (const kind of ENTITY_KINDS) {
        await this.writeAtomically(indexFileName(kind), Object.fromEntries(graph.getNodesByType(kind)));
      }
    } catch (error) {
      throw new StorageError(`Failed to save graph to ${this.directory}`, { cause: toError(error) });
    }

    return {
      nodeCount: document.nodes.length,
      edgeCount: document.links.length,
      processingTime: Date.now() - startTime,
      files
    };
  }

  async load(): Promise<KnowledgeGraph> {
    const graph = new KnowledgeGraph(this.graphOptions);

    const raw = await this.readOptionalJson(GRAPH_FILE);
    if (raw === undefined) {
      return graph;
    }

    const parsed = PersistedGraphSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(`Invalid ${GRAPH_FILE}: ${describeIssues(parsed.error)}`);
    }

    for (const node of parsed.data.nodes) {
      if (node.id !== node.data.id || node.node_type !== node.data.kind) {
        throw new StorageError(
          `Node ${node.id} (${node.node_type}) does not match its record ${node.data.id} (${node.data.kind})`
        );
      }
      if (!this.restore(() => graph.addNode(node.data, node.embedding ?? undefined))) {
        throw new StorageError(`Duplicate node id ${node.id} in ${GRAPH_FILE}`);
      }
    }

    for (const link of parsed.data.links) {
      this.restore(() => graph.addEdge(link.source, link.target, link.edge_type, link.weight, link.metadata));
    }

    for (const kind of ENTITY_KINDS) {
      await this.checkIndexFile(graph, kind);
    }

    return graph;
  }

  async lastSaved(): Promise<Date | undefined> {
    try {
      const stats = await fs.stat(join(this.directory, GRAPH_FILE));
      return stats.mtime;
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new StorageError(`Cannot stat ${GRAPH_FILE}`, { cause: toError(error) });
    }
  }

  /**
   * The per-type index must hold exactly the graph's nodes of that type
   */
  private async checkIndexFile(graph: KnowledgeGraph, kind: EntityKind): Promise<void> {
    const fileName = indexFileName(kind);
    const raw = await this.readOptionalJson(fileName);
    const parsed = EntityIndexFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new StorageError(`Invalid ${fileName}: ${describeIssues(parsed.error)}`);
    }

    const indexed = graph.getNodesByType(kind);
    const records = Object.entries(parsed.data);

    if (records.length !== indexed.size) {
      throw new StorageError(
        `${fileName} lists ${records.length} records but ${GRAPH_FILE} has ${indexed.size} ${kind} nodes`
      );
    }

    for (const [id, record] of records) {
      const entity = indexed.get(id);
      if (!entity || record.kind !== kind || record.id !== id) {
        throw new StorageError(`${fileName} entry ${id} has no matching ${kind} node in ${GRAPH_FILE}`);
      }
      if (JSON.stringify(record) !== JSON.stringify(entity)) {
        throw new StorageError(`${fileName} entry ${id} differs from its node record`);
      }
    }
  }

  private restore<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw new StorageError(`Persisted graph is inconsistent: ${toError(error).message}`, { cause: error });
    }
  }

  private async readOptionalJson(fileName: string): Promise<unknown> {
    const path = join(this.directory, fileName);
    let text: string;
    try {
      text = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new StorageError(`Cannot read ${path}`, { cause: toError(error) });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new StorageError(`Malformed JSON in ${path}`, { cause: toError(error) });
    }
  }

  private async writeAtomically(fileName: string, value: unknown): Promise<void> {
    const path = join(this.directory, fileName);
    const tempPath = `${path}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(value, null, 2), 'utf-8');
    await fs.rename(tempPath, path);
  }
}
