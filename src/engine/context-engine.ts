/**
 * Knowledge context engine
 *
 * Entry point tying the pieces together: loads the persisted graph, keeps
 * it in sync with the artifact stores, and answers authority-ordered
 * queries, multi-hop traversals and override lookups against it.
 *
 * One engine instance owns one graph and assumes it is the only writer of
 * the storage directory.
 */

import { getDecisionOverrides, getSupersedingDecision } from '../core/authority.js';
import { KnowledgeGraph } from '../core/graph.js';
import { multiHopTraversal, type MultiHopOptions, type MultiHopResult } from '../core/traversal.js';
import type { ChunkEntity, DecisionEntity } from '../core/types.js';
import { resolveConfig, type KnowledgeGraphConfig, type PartialConfig } from '../config/config.js';
import { SemanticEdgeInferencer } from '../inference/semantic-edge-inferencer.js';
import { createMatcher, retrieveWithAuthority } from '../retrieval/authority-retriever.js';
import { formatContextWithAuthority } from '../retrieval/context-formatter.js';
import { getGraphStats, type GraphStats } from '../retrieval/graph-stats.js';
import type { AuthorityResults, RetrievalMatcher } from '../retrieval/types.js';
import { FileKnowledgeSources } from '../sources/file-sources.js';
import type { KnowledgeSources } from '../sources/types.js';
import { JsonGraphStore } from '../storage/graph-store.js';
import type { GraphStorage } from '../storage/types.js';
import {
  GraphSyncOrchestrator,
  needsSync,
  type ModificationTracker,
  type SyncReport
} from '../sync/sync-orchestrator.js';
import { OllamaEmbeddingProvider, type EmbeddingProvider } from '../utils/embedding-service.js';

export interface ContextEngineDependencies {
  sources?: KnowledgeSources & Partial<ModificationTracker>;
  storage?: GraphStorage;
  embedder?: EmbeddingProvider;
  matcher?: RetrievalMatcher;
}

function tracksModification(
  sources: KnowledgeSources & Partial<ModificationTracker>
): sources is KnowledgeSources & ModificationTracker {
  return typeof sources.lastModified === 'function';
}

export interface ContextQueryOptions {
  topK?: number;
  includeSuperseded?: boolean;
}

export interface ContextQueryResult {
  query: string;
  results: AuthorityResults;
  /** Markdown brief, highest authority first */
  brief: string;
  metadata: {
    matcher: string;
    queryTime: number;
  };
}

export class KnowledgeContextEngine {
  private config: KnowledgeGraphConfig;
  private graph: KnowledgeGraph;
  private storage: GraphStorage;
  private sources: KnowledgeSources & Partial<ModificationTracker>;
  private embedder: EmbeddingProvider;
  private matcher: RetrievalMatcher;
  private orchestrator: GraphSyncOrchestrator;
  private initialized = false;

  constructor(config: PartialConfig = {}, deps: ContextEngineDependencies = {}) {
    this.config = resolveConfig(config);

    this.graph = new KnowledgeGraph(this.config.graph);
    this.storage = deps.storage ?? new JsonGraphStore(this.config.storage.directory, this.config.graph);
    this.sources = deps.sources ?? new FileKnowledgeSources(this.config.sources);
    this.embedder =
      deps.embedder ??
      new OllamaEmbeddingProvider({
        host: this.config.embedding.host,
        model: this.config.embedding.model,
        maxBatchSize: this.config.embedding.maxBatchSize,
        timeoutMs: this.config.embedding.timeoutMs,
        cacheSize: this.config.embedding.cacheSize
      });
    this.matcher = deps.matcher ?? createMatcher(this.config.retrieval, this.embedder);

    this.orchestrator = new GraphSyncOrchestrator({
      sources: this.sources,
      storage: this.storage,
      embedder: this.embedder,
      inferencer: new SemanticEdgeInferencer(this.config.inference),
      verbose: this.config.sync.verbose
    });
  }

  /**
   * Load the persisted graph. Rejects with a `StorageError` when the
   * persisted data is malformed.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    this.graph = await this.storage.load();
    this.initialized = true;
  }

  private async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }
  }

  getConfig(): KnowledgeGraphConfig {
    return this.config;
  }

  async getGraph(): Promise<KnowledgeGraph> {
    await this.ensureInitialized();
    return this.graph;
  }

  /**
   * Bring the graph up to date with every store and persist it
   */
  async sync(): Promise<SyncReport> {
    await this.ensureInitialized();
    return this.orchestrator.sync(this.graph);
  }

  /**
   * Whether a store changed since the last persisted sync. Stores that do
   * not track modification times always report a pending sync.
   */
  async needsSync(): Promise<boolean> {
    if (!tracksModification(this.sources)) {
      return true;
    }
    return needsSync(this.storage, this.sources);
  }

  async query(query: string, options: ContextQueryOptions = {}): Promise<ContextQueryResult> {
    await this.ensureInitialized();
    const startTime = Date.now();

    const results = await retrieveWithAuthority(query, this.graph, {
      topK: options.topK ?? this.config.retrieval.topK,
      matcher: this.matcher,
      includeSuperseded: options.includeSuperseded
    });

    return {
      query,
      results,
      brief: formatContextWithAuthority(results),
      metadata: {
        matcher: this.matcher.name,
        queryTime: Date.now() - startTime
      }
    };
  }

  async traverse(seedIds: readonly string[], options: MultiHopOptions): Promise<MultiHopResult> {
    await this.ensureInitialized();
    return multiHopTraversal(this.graph, seedIds, options);
  }

  async getSupersedingDecision(chunkId: string): Promise<DecisionEntity | undefined> {
    await this.ensureInitialized();
    return getSupersedingDecision(this.graph, chunkId);
  }

  async getDecisionOverrides(decisionId: string): Promise<ChunkEntity[]> {
    await this.ensureInitialized();
    return getDecisionOverrides(this.graph, decisionId);
  }

  async getStats(): Promise<GraphStats> {
    await this.ensureInitialized();
    return getGraphStats(this.graph);
  }
}
