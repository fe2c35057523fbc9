/**
 * Graph synchronization
 *
 * Brings the graph up to date with every store in a fixed order:
 *
 *   roadmap → questions → decisions → assessments (architecture, competitive)
 *   → chunks → semantic edges → persist
 *
 * Stages are isolated from each other: a failing store is logged and recorded
 * in the report, the remaining stages still run, and the graph is always
 * persisted. Running a sync twice against unchanged stores leaves node and
 * edge counts unchanged.
 */

import { v4 as uuidv4 } from 'uuid';
import type { KnowledgeGraph } from '../core/graph.js';
import {
  SemanticEdgeInferencer,
  totalEdgesCreated,
  type InferenceReport
} from '../inference/semantic-edge-inferencer.js';
import type { KnowledgeSources } from '../sources/types.js';
import type { GraphStorage } from '../storage/types.js';
import type { EmbeddingProvider } from '../utils/embedding-service.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/error-handler.js';
import {
  integrateArchitectureAssessment,
  integrateChunks,
  integrateCompetitiveAssessments,
  integrateDecisions,
  integrateQuestions,
  integrateRoadmapItems,
  type IntegrationResult
} from './integrators.js';

export const SYNC_STAGES = [
  'roadmap_items',
  'questions',
  'decisions',
  'architecture_assessment',
  'competitive_assessments',
  'chunks',
  'semantic_edges',
  'persist'
] as const;

export type SyncStage = typeof SYNC_STAGES[number];

export interface StageResult {
  stage: SyncStage;
  success: boolean;
  /** Nodes added (edges created for `semantic_edges`) */
  added: number;
  /** Records skipped because their id is held by a node of another type */
  conflicts: string[];
  durationMs: number;
  error?: string;
}

export interface SyncReport {
  syncId: string;
  startedAt: string;
  stages: StageResult[];
  inference?: InferenceReport;
  nodeCount: number;
  edgeCount: number;
  persisted: boolean;
  durationMs: number;
}

export interface SyncDependencies {
  sources: KnowledgeSources;
  storage: GraphStorage;
  embedder: EmbeddingProvider;
  inferencer?: SemanticEdgeInferencer;
  verbose?: boolean;
}

export class GraphSyncOrchestrator {
  private sources: KnowledgeSources;
  private storage: GraphStorage;
  private embedder: EmbeddingProvider;
  private inferencer: SemanticEdgeInferencer;
  private verbose: boolean;

  constructor(deps: SyncDependencies) {
    this.sources = deps.sources;
    this.storage = deps.storage;
    this.embedder = deps.embedder;
    this.inferencer = deps.inferencer ?? new SemanticEdgeInferencer();
    this.verbose = deps.verbose ?? false;
  }

  /**
   * Synchronize `graph` with all stores and persist it
   */
  async sync(graph: KnowledgeGraph): Promise<SyncReport> {
    const startTime = Date.now();
    const syncId = uuidv4();
    const stages: StageResult[] = [];
    let inference: InferenceReport | undefined;

    this.log(`🔄 Syncing knowledge graph (${syncId})...`);

    const run = async (stage: SyncStage, operation: () => Promise<IntegrationResult>, category: ErrorCategory) => {
      const stageStart = Date.now();
      const result = await ErrorHandler.wrapOperation(
        operation,
        category,
        `sync ${stage.replace(/_/g, ' ')}`,
        { syncId, stage },
        stage === 'persist' ? ErrorSeverity.HIGH : ErrorSeverity.MEDIUM
      );

      if (result.success) {
        const { added, conflicts } = result.data;
        stages.push({ stage, success: true, added, conflicts, durationMs: Date.now() - stageStart });
        this.log(`✅ ${stage}: ${added}`);
        if (conflicts.length > 0) {
          console.warn(`⚠️ ${stage}: skipped ids held by another type: ${conflicts.join(', ')}`);
        }
      } else {
        const cause = result.error.originalError?.message;
        stages.push({
          stage,
          success: false,
          added: 0,
          conflicts: [],
          durationMs: Date.now() - stageStart,
          error: cause ? `${result.error.message}: ${cause}` : result.error.message
        });
      }
      return result.success;
    };

    await run(
      'roadmap_items',
      async () => integrateRoadmapItems(graph, await this.sources.loadRoadmapItems(), this.embedder),
      ErrorCategory.SOURCE
    );
    await run('questions', async () => integrateQuestions(graph, await this.sources.loadQuestions()), ErrorCategory.SOURCE);
    await run(
      'decisions',
      async () => integrateDecisions(graph, await this.sources.loadDecisions(), this.embedder),
      ErrorCategory.SOURCE
    );
    await run(
      'architecture_assessment',
      async () => integrateArchitectureAssessment(graph, await this.sources.loadArchitectureAssessment()),
      ErrorCategory.SOURCE
    );
    await run(
      'competitive_assessments',
      async () => integrateCompetitiveAssessments(graph, await this.sources.loadCompetitiveAssessments()),
      ErrorCategory.SOURCE
    );
    await run('chunks', async () => integrateChunks(graph, await this.sources.loadChunks()), ErrorCategory.SOURCE);
    await run(
      'semantic_edges',
      async () => {
        inference = this.inferencer.infer(graph);
        return { added: totalEdgesCreated(inference), conflicts: [] };
      },
      ErrorCategory.INFERENCE
    );
    const persisted = await run(
      'persist',
      async () => ({ added: (await this.storage.save(graph)).nodeCount, conflicts: [] }),
      ErrorCategory.STORAGE
    );

    const report: SyncReport = {
      syncId,
      startedAt: new Date(startTime).toISOString(),
      stages,
      inference,
      nodeCount: graph.nodeCount(),
      edgeCount: graph.edgeCount(),
      persisted,
      durationMs: Date.now() - startTime
    };

    this.log(`✅ Graph synced: ${report.nodeCount} nodes, ${report.edgeCount} edges`);
    return report;
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }
}

/**
 * Modification-time source, implemented by file-backed stores
 */
export interface ModificationTracker {
  lastModified(): Promise<Date | undefined>;
}

/**
 * Whether any store changed since the graph was last persisted
 */
export async function needsSync(storage: GraphStorage, sources: ModificationTracker): Promise<boolean> {
  const saved = await storage.lastSaved();
  if (!saved) {
    return true;
  }
  const modified = await sources.lastModified();
  return modified !== undefined && modified.getTime() > saved.getTime();
}

export function failedStages(report: SyncReport): StageResult[] {
  return report.stages.filter(stage => !stage.success);
}
