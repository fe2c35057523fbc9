/**
 * Semantic edge inference
 *
 * Links chunks to roadmap items and decisions by cosine similarity of their
 * embeddings. Each pass first removes every previously inferred edge, so the
 * edge set always reflects the current thresholds and embeddings.
 *
 * Time Complexity: O(R·C + D·C) similarity evaluations
 */

import type { KnowledgeGraph } from '../core/graph.js';
import { SEMANTIC_EDGE_TYPES, type Embedding } from '../core/types.js';
import { ConfigurationError } from '../utils/error-handler.js';
import { VectorUtils } from '../utils/vector-utils.js';

export interface InferenceThresholds {
  /** roadmap item → chunk, strong relevance */
  supportedByThreshold: number;
  /** roadmap item → chunk, moderate relevance (lower bound) */
  mentionedInThreshold: number;
  /** decision → chunk */
  overridesThreshold: number;
}

export const DEFAULT_THRESHOLDS: InferenceThresholds = {
  supportedByThreshold: 0.75,
  mentionedInThreshold: 0.65,
  overridesThreshold: 0.7
};

export interface InferenceReport {
  edgesRemoved: number;
  edgesCreated: {
    SUPPORTED_BY: number;
    MENTIONED_IN: number;
    OVERRIDES: number;
  };
  chunksProcessed: number;
  /** Chunks without a usable embedding */
  chunksSkipped: number;
  /** Pairs whose embeddings differ in dimension */
  pairsSkipped: number;
  roadmapItemsWithEmbedding: number;
  decisionsWithEmbedding: number;
  durationMs: number;
}

interface CachedEmbedding {
  id: string;
  embedding: Embedding;
}

export class SemanticEdgeInferencer {
  private thresholds: InferenceThresholds;

  constructor(thresholds: Partial<InferenceThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };

    const { supportedByThreshold, mentionedInThreshold, overridesThreshold } = this.thresholds;
    for (const value of [supportedByThreshold, mentionedInThreshold, overridesThreshold]) {
      if (!Number.isFinite(value) || value < 0 || value > 1) {
        throw new ConfigurationError(`Similarity thresholds must be between 0 and 1, got ${value}`);
      }
    }
    if (mentionedInThreshold > supportedByThreshold) {
      throw new ConfigurationError(
        `mentionedInThreshold (${mentionedInThreshold}) cannot exceed supportedByThreshold (${supportedByThreshold})`
      );
    }
  }

  getThresholds(): InferenceThresholds {
    return { ...this.thresholds };
  }

  /**
   * Recompute all semantic edges of the graph
   */
  infer(graph: KnowledgeGraph): InferenceReport {
    const startTime = Date.now();
    const report: InferenceReport = {
      edgesRemoved: graph.removeEdgesOfType(SEMANTIC_EDGE_TYPES),
      edgesCreated: { SUPPORTED_BY: 0, MENTIONED_IN: 0, OVERRIDES: 0 },
      chunksProcessed: 0,
      chunksSkipped: 0,
      pairsSkipped: 0,
      roadmapItemsWithEmbedding: 0,
      decisionsWithEmbedding: 0,
      durationMs: 0
    };

    const roadmapEmbeddings = this.collectEmbeddings(graph, graph.getNodesByType('roadmap_item').keys());
    const decisionEmbeddings = this.collectEmbeddings(graph, graph.getNodesByType('decision').keys());
    report.roadmapItemsWithEmbedding = roadmapEmbeddings.length;
    report.decisionsWithEmbedding = decisionEmbeddings.length;

    const { supportedByThreshold, mentionedInThreshold, overridesThreshold } = this.thresholds;

    for (const chunkId of graph.getNodesByType('chunk').keys()) {
      const chunkEmbedding = graph.getEmbedding(chunkId);
      if (!chunkEmbedding || !VectorUtils.isValid(chunkEmbedding)) {
        report.chunksSkipped++;
        continue;
      }
      report.chunksProcessed++;

      for (const item of roadmapEmbeddings) {
        if (item.embedding.length !== chunkEmbedding.length) {
          report.pairsSkipped++;
          continue;
        }
        const similarity = VectorUtils.cosineSimilarity(chunkEmbedding, item.embedding);
        if (similarity >= supportedByThreshold) {
          graph.addEdge(item.id, chunkId, 'SUPPORTED_BY', similarity);
          report.edgesCreated.SUPPORTED_BY++;
        } else if (similarity >= mentionedInThreshold) {
          graph.addEdge(item.id, chunkId, 'MENTIONED_IN', similarity);
          report.edgesCreated.MENTIONED_IN++;
        }
      }

      for (const decision of decisionEmbeddings) {
        if (decision.embedding.length !== chunkEmbedding.length) {
          report.pairsSkipped++;
          continue;
        }
        const similarity = VectorUtils.cosineSimilarity(chunkEmbedding, decision.embedding);
        if (similarity >= overridesThreshold) {
          graph.addEdge(decision.id, chunkId, 'OVERRIDES', similarity);
          report.edgesCreated.OVERRIDES++;
        }
      }
    }

    report.durationMs = Date.now() - startTime;
    return report;
  }

  private collectEmbeddings(graph: KnowledgeGraph, ids: Iterable<string>): CachedEmbedding[] {
    const cached: CachedEmbedding[] = [];
    for (const id of ids) {
      const embedding = graph.getEmbedding(id);
      if (embedding && VectorUtils.isValid(embedding)) {
        cached.push({ id, embedding });
      }
    }
    return cached;
  }
}

export function totalEdgesCreated(report: InferenceReport): number {
  const { SUPPORTED_BY, MENTIONED_IN, OVERRIDES } = report.edgesCreated;
  return SUPPORTED_BY + MENTIONED_IN + OVERRIDES;
}
