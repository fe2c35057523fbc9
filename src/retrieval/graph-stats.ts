import { authorityCategoryOf } from '../core/authority.js';
import type { KnowledgeGraph } from '../core/graph.js';
import type { EdgeType, EntityKind } from '../core/types.js';

export interface AuthorityCoverage {
  activeDecisions: number;
  answeredQuestions: number;
  /** Questions not answered: pending, deferred or obsolete */
  pendingQuestions: number;
  assessments: number;
  roadmapItems: number;
  gaps: number;
  chunks: number;
  /** Chunks with at least one overriding decision */
  overriddenChunks: number;
}

export interface GraphStats {
  totalNodes: number;
  totalEdges: number;
  density: number;
  nodesByType: Record<EntityKind, number>;
  edgesByType: Record<EdgeType, number>;
  authorityCoverage: AuthorityCoverage;
}

/**
 * Node and edge counts plus how much of the graph each authority level covers
 */
export function getGraphStats(graph: KnowledgeGraph): GraphStats {
  const metrics = graph.getMetrics();

  let activeDecisions = 0;
  for (const decision of graph.getNodesByType('decision').values()) {
    if (decision.status === 'active') {
      activeDecisions++;
    }
  }

  let answeredQuestions = 0;
  let pendingQuestions = 0;
  for (const question of graph.getNodesByType('question').values()) {
    if (authorityCategoryOf(question) === 'answered_questions') {
      answeredQuestions++;
    } else {
      pendingQuestions++;
    }
  }

  let overriddenChunks = 0;
  for (const chunkId of graph.getNodesByType('chunk').keys()) {
    if (graph.getIncomingEdges(chunkId, ['OVERRIDES']).length > 0) {
      overriddenChunks++;
    }
  }

  return {
    totalNodes: metrics.nodeCount,
    totalEdges: metrics.edgeCount,
    density: metrics.density,
    nodesByType: metrics.nodesByKind,
    edgesByType: metrics.edgesByType,
    authorityCoverage: {
      activeDecisions,
      answeredQuestions,
      pendingQuestions,
      assessments: metrics.nodesByKind.assessment,
      roadmapItems: metrics.nodesByKind.roadmap_item,
      gaps: metrics.nodesByKind.gap,
      chunks: metrics.nodesByKind.chunk,
      overriddenChunks
    }
  };
}
