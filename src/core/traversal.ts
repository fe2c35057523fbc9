/**
 * Graph traversal over the unified knowledge graph
 *
 * Breadth-first expansion is the natural fit for context assembly: the
 * immediate neighborhood of a seed (the decision resolving a question, the
 * chunks supporting a roadmap item) is explored before anything further out.
 * The graph is not acyclic (OVERRIDES and RESOLVES relationships can close
 * loops), so every traversal is guarded by a visited set.
 *
 * Time Complexity: O(V + E)
 * Space Complexity: O(V)
 */

import type { Neighbor } from './graph.js';
import { entityMatches } from './entities.js';
import type {
  EdgeType,
  EntityKind,
  EntityOfKind,
  GraphNode,
  KnowledgeEntity
} from './types.js';

/**
 * Graph interface for traversal operations
 */
export interface GraphLike {
  getNode(nodeId: string): GraphNode | undefined;
  getNeighbors(nodeId: string, edgeTypes?: readonly EdgeType[]): Neighbor[];
}

export interface MultiHopOptions {
  /** Hop budget; 0 returns the seeds only */
  maxHops: number;
  /**
   * Topic terms. A discovered node is reported only when its serialized
   * content contains at least one term (case-insensitive). Non-matching
   * nodes are still expanded through.
   */
  topicTerms?: readonly string[];
  edgeTypes?: readonly EdgeType[];
}

export type EntityGroups = { [K in EntityKind]: EntityOfKind<K>[] };

export interface MultiHopResult {
  /** Reported nodes grouped by type, seeds included */
  groups: EntityGroups;
  /** Hop distance of every reported node from the nearest seed */
  distances: Map<string, number>;
  /** Node ids from the seed to each reported node, unreported hops included */
  paths: Map<string, string[]>;
  /** Seeds that exist in the graph */
  seeds: string[];
  metadata: {
    nodesVisited: number;
    edgesTraversed: number;
    hopsCompleted: number;
    executionTime: number;
  };
}

export function createEmptyGroups(): EntityGroups {
  return {
    chunk: [],
    decision: [],
    question: [],
    assessment: [],
    roadmap_item: [],
    gap: []
  };
}

function groupFor<K extends EntityKind>(groups: EntityGroups, kind: K): EntityOfKind<K>[] {
  return groups[kind];
}

/**
 * Graph traversal over a knowledge graph
 */
export class GraphTraversal {
  private graph: GraphLike;

  constructor(graph: GraphLike) {
    this.graph = graph;
  }

  /**
   * Multi-hop expansion from a set of seeds
   *
   * Follows both outgoing and incoming edges, one hop level at a time, until
   * the hop budget is exhausted or the frontier is empty.
   */
  multiHop(seedIds: readonly string[], options: MultiHopOptions): MultiHopResult {
    const startTime = Date.now();
    const terms = (options.topicTerms ?? []).map(term => term.trim()).filter(term => term.length > 0);
    const groups = createEmptyGroups();
    const distances = new Map<string, number>();
    const paths = new Map<string, string[]>();
    // path to every visited node, reported or not
    const trails = new Map<string, string[]>();
    const seeds: string[] = [];

    const report = (entity: KnowledgeEntity, distance: number, path: string[]) => {
      groupFor(groups, entity.kind).push(entity);
      distances.set(entity.id, distance);
      paths.set(entity.id, path);
    };

    for (const seedId of seedIds) {
      const node = this.graph.getNode(seedId);
      if (!node || trails.has(seedId)) {
        continue;
      }
      trails.set(seedId, [seedId]);
      seeds.push(seedId);
      report(node.entity, 0, [seedId]);
    }

    let frontier = [...seeds];
    let hopsCompleted = 0;
    let edgesTraversed = 0;

    while (frontier.length > 0 && hopsCompleted < options.maxHops) {
      const next: string[] = [];

      for (const nodeId of frontier) {
        const trail = trails.get(nodeId) ?? [nodeId];
        for (const { node } of this.graph.getNeighbors(nodeId, options.edgeTypes)) {
          edgesTraversed++;
          if (trails.has(node.id)) {
            continue;
          }
          const path = [...trail, node.id];
          trails.set(node.id, path);
          next.push(node.id);

          if (terms.length === 0 || terms.some(term => entityMatches(node.entity, term))) {
            report(node.entity, hopsCompleted + 1, path);
          }
        }
      }

      hopsCompleted++;
      frontier = next;
    }

    return {
      groups,
      distances,
      paths,
      seeds,
      metadata: {
        nodesVisited: trails.size,
        edgesTraversed,
        hopsCompleted,
        executionTime: Date.now() - startTime
      }
    };
  }
}

/**
 * Convenience wrapper for one-off multi-hop queries
 */
export function multiHopTraversal(
  graph: GraphLike,
  seedIds: readonly string[],
  options: MultiHopOptions
): MultiHopResult {
  return new GraphTraversal(graph).multiHop(seedIds, options);
}
