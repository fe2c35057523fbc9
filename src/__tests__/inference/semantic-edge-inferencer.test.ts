/**
 * Unit tests for similarity-inferred edges
 *
 * Vectors come from VECTORS so every cosine score is exact and the
 * threshold boundaries can be asserted directly.
 */

import { KnowledgeGraph } from '../../core/graph.js';
import {
  DEFAULT_THRESHOLDS,
  SemanticEdgeInferencer,
  totalEdgesCreated
} from '../../inference/semantic-edge-inferencer.js';
import { ConfigurationError } from '../../utils/error-handler.js';
import { TestHelpers, VECTORS, vector } from '../setup.js';

describe('SemanticEdgeInferencer', () => {
  let graph: KnowledgeGraph;
  let inferencer: SemanticEdgeInferencer;

  beforeEach(() => {
    graph = new KnowledgeGraph();
    inferencer = new SemanticEdgeInferencer();
    graph.addNode(TestHelpers.chunk('C1'), vector(VECTORS.AXIS));
  });

  describe('Roadmap item edges', () => {
    test('should create SUPPORTED_BY at or above 0.75', () => {
      graph.addNode(TestHelpers.roadmapItem('Strong'), vector(VECTORS.SIM_080));
      graph.addNode(TestHelpers.roadmapItem('Boundary'), vector(VECTORS.SIM_075));

      const report = inferencer.infer(graph);

      expect(graph.getEdge('ri_strong', 'C1')?.type).toBe('SUPPORTED_BY');
      expect(graph.getEdge('ri_strong', 'C1')?.weight).toBe(0.8);
      expect(graph.getEdge('ri_boundary', 'C1')?.type).toBe('SUPPORTED_BY');
      expect(graph.getEdge('ri_boundary', 'C1')?.weight).toBe(0.75);
      expect(report.edgesCreated).toEqual({ SUPPORTED_BY: 2, MENTIONED_IN: 0, OVERRIDES: 0 });
    });

    test('should create MENTIONED_IN between 0.65 and 0.75', () => {
      graph.addNode(TestHelpers.roadmapItem('Moderate'), vector(VECTORS.SIM_070));
      graph.addNode(TestHelpers.roadmapItem('Boundary'), vector(VECTORS.SIM_065));

      const report = inferencer.infer(graph);

      expect(graph.getEdge('ri_moderate', 'C1')?.type).toBe('MENTIONED_IN');
      expect(graph.getEdge('ri_moderate', 'C1')?.weight).toBe(0.7);
      expect(graph.getEdge('ri_boundary', 'C1')?.type).toBe('MENTIONED_IN');
      expect(report.edgesCreated.MENTIONED_IN).toBe(2);
    });

    test('should not link below the MENTIONED_IN threshold', () => {
      graph.addNode(TestHelpers.roadmapItem('Weak'), vector(VECTORS.SIM_060));
      graph.addNode(TestHelpers.roadmapItem('Unrelated'), vector(VECTORS.ORTHOGONAL));

      const report = inferencer.infer(graph);

      expect(graph.edgeCount()).toBe(0);
      expect(totalEdgesCreated(report)).toBe(0);
      expect(report.roadmapItemsWithEmbedding).toBe(2);
    });
  });

  describe('Decision edges', () => {
    test('should create OVERRIDES at or above 0.7', () => {
      graph.addNode(TestHelpers.decision('D1'), vector(VECTORS.SIM_082));
      graph.addNode(TestHelpers.decision('D2'), vector(VECTORS.SIM_070));
      graph.addNode(TestHelpers.decision('D3'), vector(VECTORS.SIM_065));

      const report = inferencer.infer(graph);

      expect(graph.getEdge('D1', 'C1')?.type).toBe('OVERRIDES');
      expect(graph.getEdge('D1', 'C1')?.weight).toBe(0.82);
      expect(graph.getEdge('D2', 'C1')?.weight).toBe(0.7);
      expect(graph.hasEdge('D3', 'C1')).toBe(false);
      expect(report.edgesCreated.OVERRIDES).toBe(2);
      expect(report.decisionsWithEmbedding).toBe(3);
    });

    test('should skip decisions without an embedding', () => {
      graph.addNode(TestHelpers.decision('D1'));

      const report = inferencer.infer(graph);

      expect(report.decisionsWithEmbedding).toBe(0);
      expect(graph.edgeCount()).toBe(0);
    });
  });

  describe('Skipped inputs', () => {
    test('should skip chunks without an embedding', () => {
      graph.addNode(TestHelpers.chunk('C2'));
      graph.addNode(TestHelpers.chunk('C3'), [Number.NaN, 0, 0, 0, 0]);
      graph.addNode(TestHelpers.decision('D1'), vector(VECTORS.SIM_082));

      const report = inferencer.infer(graph);

      expect(report.chunksProcessed).toBe(1);
      expect(report.chunksSkipped).toBe(2);
      expect(graph.getIncomingEdges('C2')).toEqual([]);
      expect(graph.getIncomingEdges('C3')).toEqual([]);
    });

    test('should skip pairs whose dimensions differ', () => {
      graph.addNode(TestHelpers.chunk('C2'), [1, 0, 0]);
      graph.addNode(TestHelpers.roadmapItem('Strong'), vector(VECTORS.SIM_080));
      graph.addNode(TestHelpers.decision('D1'), vector(VECTORS.SIM_082));

      const report = inferencer.infer(graph);

      expect(report.pairsSkipped).toBe(2);
      expect(report.chunksProcessed).toBe(2);
      expect(graph.getIncomingEdges('C2')).toEqual([]);
      expect(graph.getIncomingEdges('C1')).toHaveLength(2);
    });
  });

  describe('Recomputation', () => {
    test('should replace inferred edges and keep structural ones', () => {
      graph.addNode(TestHelpers.decision('D1'), vector(VECTORS.SIM_082));
      graph.addNode(TestHelpers.roadmapItem('Strong'), vector(VECTORS.SIM_080));
      graph.addEdge('D1', 'ri_strong', 'IMPACTS');

      inferencer.infer(graph);
      const second = inferencer.infer(graph);

      expect(second.edgesRemoved).toBe(2);
      expect(totalEdgesCreated(second)).toBe(2);
      expect(graph.edgeCount()).toBe(3);
      expect(graph.getEdge('D1', 'ri_strong')?.type).toBe('IMPACTS');
    });

    test('should drop edges that no longer clear a stricter threshold', () => {
      graph.addNode(TestHelpers.roadmapItem('Moderate'), vector(VECTORS.SIM_070));
      inferencer.infer(graph);
      expect(graph.hasEdge('ri_moderate', 'C1')).toBe(true);

      const strict = new SemanticEdgeInferencer({ supportedByThreshold: 0.9, mentionedInThreshold: 0.8 });
      const report = strict.infer(graph);

      expect(report.edgesRemoved).toBe(1);
      expect(graph.hasEdge('ri_moderate', 'C1')).toBe(false);
    });
  });

  describe('Threshold validation', () => {
    test('should default to 0.75, 0.65 and 0.7', () => {
      expect(inferencer.getThresholds()).toEqual(DEFAULT_THRESHOLDS);
      expect(DEFAULT_THRESHOLDS).toEqual({
        supportedByThreshold: 0.75,
        mentionedInThreshold: 0.65,
        overridesThreshold: 0.7
      });
    });

    test('should reject thresholds outside [0, 1]', () => {
      expect(() => new SemanticEdgeInferencer({ overridesThreshold: 1.5 })).toThrow(ConfigurationError);
      expect(() => new SemanticEdgeInferencer({ mentionedInThreshold: -0.1 })).toThrow(ConfigurationError);
    });

    test('should reject a MENTIONED_IN threshold above SUPPORTED_BY', () => {
      expect(() => new SemanticEdgeInferencer({ mentionedInThreshold: 0.8 })).toThrow(
        'mentionedInThreshold (0.8) cannot exceed supportedByThreshold (0.75)'
      );
    });
  });
});
