/**
 * Unit tests for core graph data structure
 *
 * Tests the KnowledgeGraph implementation including:
 * - Idempotent node creation and the typed indices
 * - Edge creation, overwrite and endpoint typing
 * - Adjacency list management
 * - Graph consistency and validation
 */

import { KnowledgeGraph } from '../../core/graph.js';
import { GraphError } from '../../utils/error-handler.js';
import { TestHelpers } from '../setup.js';

describe('KnowledgeGraph', () => {
  let graph: KnowledgeGraph;

  beforeEach(() => {
    graph = new KnowledgeGraph();
  });

  afterEach(() => {
    graph.clear();
  });

  describe('Node Operations', () => {
    test('should add a node and index it by type', () => {
      const created = graph.addNode(TestHelpers.chunk('C1'), [0.1, 0.2]);

      expect(created).toBe(true);
      expect(graph.hasNode('C1')).toBe(true);
      expect(graph.getNodesByType('chunk').get('C1')?.content).toBe('Content of C1');
      expect(graph.getNodesByType('decision').size).toBe(0);
      expect(graph.getEmbedding('C1')).toEqual([0.1, 0.2]);
      expect(graph.getNode('C1')?.createdAt).toBeInstanceOf(Date);
    });

    test('should treat re-adding an existing id as a no-op', () => {
      graph.addNode(TestHelpers.decision('D1', { statement: 'Use Postgres' }), [1, 0]);

      const created = graph.addNode(TestHelpers.decision('D1', { statement: 'Use MySQL' }), [0, 1]);

      expect(created).toBe(false);
      expect(graph.nodeCount()).toBe(1);
      expect(graph.getNodesByType('decision').get('D1')?.statement).toBe('Use Postgres');
      expect(graph.getEmbedding('D1')).toEqual([1, 0]);
    });

    test('should reject an id already used by another type', () => {
      graph.addNode(TestHelpers.chunk('X1'));

      expect(() => graph.addNode(TestHelpers.decision('X1'))).toThrow(GraphError);
      expect(graph.getNodesByType('decision').has('X1')).toBe(false);
    });

    test('should not store empty embeddings', () => {
      graph.addNode(TestHelpers.chunk('C1'), []);

      expect(graph.getEmbedding('C1')).toBeUndefined();
    });

    test('should enforce node capacity limits', () => {
      const smallGraph = new KnowledgeGraph({ maxNodes: 2 });
      smallGraph.addNode(TestHelpers.chunk('C1'));
      smallGraph.addNode(TestHelpers.chunk('C2'));

      expect(() => smallGraph.addNode(TestHelpers.chunk('C3'))).toThrow('Graph capacity exceeded');
    });

    test('should store its own copy of the entity', () => {
      const chunk = TestHelpers.chunk('C1');
      graph.addNode(chunk);

      chunk.content = 'Rewritten by the caller';

      expect(graph.getNodesByType('chunk').get('C1')?.content).toBe('Content of C1');
      expect(graph.getEntity('C1')).not.toBe(chunk);
    });

    test('should mark a question answered by a decision', () => {
      graph.addNode(TestHelpers.question('Q1'));

      expect(graph.markQuestionAnswered('Q1', 'D1')).toBe(true);

      const question = graph.getNodesByType('question').get('Q1');
      expect(question?.status).toBe('answered');
      expect(question?.answeredByDecision).toBe('D1');
      expect(graph.getEntity('Q1')).toBe(question);
      expect(graph.markQuestionAnswered('Q404', 'D1')).toBe(false);
    });
  });

  describe('Edge Operations', () => {
    beforeEach(() => {
      graph.addNode(TestHelpers.decision('D1'));
      graph.addNode(TestHelpers.question('Q1'));
      graph.addNode(TestHelpers.roadmapItem('Billing'));
      graph.addNode(TestHelpers.chunk('C1'));
    });

    test('should add a typed, weighted edge', () => {
      const edge = graph.addEdge('D1', 'Q1', 'RESOLVES', 1.0, { note: 'test' });

      expect(edge.id).toBe('D1->Q1');
      expect(edge.type).toBe('RESOLVES');
      expect(edge.metadata).toEqual({ note: 'test' });
      expect(graph.hasEdge('D1', 'Q1')).toBe(true);
      expect(graph.hasEdge('Q1', 'D1')).toBe(false);
      expect(graph.getIncomingEdges('Q1').map(e => e.source)).toEqual(['D1']);
      expect(graph.getPredecessors('Q1')).toEqual(['D1']);
    });

    test('should throw for edges to unknown nodes', () => {
      expect(() => graph.addEdge('D1', 'missing', 'OVERRIDES')).toThrow(GraphError);
      expect(() => graph.addEdge('missing', 'C1', 'OVERRIDES')).toThrow('Source node missing does not exist');
    });

    test('should only allow OVERRIDES from decisions to chunks', () => {
      expect(() => graph.addEdge('ri_billing', 'C1', 'OVERRIDES', 0.9)).toThrow(GraphError);
      expect(() => graph.addEdge('D1', 'Q1', 'OVERRIDES', 0.9)).toThrow(GraphError);
      expect(graph.addEdge('D1', 'C1', 'OVERRIDES', 0.9).weight).toBe(0.9);
    });

    test('should enforce endpoint kinds for every edge type', () => {
      expect(() => graph.addEdge('Q1', 'D1', 'RESOLVES')).toThrow(GraphError);
      expect(() => graph.addEdge('C1', 'ri_billing', 'SUPPORTED_BY')).toThrow(GraphError);
      expect(() => graph.addEdge('D1', 'ri_billing', 'ABOUT_ITEM')).toThrow(GraphError);
    });

    test('should keep a single edge per ordered pair', () => {
      const first = graph.addEdge('ri_billing', 'C1', 'MENTIONED_IN', 0.66);
      const second = graph.addEdge('ri_billing', 'C1', 'SUPPORTED_BY', 0.8);

      expect(graph.edgeCount()).toBe(1);
      expect(graph.getEdge('ri_billing', 'C1')?.type).toBe('SUPPORTED_BY');
      expect(second.createdAt).toBe(first.createdAt);
    });

    test('should reject non-finite weights', () => {
      expect(() => graph.addEdge('D1', 'C1', 'OVERRIDES', Number.NaN)).toThrow(GraphError);
    });

    test('should filter edges by type', () => {
      graph.addEdge('D1', 'Q1', 'RESOLVES');
      graph.addEdge('D1', 'ri_billing', 'IMPACTS');
      graph.addEdge('D1', 'C1', 'OVERRIDES', 0.72);

      expect(graph.getOutgoingEdges('D1')).toHaveLength(3);
      expect(graph.getOutgoingEdges('D1', ['OVERRIDES']).map(e => e.target)).toEqual(['C1']);
      expect(graph.getNeighbors('C1').map(n => [n.node.id, n.direction])).toEqual([['D1', 'in']]);
    });

    test('should remove edges of the given types only', () => {
      graph.addEdge('D1', 'Q1', 'RESOLVES');
      graph.addEdge('D1', 'C1', 'OVERRIDES', 0.72);
      graph.addEdge('ri_billing', 'C1', 'SUPPORTED_BY', 0.8);

      const removed = graph.removeEdgesOfType(['OVERRIDES', 'SUPPORTED_BY', 'MENTIONED_IN']);

      expect(removed).toBe(2);
      expect(graph.edgeCount()).toBe(1);
      expect(graph.hasEdge('D1', 'Q1')).toBe(true);
      expect(graph.getIncomingEdges('C1')).toEqual([]);
    });
  });

  describe('Metrics and Consistency', () => {
    test('should report counts by kind and edge type', () => {
      graph.addNode(TestHelpers.decision('D1'));
      graph.addNode(TestHelpers.chunk('C1'));
      graph.addNode(TestHelpers.chunk('C2'));
      graph.addEdge('D1', 'C1', 'OVERRIDES', 0.75);

      const metrics = graph.getMetrics();

      expect(metrics.nodeCount).toBe(3);
      expect(metrics.edgeCount).toBe(1);
      expect(metrics.nodesByKind.chunk).toBe(2);
      expect(metrics.nodesByKind.decision).toBe(1);
      expect(metrics.edgesByType.OVERRIDES).toBe(1);
      expect(metrics.edgesByType.RESOLVES).toBe(0);
      expect(metrics.density).toBeCloseTo(1 / 6);
    });

    test('should validate a consistent graph', () => {
      graph.addNode(TestHelpers.decision('D1'));
      graph.addNode(TestHelpers.question('Q1'));
      graph.addEdge('D1', 'Q1', 'RESOLVES');
      graph.markQuestionAnswered('Q1', 'D1');

      expect(graph.validateConsistency()).toEqual([]);
    });

    test('should clear everything', () => {
      graph.addNode(TestHelpers.decision('D1'));
      graph.addNode(TestHelpers.chunk('C1'));
      graph.addEdge('D1', 'C1', 'OVERRIDES', 0.9);

      graph.clear();

      expect(graph.nodeCount()).toBe(0);
      expect(graph.edgeCount()).toBe(0);
      expect(graph.getNodesByType('chunk').size).toBe(0);
    });
  });
});
