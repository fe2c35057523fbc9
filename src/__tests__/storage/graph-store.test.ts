/**
 * Tests for JSON file persistence
 *
 * Each test works in its own temporary directory.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { KnowledgeGraph } from '../../core/graph.js';
import { GRAPH_FILE, indexFileName, JsonGraphStore } from '../../storage/graph-store.js';
import { StorageError } from '../../utils/error-handler.js';
import { TestHelpers, VECTORS, vector } from '../setup.js';

function buildGraph(): KnowledgeGraph {
  const graph = new KnowledgeGraph();
  graph.addNode(TestHelpers.roadmapItem('Billing'), vector(VECTORS.SIM_080));
  graph.addNode(TestHelpers.question('Q1', { relatedRoadmapItems: ['Billing'] }));
  graph.addNode(TestHelpers.decision('D1', { questionId: 'Q1' }), vector(VECTORS.SIM_082));
  graph.addNode(TestHelpers.assessment('A1', { payload: { analysis: { summary: 'ok' } } }));
  graph.addNode(TestHelpers.gap('G1'));
  graph.addNode(TestHelpers.chunk('C1'), vector(VECTORS.AXIS));

  graph.addEdge('Q1', 'ri_billing', 'ABOUT_ITEM', 0.8);
  graph.addEdge('D1', 'Q1', 'RESOLVES');
  graph.addEdge('A1', 'G1', 'IDENTIFIES_GAP', 0.9, { source: 'test' });
  graph.addEdge('D1', 'C1', 'OVERRIDES', 0.82);
  graph.markQuestionAnswered('Q1', 'D1');
  return graph;
}

describe('JsonGraphStore', () => {
  let directory: string;
  let store: JsonGraphStore;

  beforeEach(async () => {
    directory = await TestHelpers.createTempDir();
    store = new JsonGraphStore(join(directory, 'unified_graph'));
  });

  afterEach(async () => {
    await TestHelpers.removeTempDir(directory);
  });

  test('should load an empty graph when nothing was saved', async () => {
    const graph = await store.load();

    expect(graph.nodeCount()).toBe(0);
    expect(await store.lastSaved()).toBeUndefined();
  });

  test('should write the node-link document and one index per type', async () => {
    const result = await store.save(buildGraph());

    expect(result.nodeCount).toBe(6);
    expect(result.edgeCount).toBe(4);
    expect(result.files).toEqual([
      'graph.json',
      'chunk_nodes.json',
      'decision_nodes.json',
      'question_nodes.json',
      'assessment_nodes.json',
      'roadmap_item_nodes.json',
      'gap_nodes.json'
    ]);

    const files = await fs.readdir(store.getDirectory());
    expect(files.sort()).toEqual([...result.files].sort());

    const document = JSON.parse(await fs.readFile(join(store.getDirectory(), GRAPH_FILE), 'utf-8'));
    expect(document.directed).toBe(true);
    expect(document.nodes[0]).toEqual({
      id: 'ri_billing',
      node_type: 'roadmap_item',
      data: TestHelpers.roadmapItem('Billing'),
      embedding: [4, 3, 0, 0, 0]
    });
    expect(document.links).toContainEqual({
      source: 'A1',
      target: 'G1',
      edge_type: 'IDENTIFIES_GAP',
      weight: 0.9,
      metadata: { source: 'test' }
    });

    const decisions = JSON.parse(await fs.readFile(join(store.getDirectory(), indexFileName('decision')), 'utf-8'));
    expect(Object.keys(decisions)).toEqual(['D1']);
  });

  test('should restore nodes, embeddings and edges', async () => {
    const original = buildGraph();
    await store.save(original);

    const loaded = await new JsonGraphStore(store.getDirectory()).load();

    expect(loaded.nodeCount()).toBe(6);
    expect(loaded.edgeCount()).toBe(4);
    expect(loaded.getEntity('Q1')).toEqual(original.getEntity('Q1'));
    expect(loaded.getNodesByType('question').get('Q1')?.status).toBe('answered');
    expect(loaded.getEntity('A1')).toEqual(original.getEntity('A1'));
    expect(loaded.getEmbedding('D1')).toEqual([41, 28, 5, 3, 1]);
    expect(loaded.getEmbedding('Q1')).toBeUndefined();
    expect(loaded.getEdge('D1', 'C1')?.weight).toBe(0.82);
    expect(loaded.getEdge('A1', 'G1')?.metadata).toEqual({ source: 'test' });
    expect(loaded.validateConsistency()).toEqual([]);
    expect(await store.lastSaved()).toBeInstanceOf(Date);
  });

  test('should overwrite previous saves', async () => {
    await store.save(buildGraph());
    await store.save(new KnowledgeGraph());

    const loaded = await store.load();

    expect(loaded.nodeCount()).toBe(0);
    expect(loaded.edgeCount()).toBe(0);
  });

  describe('Malformed data', () => {
    const writeGraphFile = async (text: string) => {
      await fs.mkdir(store.getDirectory(), { recursive: true });
      await fs.writeFile(join(store.getDirectory(), GRAPH_FILE), text, 'utf-8');
    };

    test('should reject unparseable JSON', async () => {
      await writeGraphFile('{ "nodes": [');

      await expect(store.load()).rejects.toThrow(StorageError);
      await expect(store.load()).rejects.toThrow(`Malformed JSON in ${join(store.getDirectory(), GRAPH_FILE)}`);
    });

    test('should reject documents that do not match the schema', async () => {
      await writeGraphFile(JSON.stringify({ nodes: 'none', links: [] }));

      await expect(store.load()).rejects.toThrow('Invalid graph.json: nodes: Expected array, received string');
    });

    test('should reject links to unknown nodes', async () => {
      await writeGraphFile(JSON.stringify({
        nodes: [],
        links: [{ source: 'D1', target: 'C1', edge_type: 'OVERRIDES', weight: 0.8 }]
      }));

      await expect(store.load()).rejects.toThrow('Persisted graph is inconsistent: Source node D1 does not exist');
    });

    test('should reject nodes whose type disagrees with their record', async () => {
      await writeGraphFile(JSON.stringify({
        nodes: [{ id: 'C1', node_type: 'decision', data: TestHelpers.chunk('C1') }],
        links: []
      }));

      await expect(store.load()).rejects.toThrow('Node C1 (decision) does not match its record C1 (chunk)');
    });

    test('should reject an index file that disagrees with the graph', async () => {
      await store.save(buildGraph());
      await fs.writeFile(join(store.getDirectory(), indexFileName('decision')), '{}', 'utf-8');

      await expect(store.load()).rejects.toThrow(
        'decision_nodes.json lists 0 records but graph.json has 1 decision nodes'
      );
    });

    test('should reject an index record that differs from its node', async () => {
      await store.save(buildGraph());
      const changed = { G1: TestHelpers.gap('G1', { severity: 'critical' }) };
      await fs.writeFile(join(store.getDirectory(), indexFileName('gap')), JSON.stringify(changed), 'utf-8');

      await expect(store.load()).rejects.toThrow('gap_nodes.json entry G1 differs from its node record');
    });
  });
});
