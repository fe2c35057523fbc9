/**
 * Hono HTTP API for the knowledge graph
 *
 * Exposes sync, statistics, authority-ordered queries, multi-hop traversal
 * and override lookups. Request bodies are validated with zod; invalid input
 * is answered with 400.
 */

import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { EDGE_TYPES } from '../core/types.js';
import type { KnowledgeContextEngine } from '../engine/context-engine.js';
import { describeIssues } from '../sources/schemas.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity, toError } from '../utils/error-handler.js';

export const QueryRequestSchema = z.object({
  query: z.string().trim().min(1),
  topK: z.number().int().positive().max(1000).optional(),
  includeSuperseded: z.boolean().optional()
});

export const TraverseRequestSchema = z.object({
  seeds: z.array(z.string().min(1)).min(1),
  maxHops: z.number().int().min(0).max(10).default(2),
  topicTerms: z.array(z.string()).optional(),
  edgeTypes: z.array(z.enum(EDGE_TYPES)).optional()
});

async function readBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<{ ok: true; data: z.output<S> } | { ok: false; error: string }> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return { ok: false, error: 'Request body must be valid JSON' };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: describeIssues(parsed.error) };
  }
  return { ok: true, data: parsed.data };
}

function failure(c: Context, category: ErrorCategory, operation: string, error: unknown) {
  const info = ErrorHandler.handle(category, ErrorSeverity.HIGH, `Failed to ${operation}`, toError(error), {
    path: c.req.path
  });
  return c.json({ error: info.message, detail: info.originalError?.message }, 500);
}

export function createApp(engine: KnowledgeContextEngine): Hono {
  const app = new Hono();

  // Enable CORS for UI communication
  app.use('/*', cors({
    origin: ['http://localhost:5173', 'http://localhost:3000', 'http://127.0.0.1:5173'],
    allowHeaders: ['Content-Type'],
    allowMethods: ['GET', 'POST', 'OPTIONS']
  }));

  /**
   * GET /api/health
   */
  app.get('/api/health', (c) => {
    return c.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'authority-graph'
    });
  });

  /**
   * POST /api/graph/sync
   * Sync every store into the graph and persist it
   */
  app.post('/api/graph/sync', async (c) => {
    try {
      const report = await engine.sync();
      return c.json(report);
    } catch (error) {
      return failure(c, ErrorCategory.SYNC, 'sync graph', error);
    }
  });

  /**
   * GET /api/graph/stats
   */
  app.get('/api/graph/stats', async (c) => {
    try {
      const [stats, stale] = await Promise.all([engine.getStats(), engine.needsSync()]);
      return c.json({ ...stats, needsSync: stale });
    } catch (error) {
      return failure(c, ErrorCategory.STORAGE, 'compute graph statistics', error);
    }
  });

  /**
   * POST /api/query
   * Authority-ordered retrieval plus the markdown brief
   */
  app.post('/api/query', async (c) => {
    const body = await readBody(c, QueryRequestSchema);
    if (!body.ok) {
      return c.json({ error: body.error }, 400);
    }

    try {
      const result = await engine.query(body.data.query, {
        topK: body.data.topK,
        includeSuperseded: body.data.includeSuperseded
      });
      return c.json(result);
    } catch (error) {
      return failure(c, ErrorCategory.RETRIEVAL, 'query graph', error);
    }
  });

  /**
   * POST /api/traverse
   * Multi-hop expansion from seed nodes, grouped by type, with the path to each node
   */
  app.post('/api/traverse', async (c) => {
    const body = await readBody(c, TraverseRequestSchema);
    if (!body.ok) {
      return c.json({ error: body.error }, 400);
    }

    try {
      const result = await engine.traverse(body.data.seeds, {
        maxHops: body.data.maxHops,
        topicTerms: body.data.topicTerms,
        edgeTypes: body.data.edgeTypes
      });
      return c.json({
        seeds: result.seeds,
        groups: result.groups,
        distances: Object.fromEntries(result.distances),
        paths: Object.fromEntries(result.paths),
        metadata: result.metadata
      });
    } catch (error) {
      return failure(c, ErrorCategory.RETRIEVAL, 'traverse graph', error);
    }
  });

  /**
   * GET /api/chunks/:id/superseded-by
   */
  app.get('/api/chunks/:id/superseded-by', async (c) => {
    const chunkId = c.req.param('id');
    try {
      const graph = await engine.getGraph();
      if (!graph.getNodesByType('chunk').has(chunkId)) {
        return c.json({ error: `Chunk ${chunkId} not found` }, 404);
      }
      const decision = await engine.getSupersedingDecision(chunkId);
      if (!decision) {
        return c.json({ error: `Chunk ${chunkId} is not overridden` }, 404);
      }
      return c.json({ chunkId, decision });
    } catch (error) {
      return failure(c, ErrorCategory.RETRIEVAL, 'look up superseding decision', error);
    }
  });

  /**
   * GET /api/decisions/:id/overrides
   */
  app.get('/api/decisions/:id/overrides', async (c) => {
    const decisionId = c.req.param('id');
    try {
      const graph = await engine.getGraph();
      if (!graph.getNodesByType('decision').has(decisionId)) {
        return c.json({ error: `Decision ${decisionId} not found` }, 404);
      }
      const chunks = await engine.getDecisionOverrides(decisionId);
      return c.json({ decisionId, chunks });
    } catch (error) {
      return failure(c, ErrorCategory.RETRIEVAL, 'list decision overrides', error);
    }
  });

  return app;
}
