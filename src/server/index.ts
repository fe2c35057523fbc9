/**
 * Main server entry point
 *
 * Configuration comes from the environment (see `loadConfigFromEnv`).
 */

import { serve } from '@hono/node-server';
import { loadConfigFromEnv } from '../config/config.js';
import { KnowledgeContextEngine } from '../engine/context-engine.js';
import { createApp } from './api.js';

const config = loadConfigFromEnv();
const engine = new KnowledgeContextEngine(config);
const app = createApp(engine);
const { port, host } = config.server;

console.log(`🧠 Starting knowledge graph server...`);
console.log(`📡 Server will be available at http://${host}:${port}`);
console.log(`🔗 API endpoints:`);
console.log(`   GET  /api/health - Health check`);
console.log(`   POST /api/graph/sync - Sync stores into the graph`);
console.log(`   GET  /api/graph/stats - Graph statistics`);
console.log(`   POST /api/query - Authority-ordered retrieval`);
console.log(`   POST /api/traverse - Multi-hop traversal`);
console.log(`   GET  /api/chunks/:id/superseded-by - Superseding decision`);
console.log(`   GET  /api/decisions/:id/overrides - Chunks a decision overrides`);

console.log(`🌱 Loading graph from ${config.storage.directory}...`);
engine.initialize().then(async () => {
  const stats = await engine.getStats();
  console.log(`✅ Graph loaded: ${stats.totalNodes} nodes, ${stats.totalEdges} edges`);
  if (await engine.needsSync()) {
    console.log(`⚠️  Stores changed since the last sync, POST /api/graph/sync to update`);
  }

  serve({
    fetch: app.fetch,
    port,
    hostname: host,
  }, (info) => {
    console.log(`✅ Knowledge graph server is running on http://${info.address}:${info.port}`);
  });
}).catch((error: unknown) => {
  console.error(`❌ Failed to load graph:`, error);
  process.exit(1);
});

// Graceful shutdown
process.on('SIGINT', () => {
  console.log('\n🛑 Shutting down knowledge graph server...');
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.log('\n🛑 Shutting down knowledge graph server...');
  process.exit(0);
});
