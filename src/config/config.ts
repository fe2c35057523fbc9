/**
 * Configuration for the knowledge graph
 *
 * A full configuration is built from defaults; callers pass partial
 * overrides which are merged section by section. Environment variables are
 * read once at the process edge by `loadConfigFromEnv`.
 */

import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../utils/error-handler.js';

export type RetrievalMatcherKind = 'keyword' | 'embedding';

export interface KnowledgeGraphConfig {
  graph: {
    maxNodes: number;
  };
  storage: {
    /** Directory holding graph.json and the per-type index files */
    directory: string;
  };
  sources: {
    roadmapPath: string;
    questionsPath: string;
    decisionsPath: string;
    architecturePath: string;
    competitivePath: string;
    chunksPath: string;
  };
  inference: {
    supportedByThreshold: number;
    mentionedInThreshold: number;
    overridesThreshold: number;
  };
  embedding: {
    model: string;
    host: string;
    maxBatchSize: number;
    timeoutMs: number;
    cacheSize: number;
  };
  retrieval: {
    matcher: RetrievalMatcherKind;
    topK: number;
    minSimilarity: number;
  };
  sync: {
    verbose: boolean;
  };
  server: {
    port: number;
    host: string;
  };
}

export type PartialConfig = {
  [S in keyof KnowledgeGraphConfig]?: Partial<KnowledgeGraphConfig[S]>;
};

/**
 * Default configuration rooted at `baseDir`
 */
export function createDefaultConfig(baseDir: string = '.'): KnowledgeGraphConfig {
  const dataDir = join(baseDir, 'data');
  const outputDir = join(baseDir, 'output');
  return createConfigForDirectories(dataDir, outputDir, join(dataDir, 'unified_graph'));
}

function createConfigForDirectories(dataDir: string, outputDir: string, graphDir: string): KnowledgeGraphConfig {
  return {
    graph: {
      maxNodes: 100000
    },
    storage: {
      directory: graphDir
    },
    sources: {
      roadmapPath: join(outputDir, 'master_roadmap.md'),
      questionsPath: join(dataDir, 'questions', 'questions.json'),
      decisionsPath: join(dataDir, 'questions', 'decisions.json'),
      architecturePath: join(outputDir, 'architecture-alignment.json'),
      competitivePath: join(outputDir, 'competitive', 'assessments.json'),
      chunksPath: join(dataDir, 'chunks.jsonl')
    },
    inference: {
      supportedByThreshold: 0.75,
      mentionedInThreshold: 0.65,
      overridesThreshold: 0.7
    },
    embedding: {
      model: 'mxbai-embed-large:latest',
      host: 'http://127.0.0.1:11434',
      maxBatchSize: 32,
      timeoutMs: 30000,
      cacheSize: 10000
    },
    retrieval: {
      matcher: 'keyword',
      topK: 20,
      minSimilarity: 0.5
    },
    sync: {
      verbose: false
    },
    server: {
      port: 3001,
      host: '127.0.0.1'
    }
  };
}

/**
 * Merge partial overrides onto defaults and validate the result
 */
export function resolveConfig(
  overrides: PartialConfig = {},
  base: KnowledgeGraphConfig = createDefaultConfig()
): KnowledgeGraphConfig {
  const config: KnowledgeGraphConfig = {
    graph: { ...base.graph, ...overrides.graph },
    storage: { ...base.storage, ...overrides.storage },
    sources: { ...base.sources, ...overrides.sources },
    inference: { ...base.inference, ...overrides.inference },
    embedding: { ...base.embedding, ...overrides.embedding },
    retrieval: { ...base.retrieval, ...overrides.retrieval },
    sync: { ...base.sync, ...overrides.sync },
    server: { ...base.server, ...overrides.server }
  };

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid configuration: ${validation.errors.join(', ')}`);
  }

  return config;
}

const isUnitInterval = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;

export function validateConfig(config: KnowledgeGraphConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const { inference, embedding, retrieval, graph, storage } = config;

  if (!storage.directory || storage.directory.trim().length === 0) {
    errors.push('Storage directory is required');
  }

  if (graph.maxNodes <= 0) {
    errors.push('Max nodes must be positive');
  }

  for (const [name, value] of Object.entries(inference)) {
    if (!isUnitInterval(value)) {
      errors.push(`${name} must be between 0 and 1`);
    }
  }

  if (inference.mentionedInThreshold > inference.supportedByThreshold) {
    errors.push('mentionedInThreshold cannot exceed supportedByThreshold');
  }

  if (embedding.maxBatchSize <= 0) {
    errors.push('Embedding batch size must be positive');
  }

  if (embedding.timeoutMs <= 0) {
    errors.push('Embedding timeout must be positive');
  }

  if (!Number.isInteger(embedding.cacheSize) || embedding.cacheSize <= 0) {
    errors.push('Embedding cache size must be a positive integer');
  }

  if (retrieval.topK <= 0) {
    errors.push('Retrieval topK must be positive');
  }

  if (!isUnitInterval(retrieval.minSimilarity)) {
    errors.push('Retrieval minSimilarity must be between 0 and 1');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

const EnvSchema = z.object({
  KG_BASE_DIR: z.string().min(1).optional(),
  KG_DATA_DIR: z.string().min(1).optional(),
  KG_OUTPUT_DIR: z.string().min(1).optional(),
  KG_GRAPH_DIR: z.string().min(1).optional(),
  KG_RETRIEVAL_MATCHER: z.enum(['keyword', 'embedding']).optional(),
  KG_RETRIEVAL_TOP_K: z.coerce.number().int().positive().optional(),
  KG_EMBEDDING_MODEL: z.string().min(1).optional(),
  KG_EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  KG_SYNC_VERBOSE: z.enum(['true', 'false', '1', '0']).optional(),
  OLLAMA_HOST: z.string().url().optional(),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  HOST: z.string().min(1).optional()
});

/**
 * Build the configuration from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): KnowledgeGraphConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const baseDir = vars.KG_BASE_DIR ?? '.';
  const dataDir = vars.KG_DATA_DIR ?? join(baseDir, 'data');
  const outputDir = vars.KG_OUTPUT_DIR ?? join(baseDir, 'output');
  const base = createConfigForDirectories(dataDir, outputDir, vars.KG_GRAPH_DIR ?? join(dataDir, 'unified_graph'));

  return resolveConfig(
    {
      embedding: {
        ...(vars.KG_EMBEDDING_MODEL !== undefined && { model: vars.KG_EMBEDDING_MODEL }),
        ...(vars.KG_EMBEDDING_TIMEOUT_MS !== undefined && { timeoutMs: vars.KG_EMBEDDING_TIMEOUT_MS }),
        ...(vars.OLLAMA_HOST !== undefined && { host: vars.OLLAMA_HOST })
      },
      retrieval: {
        ...(vars.KG_RETRIEVAL_MATCHER !== undefined && { matcher: vars.KG_RETRIEVAL_MATCHER }),
        ...(vars.KG_RETRIEVAL_TOP_K !== undefined && { topK: vars.KG_RETRIEVAL_TOP_K })
      },
      sync: {
        ...(vars.KG_SYNC_VERBOSE !== undefined && { verbose: vars.KG_SYNC_VERBOSE === 'true' || vars.KG_SYNC_VERBOSE === '1' })
      },
      server: {
        ...(vars.PORT !== undefined && { port: vars.PORT }),
        ...(vars.HOST !== undefined && { host: vars.HOST })
      }
    },
    base
  );
}
