/**
 * Embedding Service
 *
 * Embedding generation sits behind `EmbeddingProvider` so the sync procedure
 * and the embedding matcher never depend on a particular model server. The
 * Ollama-backed provider adds text-keyed caching, batching and a per-batch
 * timeout.
 */

import { Ollama } from 'ollama';
import type { Embedding } from '../core/types.js';
import { EmbeddingError, toError } from './error-handler.js';
import { VectorUtils, type EmbeddingCache } from './vector-utils.js';

/**
 * Produces one embedding per input text, in input order
 */
export interface EmbeddingProvider {
  embed(texts: string[]): Promise<Embedding[]>;
}

export interface OllamaEmbeddingConfig {
  host: string;
  model: string;
  maxBatchSize: number;
  timeoutMs: number;
  cacheSize: number;
}

const DEFAULT_OLLAMA_CONFIG: OllamaEmbeddingConfig = {
  host: 'http://127.0.0.1:11434',
  model: 'mxbai-embed-large:latest',
  maxBatchSize: 32,
  timeoutMs: 30000,
  cacheSize: 10000
};

/**
 * Minimal slice of the Ollama client used here
 */
export interface OllamaClientLike {
  embed(request: { model: string; input: string[] }): Promise<{ embeddings: number[][] }>;
  abort(): void;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private config: OllamaEmbeddingConfig;
  private client: OllamaClientLike;
  private cache: EmbeddingCache;

  constructor(config: Partial<OllamaEmbeddingConfig> = {}, client?: OllamaClientLike) {
    this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    this.client = client ?? new Ollama({ host: this.config.host });
    this.cache = VectorUtils.createEmbeddingCache(this.config.cacheSize);
  }

  async embed(texts: string[]): Promise<Embedding[]> {
    const resolved = new Map<string, Embedding>();
    const pending: string[] = [];

    for (const text of new Set(texts)) {
      const cached = this.cache.get(text);
      if (cached) {
        resolved.set(text, cached);
      } else {
        pending.push(text);
      }
    }

    for (let i = 0; i < pending.length; i += this.config.maxBatchSize) {
      const batch = pending.slice(i, i + this.config.maxBatchSize);
      const embeddings = await this.embedBatch(batch);
      batch.forEach((text, index) => {
        resolved.set(text, embeddings[index]);
        this.cache.set(text, embeddings[index]);
      });
    }

    return texts.map(text => {
      const embedding = resolved.get(text);
      if (!embedding) {
        throw new EmbeddingError(`No embedding produced for text: ${text.slice(0, 50)}`);
      }
      return embedding;
    });
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async embedBatch(batch: string[]): Promise<Embedding[]> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        this.client.abort();
        reject(new EmbeddingError(`Embedding request timed out after ${this.config.timeoutMs}ms`));
      }, this.config.timeoutMs);
    });

    try {
      const response = await Promise.race([
        this.client.embed({ model: this.config.model, input: batch }),
        timeout
      ]);

      if (response.embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `Expected ${batch.length} embeddings from ${this.config.model}, got ${response.embeddings.length}`
        );
      }
      return response.embeddings;
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(`Embedding request to ${this.config.model} failed`, { cause: toError(error) });
    } finally {
      clearTimeout(timer);
    }
  }
}
