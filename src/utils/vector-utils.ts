/**
 * Vector utility functions for similarity calculations over embeddings
 */

import type { Embedding } from '../core/types.js';

export interface SimilarityResult {
  index: number;
  score: number;
}

export interface EmbeddingCache {
  get(key: string): Embedding | undefined;
  set(key: string, embedding: Embedding): void;
  clear(): void;
  size(): number;
}

export class VectorUtils {
  /**
   * Cosine similarity between two vectors. Zero-norm vectors score 0.
   */
  static cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
      throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
      return 0;
    }

    return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  }

  /**
   * Check that a vector is non-empty and holds only finite values
   */
  static isValid(vector: readonly number[]): boolean {
    return vector.length > 0 && vector.every(value => Number.isFinite(value));
  }

  /**
   * Indices of candidates scoring at least `threshold` against the query,
   * best first. Candidates of a different dimension are ignored.
   */
  static findSimilarVectors(
    query: readonly number[],
    candidates: ReadonlyArray<readonly number[]>,
    threshold: number = 0,
    topK: number = candidates.length
  ): SimilarityResult[] {
    const results: SimilarityResult[] = [];

    candidates.forEach((candidate, index) => {
      if (candidate.length !== query.length) {
        return;
      }
      const score = this.cosineSimilarity(query, candidate);
      if (score >= threshold) {
        results.push({ index, score });
      }
    });

    return results.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  /**
   * Bounded embedding cache keyed by text; evicts the oldest entry when full
   */
  static createEmbeddingCache(maxSize: number = 1000): EmbeddingCache {
    const cache = new Map<string, Embedding>();

    return {
      get: (key: string) => cache.get(key),
      set: (key: string, embedding: Embedding) => {
        if (!cache.has(key) && cache.size >= maxSize) {
          const oldest = cache.keys().next();
          if (!oldest.done) {
            cache.delete(oldest.value);
          }
        }
        cache.set(key, embedding);
      },
      clear: () => cache.clear(),
      size: () => cache.size
    };
  }
}
