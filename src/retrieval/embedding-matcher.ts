import type { KnowledgeGraph } from '../core/graph.js';
import type { Embedding, KnowledgeEntity } from '../core/types.js';
import type { EmbeddingProvider } from '../utils/embedding-service.js';
import { EmbeddingError } from '../utils/error-handler.js';
import { VectorUtils } from '../utils/vector-utils.js';
import type { RetrievalMatch, RetrievalMatcher } from './types.js';

export interface EmbeddingMatcherOptions {
  /** Minimum cosine similarity for a node to match */
  minSimilarity: number;
}

/**
 * Ranks nodes by cosine similarity between the query embedding and the node
 * embedding. Nodes without an embedding, or of a different dimension, never
 * match.
 */
export class EmbeddingMatcher implements RetrievalMatcher {
  readonly name = 'embedding';
  private embedder: EmbeddingProvider;
  private options: EmbeddingMatcherOptions;

  constructor(embedder: EmbeddingProvider, options: Partial<EmbeddingMatcherOptions> = {}) {
    this.embedder = embedder;
    this.options = { minSimilarity: options.minSimilarity ?? 0.5 };
  }

  async match(query: string, graph: KnowledgeGraph): Promise<RetrievalMatch[]> {
    const text = query.trim();
    if (text.length === 0) {
      return [];
    }

    const [queryEmbedding] = await this.embedder.embed([text]);
    if (!queryEmbedding || !VectorUtils.isValid(queryEmbedding)) {
      throw new EmbeddingError('Query embedding is empty or invalid');
    }

    const entities: KnowledgeEntity[] = [];
    const embeddings: Embedding[] = [];
    for (const node of graph.getAllNodes()) {
      if (node.embedding) {
        entities.push(node.entity);
        embeddings.push(node.embedding);
      }
    }

    return VectorUtils.findSimilarVectors(queryEmbedding, embeddings, this.options.minSimilarity).map(
      ({ index, score }) => ({ entity: entities[index], similarity: score })
    );
  }
}
