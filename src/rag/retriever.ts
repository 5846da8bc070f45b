import { EmbeddingsProvider } from '../embeddings/types.js';
import { RetrievalError, describeCause, isRagError } from '../errors.js';
import { VectorIndex } from '../indexing/vector-index.js';
import { RetrievalResult } from '../types.js';
import { logger } from '../util/logger.js';

export interface RetrievalOptions {
  topK: number;
}

/** Embeds the query and returns the top-K chunks of the index */
export class VectorRetriever {
  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingsProvider,
    private readonly options: RetrievalOptions
  ) {}

  /** @throws RetrievalError if embedding the query or searching fails */
  async retrieve(query: string): Promise<RetrievalResult> {
    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddings.embed(query);
    } catch (error) {
      logger.error('[Retriever] Failed to embed query');
      throw new RetrievalError(`Failed to embed query: ${describeCause(error)}`, { cause: error });
    }

    try {
      const results = this.index.search(queryEmbedding, this.options.topK);
      logger.debug(
        `[Retriever] Top ${results.length} of ${this.index.size} chunks:`,
        results.map(result => ({ id: result.chunk.id, score: Number(result.score.toFixed(4)) }))
      );
      return results;
    } catch (error) {
      if (isRagError(error)) {
        throw error;
      }
      throw new RetrievalError(`Vector search failed: ${describeCause(error)}`, { cause: error });
    }
  }
}
