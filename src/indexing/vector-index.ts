import { IndexBuildError, RetrievalError } from '../errors.js';
import { Chunk, IndexedChunk, ScoredChunk } from '../types.js';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

interface Entry {
  chunk: Chunk;
  embedding: readonly number[];
}

/**
 * In-memory chunk store with exact nearest-neighbour search by cosine
 * similarity. Read-only once constructed, so concurrent queries are safe.
 */
export class VectorIndex {
  private readonly entries: readonly Entry[];
  readonly dimensions: number;

  constructor(chunks: readonly IndexedChunk[], dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new IndexBuildError(`Index dimensionality must be a positive integer, got ${dimensions}`);
    }

    this.dimensions = dimensions;
    this.entries = chunks.map(({ embedding, ...chunk }) => {
      if (embedding.length !== dimensions) {
        throw new IndexBuildError(
          `Chunk ${chunk.id} has an embedding of ${embedding.length} dimensions, expected ${dimensions}`
        );
      }
      return { chunk: Object.freeze(chunk), embedding: Object.freeze([...embedding]) };
    });
  }

  get size(): number {
    return this.entries.length;
  }

  getChunks(): Chunk[] {
    return this.entries.map(entry => entry.chunk);
  }

  getEmbedding(chunkId: string): readonly number[] | undefined {
    return this.entries.find(entry => entry.chunk.id === chunkId)?.embedding;
  }

  /**
   * Top-K chunks by cosine similarity, highest first. Equal scores keep
   * insertion order so results are deterministic.
   * @throws RetrievalError for an empty index or a query of the wrong dimensionality
   */
  search(queryEmbedding: readonly number[], topK: number): ScoredChunk[] {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new RetrievalError(`topK must be a positive integer, got ${topK}`);
    }
    if (this.entries.length === 0) {
      throw new RetrievalError('Cannot search an empty index');
    }
    if (queryEmbedding.length !== this.dimensions) {
      throw new RetrievalError(
        `Query embedding has ${queryEmbedding.length} dimensions, index expects ${this.dimensions}`
      );
    }

    return this.entries
      .map((entry, position) => ({
        chunk: entry.chunk,
        score: cosineSimilarity(queryEmbedding, entry.embedding),
        position,
      }))
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, topK)
      .map(({ chunk, score }) => ({ chunk, score }));
  }
}
