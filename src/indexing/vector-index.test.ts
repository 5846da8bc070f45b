import { IndexBuildError, RetrievalError } from '../errors.js';
import { IndexedChunk } from '../types.js';
import { VectorIndex, cosineSimilarity } from './vector-index.js';

function chunk(id: string, embedding: number[]): IndexedChunk {
  return { id, documentId: 'doc.txt', text: `text of ${id}`, startLine: 0, endLine: 0, metadata: {}, embedding };
}

describe('cosineSimilarity', () => {
  it('should score identical directions as 1', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
  });

  it('should score orthogonal vectors as 0', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('should score opposite vectors as -1', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('should return 0 for a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should reject vectors of different lengths', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vector length mismatch: 1 vs 2');
  });
});

describe('VectorIndex', () => {
  const chunks = [chunk('x', [1, 0]), chunk('y', [0, 1]), chunk('xy', [1, 1])];

  it('should rank chunks by similarity, highest first', () => {
    const index = new VectorIndex(chunks, 2);
    const results = index.search([1, 0], 3);
    expect(results.map((r) => r.chunk.id)).toEqual(['x', 'xy', 'y']);
    expect(results[0].score).toBe(1);
    expect(results[1].score).toBeCloseTo(Math.SQRT1_2);
    expect(results[2].score).toBe(0);
  });

  it('should return at most topK results', () => {
    const index = new VectorIndex(chunks, 2);
    expect(index.search([1, 0], 2)).toHaveLength(2);
    expect(index.search([1, 0], 10)).toHaveLength(3);
  });

  it('should keep insertion order for equal scores', () => {
    const index = new VectorIndex([chunk('first', [1, 0]), chunk('second', [2, 0]), chunk('third', [0, 1])], 2);
    expect(index.search([1, 0], 3).map((r) => r.chunk.id)).toEqual(['first', 'second', 'third']);
  });

  it('should return chunks without their embeddings', () => {
    const index = new VectorIndex(chunks, 2);
    const [top] = index.search([1, 0], 1);
    expect(top.chunk).toEqual({ id: 'x', documentId: 'doc.txt', text: 'text of x', startLine: 0, endLine: 0, metadata: {} });
  });

  it('should expose its chunks and embeddings', () => {
    const index = new VectorIndex(chunks, 2);
    expect(index.size).toBe(3);
    expect(index.getChunks().map((c) => c.id)).toEqual(['x', 'y', 'xy']);
    expect(index.getEmbedding('xy')).toEqual([1, 1]);
    expect(index.getEmbedding('missing')).toBeUndefined();
  });

  it('should not be affected by later changes to the input vectors', () => {
    const embedding = [1, 0];
    const index = new VectorIndex([chunk('x', embedding)], 2);
    embedding[0] = 0;
    expect(index.getEmbedding('x')).toEqual([1, 0]);
  });

  it('should reject embeddings of the wrong dimensionality', () => {
    expect(() => new VectorIndex([chunk('x', [1, 0, 0])], 2)).toThrow(IndexBuildError);
  });

  it('should reject an invalid dimensionality', () => {
    expect(() => new VectorIndex([], 0)).toThrow(IndexBuildError);
  });

  describe('search errors', () => {
    it('should reject an invalid topK', () => {
      const index = new VectorIndex(chunks, 2);
      expect(() => index.search([1, 0], 0)).toThrow(RetrievalError);
    });

    it('should reject searching an empty index', () => {
      expect(() => new VectorIndex([], 2).search([1, 0], 1)).toThrow('Cannot search an empty index');
    });

    it('should reject a query of the wrong dimensionality', () => {
      const index = new VectorIndex(chunks, 2);
      expect(() => index.search([1, 0, 0], 1)).toThrow('Query embedding has 3 dimensions, index expects 2');
    });
  });
});
