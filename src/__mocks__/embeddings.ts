/**
 * Deterministic embeddings providers for testing
 */

import type { EmbeddingsProvider } from '../embeddings/types.js';

// 32-bit string hash, stable across runs
function hashText(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (hash << 5) - hash + text.charCodeAt(i);
    hash = hash & hash;
  }
  return Math.abs(hash);
}

/**
 * Pseudo-random unit vectors seeded by the text. Equal texts get equal
 * vectors; different texts get unrelated ones.
 */
export function createMockEmbeddings(dimensions: number = 32): EmbeddingsProvider {
  return {
    dimensions,
    embed: async (text: string): Promise<number[]> => {
      let state = hashText(text);
      const vector = Array.from({ length: dimensions }, () => {
        // Linear congruential generator mapped to [-1, 1]
        state = (state * 1103515245 + 12345) & 0x7fffffff;
        return (state / 0x7fffffff) * 2 - 1;
      });
      const norm = Math.hypot(...vector);
      return vector.map((v) => v / norm);
    },
  };
}

/**
 * Bag-of-words embeddings: each lowercase word is hashed to one dimension and
 * counted. Texts sharing words get a positive cosine similarity, texts sharing
 * none get 0.
 */
export function createKeywordEmbeddings(dimensions: number = 64): EmbeddingsProvider {
  return {
    dimensions,
    embed: async (text: string): Promise<number[]> => {
      const vector = new Array<number>(dimensions).fill(0);
      for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
        vector[hashText(word) % dimensions] += 1;
      }
      return vector;
    },
  };
}

/**
 * Embeddings whose every call rejects
 */
export function createFailingEmbeddings(dimensions: number = 32): EmbeddingsProvider {
  return {
    dimensions,
    embed: async (): Promise<number[]> => {
      throw new Error('Embeddings service unavailable');
    },
  };
}
