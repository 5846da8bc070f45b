import OpenAI from 'openai';
import QuickLRU from 'quick-lru';
import { EmbeddingsProvider } from './types.js';
import { logger } from '../util/logger.js';

export interface OpenAIEmbeddingsOptions {
  apiKey: string;
  model: string;
  dimensions: number;
  /** Send `dimensions` with each request (text-embedding-3 models accept it) */
  sendDimensions?: boolean;
  /** Set for OpenAI-compatible endpoints such as Gemini's */
  baseURL?: string;
  maxRetries?: number;
  cacheSize?: number;
}

/**
 * Embeddings through the OpenAI SDK. Works against any endpoint that speaks the
 * OpenAI embeddings API.
 */
export class OpenAIEmbeddings implements EmbeddingsProvider {
  private openai: OpenAI;
  private cache: QuickLRU<string, number[]>;
  readonly dimensions: number;
  private readonly model: string;
  private readonly sendDimensions: boolean;

  constructor(options: OpenAIEmbeddingsOptions) {
    if (!options.apiKey) {
      throw new Error('API key is required');
    }
    // The SDK retries connection errors, 408, 409, 429 and 5xx with backoff, honouring Retry-After
    this.openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: options.maxRetries ?? 3 });
    this.cache = new QuickLRU({ maxSize: options.cacheSize ?? 1000 });
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.sendDimensions = options.sendDimensions ?? false;
  }

  async embed(text: string): Promise<number[]> {
    if (!text || typeof text !== 'string') {
      throw new Error('Input text must be a non-empty string');
    }

    const cleanText = text.trim();
    if (!cleanText) {
      throw new Error('Input text is empty after trimming');
    }

    const cached = this.cache.get(cleanText);
    if (cached) {
      return cached;
    }

    const response = await this.openai.embeddings.create({
      model: this.model,
      input: cleanText,
      ...(this.sendDimensions ? { dimensions: this.dimensions } : {}),
    });

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error(`No embedding returned from ${this.model}`);
    }
    if (embedding.length !== this.dimensions) {
      throw new Error(`Invalid embedding: got ${embedding.length} dimensions, expected ${this.dimensions}`);
    }

    logger.debug(`[OpenAIEmbeddings] Embedded ${cleanText.length} chars`);
    this.cache.set(cleanText, embedding);
    return embedding;
  }
}
