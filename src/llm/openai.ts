import OpenAI from 'openai';
import { LLMProvider } from './types.js';
import { logger } from '../util/logger.js';

export interface OpenAIChatOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  contextWindow: number;
  numOutput?: number;
  /** Set for OpenAI-compatible endpoints such as Gemini's */
  baseURL?: string;
  maxRetries?: number;
}

/** Single-turn completions through the chat completions API */
export class OpenAIChat implements LLMProvider {
  private openai: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  readonly contextWindow: number;
  readonly numOutput: number;

  constructor(options: OpenAIChatOptions) {
    if (!options.apiKey) {
      throw new Error('API key is required');
    }
    this.openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: options.maxRetries ?? 3 });
    this.model = options.model;
    this.temperature = options.temperature ?? 0.2;
    this.contextWindow = options.contextWindow;
    this.numOutput = options.numOutput ?? 256;
  }

  async complete(prompt: string): Promise<string> {
    const completion = await this.openai.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: this.temperature,
      max_tokens: this.numOutput,
    });

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new Error(`No content returned from ${this.model}`);
    }

    logger.debug(`[OpenAIChat] ${this.model} returned ${content.length} chars`);
    return content.trim();
  }
}
