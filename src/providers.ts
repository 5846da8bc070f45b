import { PROVIDER_PRESETS, RagConfig } from './config.js';
import { OpenAIEmbeddings } from './embeddings/openai.js';
import { EmbeddingsProvider } from './embeddings/types.js';
import { OpenAIChat } from './llm/openai.js';
import { LLMProvider } from './llm/types.js';
import { logger } from './util/logger.js';

export interface Providers {
  embeddings: EmbeddingsProvider;
  llm: LLMProvider;
}

/**
 * Build the embedding and completion clients for the configured backend.
 * Both backends go through the OpenAI SDK; Gemini via its compatible endpoint.
 */
export function createProviders(config: RagConfig, apiKey: string): Providers {
  const preset = PROVIDER_PRESETS[config.provider];
  const llmModel = config.llmModel ?? preset.llmModel;
  const embeddingModel = config.embeddingModel ?? preset.embeddingModel;

  const embeddings = new OpenAIEmbeddings({
    apiKey,
    model: embeddingModel,
    dimensions: preset.embeddingDimensions,
    sendDimensions: preset.sendDimensions,
    baseURL: preset.baseURL,
    maxRetries: config.maxRetries,
  });

  const llm = new OpenAIChat({
    apiKey,
    model: llmModel,
    temperature: config.temperature,
    contextWindow: preset.contextWindow,
    numOutput: preset.numOutput,
    baseURL: preset.baseURL,
    maxRetries: config.maxRetries,
  });

  logger.info(`[Providers] ${config.provider}: LLM ${llmModel}, embeddings ${embeddingModel}`);
  return { embeddings, llm };
}
