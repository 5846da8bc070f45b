import { z } from 'zod';
import { ConfigError, MissingCredentialError } from './errors.js';
import { RESPONSE_MODES } from './types.js';
import { logger } from './util/logger.js';

export const PROVIDERS = ['openai', 'gemini'] as const;

export type ProviderName = (typeof PROVIDERS)[number];

export interface ProviderPreset {
  apiKeyEnv: string;
  baseURL?: string;
  llmModel: string;
  embeddingModel: string;
  embeddingDimensions: number;
  /** Whether the embeddings endpoint accepts the `dimensions` parameter */
  sendDimensions: boolean;
  contextWindow: number;
  numOutput: number;
}

export const PROVIDER_PRESETS: Record<ProviderName, ProviderPreset> = {
  openai: {
    apiKeyEnv: 'OPENAI_API_KEY',
    llmModel: 'gpt-3.5-turbo',
    embeddingModel: 'text-embedding-3-small',
    embeddingDimensions: 1536,
    sendDimensions: true,
    contextWindow: 16385,
    numOutput: 256,
  },
  gemini: {
    // Gemini's OpenAI-compatible endpoint
    apiKeyEnv: 'GOOGLE_API_KEY',
    baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
    llmModel: 'gemini-1.5-flash',
    embeddingModel: 'text-embedding-004',
    embeddingDimensions: 768,
    sendDimensions: false,
    contextWindow: 32768,
    numOutput: 256,
  },
};

export const RagConfigSchema = z
  .object({
    provider: z.enum(PROVIDERS).default('openai'),
    dataDir: z.string().min(1).default('data'),
    topK: z.coerce.number().int().positive().default(5),
    similarityCutoff: z.coerce.number().min(0).max(1).default(0.8),
    responseMode: z.enum(RESPONSE_MODES).default('compact'),
    chunkSize: z.coerce.number().int().positive().default(1024),
    chunkOverlap: z.coerce.number().int().nonnegative().default(20),
    embedConcurrency: z.coerce.number().int().positive().default(4),
    maxRetries: z.coerce.number().int().nonnegative().default(3),
    temperature: z.coerce.number().min(0).max(2).default(0.2),
    emptyContext: z.enum(['respond', 'error']).default('respond'),
    ingestErrors: z.enum(['fail', 'skip']).default('fail'),
    recursive: z.boolean().default(false),
    apiKeyEnv: z.string().min(1).optional(),
    llmModel: z.string().min(1).optional(),
    embeddingModel: z.string().min(1).optional(),
  })
  .refine(config => config.chunkOverlap < config.chunkSize, {
    message: 'must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type RagConfig = z.output<typeof RagConfigSchema>;
export type RagConfigInput = z.input<typeof RagConfigSchema>;

/** Environment variables read as fallbacks for unset options */
const ENV_KEYS = {
  provider: 'RAG_PROVIDER',
  dataDir: 'RAG_DATA_DIR',
  topK: 'RAG_TOP_K',
  similarityCutoff: 'RAG_SIMILARITY_CUTOFF',
  responseMode: 'RAG_RESPONSE_MODE',
} as const;

type Env = Record<string, string | undefined>;

/** Values are validated at runtime, so CLI strings can be passed as-is */
export type ConfigOverrides = { [K in keyof RagConfigInput]?: unknown };

/**
 * Merge explicit options over environment fallbacks over defaults and
 * validate the result.
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): RagConfig {
  const merged: Record<string, unknown> = {};
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]?.trim();
    if (value) {
      merged[field] = value;
    }
  }
  // An option left undefined must not hide its environment fallback
  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[field] = value;
    }
  }

  const result = RagConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${errors}`, { cause: result.error });
  }

  logger.debug('[Config] Configuration resolved:', result.data);
  return result.data;
}

/**
 * Read a credential from the environment.
 * @throws MissingCredentialError if the variable is unset or blank
 */
export function loadCredential(variable: string, env: Env = process.env): string {
  const value = env[variable]?.trim();
  if (!value) {
    logger.error(`[Config] ${variable} not found. Set it in the environment or in a .env file.`);
    throw new MissingCredentialError(variable);
  }
  logger.info(`[Config] Loaded credential from ${variable}`);
  return value;
}

export function credentialVariable(config: Pick<RagConfig, 'provider' | 'apiKeyEnv'>): string {
  return config.apiKeyEnv ?? PROVIDER_PRESETS[config.provider].apiKeyEnv;
}

// Utility function to check if a path is markdown
export function isMarkdownPath(path: string): boolean {
  const lowercasePath = path.toLowerCase();
  return lowercasePath.endsWith('.md') ||
         lowercasePath.endsWith('.mdx') ||
         lowercasePath.endsWith('.markdown');
}

export function isHtmlPath(path: string): boolean {
  const lowercasePath = path.toLowerCase();
  return lowercasePath.endsWith('.html') || lowercasePath.endsWith('.htm');
}
