import { RagConfig, credentialVariable, loadCredential } from '../config.js';
import { loadDocuments } from '../ingest/reader.js';
import { buildIndex } from '../indexing/build-index.js';
import { ProgressListener } from '../indexing/status.js';
import { VectorIndex } from '../indexing/vector-index.js';
import { TextSplitter } from '../processor/splitter.js';
import { Providers, createProviders } from '../providers.js';
import { RagResponse } from '../types.js';
import { logger } from '../util/logger.js';
import { QueryEngine, configurePipeline } from './query-engine.js';

export interface InitializeOptions {
  onProgress?: ProgressListener;
}

/**
 * The whole flow over one data directory: load documents, build the index
 * once, then answer any number of queries against it.
 */
export class RAGPipeline {
  private engine: QueryEngine | null = null;
  private index: VectorIndex | null = null;
  private documentCount = 0;

  constructor(
    private readonly config: RagConfig,
    private readonly providers: Providers
  ) {}

  async initialize(options: InitializeOptions = {}): Promise<void> {
    const documents = await loadDocuments(this.config.dataDir, {
      recursive: this.config.recursive,
      onError: this.config.ingestErrors,
    });
    this.documentCount = documents.length;

    this.index = await buildIndex(documents, {
      embeddings: this.providers.embeddings,
      splitter: new TextSplitter({ chunkSize: this.config.chunkSize, chunkOverlap: this.config.chunkOverlap }),
      concurrency: this.config.embedConcurrency,
      onProgress: options.onProgress,
    });

    this.engine = configurePipeline(this.index, {
      embeddings: this.providers.embeddings,
      llm: this.providers.llm,
      topK: this.config.topK,
      similarityCutoff: this.config.similarityCutoff,
      responseMode: this.config.responseMode,
      emptyContext: this.config.emptyContext,
    });
  }

  get stats(): { documents: number; chunks: number } {
    return { documents: this.documentCount, chunks: this.index?.size ?? 0 };
  }

  async query(text: string): Promise<RagResponse> {
    if (!this.engine) {
      throw new Error('RAGPipeline.initialize() must complete before querying');
    }
    return this.engine.query(text);
  }
}

/**
 * Resolve the credential, then build the provider clients. The credential is
 * checked before any client exists, so a missing key never reaches the network.
 * @throws MissingCredentialError
 */
export function createPipeline(config: RagConfig, env: Record<string, string | undefined> = process.env): RAGPipeline {
  const apiKey = loadCredential(credentialVariable(config), env);
  const providers = createProviders(config, apiKey);
  logger.debug('[RAGPipeline] Providers created');
  return new RAGPipeline(config, providers);
}
