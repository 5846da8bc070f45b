export { loadCredential, resolveConfig, PROVIDER_PRESETS } from './config.js';
export type { RagConfig, ConfigOverrides, ProviderName } from './config.js';
export * from './errors.js';
export type {
  Chunk,
  Document,
  DocumentMetadata,
  IndexedChunk,
  RagResponse,
  ResponseMode,
  RetrievalResult,
  ScoredChunk,
} from './types.js';
export { RESPONSE_MODES } from './types.js';
export { loadDocuments } from './ingest/reader.js';
export type { ReaderOptions } from './ingest/reader.js';
export { TextSplitter } from './processor/splitter.js';
export { buildIndex, chunkDocuments } from './indexing/build-index.js';
export { VectorIndex, cosineSimilarity } from './indexing/vector-index.js';
export { QueryEngine, configurePipeline } from './rag/query-engine.js';
export type { PipelineOptions } from './rag/query-engine.js';
export { ResponseSynthesizer } from './rag/synthesizer.js';
export { SimilarityPostprocessor } from './rag/postprocessor.js';
export type { NodePostprocessor } from './rag/postprocessor.js';
export { RAGPipeline, createPipeline } from './rag/pipeline.js';
export { createProviders } from './providers.js';
export type { EmbeddingsProvider } from './embeddings/types.js';
export type { LLMProvider } from './llm/types.js';
