export type DocumentMetadata = Record<string, string>;

/** A loaded source file. Frozen once created by the reader. */
export interface Document {
  /** Path relative to the data directory, with forward slashes */
  id: string;
  text: string;
  metadata: DocumentMetadata;
}

export interface Chunk {
  /** `<documentId>#<n>` */
  id: string;
  documentId: string;
  text: string;
  startLine: number;
  endLine: number;
  metadata: DocumentMetadata;
}

export interface IndexedChunk extends Chunk {
  embedding: number[];
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

/** Descending by score, at most topK entries, none below the cutoff */
export type RetrievalResult = ScoredChunk[];

export const RESPONSE_MODES = ['refine', 'compact', 'tree_summarize', 'accumulate', 'simple_summarize'] as const;

export type ResponseMode = (typeof RESPONSE_MODES)[number];

export interface RagResponse {
  text: string;
  sourceNodes: ScoredChunk[];
  mode: ResponseMode;
  metadata: {
    /** True when retrieval left nothing to synthesize from */
    noContext: boolean;
    llmCalls: number;
  };
}
