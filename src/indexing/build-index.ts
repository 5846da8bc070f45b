import PQueue from 'p-queue';
import { EmbeddingsProvider } from '../embeddings/types.js';
import { IndexBuildError, describeCause } from '../errors.js';
import { TextSplitter } from '../processor/splitter.js';
import { Chunk, Document, IndexedChunk } from '../types.js';
import { logger } from '../util/logger.js';
import { ProgressListener } from './status.js';
import { VectorIndex } from './vector-index.js';

export interface BuildIndexOptions {
  embeddings: EmbeddingsProvider;
  splitter: TextSplitter;
  /** Embedding calls in flight at once */
  concurrency?: number;
  onProgress?: ProgressListener;
}

export function chunkDocuments(documents: readonly Document[], splitter: TextSplitter): Chunk[] {
  return documents.flatMap(document => {
    const lineOffset = Number(document.metadata.line_offset ?? 0);
    return splitter.splitText(document.text, lineOffset).map((segment, n) => ({
      id: `${document.id}#${n}`,
      documentId: document.id,
      text: segment.text,
      startLine: segment.startLine,
      endLine: segment.endLine,
      metadata: document.metadata,
    }));
  });
}

/**
 * Split, embed and index documents. Rebuilds from scratch every time.
 * @throws IndexBuildError if no chunk is produced or any chunk fails to embed
 */
export async function buildIndex(documents: readonly Document[], options: BuildIndexOptions): Promise<VectorIndex> {
  const { embeddings, splitter, concurrency = 4, onProgress } = options;

  const chunks = chunkDocuments(documents, splitter);
  logger.info(`[Indexer] Split ${documents.length} documents into ${chunks.length} chunks`);

  if (chunks.length === 0) {
    throw new IndexBuildError(`No text chunks could be produced from ${documents.length} documents`);
  }

  let done = 0;
  const embedChunk = async (chunk: Chunk): Promise<IndexedChunk> => {
    let embedding: number[];
    try {
      embedding = await embeddings.embed(chunk.text);
    } catch (error) {
      logger.error(`[Indexer] Failed to embed chunk ${chunk.id}`);
      throw new IndexBuildError(`Failed to embed chunk ${chunk.id}: ${describeCause(error)}`, { cause: error });
    }
    done++;
    onProgress?.(done, chunks.length);
    return { ...chunk, embedding };
  };

  const queue = new PQueue({ concurrency });
  let indexed: IndexedChunk[];
  try {
    // Results come back in chunk order
    indexed = await queue.addAll(
      chunks.map(chunk => () => embedChunk(chunk)),
      { throwOnTimeout: true }
    );
  } catch (error) {
    // Chunks not yet started are dropped once one has failed
    queue.clear();
    throw error;
  }

  // The constructor checks every vector against the provider's dimensionality
  const index = new VectorIndex(indexed, embeddings.dimensions);
  logger.info(`[Indexer] Vector index built with ${index.size} chunks of ${index.dimensions} dimensions`);
  return index;
}
