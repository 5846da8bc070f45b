import { EmbeddingsProvider } from '../embeddings/types.js';
import { ConfigError, NoRelevantContextError, RetrievalError } from '../errors.js';
import { VectorIndex } from '../indexing/vector-index.js';
import { LLMProvider } from '../llm/types.js';
import { RagResponse, RESPONSE_MODES, ResponseMode } from '../types.js';
import { logger } from '../util/logger.js';
import { NodePostprocessor, SimilarityPostprocessor } from './postprocessor.js';
import { EMPTY_RESPONSE } from './prompts.js';
import { VectorRetriever } from './retriever.js';
import { ResponseSynthesizer } from './synthesizer.js';

export interface PipelineOptions {
  embeddings: EmbeddingsProvider;
  llm: LLMProvider;
  /** Candidates fetched by vector search before the cutoff applies */
  topK?: number;
  /** Minimum cosine similarity in [0, 1] */
  similarityCutoff?: number;
  responseMode?: ResponseMode;
  /**
   * What a query returns when no chunk survives the cutoff:
   * 'respond' answers EMPTY_RESPONSE without calling the LLM,
   * 'error' throws NoRelevantContextError.
   */
  emptyContext?: 'respond' | 'error';
  /** Extra postprocessors run after the similarity cutoff */
  postprocessors?: NodePostprocessor[];
}

export class QueryEngine {
  private readonly retriever: VectorRetriever;
  private readonly postprocessors: NodePostprocessor[];
  private readonly synthesizer: ResponseSynthesizer;
  private readonly emptyContext: 'respond' | 'error';
  readonly topK: number;
  readonly similarityCutoff: number;

  constructor(index: VectorIndex, options: PipelineOptions) {
    const {
      topK = 5,
      similarityCutoff = 0.8,
      responseMode = 'compact',
      emptyContext = 'respond',
      postprocessors = [],
    } = options;

    if (!Number.isInteger(topK) || topK < 1) {
      throw new ConfigError(`topK must be a positive integer, got ${topK}`);
    }
    if (!(similarityCutoff >= 0 && similarityCutoff <= 1)) {
      throw new ConfigError(`similarityCutoff must be in [0, 1], got ${similarityCutoff}`);
    }
    if (!RESPONSE_MODES.includes(responseMode)) {
      throw new ConfigError(`Unknown response mode '${responseMode}'`);
    }

    this.topK = topK;
    this.similarityCutoff = similarityCutoff;
    this.emptyContext = emptyContext;
    this.retriever = new VectorRetriever(index, options.embeddings, { topK });
    this.postprocessors = [new SimilarityPostprocessor({ similarityCutoff }), ...postprocessors];
    this.synthesizer = new ResponseSynthesizer({ llm: options.llm, mode: responseMode });
  }

  /**
   * Retrieve, filter and synthesize. Each call is independent; the engine
   * holds no per-query state.
   */
  async query(text: string): Promise<RagResponse> {
    const queryText = text.trim();
    if (!queryText) {
      throw new RetrievalError('Query text must not be empty');
    }

    logger.info(`[QueryEngine] Executing query: ${queryText}`);

    const retrieved = await this.retriever.retrieve(queryText);

    let nodes = retrieved;
    for (const postprocessor of this.postprocessors) {
      nodes = postprocessor.postprocess(nodes, queryText);
    }
    logger.debug(`[QueryEngine] ${nodes.length} of ${retrieved.length} retrieved chunks kept`);

    if (nodes.length === 0) {
      if (this.emptyContext === 'error') {
        throw new NoRelevantContextError(this.similarityCutoff);
      }
      logger.warn(`[QueryEngine] No chunk reached the similarity cutoff of ${this.similarityCutoff}`);
      return {
        text: EMPTY_RESPONSE,
        sourceNodes: [],
        mode: this.synthesizer.mode,
        metadata: { noContext: true, llmCalls: 0 },
      };
    }

    const { text: answer, llmCalls } = await this.synthesizer.synthesize(queryText, nodes);
    logger.info('[QueryEngine] Query executed successfully');

    return {
      text: answer,
      sourceNodes: nodes,
      mode: this.synthesizer.mode,
      metadata: { noContext: false, llmCalls },
    };
  }
}

export function configurePipeline(index: VectorIndex, options: PipelineOptions): QueryEngine {
  const engine = new QueryEngine(index, options);
  logger.info(
    `[QueryEngine] Configured with topK=${engine.topK}, similarityCutoff=${engine.similarityCutoff}, mode=${options.responseMode ?? 'compact'}`
  );
  return engine;
}
