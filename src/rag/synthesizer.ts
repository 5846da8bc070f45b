import { SynthesisError, describeCause, isRagError } from '../errors.js';
import { LLMProvider } from '../llm/types.js';
import { TextSplitter } from '../processor/splitter.js';
import { ResponseMode, ScoredChunk } from '../types.js';
import { logger } from '../util/logger.js';
import { PromptHelper } from './prompt-helper.js';
import {
  ACCUMULATE_SEPARATOR,
  EMPTY_RESPONSE,
  PromptTemplate,
  refinePrompt,
  summaryPrompt,
  textQaPrompt,
} from './prompts.js';

export interface SynthesisResult {
  text: string;
  llmCalls: number;
}

export interface ResponseSynthesizerOptions {
  llm: LLMProvider;
  mode?: ResponseMode;
}

// Deepest tree_summarize recursion before falling back to refining
const MAX_TREE_DEPTH = 8;

/**
 * Turns retrieved chunks into an answer with one or more completion calls.
 *
 * - refine: one call per chunk, each refining the previous answer
 * - compact: chunks packed into as few prompts as fit, then refined across
 * - tree_summarize: packed prompts answered independently, answers summarized recursively
 * - accumulate: one independent answer per chunk, joined
 * - simple_summarize: everything truncated into one prompt
 */
export class ResponseSynthesizer {
  private readonly llm: LLMProvider;
  private readonly promptHelper: PromptHelper;
  readonly mode: ResponseMode;

  constructor(options: ResponseSynthesizerOptions) {
    this.llm = options.llm;
    this.mode = options.mode ?? 'compact';
    this.promptHelper = new PromptHelper(options.llm);
  }

  /** @throws SynthesisError wrapping the provider's error */
  async synthesize(query: string, nodes: readonly ScoredChunk[]): Promise<SynthesisResult> {
    const calls = { count: 0 };
    const texts = nodes.map(node => node.chunk.text);

    if (texts.length === 0) {
      return { text: EMPTY_RESPONSE, llmCalls: 0 };
    }

    logger.debug(`[Synthesizer] ${this.mode} over ${texts.length} chunks`);

    try {
      const text = await this.run(query, texts, calls);
      logger.debug(`[Synthesizer] Answer produced with ${calls.count} LLM calls`);
      return { text, llmCalls: calls.count };
    } catch (error) {
      if (isRagError(error)) {
        throw error;
      }
      logger.error(`[Synthesizer] ${this.mode} synthesis failed after ${calls.count} LLM calls`);
      throw new SynthesisError(`Response synthesis failed: ${describeCause(error)}`, { cause: error });
    }
  }

  private run(query: string, texts: string[], calls: { count: number }): Promise<string> {
    switch (this.mode) {
      case 'refine':
        return this.refine(query, texts, calls);
      case 'compact':
        return this.refine(query, this.promptHelper.repack(texts, textQaPrompt, query), calls);
      case 'tree_summarize':
        return this.treeSummarize(query, texts, calls, 0);
      case 'accumulate':
        return this.accumulate(query, texts, calls);
      case 'simple_summarize':
        return this.call(textQaPrompt({ context: this.promptHelper.truncate(texts, textQaPrompt, query), query }), calls);
    }
  }

  private async call(prompt: string, calls: { count: number }): Promise<string> {
    calls.count++;
    return this.llm.complete(prompt);
  }

  /** Split text so each piece fits the template with the given answer filled in */
  private fit(text: string, template: PromptTemplate, query: string, existingAnswer?: string): string[] {
    const available = this.promptHelper.availableTokens(template, query, existingAnswer);
    return new TextSplitter({ chunkSize: available, chunkOverlap: 0 })
      .splitText(text)
      .map(segment => segment.text);
  }

  private async refine(query: string, texts: readonly string[], calls: { count: number }): Promise<string> {
    let answer: string | undefined;

    for (const text of texts) {
      if (answer === undefined) {
        const [first, ...rest] = this.fit(text, textQaPrompt, query);
        if (first === undefined) {
          continue;
        }
        answer = await this.call(textQaPrompt({ context: first, query }), calls);
        for (const piece of rest) {
          answer = await this.refineWith(query, piece, answer, calls);
        }
      } else {
        answer = await this.refineWith(query, text, answer, calls);
      }
    }

    return answer ?? EMPTY_RESPONSE;
  }

  private async refineWith(query: string, text: string, existingAnswer: string, calls: { count: number }): Promise<string> {
    let answer = existingAnswer;
    for (const piece of this.fit(text, refinePrompt, query, answer)) {
      answer = await this.call(refinePrompt({ context: piece, query, existingAnswer: answer }), calls);
    }
    return answer;
  }

  private async treeSummarize(query: string, texts: readonly string[], calls: { count: number }, depth: number): Promise<string> {
    const packed = this.promptHelper.repack(texts, summaryPrompt, query);

    if (packed.length === 1) {
      return this.call(summaryPrompt({ context: packed[0], query }), calls);
    }
    if (depth >= MAX_TREE_DEPTH) {
      logger.warn(`[Synthesizer] tree_summarize did not converge after ${depth} levels, refining instead`);
      return this.refine(query, packed, calls);
    }

    const summaries = await Promise.all(
      packed.map(context => this.call(summaryPrompt({ context, query }), calls))
    );
    return this.treeSummarize(query, summaries, calls, depth + 1);
  }

  private async accumulate(query: string, texts: readonly string[], calls: { count: number }): Promise<string> {
    const responses: string[] = [];
    for (const text of texts) {
      for (const piece of this.fit(text, textQaPrompt, query)) {
        responses.push(await this.call(textQaPrompt({ context: piece, query }), calls));
      }
    }
    return responses.map((response, i) => `Response ${i + 1}: ${response}`).join(ACCUMULATE_SEPARATOR);
  }
}
