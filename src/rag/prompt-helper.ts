import { LLMProvider } from '../llm/types.js';
import { TextSplitter, estimateTokens } from '../processor/splitter.js';
import { PromptTemplate } from './prompts.js';

// Slack for the token estimate
const PADDING_TOKENS = 5;

/**
 * Fits retrieved text into the context window left over by a prompt template
 * and the completion budget.
 */
export class PromptHelper {
  constructor(private readonly llm: Pick<LLMProvider, 'contextWindow' | 'numOutput'>) {}

  /**
   * Tokens available for context in one call using the template.
   * Measured with the query and existing answer filled in, so long queries
   * leave less room.
   */
  availableTokens(template: PromptTemplate, query: string, existingAnswer?: string): number {
    const emptyPrompt = template({ context: '', query, existingAnswer });
    const available = this.llm.contextWindow - this.llm.numOutput - estimateTokens(emptyPrompt) - PADDING_TOKENS;
    if (available < 1) {
      throw new Error(
        `Prompt leaves no room for context (window ${this.llm.contextWindow}, output ${this.llm.numOutput})`
      );
    }
    return available;
  }

  /** Concatenate texts and re-split them into as few prompt-sized pieces as possible */
  repack(texts: readonly string[], template: PromptTemplate, query: string): string[] {
    const available = this.availableTokens(template, query);
    const splitter = new TextSplitter({ chunkSize: available, chunkOverlap: 0 });
    return splitter.splitText(texts.join('\n\n')).map(segment => segment.text);
  }

  /** Concatenate texts and cut the result to a single prompt */
  truncate(texts: readonly string[], template: PromptTemplate, query: string): string {
    const maxChars = this.availableTokens(template, query) * 4;
    return texts.join('\n\n').slice(0, maxChars);
  }
}
