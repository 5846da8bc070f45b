export interface LLMProvider {
  complete(prompt: string): Promise<string>;
  /** Prompt plus completion budget, in tokens */
  contextWindow: number;
  /** Tokens reserved for the completion */
  numOutput: number;
}
