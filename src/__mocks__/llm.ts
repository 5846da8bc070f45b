/**
 * Scripted LLM for testing
 */

import type { Mock } from 'vitest';
import type { LLMProvider } from '../llm/types.js';

export interface MockLLM extends LLMProvider {
  complete: Mock<(prompt: string) => Promise<string>>;
}

/**
 * Creates an LLM whose nth call answers `answer <n>`, starting at 1.
 * Pass `respond` to compute the answer from the prompt instead.
 */
export function createMockLLM(
  options: { contextWindow?: number; numOutput?: number; respond?: (prompt: string, call: number) => string } = {}
): MockLLM {
  let calls = 0;
  const respond = options.respond ?? ((_prompt: string, call: number) => `answer ${call}`);
  return {
    contextWindow: options.contextWindow ?? 4096,
    numOutput: options.numOutput ?? 256,
    complete: vi.fn(async (prompt: string) => respond(prompt, ++calls)),
  };
}

/**
 * LLM whose every call rejects with the given error
 */
export function createFailingLLM(error: unknown = new Error('LLM service unavailable')): MockLLM {
  return {
    contextWindow: 4096,
    numOutput: 256,
    complete: vi.fn(async () => {
      throw error;
    }),
  };
}
