import { createFailingLLM, createMockLLM } from '../__mocks__/llm.js';
import { SynthesisError } from '../errors.js';
import { ScoredChunk } from '../types.js';
import { EMPTY_RESPONSE } from './prompts.js';
import { ResponseSynthesizer } from './synthesizer.js';

function nodes(...texts: string[]): ScoredChunk[] {
  return texts.map((text, i) => ({
    chunk: { id: `doc.txt#${i}`, documentId: 'doc.txt', text, startLine: i, endLine: i, metadata: {} },
    score: 0.9,
  }));
}

const words = (word: string, count: number) => Array(count).fill(word).join(' ');

describe('ResponseSynthesizer', () => {
  it('should default to compact', () => {
    expect(new ResponseSynthesizer({ llm: createMockLLM() }).mode).toBe('compact');
  });

  it('should answer EMPTY_RESPONSE without calling the LLM when there are no nodes', async () => {
    const llm = createMockLLM();
    const synthesizer = new ResponseSynthesizer({ llm, mode: 'refine' });
    await expect(synthesizer.synthesize('q', [])).resolves.toEqual({ text: EMPTY_RESPONSE, llmCalls: 0 });
    expect(llm.complete).not.toHaveBeenCalled();
  });

  describe('compact', () => {
    it('should use a single call when everything fits', async () => {
      const llm = createMockLLM();
      const synthesizer = new ResponseSynthesizer({ llm, mode: 'compact' });
      const result = await synthesizer.synthesize('q', nodes('one', 'two', 'three'));

      expect(result).toEqual({ text: 'answer 1', llmCalls: 1 });
      expect(llm.complete.mock.calls[0][0]).toContain('one\n\ntwo\n\nthree');
    });

    it('should refine across prompts when the chunks overflow the window', async () => {
      // 73 tokens of context per question prompt; each chunk is 41
      const llm = createMockLLM({ contextWindow: 130, numOutput: 10 });
      const synthesizer = new ResponseSynthesizer({ llm, mode: 'compact' });
      const result = await synthesizer.synthesize('q', nodes(words('alpha', 27), words('bravo', 27)));

      expect(result).toEqual({ text: 'answer 2', llmCalls: 2 });
      expect(llm.complete.mock.calls[0][0]).toMatch(/^Answer the question/);
      expect(llm.complete.mock.calls[1][0]).toContain('Current answer: answer 1\n');
      expect(llm.complete.mock.calls[1][0]).toContain(words('bravo', 27));
    });
  });

  describe('refine', () => {
    it('should make one call per chunk, refining the previous answer', async () => {
      const llm = createMockLLM();
      const synthesizer = new ResponseSynthesizer({ llm, mode: 'refine' });
      const result = await synthesizer.synthesize('q', nodes('one', 'two', 'three'));

      expect(result).toEqual({ text: 'answer 3', llmCalls: 3 });
      expect(llm.complete.mock.calls[0][0]).toContain('Question: q\n');
      expect(llm.complete.mock.calls[1][0]).toContain('Current answer: answer 1\n');
      expect(llm.complete.mock.calls[2][0]).toContain('Current answer: answer 2\n');
    });

    it('should split a chunk too large for one prompt', async () => {
      const llm = createMockLLM({ contextWindow: 130, numOutput: 10 });
      const synthesizer = new ResponseSynthesizer({ llm, mode: 'refine' });
      const result = await synthesizer.synthesize('q', nodes(`${words('alpha', 27)}\n\n${words('bravo', 27)}`));

      expect(result).toEqual({ text: 'answer 2', llmCalls: 2 });
    });
  });

  describe('tree_summarize', () => {
    it('should summarize a single packed prompt in one call', async () => {
      const llm = createMockLLM();
      const synthesizer = new ResponseSynthesizer({ llm, mode: 'tree_summarize' });
      const result = await synthesizer.synthesize('q', nodes('one', 'two'));

      expect(result).toEqual({ text: 'answer 1', llmCalls: 1 });
      expect(llm.complete.mock.calls[0][0]).toMatch(/^Below are excerpts/);
    });

    it('should summarize the summaries when the chunks overflow', async () => {
      // 21 tokens of context per summary prompt; each chunk is 15
      const llm = createMockLLM({ contextWindow: 75, numOutput: 10 });
      const synthesizer = new ResponseSynthesizer({ llm, mode: 'tree_summarize' });
      const result = await synthesizer.synthesize('q', nodes(words('alpha', 10), words('bravo', 10)));

      expect(result).toEqual({ text: 'answer 3', llmCalls: 3 });
      expect(llm.complete.mock.calls[2][0]).toContain('answer 1\n\nanswer 2');
    });
  });

  describe('accumulate', () => {
    it('should answer each chunk independently and join the answers', async () => {
      const llm = createMockLLM();
      const synthesizer = new ResponseSynthesizer({ llm, mode: 'accumulate' });
      const result = await synthesizer.synthesize('q', nodes('one', 'two'));

      expect(result).toEqual({
        text: 'Response 1: answer 1\n---------------------\nResponse 2: answer 2',
        llmCalls: 2,
      });
      expect(llm.complete.mock.calls[1][0]).not.toContain('Current answer');
    });
  });

  describe('simple_summarize', () => {
    it('should truncate everything into one prompt', async () => {
      const llm = createMockLLM({ contextWindow: 75, numOutput: 10 });
      const synthesizer = new ResponseSynthesizer({ llm, mode: 'simple_summarize' });
      const result = await synthesizer.synthesize('q', nodes(words('alpha', 10), words('bravo', 10)));

      expect(result).toEqual({ text: 'answer 1', llmCalls: 1 });
      const prompt = llm.complete.mock.calls[0][0];
      expect(prompt).toContain(`${words('alpha', 10)}\n\nbravo bravo\n`);
      expect(prompt).not.toContain('bravo bravo bravo');
    });
  });

  describe('errors', () => {
    it('should wrap provider failures in SynthesisError', async () => {
      const cause = new Error('LLM service unavailable');
      const synthesizer = new ResponseSynthesizer({ llm: createFailingLLM(cause), mode: 'compact' });
      const error = await synthesizer.synthesize('q', nodes('one')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SynthesisError);
      expect(error).toHaveProperty('message', 'Response synthesis failed: LLM service unavailable');
      expect(error).toHaveProperty('cause', cause);
    });

    it('should fail when the context window is too small for any context', async () => {
      const synthesizer = new ResponseSynthesizer({ llm: createMockLLM({ contextWindow: 50, numOutput: 10 }) });
      await expect(synthesizer.synthesize('q', nodes('one'))).rejects.toThrow(SynthesisError);
    });
  });
});
