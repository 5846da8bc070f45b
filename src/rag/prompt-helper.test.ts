import { PromptHelper } from './prompt-helper.js';
import { refinePrompt, summaryPrompt, textQaPrompt } from './prompts.js';

const alpha = Array(10).fill('alpha').join(' ');
const bravo = Array(10).fill('bravo').join(' ');

describe('PromptHelper', () => {
  describe('availableTokens', () => {
    it('should subtract the prompt, the output budget and padding', () => {
      const helper = new PromptHelper({ contextWindow: 4096, numOutput: 256 });
      // The empty question-answering prompt is 167 characters, 42 tokens
      expect(helper.availableTokens(textQaPrompt, 'q')).toBe(3793);
    });

    it('should count the existing answer of refine prompts', () => {
      const helper = new PromptHelper({ contextWindow: 4096, numOutput: 256 });
      expect(helper.availableTokens(refinePrompt, 'q', 'answer 1')).toBe(3770);
    });

    it('should leave less room for longer queries', () => {
      const helper = new PromptHelper({ contextWindow: 4096, numOutput: 256 });
      expect(helper.availableTokens(textQaPrompt, 'q'.repeat(41))).toBe(3783);
    });

    it('should throw when the window cannot hold any context', () => {
      const helper = new PromptHelper({ contextWindow: 50, numOutput: 10 });
      expect(() => helper.availableTokens(textQaPrompt, 'q')).toThrow(
        'Prompt leaves no room for context (window 50, output 10)'
      );
    });
  });

  describe('repack', () => {
    it('should merge texts that fit one prompt', () => {
      const helper = new PromptHelper({ contextWindow: 4096, numOutput: 256 });
      expect(helper.repack(['first', 'second'], textQaPrompt, 'q')).toEqual(['first\n\nsecond']);
    });

    it('should split texts that do not', () => {
      // 75 - 10 - 39 - 5 leaves 21 tokens; each text is 15
      const helper = new PromptHelper({ contextWindow: 75, numOutput: 10 });
      expect(helper.repack([alpha, bravo], summaryPrompt, 'q')).toEqual([alpha, bravo]);
    });
  });

  describe('truncate', () => {
    it('should cut the joined text to the available characters', () => {
      // 75 - 10 - 42 - 5 leaves 18 tokens, 72 characters
      const helper = new PromptHelper({ contextWindow: 75, numOutput: 10 });
      expect(helper.truncate([alpha, bravo], textQaPrompt, 'q')).toBe(`${alpha}\n\nbravo bravo`);
    });
  });
});
