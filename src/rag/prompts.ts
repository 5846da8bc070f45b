export type PromptTemplate = (vars: { context: string; query: string; existingAnswer?: string }) => string;

const DIVIDER = '---------------------';

export const textQaPrompt: PromptTemplate = ({ context, query }) =>
  'Answer the question using only the context below.\n' +
  `${DIVIDER}\n${context}\n${DIVIDER}\n` +
  'If the context does not contain the answer, say so.\n' +
  `Question: ${query}\n` +
  'Answer: ';

export const refinePrompt: PromptTemplate = ({ context, query, existingAnswer = '' }) =>
  `Question: ${query}\n` +
  `Current answer: ${existingAnswer}\n` +
  'Improve the current answer with the additional context below, only where it helps.\n' +
  `${DIVIDER}\n${context}\n${DIVIDER}\n` +
  'If the additional context is not useful, repeat the current answer unchanged.\n' +
  'Improved answer: ';

export const summaryPrompt: PromptTemplate = ({ context, query }) =>
  'Below are excerpts from several sources.\n' +
  `${DIVIDER}\n${context}\n${DIVIDER}\n` +
  'Using only these excerpts, answer the question.\n' +
  `Question: ${query}\n` +
  'Answer: ';

export const EMPTY_RESPONSE = 'Empty Response';

export const ACCUMULATE_SEPARATOR = `\n${DIVIDER}\n`;
