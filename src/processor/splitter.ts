export interface TextSplitterOptions {
  /** Maximum chunk size in estimated tokens */
  chunkSize: number;
  /** Estimated tokens of trailing text repeated at the start of the next chunk */
  chunkOverlap: number;
}

export interface TextSegment {
  text: string;
  startLine: number;
  endLine: number;
}

interface Piece extends TextSegment {
  tokens: number;
  /** Pieces of one paragraph are joined with a space, paragraphs with a blank line */
  paragraph: number;
}

// Rough approximation: 4 chars per token
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function splitParagraphs(text: string, lineOffset: number): TextSegment[] {
  const lines = text.split(/\r?\n/);
  const paragraphs: TextSegment[] = [];
  let current: string[] = [];
  let startLine = 0;

  lines.forEach((line, i) => {
    if (line.trim().length === 0) {
      if (current.length > 0) {
        paragraphs.push({ text: current.join('\n').trim(), startLine: lineOffset + startLine, endLine: lineOffset + i - 1 });
        current = [];
      }
      return;
    }
    if (current.length === 0) {
      startLine = i;
    }
    current.push(line);
  });

  if (current.length > 0) {
    paragraphs.push({ text: current.join('\n').trim(), startLine: lineOffset + startLine, endLine: lineOffset + lines.length - 1 });
  }

  return paragraphs;
}

// Splits only at whitespace after a terminator, so "1.2.3" and a leading "..." stay intact
function splitSentences(text: string): string[] {
  return text.split(/(?<=[.!?])\s+/).filter(sentence => sentence.length > 0);
}

function hardSplit(text: string, maxTokens: number): string[] {
  const maxChars = maxTokens * 4;
  const parts: string[] = [];
  let current = '';
  // Iterating the string yields code points, so surrogate pairs are never cut
  for (const char of text) {
    if (current.length + char.length > maxChars) {
      parts.push(current);
      current = '';
    }
    current += char;
  }
  parts.push(current);
  return parts.map(part => part.trim()).filter(part => part.length > 0);
}

function joinPieces(pieces: Piece[]): string {
  let text = '';
  pieces.forEach((piece, i) => {
    if (i > 0) {
      text += piece.paragraph === pieces[i - 1].paragraph ? ' ' : '\n\n';
    }
    text += piece.text;
  });
  return text;
}

/**
 * Paragraph-first text splitter. Paragraphs are packed into chunks up to
 * chunkSize tokens; a paragraph larger than that is split by sentences, and a
 * sentence larger than that by characters.
 */
export class TextSplitter {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(options: TextSplitterOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
      throw new Error(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new Error(`chunkOverlap must be in [0, chunkSize), got ${options.chunkOverlap}`);
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  splitText(text: string, lineOffset: number = 0): TextSegment[] {
    const pieces = this.toPieces(text, lineOffset);
    const segments: TextSegment[] = [];
    let current: Piece[] = [];
    let currentTokens = 0;

    const flush = () => {
      segments.push({
        text: joinPieces(current),
        startLine: current[0].startLine,
        endLine: current[current.length - 1].endLine,
      });
    };

    for (const piece of pieces) {
      if (current.length > 0 && currentTokens + piece.tokens > this.chunkSize) {
        flush();
        current = this.overlapFor(current, piece.tokens);
        currentTokens = current.reduce((sum, p) => sum + p.tokens, 0);
      }
      current.push(piece);
      currentTokens += piece.tokens;
    }

    if (current.length > 0) {
      flush();
    }

    return segments;
  }

  private toPieces(text: string, lineOffset: number): Piece[] {
    const pieces: Piece[] = [];

    splitParagraphs(text, lineOffset).forEach((paragraph, index) => {
      const tokens = estimateTokens(paragraph.text);
      if (tokens <= this.chunkSize) {
        pieces.push({ ...paragraph, tokens, paragraph: index });
        return;
      }

      for (const sentence of splitSentences(paragraph.text)) {
        const parts = estimateTokens(sentence) > this.chunkSize ? hardSplit(sentence, this.chunkSize) : [sentence];
        for (const part of parts) {
          pieces.push({
            text: part,
            tokens: estimateTokens(part),
            startLine: paragraph.startLine,
            endLine: paragraph.endLine,
            paragraph: index,
          });
        }
      }
    });

    return pieces;
  }

  /** Trailing pieces of the previous chunk that fit the overlap and leave room for the next piece */
  private overlapFor(previous: Piece[], nextTokens: number): Piece[] {
    const overlap: Piece[] = [];
    let tokens = 0;
    for (let i = previous.length - 1; i >= 0; i--) {
      const piece = previous[i];
      if (tokens + piece.tokens > this.chunkOverlap || tokens + piece.tokens + nextTokens > this.chunkSize) {
        break;
      }
      overlap.unshift(piece);
      tokens += piece.tokens;
    }
    return overlap;
  }
}
