import { logger } from '../util/logger.js';

export interface ProcessedMarkdown {
  title?: string;
  frontMatter: Record<string, string>;
  text: string;
  /** Lines taken by the front matter block, so chunk line numbers match the file */
  lineOffset: number;
}

export function extractFrontMatter(content: string): {
  frontMatter: Record<string, string>;
  content: string;
  endLine: number;
} {
  const frontMatterRegex = /^---\s*\r?\n([\s\S]*?)\r?\n---\s*(?:\r?\n|$)/;
  const match = content.match(frontMatterRegex);

  if (!match) {
    return { frontMatter: {}, content, endLine: 0 };
  }

  const frontMatter: Record<string, string> = {};

  // Parse YAML-like front matter, flat key: value pairs only
  for (const line of match[1].split(/\r?\n/)) {
    const [key, ...valueParts] = line.split(':');
    if (key.trim() && valueParts.length > 0) {
      const value = valueParts.join(':').trim();
      // Remove quotes if present
      frontMatter[key.trim()] = value.replace(/^["']|["']$/g, '');
    }
  }

  return {
    frontMatter,
    content: content.slice(match[0].length),
    endLine: match[0].split('\n').length - 1
  };
}

function firstHeading(content: string): string | undefined {
  const match = content.match(/^#\s+(.+)$/m);
  return match ? match[1].trim() : undefined;
}

export function processMarkdownContent(content: string): ProcessedMarkdown {
  const { frontMatter, content: body, endLine } = extractFrontMatter(content);

  if (endLine > 0) {
    logger.debug(`[MarkdownProcessor] Front matter keys: ${Object.keys(frontMatter).join(', ')}`);
  }

  return {
    title: frontMatter.title || firstHeading(body),
    frontMatter,
    text: body,
    lineOffset: endLine
  };
}
