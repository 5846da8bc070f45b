import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { logger } from '../util/logger.js';

export interface ExtractedContent {
  title?: string;
  text: string;
}

const BLOCK_SELECTOR = 'h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, tr';

/** Collapse runs of spaces inside lines and keep paragraph breaks */
export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.replace(/[ \t\f\v ]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function blockText(element: Element): string {
  // Handle code blocks specially
  if (element.tagName === 'PRE') {
    return element.textContent?.trim() ?? '';
  }

  // Handle table rows specially
  if (element.tagName === 'TR') {
    return Array.from(element.querySelectorAll('td, th'))
      .map(cell => cell.textContent?.trim() || '')
      .join(' | ');
  }

  const text = element.textContent?.replace(/\s+/g, ' ').trim() ?? '';
  return element.tagName === 'LI' && text ? `- ${text}` : text;
}

/**
 * Text of the outermost block elements under root, one paragraph each.
 * Falls back to the plain text content when there are no block elements.
 */
function extractBlocks(root: Element): string {
  for (const unwanted of Array.from(root.querySelectorAll('script, style, noscript, template'))) {
    unwanted.remove();
  }

  const blocks = Array.from(root.querySelectorAll(BLOCK_SELECTOR))
    // Skip blocks nested inside another block (a <p> inside an <li>)
    .filter(element => !element.parentElement?.closest(BLOCK_SELECTOR))
    .map(blockText)
    .filter(text => text.length > 0);

  if (blocks.length === 0) {
    return cleanText(root.textContent ?? '');
  }
  return cleanText(blocks.join('\n\n'));
}

/**
 * Extract the readable text of an HTML page. Readability picks the main
 * content; when it finds nothing the whole body is used.
 */
export function extractHtmlContent(html: string): ExtractedContent {
  const dom = new JSDOM(html);
  const doc = dom.window.document;
  const title = doc.title.trim() || undefined;

  // Readability mutates the document it is given
  const article = new Readability(new JSDOM(html).window.document).parse();
  if (article?.content) {
    const articleDom = new JSDOM(article.content);
    const text = extractBlocks(articleDom.window.document.body);
    if (text) {
      return { title: title ?? article.title ?? undefined, text };
    }
  }

  logger.debug('[ContentProcessor] Readability found no article, using body text');
  return { title, text: doc.body ? extractBlocks(doc.body) : '' };
}
