import { readdir, readFile, realpath, stat } from 'node:fs/promises';
import { basename, extname, join, relative, resolve, sep } from 'node:path';
import { isHtmlPath, isMarkdownPath } from '../config.js';
import { DirectoryNotFoundError, DocumentLoadError, NoDocumentsError } from '../errors.js';
import { extractHtmlContent } from '../processor/content.js';
import { processMarkdownContent } from '../processor/markdown.js';
import { Document, DocumentMetadata } from '../types.js';
import { logger } from '../util/logger.js';

/** Extensions read as text, with the MIME type recorded in metadata */
export const SUPPORTED_EXTENSIONS: Record<string, string> = {
  '.txt': 'text/plain',
  '.text': 'text/plain',
  '.log': 'text/plain',
  '.md': 'text/markdown',
  '.mdx': 'text/markdown',
  '.markdown': 'text/markdown',
  '.rst': 'text/x-rst',
  '.html': 'text/html',
  '.htm': 'text/html',
  '.csv': 'text/csv',
  '.tsv': 'text/tab-separated-values',
  '.json': 'application/json',
  '.xml': 'application/xml',
  '.yaml': 'application/yaml',
  '.yml': 'application/yaml',
};

export interface ReaderOptions {
  /** Descend into subdirectories */
  recursive?: boolean;
  /** Skip files and directories whose name starts with a dot */
  excludeHidden?: boolean;
  /** Only load these extensions (with or without the leading dot) */
  requiredExts?: string[];
  /** Stop after this many files, in sorted path order */
  numFilesLimit?: number;
  encoding?: string;
  /**
   * 'fail' aborts the whole load on the first unreadable file.
   * 'skip' logs it and keeps the rest.
   */
  onError?: 'fail' | 'skip';
}

interface ExtractedFile {
  text: string;
  metadata: DocumentMetadata;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function toDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

async function listFiles(
  dir: string,
  recursive: boolean,
  excludeHidden: boolean,
  visited: Set<string> = new Set()
): Promise<string[]> {
  // Symlinked directories can form cycles
  const real = await realpath(dir);
  if (visited.has(real)) {
    logger.debug(`[Reader] Skipping already visited directory ${dir}`);
    return [];
  }
  visited.add(real);

  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    if (excludeHidden && entry.name.startsWith('.')) {
      continue;
    }
    const fullPath = join(dir, entry.name);
    let isDirectory = entry.isDirectory();
    let isFile = entry.isFile();

    if (entry.isSymbolicLink()) {
      try {
        const target = await stat(fullPath);
        isDirectory = target.isDirectory();
        isFile = target.isFile();
      } catch (error) {
        logger.warn(`[Reader] Skipping broken symbolic link ${fullPath}:`, error);
        continue;
      }
    }

    if (isDirectory) {
      if (recursive) {
        files.push(...(await listFiles(fullPath, recursive, excludeHidden, visited)));
      }
    } else if (isFile) {
      files.push(fullPath);
    }
  }

  return files;
}

async function readFileContent(filePath: string, encoding: string): Promise<ExtractedFile> {
  const [buffer, stats] = await Promise.all([readFile(filePath), stat(filePath)]);
  // fatal: invalid byte sequences throw instead of becoming U+FFFD
  const raw = new TextDecoder(encoding, { fatal: true }).decode(buffer);
  const ext = extname(filePath).toLowerCase();

  const metadata: DocumentMetadata = {
    file_path: filePath,
    file_name: basename(filePath),
    file_type: SUPPORTED_EXTENSIONS[ext] ?? 'text/plain',
    file_size: String(stats.size),
    creation_date: toDate(stats.birthtime),
    last_modified_date: toDate(stats.mtime),
  };

  if (isMarkdownPath(filePath)) {
    const markdown = processMarkdownContent(raw);
    // File metadata wins over front matter keys of the same name
    const merged: DocumentMetadata = { ...markdown.frontMatter, ...metadata };
    if (markdown.title) {
      merged.title = markdown.title;
    }
    if (markdown.lineOffset > 0) {
      merged.line_offset = String(markdown.lineOffset);
    }
    return { text: markdown.text, metadata: merged };
  }

  if (isHtmlPath(filePath)) {
    const html = extractHtmlContent(raw);
    return { text: html.text, metadata: html.title ? { ...metadata, title: html.title } : metadata };
  }

  return { text: raw, metadata };
}

/**
 * Load every supported file of a directory as a Document.
 *
 * @throws DirectoryNotFoundError if the path is missing or not a directory
 * @throws NoDocumentsError if nothing could be loaded
 * @throws DocumentLoadError for an unreadable file when onError is 'fail'
 */
export async function loadDocuments(directoryPath: string, options: ReaderOptions = {}): Promise<Document[]> {
  const {
    recursive = false,
    excludeHidden = true,
    requiredExts,
    numFilesLimit,
    encoding = 'utf-8',
    onError = 'fail',
  } = options;

  const root = resolve(directoryPath);

  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      logger.error(`[Reader] '${directoryPath}' is not a directory`);
      throw new DirectoryNotFoundError(directoryPath);
    }
  } catch (error) {
    if (error instanceof DirectoryNotFoundError) {
      throw error;
    }
    if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      logger.error(`[Reader] Data directory '${directoryPath}' does not exist`);
      throw new DirectoryNotFoundError(directoryPath, { cause: error });
    }
    throw new DocumentLoadError(directoryPath, error);
  }

  logger.info(`[Reader] Loading documents from directory: ${directoryPath}`);

  let files: string[];
  try {
    files = await listFiles(root, recursive, excludeHidden);
  } catch (error) {
    throw new DocumentLoadError(directoryPath, error);
  }

  const allowed = requiredExts
    ? new Set(requiredExts.map(normalizeExtension))
    : new Set(Object.keys(SUPPORTED_EXTENSIONS));

  let candidates = files
    .filter(file => {
      const supported = allowed.has(extname(file).toLowerCase());
      if (!supported) {
        logger.debug(`[Reader] Skipping unsupported file ${file}`);
      }
      return supported;
    })
    .sort();

  if (numFilesLimit !== undefined) {
    candidates = candidates.slice(0, numFilesLimit);
  }

  const documents: Document[] = [];
  for (const file of candidates) {
    const id = relative(root, file).split(sep).join('/');
    try {
      const { text, metadata } = await readFileContent(file, encoding);
      documents.push(Object.freeze({ id, text, metadata: Object.freeze(metadata) }));
    } catch (error) {
      if (onError === 'skip') {
        logger.warn(`[Reader] Skipping ${id}:`, error);
        continue;
      }
      logger.error(`[Reader] Failed to load ${id}`);
      throw new DocumentLoadError(id, error);
    }
  }

  if (documents.length === 0) {
    logger.warn(`[Reader] No documents found in ${directoryPath}`);
    throw new NoDocumentsError(directoryPath);
  }

  logger.info(`[Reader] Successfully loaded ${documents.length} documents`);
  return documents;
}
