/**
 * Error taxonomy for the pipeline.
 *
 * Every stage converts provider and filesystem failures into one of these
 * classes at its boundary and keeps the original error as `cause`. The CLI
 * maps `kind` to a process exit code.
 */

export type RagErrorKind = 'config' | 'ingestion' | 'index' | 'query';

export const EXIT_CODES: Record<RagErrorKind, number> = {
  config: 2,
  ingestion: 3,
  index: 4,
  query: 5,
};

/** Exit code for anything that is not a RagError */
export const UNEXPECTED_EXIT_CODE = 1;

export abstract class RagError extends Error {
  abstract readonly kind: RagErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

// ============ Configuration ============

export class ConfigError extends RagError {
  readonly kind = 'config';
}

export class MissingCredentialError extends RagError {
  readonly kind = 'config';
  readonly variable: string;

  constructor(variable: string) {
    super(`${variable} environment variable is required`);
    this.variable = variable;
  }
}

// ============ Ingestion ============

export class DirectoryNotFoundError extends RagError {
  readonly kind = 'ingestion';
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Data directory '${path}' does not exist`, options);
    this.path = path;
  }
}

export class NoDocumentsError extends RagError {
  readonly kind = 'ingestion';
  readonly path: string;

  constructor(path: string) {
    super(`No documents could be loaded from '${path}'`);
    this.path = path;
  }
}

export class DocumentLoadError extends RagError {
  readonly kind = 'ingestion';
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to load '${filePath}': ${describeCause(cause)}`, { cause });
    this.filePath = filePath;
  }
}

// ============ Indexing ============

export class IndexBuildError extends RagError {
  readonly kind = 'index';
}

// ============ Querying ============

export class RetrievalError extends RagError {
  readonly kind = 'query';
}

export class NoRelevantContextError extends RagError {
  readonly kind = 'query';
  readonly similarityCutoff: number;

  constructor(similarityCutoff: number) {
    super(`No retrieved chunk reached the similarity cutoff of ${similarityCutoff}`);
    this.similarityCutoff = similarityCutoff;
  }
}

export class SynthesisError extends RagError {
  readonly kind = 'query';
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  return 'unknown error';
}

export function exitCodeFor(error: unknown): number {
  return isRagError(error) ? error.exitCode : UNEXPECTED_EXIT_CODE;
}
