import { createInterface } from 'node:readline';
import { Command, CommanderError, Option } from 'commander';
import { PROVIDERS, RagConfig, resolveConfig } from './config.js';
import { exitCodeFor, isRagError } from './errors.js';
import { IndexingProgress } from './indexing/status.js';
import { RAGPipeline, createPipeline } from './rag/pipeline.js';
import { RagResponse, RESPONSE_MODES } from './types.js';
import { logger, setLogLevel } from './util/logger.js';
import { sanitizeErrorMessage } from './util/redact.js';

export interface Output {
  write(chunk: string): unknown;
}

export interface CliDeps {
  createPipeline: (config: RagConfig, env: Record<string, string | undefined>) => RAGPipeline;
  env: Record<string, string | undefined>;
  stdin: NodeJS.ReadableStream;
  stdout: Output;
  stderr: Output;
  /** Draw a progress bar while embedding */
  showProgress: boolean;
}

interface CliOptions {
  dataDir?: string;
  provider?: string;
  topK?: string;
  cutoff?: string;
  mode?: string;
  chunkSize?: string;
  chunkOverlap?: string;
  recursive?: boolean;
  skipErrors?: boolean;
  apiKeyEnv?: string;
  strictContext?: boolean;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export function formatResponse(query: string, response: RagResponse, json: boolean): string {
  if (json) {
    return JSON.stringify(
      {
        query,
        answer: response.text,
        mode: response.mode,
        noContext: response.metadata.noContext,
        llmCalls: response.metadata.llmCalls,
        sources: response.sourceNodes.map(({ chunk, score }) => ({
          id: chunk.id,
          document: chunk.documentId,
          score,
          startLine: chunk.startLine + 1,
          endLine: chunk.endLine + 1,
        })),
      },
      null,
      2
    ) + '\n';
  }

  let text = `Query Response:\n${response.text}\n`;
  if (response.sourceNodes.length > 0) {
    text += '\nSources:\n';
    for (const { chunk, score } of response.sourceNodes) {
      text += `  [${score.toFixed(3)}] ${chunk.documentId} (lines ${chunk.startLine + 1}-${chunk.endLine + 1})\n`;
    }
  }
  return text;
}

async function interactive(pipeline: RAGPipeline, deps: CliDeps, json: boolean): Promise<void> {
  const rl = createInterface({ input: deps.stdin, terminal: false });
  deps.stderr.write('Ask a question (empty line to quit)\n> ');

  try {
    for await (const line of rl) {
      const question = line.trim();
      if (!question) {
        break;
      }
      try {
        deps.stdout.write(formatResponse(question, await pipeline.query(question), json));
      } catch (error) {
        // A failed query ends that query only; the index is still usable
        if (!isRagError(error) || error.kind !== 'query') {
          throw error;
        }
        logger.error('[CLI] Query failed:', error);
        deps.stderr.write(`Error: ${sanitizeErrorMessage(error)}\n`);
      }
      deps.stderr.write('> ');
    }
  } finally {
    rl.close();
  }
}

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('local-docs-rag')
    .description('Answer questions about a local directory of documents with retrieval-augmented generation')
    .version('1.0.0')
    .argument('[query...]', 'question to answer; omit to ask interactively')
    .option('-d, --data-dir <path>', 'directory of documents (default: data)')
    .addOption(new Option('-p, --provider <name>', 'LLM and embedding backend').choices(PROVIDERS))
    .option('-k, --top-k <n>', 'chunks retrieved before the similarity cutoff (default: 5)')
    .option('-c, --cutoff <score>', 'minimum cosine similarity of a used chunk (default: 0.8)')
    .addOption(new Option('-m, --mode <mode>', 'response synthesis mode (default: compact)').choices(RESPONSE_MODES))
    .option('--chunk-size <tokens>', 'chunk size in estimated tokens (default: 1024)')
    .option('--chunk-overlap <tokens>', 'tokens shared by consecutive chunks (default: 20)')
    .option('-r, --recursive', 'read subdirectories too')
    .option('--skip-errors', 'skip unreadable files instead of failing')
    .option('--api-key-env <name>', 'environment variable holding the API key')
    .option('--strict-context', 'fail when no chunk reaches the cutoff instead of answering "Empty Response"')
    .option('--json', 'print the answer and its sources as JSON')
    .option('-v, --verbose', 'debug logging')
    .option('-q, --quiet', 'only log errors')
    .exitOverride()
    .configureOutput({
      writeOut: str => deps.stdout.write(str),
      writeErr: str => deps.stderr.write(str),
    })
    .action(async (queryWords: string[], options: CliOptions) => {
      if (options.verbose) {
        setLogLevel('debug');
      } else if (options.quiet) {
        setLogLevel('error');
      }

      logger.info('[CLI] Starting');
      const config = resolveConfig(
        {
          dataDir: options.dataDir,
          provider: options.provider,
          topK: options.topK,
          similarityCutoff: options.cutoff,
          responseMode: options.mode,
          chunkSize: options.chunkSize,
          chunkOverlap: options.chunkOverlap,
          recursive: options.recursive,
          ingestErrors: options.skipErrors ? 'skip' : undefined,
          apiKeyEnv: options.apiKeyEnv,
          emptyContext: options.strictContext ? 'error' : undefined,
        },
        deps.env
      );

      const pipeline = deps.createPipeline(config, deps.env);

      const progress = deps.showProgress ? new IndexingProgress() : undefined;
      try {
        await pipeline.initialize({ onProgress: progress?.listener });
      } finally {
        progress?.stop();
      }
      logger.info(`[CLI] Number of documents loaded: ${pipeline.stats.documents}`);

      const json = options.json ?? false;
      const question = queryWords.join(' ').trim();
      if (question) {
        deps.stdout.write(formatResponse(question, await pipeline.query(question), json));
      } else {
        await interactive(pipeline, deps, json);
      }
    });

  return program;
}

/**
 * Run the CLI and resolve to the process exit code. Never rejects: failures
 * are logged as fatal and mapped to an exit code per error kind.
 */
export async function run(argv: string[], deps: CliDeps): Promise<number> {
  const program = buildProgram(deps);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help, version and usage errors have already been printed by commander
      return error.exitCode;
    }
    logger.error('[CLI] Application failed to execute due to an error:', error);
    deps.stderr.write(`Error: ${sanitizeErrorMessage(error)}\n`);
    return exitCodeFor(error);
  } finally {
    logger.info('[CLI] Application execution completed');
  }
}

export const defaultDeps = (): CliDeps => ({
  createPipeline,
  env: process.env,
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  showProgress: process.stderr.isTTY === true,
});
