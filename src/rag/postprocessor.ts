import { ScoredChunk } from '../types.js';
import { logger } from '../util/logger.js';

export interface NodePostprocessor {
  postprocess(nodes: readonly ScoredChunk[], query: string): ScoredChunk[];
}

/** Drops chunks scoring below the cutoff; order is preserved */
export class SimilarityPostprocessor implements NodePostprocessor {
  readonly similarityCutoff: number;

  constructor(options: { similarityCutoff: number }) {
    if (!(options.similarityCutoff >= 0 && options.similarityCutoff <= 1)) {
      throw new Error(`similarityCutoff must be in [0, 1], got ${options.similarityCutoff}`);
    }
    this.similarityCutoff = options.similarityCutoff;
  }

  postprocess(nodes: readonly ScoredChunk[]): ScoredChunk[] {
    return nodes.filter(node => {
      // NaN fails every cutoff
      if (!(node.score >= this.similarityCutoff)) {
        logger.debug(`[SimilarityPostprocessor] Filtering out ${node.chunk.id} with score ${node.score} < ${this.similarityCutoff}`);
        return false;
      }
      return true;
    });
  }
}
