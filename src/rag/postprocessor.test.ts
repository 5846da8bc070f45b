import { ScoredChunk } from '../types.js';
import { SimilarityPostprocessor } from './postprocessor.js';

function scored(id: string, score: number): ScoredChunk {
  return { chunk: { id, documentId: 'doc.txt', text: id, startLine: 0, endLine: 0, metadata: {} }, score };
}

describe('SimilarityPostprocessor', () => {
  it('should keep chunks at or above the cutoff, in order', () => {
    const postprocessor = new SimilarityPostprocessor({ similarityCutoff: 0.8 });
    const kept = postprocessor.postprocess([scored('a', 0.95), scored('b', 0.8), scored('c', 0.79)]);
    expect(kept.map((node) => node.chunk.id)).toEqual(['a', 'b']);
  });

  it('should keep everything with a cutoff of 0', () => {
    const postprocessor = new SimilarityPostprocessor({ similarityCutoff: 0 });
    expect(postprocessor.postprocess([scored('a', 0), scored('b', 0.1)])).toHaveLength(2);
  });

  it('should drop chunks whose score is not a number', () => {
    const postprocessor = new SimilarityPostprocessor({ similarityCutoff: 0 });
    const kept = postprocessor.postprocess([scored('a', Number.NaN), scored('b', 0.2)]);
    expect(kept.map((node) => node.chunk.id)).toEqual(['b']);
  });

  it('should not modify its input', () => {
    const nodes = [scored('a', 0.1)];
    new SimilarityPostprocessor({ similarityCutoff: 0.5 }).postprocess(nodes);
    expect(nodes).toHaveLength(1);
  });

  it.each([-0.1, 1.1, Number.NaN])('should reject a cutoff of %d', (similarityCutoff) => {
    expect(() => new SimilarityPostprocessor({ similarityCutoff })).toThrow('similarityCutoff must be in [0, 1]');
  });
});
