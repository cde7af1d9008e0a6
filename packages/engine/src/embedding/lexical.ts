import type { SparseEmbeddingProvider, SparseVector } from './interface.js';

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'has', 'have', 'in',
  'is', 'it', 'its', 'of', 'on', 'or', 'that', 'the', 'this', 'to', 'was', 'were', 'will', 'with',
]);

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []).filter(t => t.length > 1 && !STOP_WORDS.has(t));
}

/**
 * In-process lexical encoder: sublinear term frequency (1 + ln tf), L2-normalised so
 * that the dot product of two encodings lies in [0, 1].
 */
export class LexicalSparseEmbedder implements SparseEmbeddingProvider {
  readonly name = 'lexical';

  encode(text: string): SparseVector {
    const tf = new Map<string, number>();
    for (const token of tokenize(text)) tf.set(token, (tf.get(token) ?? 0) + 1);

    let norm = 0;
    const weights: [string, number][] = [];
    for (const [term, count] of tf) {
      const w = 1 + Math.log(count);
      weights.push([term, w]);
      norm += w * w;
    }
    norm = Math.sqrt(norm);

    const vector: SparseVector = {};
    for (const [term, w] of weights.sort((a, b) => a[0].localeCompare(b[0]))) {
      vector[term] = w / norm;
    }
    return vector;
  }

  async embedSparse(texts: string[]): Promise<SparseVector[]> {
    return texts.map(t => this.encode(t));
  }
}
