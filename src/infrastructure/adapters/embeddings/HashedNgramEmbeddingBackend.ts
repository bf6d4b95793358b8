import type { EmbeddingBackendPort } from '../../../application/ports/EmbeddingBackendPort.js';
import { normalizeDescription } from '../../../domain/services/DescriptionNormalizer.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const fnv1a = (value: string): number => {
  let hash = FNV_OFFSET;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
};

/**
 * Offline embedding: hashes whole words and character trigrams into a fixed
 * number of buckets and L2-normalises the result. Lexical, not semantic, but
 * it needs no model download and never fails.
 */
export class HashedNgramEmbeddingBackend implements EmbeddingBackendPort {
  readonly name = 'local-hashed-ngrams';

  constructor(
    private readonly dimensions = 512,
    private readonly ngram = 3,
  ) {}

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    const words = normalizeDescription(text).split(' ').filter(Boolean);

    for (const word of words) {
      this.add(vector, `w:${word}`, 1);

      const padded = ` ${word} `;
      for (let start = 0; start + this.ngram <= padded.length; start += 1) {
        this.add(vector, `g:${padded.slice(start, start + this.ngram)}`, 0.5);
      }
    }

    const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return magnitude === 0 ? vector : vector.map((value) => value / magnitude);
  }

  private add(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimensions;
    // High bit picks the sign so colliding features partly cancel out.
    const sign = hash & 0x80000000 ? -1 : 1;
    vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
  }
}
