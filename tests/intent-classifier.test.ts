import { describe, it, expect } from 'vitest';
import type { EmbeddingBackendPort } from '../src/application/ports/EmbeddingBackendPort.js';
import {
  cosineSimilarity,
  IntentClassifierService,
  similarityToConfidence,
} from '../src/application/services/IntentClassifierService.js';
import { CachedEmbeddingBackend } from '../src/infrastructure/adapters/embeddings/CachedEmbeddingBackend.js';
import { HashedNgramEmbeddingBackend } from '../src/infrastructure/adapters/embeddings/HashedNgramEmbeddingBackend.js';
import { createLogger, intentCorpus } from './fixtures.js';

class ZeroBackend implements EmbeddingBackendPort {
  readonly name = 'zero';

  async embed(): Promise<number[]> {
    return [0, 0, 0];
  }
}

class FailingBackend implements EmbeddingBackendPort {
  readonly name = 'failing-remote';
  calls = 0;

  async embed(): Promise<number[]> {
    this.calls += 1;
    throw new Error('connection refused');
  }
}

describe('cosineSimilarity and similarityToConfidence', () => {
  it('handles orthogonal, identical and mismatched vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([2, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [0, 0])).toBe(0);
  });

  it('caps high similarity and discounts low similarity', () => {
    expect(similarityToConfidence(0.99)).toBe(0.95);
    expect(similarityToConfidence(0.8)).toBe(0.8);
    expect(similarityToConfidence(0.6)).toBeCloseTo(0.51);
    expect(similarityToConfidence(0.4)).toBeCloseTo(0.2);
  });
});

describe('IntentClassifierService', () => {
  it('accepts a confident local embedding match', async () => {
    const classifier = new IntentClassifierService(
      intentCorpus,
      { local: new CachedEmbeddingBackend(new HashedNgramEmbeddingBackend()) },
      createLogger(),
    );

    const result = await classifier.classify('catat pengeluaran 50000 untuk makan');

    expect(result).toEqual({ category: 'interaction_data', type: 'record', confidence: 0.95, method: 'local_embedding' });
  });

  it('falls back to keywords when embeddings give nothing', async () => {
    const remote = new FailingBackend();
    const logger = createLogger();
    const classifier = new IntentClassifierService(intentCorpus, { local: new ZeroBackend(), remote }, logger);

    const result = await classifier.classify('catat pengeluaran 50000 untuk makan');

    expect(result).toEqual({ category: 'interaction_data', type: 'record', confidence: 1, method: 'keyword' });
    expect(classifier.isBackendAvailable('failing-remote')).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('embedding_backend_unavailable', {
      backend: 'failing-remote',
      error: 'connection refused',
    });
  });

  it('stops calling a backend once it has failed', async () => {
    const remote = new FailingBackend();
    const classifier = new IntentClassifierService(intentCorpus, { local: new ZeroBackend(), remote }, createLogger());

    await classifier.classify('halo');
    await classifier.classify('hapus transaksi 12');

    expect(remote.calls).toBe(1);
  });

  it('returns the low-confidence default when nothing matches', async () => {
    const classifier = new IntentClassifierService(intentCorpus, { local: new ZeroBackend() }, createLogger());

    const result = await classifier.classify('qwerty zxcv');

    expect(result).toEqual({ category: 'general', type: 'unknown', confidence: 0.3, method: 'default' });
    expect(classifier.shouldAskForClarification(result.confidence)).toBe(true);
    expect(await classifier.classify('   ')).toEqual(result);
  });
});

describe('IntentClassifierService.classifyWithKeywords', () => {
  const classifier = new IntentClassifierService(intentCorpus, { local: new ZeroBackend() }, createLogger());

  it('rewards keywords at the start of short queries', () => {
    expect(classifier.classifyWithKeywords('hapus transaksi 12')).toEqual({
      category: 'interaction_data',
      type: 'delete',
      confidence: 1,
      method: 'keyword',
    });
  });

  it('prefers multi-word keywords', () => {
    expect(classifier.classifyWithKeywords('berapa total pengeluaran bulan ini')).toMatchObject({
      category: 'context_data',
      type: 'summary',
    });
  });

  it('matches whole words only', () => {
    // "hai" must not match inside "chair".
    expect(classifier.classifyWithKeywords('chair')).toBeNull();
  });

  it('lowers confidence for long messages', () => {
    const long = 'tolong dong aku mau tanya sesuatu yang agak panjang soal uang dan rencana transfer ke rekening lain';
    // "transfer" mid-sentence, more than 15 words: 0.7 - 0.1.
    expect(classifier.classifyWithKeywords(long)).toEqual({
      category: 'interaction_data',
      type: 'transfer',
      confidence: 0.6,
      method: 'keyword',
    });
  });
});
