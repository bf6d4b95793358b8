import type { EmbeddingBackendPort } from '../../../application/ports/EmbeddingBackendPort.js';

export class CachedEmbeddingBackend implements EmbeddingBackendPort {
  private readonly cache = new Map<string, Promise<number[]>>();

  constructor(private readonly inner: EmbeddingBackendPort) {}

  get name(): string {
    return this.inner.name;
  }

  async embed(text: string): Promise<number[]> {
    let entry = this.cache.get(text);

    if (!entry) {
      entry = this.inner.embed(text);
      this.cache.set(text, entry);
      // Failed lookups are retried on the next call.
      void entry.catch(() => this.cache.delete(text));
    }

    return entry;
  }
}
