import OpenAI from 'openai';
import type { EmbeddingBackendPort } from '../../../application/ports/EmbeddingBackendPort.js';

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
}

export class OpenAIEmbeddingBackend implements EmbeddingBackendPort {
  readonly name = 'remote-openai';
  private readonly client: OpenAI | null;

  constructor(private readonly options: OpenAIEmbeddingOptions) {
    this.client = options.apiKey
      ? new OpenAI({
          baseURL: options.baseUrl,
          apiKey: options.apiKey,
          timeout: 25000,
          maxRetries: 0,
        })
      : null;
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async embed(text: string): Promise<number[]> {
    if (!this.client) {
      throw new Error('Remote embeddings are not configured (no API key)');
    }

    const response = await this.client.embeddings.create({ model: this.options.model, input: text });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error(`Embedding response from ${this.options.model} contained no vector`);
    }
    return embedding;
  }
}
