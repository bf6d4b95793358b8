export interface EmbeddingBackendPort {
  readonly name: string;
  /** Rejects when the backend cannot serve requests (no credentials, network or model failure). */
  embed(text: string): Promise<number[]>;
}
