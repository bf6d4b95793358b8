export class StorageError extends Error {
  constructor(
    readonly operation: string,
    options: { cause: unknown },
  ) {
    const detail = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`Storage operation '${operation}' failed: ${detail}`, options);
    this.name = 'StorageError';
  }
}
