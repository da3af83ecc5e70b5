/** Text was empty after trimming; the caller skips the item. */
export class EmptyInputError extends Error {
  constructor() {
    super("cannot embed empty text");
    this.name = "EmptyInputError";
  }
}

export class EmbeddingProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingProviderError";
  }
}

/** The candidate pool could not be read at all; nothing to score. */
export class CandidatePoolUnavailableError extends Error {
  constructor(
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`candidate pool unavailable: ${filePath}`, options);
    this.name = "CandidatePoolUnavailableError";
  }
}

export class StoreWriteError extends Error {
  constructor(
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`failed to write ${filePath}`, options);
    this.name = "StoreWriteError";
  }
}

export class StoreReadError extends Error {
  constructor(
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`failed to read ${filePath}`, options);
    this.name = "StoreReadError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
