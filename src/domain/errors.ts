export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class DocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocumentError";
  }
}

/**
 * Raised by a model collaborator for a single chunk. The pipeline logs it and
 * carries on without that chunk's signals.
 */
export class ExtractionFailure extends Error {
  constructor(
    readonly chunkIndex: number,
    cause: unknown,
  ) {
    super(
      `Extraction failed for chunk ${chunkIndex}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = "ExtractionFailure";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
