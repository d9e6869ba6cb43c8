/**
 * Job-level error taxonomy.
 *
 * Record-level problems (missing fields, unresolvable references) are not
 * errors: normalizers and resolvers return null and the job counts a skip.
 * Everything here aborts the job that raised it, never the orchestrator.
 */

export class SourceAuthError extends Error {
  readonly code = "SOURCE_AUTH" as const;

  constructor(
    public readonly url: string,
    public readonly status: number
  ) {
    super(`Source rejected credentials (HTTP ${String(status)}): ${url}`);
    this.name = "SourceAuthError";
  }
}

export class SourceUnavailableError extends Error {
  readonly code = "SOURCE_UNAVAILABLE" as const;

  constructor(
    public readonly url: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(
      `Source unreachable after ${String(attempts)} attempts: ${url}`,
      options
    );
    this.name = "SourceUnavailableError";
  }
}

export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SyncCancelledError extends Error {
  readonly code = "SYNC_CANCELLED" as const;

  constructor(reason?: string) {
    super(reason ?? "Sync cancelled");
    this.name = "SyncCancelledError";
  }
}

export class EmbeddingInputTooLargeError extends Error {
  readonly code = "EMBEDDING_INPUT_TOO_LARGE" as const;

  constructor(
    public readonly inputLength: number,
    options?: { cause?: unknown }
  ) {
    super(
      `Embedding input of ${String(inputLength)} characters exceeds the model context`,
      options
    );
    this.name = "EmbeddingInputTooLargeError";
  }
}

/**
 * True for an abort raised by an AbortSignal (node timers, fetch) or our own
 * cancellation error.
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof SyncCancelledError) {
    return true;
  }
  return error instanceof Error && error.name === "AbortError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
