/**
 * Error types raised by a domain check run.
 *
 * Per-lookup failures (timeouts, DNS server errors) never escape the worker
 * pool: they become `error` outcomes. Only the load and write errors below
 * end a run.
 */

export type InputLoadErrorCode =
  | "INPUT_NOT_FOUND"
  | "INPUT_UNREADABLE"
  | "NO_VALID_DOMAINS";

/** Input file missing, unreadable, or without a single valid domain. */
export class InputLoadError extends Error {
  constructor(
    message: string,
    public code: InputLoadErrorCode,
    public path: string,
  ) {
    super(message);
    this.name = "InputLoadError";
  }
}

/**
 * Results were computed but could not be persisted.
 * Carries the available domains so the caller can still surface them.
 */
export class OutputWriteError extends Error {
  constructor(
    message: string,
    public path: string,
    public available: readonly string[],
  ) {
    super(message);
    this.name = "OutputWriteError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ResolutionTimeoutError extends Error {
  constructor(
    public domain: string,
    public timeoutMs: number,
  ) {
    super(`Lookup timed out after ${timeoutMs}ms for ${domain}`);
    this.name = "ResolutionTimeoutError";
  }
}

export class QueueClosedError extends Error {
  constructor() {
    super("Queue is closed");
    this.name = "QueueClosedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
