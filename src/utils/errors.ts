import { UpstreamService } from "../common/common-enum";

const describe = (cause: unknown): string => {
  if (cause instanceof Error && cause.message) return cause.message;
  return String(cause);
};

export class AppError extends Error {
  public readonly status: number;

  constructor(message: string, status = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.status = status;
  }
}

/**
 * Raised by the plan store when the database cannot be reached or returns
 * something that does not decode into a plan. The only failure that
 * reaches the caller of the planning pipeline.
 */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describe(cause)}`, 500, {
      cause,
    });
    this.name = "StorageError";
  }
}

/** A completion, search or weather call failed or timed out. */
export class UpstreamUnavailableError extends AppError {
  public readonly service: UpstreamService;

  constructor(service: UpstreamService, cause: unknown) {
    super(`${service} service unavailable: ${describe(cause)}`, 502, { cause });
    this.name = "UpstreamUnavailableError";
    this.service = service;
  }
}

export class ParseFailureError extends AppError {
  public readonly excerpt: string;

  constructor(message: string, raw: string) {
    super(message, 502);
    this.name = "ParseFailureError";
    this.excerpt = raw.slice(0, 200);
  }
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}
