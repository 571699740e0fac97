/**
 * Harvest Errors
 * Typed failures local to a single page or image
 */

import type { ImageStatus } from "../types";

export interface HarvestErrorOptions {
  url: string;
  cause?: unknown;
  /** Last image status reached before the failure */
  reached?: ImageStatus;
}

export class HarvestError extends Error {
  readonly url: string;
  readonly reached?: ImageStatus;

  constructor(message: string, options: HarvestErrorOptions) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.url = options.url;
    this.reached = options.reached;
  }
}

/**
 * Network failure, timeout or non-2xx response
 */
export class FetchError extends HarvestError {
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: HarvestErrorOptions & { status?: number; timedOut?: boolean },
  ) {
    super(message, options);
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

export class ParseError extends HarvestError {}

export class IOError extends HarvestError {}

export class DecodeError extends HarvestError {}

/**
 * Image fetch failure, wrapping the underlying FetchError
 */
export class DownloadError extends HarvestError {
  get timedOut(): boolean {
    return this.cause instanceof FetchError && this.cause.timedOut;
  }

  get status(): number | undefined {
    return this.cause instanceof FetchError ? this.cause.status : undefined;
  }
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
