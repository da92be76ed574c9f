/**
 * Error taxonomy for the feed pipeline.
 *
 * Everything except FatalConfigurationError is caught at the boundary of a
 * single unit of work (one probe, one validation, one feed) and turned into a
 * FailureRecord; it never unwinds past a fan-out.
 */

export type FailureKind =
  | 'transient_network'
  | 'not_found_or_invalid'
  | 'malformed_feed_body'
  | 'unparsable_date';

export abstract class FeedPipelineError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, readonly url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeout, refused connection, DNS failure, reset socket. */
export class TransientNetworkError extends FeedPipelineError {
  readonly kind = 'transient_network';
}

/** The server answered, but not with a 2xx. */
export class NotFoundOrInvalidError extends FeedPipelineError {
  readonly kind = 'not_found_or_invalid';

  constructor(url: string, readonly status: number) {
    super(`HTTP ${status}`, url);
  }
}

export class MalformedFeedBodyError extends FeedPipelineError {
  readonly kind = 'malformed_feed_body';
}

export class UnparsableDateError extends FeedPipelineError {
  readonly kind = 'unparsable_date';

  constructor(url: string, readonly raw: string | undefined) {
    super(raw ? `Unparsable date "${raw}"` : 'Missing date', url);
  }
}

/**
 * Invalid or missing configuration. Raised before any network I/O and
 * the only error that aborts a run.
 */
export class FatalConfigurationError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'FatalConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
