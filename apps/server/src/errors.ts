/**
 * Base class for errors raised by the server. `status` is the HTTP status the
 * admin API answers with when the error reaches it.
 */
export class DNSServerError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * Malformed zone input: wrong shape, unknown record type or an answer that
 * does not fit its type.
 */
export class ValidationError extends DNSServerError {
  readonly index: number | undefined;

  constructor(message: string, index?: number) {
    super(message, 400);
    this.index = index;
  }
}

/**
 * An upstream server could not be reached, timed out or sent back something
 * that is not a reply to the forwarded query.
 */
export class UpstreamError extends DNSServerError {
  readonly upstream: string;

  constructor(message: string, upstream: string, options?: { cause?: unknown }) {
    super(message, 502, options);
    this.upstream = upstream;
  }
}

/** Invalid ports, upstream addresses or resolver construction arguments. */
export class ConfigurationError extends DNSServerError {
  constructor(message: string) {
    super(message, 500);
  }
}
