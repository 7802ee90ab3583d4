/**
 * The remote service declined the request because the call limit was reached
 */
export class RateLimitError extends Error {
  readonly status = 429;

  constructor(message = 'Call limit exceeded', readonly headers?: Headers) {
    super(message);
    this.name = 'RateLimitError';
  }
}

/**
 * Non-2xx response other than a rate-limit rejection
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly body: string
  ) {
    super(`HTTP ${status} ${statusText}: ${body.slice(0, 200)}`);
    this.name = 'HttpError';
  }
}
