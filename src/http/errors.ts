const MAX_BODY_IN_MESSAGE = 200;

export class HttpRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string,
    message?: string,
  ) {
    super(message ?? `POST ${url} failed with HTTP ${status}: ${body.slice(0, MAX_BODY_IN_MESSAGE)}`);
    this.name = "HttpRequestError";
  }
}

export class BadRequestError extends HttpRequestError {
  name = "BadRequestError";
}

export class AuthorizationError extends HttpRequestError {
  name = "AuthorizationError";
}

export class NotFoundError extends HttpRequestError {
  name = "NotFoundError";
}

export class RateLimitedError extends HttpRequestError {
  name = "RateLimitedError";

  constructor(url: string, body: string, public readonly attempts: number) {
    super(429, url, body, `POST ${url} still rate limited after ${attempts} attempt(s)`);
  }
}

export class ServerError extends HttpRequestError {
  name = "ServerError";
}

export class ConnectionError extends Error {
  constructor(
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(`Unable to reach ${url}${describeCause(options?.cause)}`, options);
    this.name = "ConnectionError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `: ${cause.message}` : "";
}

export function errorForStatus(status: number, url: string, body: string): HttpRequestError {
  switch (status) {
    case 400:
    case 409:
    case 422:
      return new BadRequestError(status, url, body);
    case 401:
    case 403:
      return new AuthorizationError(status, url, body);
    case 404:
      return new NotFoundError(status, url, body);
    default:
      if (status >= 500) {
        return new ServerError(status, url, body);
      }
      return new HttpRequestError(status, url, body);
  }
}
