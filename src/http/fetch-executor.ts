import { noopLogger, type Logger } from "../logging/logger.js";
import { ConnectionError, RateLimitedError, errorForStatus } from "./errors.js";
import type {
  Credentials,
  HeaderDecorator,
  RequestExecutor,
  RetryOnRateLimitConfig,
} from "./types.js";

export interface FetchExecutorConfig {
  readonly baseUrl: string;
  readonly credentials?: Credentials;
  /** First wait when the server sends no Retry-After; doubles per attempt. */
  readonly baseDelayMs?: number;
  /** Upper bound on any single wait. */
  readonly maxDelayMs?: number;
  readonly logger?: Logger;
}

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;
type SleepFn = (ms: number) => Promise<void>;

/**
 * Posts JSON with `fetch`, retrying only when the server answers 429.
 *
 * `fetch` and `sleep` are injectable so tests can run without a server or
 * real delays.
 */
export class FetchRequestExecutor implements RequestExecutor {
  private readonly baseUrl: URL;
  private readonly credentials: Credentials;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly logger: Logger;

  constructor(
    config: FetchExecutorConfig,
    private readonly fetchFn: FetchFn = (input, init) => fetch(input, init),
    private readonly sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  ) {
    this.baseUrl = new URL(config.baseUrl);
    this.credentials = config.credentials ?? { type: "anonymous" };
    this.baseDelayMs = config.baseDelayMs ?? 1000;
    this.maxDelayMs = config.maxDelayMs ?? 60_000;
    this.logger = config.logger ?? noopLogger;
  }

  getBaseUrl(): URL {
    return new URL(this.baseUrl.toString());
  }

  async makePostRequest(
    url: URL,
    body: unknown,
    decorateHeaders: HeaderDecorator,
    retry: RetryOnRateLimitConfig,
  ): Promise<void> {
    if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${retry.maxAttempts}`);
    }

    const target = url.toString();
    const headers = new Headers({
      accept: "application/json",
      "content-type": "application/json",
    });
    const authorization = authorizationHeader(this.credentials);
    if (authorization) {
      headers.set("authorization", authorization);
    }
    await decorateHeaders(headers);
    const payload = JSON.stringify(body);

    for (let attempt = 1; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchFn(target, {
          method: "POST",
          headers,
          body: payload,
        });
      } catch (error) {
        throw new ConnectionError(target, { cause: error });
      }

      if (response.ok) {
        await response.body?.cancel();
        this.logger.debug("Posted request", { url: target, status: response.status, attempt });
        return;
      }

      const text = await response.text();
      if (response.status !== 429) {
        throw errorForStatus(response.status, target, text);
      }
      if (attempt >= retry.maxAttempts) {
        throw new RateLimitedError(target, text, attempt);
      }

      const delay = this.retryDelay(response.headers.get("retry-after"), attempt);
      this.logger.info("Rate limited, retrying", {
        url: target,
        attempt,
        maxAttempts: retry.maxAttempts,
        delayMs: delay,
      });
      await this.sleep(delay);
    }
  }

  private retryDelay(retryAfter: string | null, attempt: number): number {
    const fromHeader = parseRetryAfter(retryAfter);
    const delay = fromHeader ?? this.baseDelayMs * Math.pow(2, attempt - 1);
    return Math.min(delay, this.maxDelayMs);
  }
}

/**
 * Retry-After in milliseconds, from either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function authorizationHeader(credentials: Credentials): string | undefined {
  switch (credentials.type) {
    case "bearer":
      return `Bearer ${credentials.token}`;
    case "basic": {
      const encoded = Buffer.from(`${credentials.username}:${credentials.password}`, "utf8").toString(
        "base64",
      );
      return `Basic ${encoded}`;
    }
    case "anonymous":
      return undefined;
  }
}
