import { noopLogger, type Logger } from "../logging/logger.js";
import type { HeaderDecorator, RequestExecutor, RetryOnRateLimitConfig } from "./types.js";

export interface RecordedRequest {
  readonly url: string;
  readonly body: unknown;
  readonly headers: Readonly<Record<string, string>>;
  readonly retry: RetryOnRateLimitConfig;
}

/**
 * Builds every request in full, headers included, and logs it instead of
 * sending it.
 */
export class DryRunRequestExecutor implements RequestExecutor {
  readonly requests: RecordedRequest[] = [];
  private readonly baseUrl: URL;

  constructor(
    baseUrl: string,
    private readonly logger: Logger = noopLogger,
  ) {
    this.baseUrl = new URL(baseUrl);
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
    const headers = new Headers();
    await decorateHeaders(headers);
    const recorded: RecordedRequest = {
      url: url.toString(),
      body,
      headers: Object.fromEntries(headers.entries()),
      retry,
    };
    this.requests.push(recorded);
    this.logger.info(`[DRY RUN] Would POST ${recorded.url}`, {
      headers: recorded.headers,
      body,
    });
  }
}
