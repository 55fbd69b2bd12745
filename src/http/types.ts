export interface RetryOnRateLimitConfig {
  /** Total attempts, the first one included. */
  readonly maxAttempts: number;
}

export type HeaderDecorator = (headers: Headers) => void | Promise<void>;

export type Credentials =
  | { readonly type: "anonymous" }
  | { readonly type: "bearer"; readonly token: string }
  | { readonly type: "basic"; readonly username: string; readonly password: string };

/**
 * Sends requests to the server. Retry, serialization and error mapping live
 * here; callers only describe the request.
 */
export interface RequestExecutor {
  getBaseUrl(): URL;

  makePostRequest(
    url: URL,
    body: unknown,
    decorateHeaders: HeaderDecorator,
    retry: RetryOnRateLimitConfig,
  ): Promise<void>;
}
