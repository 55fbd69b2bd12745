import type { Credentials } from "../http/types.js";
import type { SigningFailureMode } from "../trust/types.js";

export const DEFAULT_CONFIG_FILE = ".build-status.yml";
export const DEFAULT_RETRY_ATTEMPTS = 3;

export interface ServerConfig {
  readonly baseUrl: string;
  readonly credentials: Credentials;
}

export interface SigningConfig {
  readonly privateKeyPath?: string;
  readonly failureMode: SigningFailureMode;
}

export interface RetryConfig {
  readonly maxAttempts: number;
}

export interface BuildStatusConfig {
  readonly server: ServerConfig;
  readonly signing: SigningConfig;
  readonly rootUrl?: string;
  readonly supportsCancelledState: boolean;
  readonly retry: RetryConfig;
}
