import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import type { Credentials } from "../http/types.js";
import type { SigningFailureMode } from "../trust/types.js";
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_RETRY_ATTEMPTS,
  type BuildStatusConfig,
  type RetryConfig,
  type ServerConfig,
  type SigningConfig,
} from "./types.js";

const ROOT_KEYS = new Set([
  "server",
  "signing",
  "root_url",
  "supports_cancelled_state",
  "retry",
]);
const SERVER_KEYS = new Set(["base_url", "token", "username", "password"]);
const SIGNING_KEYS = new Set(["private_key", "failure_mode"]);
const RETRY_KEYS = new Set(["max_attempts"]);

export const ENV_SERVER_URL = "BUILD_STATUS_SERVER_URL";
export const ENV_TOKEN = "BUILD_STATUS_TOKEN";
export const ENV_USERNAME = "BUILD_STATUS_USERNAME";
export const ENV_PASSWORD = "BUILD_STATUS_PASSWORD";
export const ENV_PRIVATE_KEY = "BUILD_STATUS_PRIVATE_KEY";
export const ENV_ROOT_URL = "BUILD_STATUS_ROOT_URL";

type Env = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. Without it the default file is optional. */
  readonly configPath?: string;
  readonly cwd?: string;
  readonly env?: Env;
}

export interface ParseContext {
  readonly env: Env;
  /** Relative paths in the file resolve against this directory. */
  readonly baseDir: string;
  readonly cwd: string;
}

export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<BuildStatusConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);
  const raw = await readConfigFile(configPath, options.configPath !== undefined);
  const doc: unknown = raw === undefined ? undefined : yaml.load(raw);
  return parseConfig(doc, {
    env: options.env ?? process.env,
    baseDir: path.dirname(configPath),
    cwd,
  });
}

/**
 * Validate a parsed config document, applying environment overrides.
 * All problems are reported together.
 */
export function parseConfig(input: unknown, context: ParseContext): BuildStatusConfig {
  const errors: string[] = [];
  const doc = input === undefined || input === null ? {} : input;
  if (!isRecord(doc)) {
    throw new Error("Invalid config: config must be an object");
  }
  assertNoExtraKeys(doc, ROOT_KEYS, "config", errors);

  const server = parseServer(section(doc.server, "server", errors), context, errors);
  const signing = parseSigning(section(doc.signing, "signing", errors), context, errors);
  const retry = parseRetry(section(doc.retry, "retry", errors), errors);

  const rootUrl =
    nonEmpty(context.env[ENV_ROOT_URL]) ?? optionalString(doc.root_url, "root_url", errors);
  if (rootUrl !== undefined && !isHttpUrl(rootUrl)) {
    errors.push("root_url must be an absolute http(s) URL");
  }

  const supportsCancelledState = doc.supports_cancelled_state ?? true;
  if (typeof supportsCancelledState !== "boolean") {
    errors.push("supports_cancelled_state must be a boolean");
  }

  if (errors.length > 0) {
    throw new Error(`Invalid config: ${errors.join("; ")}`);
  }

  return {
    server,
    signing,
    rootUrl,
    supportsCancelledState: supportsCancelledState === true,
    retry,
  };
}

function parseServer(
  input: Record<string, unknown>,
  context: ParseContext,
  errors: string[],
): ServerConfig {
  assertNoExtraKeys(input, SERVER_KEYS, "server", errors);

  const baseUrl =
    nonEmpty(context.env[ENV_SERVER_URL]) ??
    optionalString(input.base_url, "server.base_url", errors);
  if (baseUrl === undefined) {
    errors.push(`server.base_url is required (or set ${ENV_SERVER_URL})`);
  } else if (!isHttpUrl(baseUrl)) {
    errors.push("server.base_url must be an absolute http(s) URL");
  }

  const token =
    nonEmpty(context.env[ENV_TOKEN]) ?? optionalString(input.token, "server.token", errors);
  const username =
    nonEmpty(context.env[ENV_USERNAME]) ??
    optionalString(input.username, "server.username", errors);
  const password =
    nonEmpty(context.env[ENV_PASSWORD]) ??
    optionalString(input.password, "server.password", errors);

  let credentials: Credentials = { type: "anonymous" };
  if (token !== undefined) {
    credentials = { type: "bearer", token };
  } else if (username !== undefined && password !== undefined) {
    credentials = { type: "basic", username, password };
  } else if (username !== undefined || password !== undefined) {
    errors.push("server.username and server.password must be set together");
  }

  return { baseUrl: baseUrl ?? "", credentials };
}

function parseSigning(
  input: Record<string, unknown>,
  context: ParseContext,
  errors: string[],
): SigningConfig {
  assertNoExtraKeys(input, SIGNING_KEYS, "signing", errors);

  const fromEnv = nonEmpty(context.env[ENV_PRIVATE_KEY]);
  const fromFile = optionalString(input.private_key, "signing.private_key", errors);
  let privateKeyPath: string | undefined;
  if (fromEnv !== undefined) {
    privateKeyPath = path.resolve(context.cwd, fromEnv);
  } else if (fromFile !== undefined) {
    privateKeyPath = path.resolve(context.baseDir, fromFile);
  }

  const mode = input.failure_mode ?? "open";
  if (mode !== "open" && mode !== "closed") {
    errors.push("signing.failure_mode must be 'open' or 'closed'");
  }
  const failureMode: SigningFailureMode = mode === "closed" ? "closed" : "open";

  return { privateKeyPath, failureMode };
}

function parseRetry(input: Record<string, unknown>, errors: string[]): RetryConfig {
  assertNoExtraKeys(input, RETRY_KEYS, "retry", errors);
  const maxAttempts = input.max_attempts ?? DEFAULT_RETRY_ATTEMPTS;
  if (typeof maxAttempts !== "number" || !Number.isInteger(maxAttempts) || maxAttempts < 1) {
    errors.push("retry.max_attempts must be a positive integer");
    return { maxAttempts: DEFAULT_RETRY_ATTEMPTS };
  }
  return { maxAttempts };
}

async function readConfigFile(
  configPath: string,
  required: boolean,
): Promise<string | undefined> {
  try {
    return await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (!required && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

function section(
  value: unknown,
  name: string,
  errors: string[],
): Record<string, unknown> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    errors.push(`${name} must be an object`);
    return {};
  }
  return value;
}

function optionalString(
  value: unknown,
  name: string,
  errors: string[],
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    errors.push(`${name} must be a string`);
    return undefined;
  }
  return nonEmpty(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: Set<string>,
  name: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${name} has unknown key '${key}'`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
