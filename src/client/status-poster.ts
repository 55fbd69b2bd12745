import type { BuildStatusConfig } from "../config/types.js";
import { DEFAULT_RETRY_ATTEMPTS } from "../config/types.js";
import { DryRunRequestExecutor } from "../http/dry-run-executor.js";
import { FetchRequestExecutor } from "../http/fetch-executor.js";
import type { RequestExecutor } from "../http/types.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { BuildStatusBuilder } from "../status/builder.js";
import type { BuildStatus } from "../status/types.js";
import { FileKeyProvider } from "../trust/key-provider.js";
import { StatusSigner } from "../trust/signer.js";
import type { KeyProvider, SigningFailureMode } from "../trust/types.js";
import { InvalidArgumentError } from "./errors.js";
import { StaticRootProvider, type DeploymentRootProvider } from "./root-url.js";

const BUILD_STATUS_VERSION = "1.0";

export interface BuildStatusPosterOptions {
  readonly executor: RequestExecutor;
  readonly projectKey: string;
  readonly repoSlug: string;
  readonly revisionSha: string;
  readonly keyProvider: KeyProvider;
  readonly rootProvider: DeploymentRootProvider;
  readonly supportsCancelledState: boolean;
  /** Attempts per post while the server answers 429. Defaults to 3. */
  readonly retryAttempts?: number;
  readonly signingFailureMode?: SigningFailureMode;
  readonly logger?: Logger;
}

/**
 * Posts signed build statuses for one commit of one repository.
 */
export class BuildStatusPoster {
  private readonly executor: RequestExecutor;
  private readonly signer: StatusSigner;
  private readonly projectKey: string;
  private readonly repoSlug: string;
  private readonly revisionSha: string;
  private readonly supportsCancelledState: boolean;
  private readonly retryAttempts: number;

  constructor(options: BuildStatusPosterOptions) {
    this.executor = requireCollaborator(options.executor, "executor");
    const keyProvider = requireCollaborator(options.keyProvider, "keyProvider");
    const rootProvider = requireCollaborator(options.rootProvider, "rootProvider");
    this.projectKey = requirePathSegment(options.projectKey, "projectKey");
    this.repoSlug = requirePathSegment(options.repoSlug, "repoSlug");
    this.revisionSha = requirePathSegment(options.revisionSha, "revisionSha");
    this.supportsCancelledState = options.supportsCancelledState;

    const retryAttempts = options.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS;
    if (!Number.isInteger(retryAttempts) || retryAttempts < 1) {
      throw new InvalidArgumentError("retryAttempts", "must be a positive integer");
    }
    this.retryAttempts = retryAttempts;

    this.signer = new StatusSigner({
      keyProvider,
      rootProvider,
      failureMode: options.signingFailureMode,
      logger: options.logger,
    });
  }

  /**
   * Finalizes the builder, hands the status to `beforePost`, then posts it
   * with signature headers. `beforePost` runs once per call, before any
   * signing or network I/O.
   */
  async post(
    statusBuilder: BuildStatusBuilder,
    beforePost: (status: BuildStatus) => void,
  ): Promise<void> {
    if (!this.supportsCancelledState) {
      statusBuilder.noCancelledState();
    }
    const status = statusBuilder.build();

    beforePost(status);

    await this.executor.makePostRequest(
      this.buildStatusUrl(),
      status,
      async (headers) => {
        const signed = await this.signer.computeHeaders(status);
        for (const [name, value] of Object.entries(signed)) {
          headers.set(name, value);
        }
      },
      { maxAttempts: this.retryAttempts },
    );
  }

  /**
   * `{base}/rest/api/1.0/projects/{projectKey}/repos/{repoSlug}/commits/{revisionSha}/builds`,
   * keeping any context path of the base URL.
   */
  buildStatusUrl(): URL {
    const url = this.executor.getBaseUrl();
    const segments = [
      "rest",
      "api",
      BUILD_STATUS_VERSION,
      "projects",
      this.projectKey,
      "repos",
      this.repoSlug,
      "commits",
      this.revisionSha,
      "builds",
    ].map((segment) => encodeURIComponent(segment));
    const basePath = url.pathname.replace(/\/+$/, "");
    url.pathname = `${basePath}/${segments.join("/")}`;
    url.search = "";
    url.hash = "";
    return url;
  }
}

export interface CreatePosterOptions {
  readonly projectKey: string;
  readonly repoSlug: string;
  readonly revisionSha: string;
  readonly logger?: Logger;
  /** Log requests instead of sending them. */
  readonly dryRun?: boolean;
  readonly keyProvider?: KeyProvider;
  readonly rootProvider?: DeploymentRootProvider;
  readonly executor?: RequestExecutor;
}

/**
 * Wires a poster from configuration: a fetch executor (or a dry-run one),
 * the configured PEM key file and the configured root URL. Any collaborator
 * passed in `options` replaces the default.
 */
export function createBuildStatusPoster(
  config: BuildStatusConfig,
  options: CreatePosterOptions,
): BuildStatusPoster {
  const logger = options.logger ?? noopLogger;
  return new BuildStatusPoster({
    executor: options.executor ?? defaultExecutor(config, logger, options.dryRun === true),
    projectKey: options.projectKey,
    repoSlug: options.repoSlug,
    revisionSha: options.revisionSha,
    keyProvider: options.keyProvider ?? keyProviderFromConfig(config),
    rootProvider: options.rootProvider ?? rootProviderFromConfig(config),
    supportsCancelledState: config.supportsCancelledState,
    retryAttempts: config.retry.maxAttempts,
    signingFailureMode: config.signing.failureMode,
    logger,
  });
}

function defaultExecutor(
  config: BuildStatusConfig,
  logger: Logger,
  dryRun: boolean,
): RequestExecutor {
  if (dryRun) {
    return new DryRunRequestExecutor(config.server.baseUrl, logger);
  }
  return new FetchRequestExecutor({
    baseUrl: config.server.baseUrl,
    credentials: config.server.credentials,
    logger,
  });
}

export function keyProviderFromConfig(config: BuildStatusConfig): KeyProvider {
  if (!config.signing.privateKeyPath) {
    throw new InvalidArgumentError("signing.private_key", "is required");
  }
  return new FileKeyProvider(config.signing.privateKeyPath);
}

export function rootProviderFromConfig(config: BuildStatusConfig): DeploymentRootProvider {
  if (!config.rootUrl) {
    throw new InvalidArgumentError("root_url", "is required");
  }
  return new StaticRootProvider(config.rootUrl);
}

function requireText(value: string | null | undefined, name: string): string {
  const stripped = typeof value === "string" ? value.trim() : "";
  if (!stripped) {
    throw new InvalidArgumentError(name);
  }
  return stripped;
}

// URL resolves "." and ".." (escaped or not) as dot segments.
function requirePathSegment(value: string | null | undefined, name: string): string {
  const segment = requireText(value, name);
  if (segment === "." || segment === "..") {
    throw new InvalidArgumentError(name, `must not be a dot segment: ${segment}`);
  }
  return segment;
}

function requireCollaborator<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(name, "is required");
  }
  return value;
}

