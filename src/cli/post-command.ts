import { createBuildStatusPoster } from "../client/status-poster.js";
import { loadConfig } from "../config/config-loader.js";
import { resolveBranchRef, resolveRevision } from "../git/revision.js";
import type { RequestExecutor } from "../http/types.js";
import type { Logger } from "../logging/logger.js";
import type { BuildStatus } from "../status/types.js";
import { builderFromOptions, type StatusOptions } from "./status-options.js";

export interface PostOptions extends StatusOptions {
  readonly project: string;
  readonly repo: string;
  /**
   * Defaults to HEAD of the working directory, in which case `ref` also
   * defaults to the checked-out branch.
   */
  readonly revision?: string;
  readonly config?: string;
  readonly dryRun?: boolean;
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

export interface PostContext {
  readonly logger: Logger;
  readonly executor?: RequestExecutor;
}

export async function runPostCommand(
  options: PostOptions,
  context: PostContext,
): Promise<BuildStatus> {
  const config = await loadConfig({
    configPath: options.config,
    cwd: options.cwd,
    env: options.env,
  });
  const revisionSha = options.revision ?? (await resolveRevision(options.cwd));
  const ref =
    options.ref ?? (options.revision === undefined ? await resolveBranchRef(options.cwd) : undefined);

  const poster = createBuildStatusPoster(config, {
    projectKey: options.project,
    repoSlug: options.repo,
    revisionSha,
    logger: context.logger,
    dryRun: options.dryRun,
    executor: context.executor,
  });

  const posted: BuildStatus[] = [];
  await poster.post(builderFromOptions({ ...options, ref }), (status) => {
    posted.push(status);
    context.logger.debug("Posting build status", {
      url: poster.buildStatusUrl().toString(),
      status,
    });
  });

  const [status] = posted;
  if (!status) {
    throw new Error("Build status was not finalized");
  }
  context.logger.info(`Posted ${status.state} for ${status.key} on ${revisionSha}`);
  return status;
}
