import * as core from "@actions/core";
import * as github from "@actions/github";
import { createBuildStatusPoster } from "../src/client/status-poster.js";
import { parseConfig } from "../src/config/config-loader.js";
import { BuildStatusBuilder, parseBuildState } from "../src/status/builder.js";
import { StaticKeyProvider } from "../src/trust/key-provider.js";
import { actionLogger } from "./action-logger.js";

async function run(): Promise<void> {
  const privateKey = core.getInput("private-key", { required: true });
  core.setSecret(privateKey);
  const token = core.getInput("token");
  if (token) {
    core.setSecret(token);
  }

  const { context } = github;
  const runUrl = `${context.serverUrl}/${context.repo.owner}/${context.repo.repo}/actions/runs/${context.runId}`;

  const config = parseConfig(
    {
      server: {
        base_url: core.getInput("server-url", { required: true }),
        token: token || undefined,
      },
      signing: {
        failure_mode: core.getBooleanInput("strict-signing") ? "closed" : "open",
      },
      root_url: core.getInput("root-url") || `${context.serverUrl}/`,
      supports_cancelled_state: core.getBooleanInput("supports-cancelled-state"),
      retry: { max_attempts: Number(core.getInput("max-attempts") || "3") },
    },
    { env: {}, baseDir: process.cwd(), cwd: process.cwd() },
  );

  const poster = createBuildStatusPoster(config, {
    projectKey: core.getInput("project", { required: true }),
    repoSlug: core.getInput("repo", { required: true }),
    revisionSha: core.getInput("revision") || context.sha,
    keyProvider: new StaticKeyProvider(privateKey),
    logger: actionLogger,
  });

  const builder = new BuildStatusBuilder(
    core.getInput("key") || `${context.workflow}/${context.job}`,
    parseBuildState(core.getInput("state", { required: true })),
    core.getInput("url") || runUrl,
  )
    .setRef(context.ref || undefined)
    .setName(core.getInput("name") || context.workflow)
    .setDescription(core.getInput("description") || undefined)
    .setBuildNumber(String(context.runNumber));

  await poster.post(builder, (status) => {
    core.setOutput("state", status.state);
    core.setOutput("key", status.key);
    actionLogger.info(`Posting ${status.state} for ${status.key}`);
  });
}

run().catch((error: unknown) => {
  core.setFailed(error instanceof Error ? error.message : String(error));
});
