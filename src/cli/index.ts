#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { createLogger, type LogLevel, type Logger } from "../logging/logger.js";
import { runHeadersCommand } from "./headers-command.js";
import { runPostCommand } from "./post-command.js";
import { parseNonNegativeInteger, type StatusOptions } from "./status-options.js";
import { runVerifyCommand } from "./verify-command.js";

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("build-status")
  .description("Post signed build statuses to a Bitbucket Server compatible API")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Only print errors");

function withStatusOptions(command: Command): Command {
  return command
    .requiredOption("--key <key>", "Build key")
    .requiredOption("--state <state>", "SUCCESSFUL | FAILED | INPROGRESS | CANCELLED")
    .requiredOption("--url <url>", "Link back to the build")
    .option("--ref <ref>", "Branch or tag ref (post on HEAD defaults to the current branch)")
    .option("--name <name>", "Display name")
    .option("--description <text>", "Description")
    .option("--build-number <number>", "Build number")
    .option("--duration <ms>", "Build duration in milliseconds")
    .option("--parent <key>", "Parent build key");
}

withStatusOptions(
  program
    .command("post")
    .description("Post a build status for a commit")
    .requiredOption("--project <key>", "Project key")
    .requiredOption("--repo <slug>", "Repository slug")
    .option("--revision <sha>", "Commit to report on (default: HEAD)"),
)
  .option("--config <path>", "Config file (default: ./.build-status.yml)")
  .option("--dry-run", "Log the signed request instead of sending it")
  .action(async (options) => {
    try {
      const status = await runPostCommand(
        {
          ...statusOptions(options),
          project: options.project,
          repo: options.repo,
          revision: options.revision,
          config: options.config,
          dryRun: Boolean(options.dryRun),
        },
        { logger: cliLogger() },
      );
      if (program.opts().verbose) {
        await writeStdout(JSON.stringify(status, null, 2) + "\n");
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

withStatusOptions(
  program.command("headers").description("Print the signing headers for a build status"),
)
  .option("--config <path>", "Config file (default: ./.build-status.yml)")
  .action(async (options) => {
    try {
      const headers = await runHeadersCommand(
        { ...statusOptions(options), config: options.config },
        cliLogger(),
      );
      await writeStdout(JSON.stringify(headers, null, 2) + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

withStatusOptions(
  program.command("verify").description("Verify a build status signature"),
)
  .requiredOption("--pub <path>", "Path to the sender's PEM public key")
  .requiredOption("--signature <base64>", "Value of the BBS-Signature header")
  .option("--algorithm <id>", "Value of the BBS-Signature-Algorithm header", "SHA256withRSA")
  .action(async (options) => {
    try {
      const envelope = await runVerifyCommand({
        ...statusOptions(options),
        pub: options.pub,
        signature: options.signature,
        algorithm: options.algorithm,
      });
      if (!program.opts().quiet) {
        await writeStdout(`Signature valid (${envelope.algorithm})\n`);
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

function statusOptions(options: Record<string, string | undefined>): StatusOptions {
  return {
    key: options.key ?? "",
    state: options.state ?? "",
    url: options.url ?? "",
    ref: options.ref,
    name: options.name,
    description: options.description,
    buildNumber: options.buildNumber,
    duration:
      options.duration === undefined
        ? undefined
        : parseNonNegativeInteger(options.duration, "--duration"),
    parent: options.parent,
  };
}

function cliLogger(): Logger {
  const globals = program.opts();
  let level: LogLevel | undefined;
  if (globals.verbose) {
    level = "debug";
  } else if (globals.quiet) {
    level = "error";
  }
  return createLogger("[build-status] ", level);
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json: unknown = JSON.parse(raw);
  if (typeof json === "object" && json !== null && "version" in json && typeof json.version === "string") {
    return json.version;
  }
  return "0.0.0";
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
