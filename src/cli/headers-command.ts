import { keyProviderFromConfig, rootProviderFromConfig } from "../client/status-poster.js";
import { loadConfig } from "../config/config-loader.js";
import type { Logger } from "../logging/logger.js";
import { StatusSigner } from "../trust/signer.js";
import { builderFromOptions, type StatusOptions } from "./status-options.js";

export interface HeadersOptions extends StatusOptions {
  readonly config?: string;
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Computes the headers a post of this status would carry, without sending
 * anything.
 */
export async function runHeadersCommand(
  options: HeadersOptions,
  logger: Logger,
): Promise<Record<string, string>> {
  const config = await loadConfig({
    configPath: options.config,
    cwd: options.cwd,
    env: options.env,
  });

  const builder = builderFromOptions(options);
  if (!config.supportsCancelledState) {
    builder.noCancelledState();
  }

  const signer = new StatusSigner({
    keyProvider: keyProviderFromConfig(config),
    rootProvider: rootProviderFromConfig(config),
    failureMode: config.signing.failureMode,
    logger,
  });
  return await signer.computeHeaders(builder.build());
}
