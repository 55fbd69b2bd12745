import * as core from "@actions/core";
import type { Logger } from "../src/logging/logger.js";

function format(message: string, data?: Record<string, unknown>): string {
  return data && Object.keys(data).length > 0
    ? `${message} ${JSON.stringify(data)}`
    : message;
}

export const actionLogger: Logger = {
  debug: (message, data) => core.debug(format(message, data)),
  info: (message, data) => core.info(format(message, data)),
  warn: (message, data) => core.warning(format(message, data)),
  error: (message, data) => core.error(format(message, data)),
};
