export {
  ENV_PASSWORD,
  ENV_PRIVATE_KEY,
  ENV_ROOT_URL,
  ENV_SERVER_URL,
  ENV_TOKEN,
  ENV_USERNAME,
  loadConfig,
  parseConfig,
} from "./config-loader.js";
export type { LoadConfigOptions, ParseContext } from "./config-loader.js";
export { DEFAULT_CONFIG_FILE, DEFAULT_RETRY_ATTEMPTS } from "./types.js";
export type {
  BuildStatusConfig,
  RetryConfig,
  ServerConfig,
  SigningConfig,
} from "./types.js";
