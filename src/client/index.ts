export { InvalidArgumentError } from "./errors.js";
export { StaticRootProvider } from "./root-url.js";
export type { DeploymentRootProvider } from "./root-url.js";
export {
  BuildStatusPoster,
  createBuildStatusPoster,
  keyProviderFromConfig,
  rootProviderFromConfig,
} from "./status-poster.js";
export type { BuildStatusPosterOptions, CreatePosterOptions } from "./status-poster.js";
