export {
  BuildStatusBuilder,
  InvalidBuildStatusError,
  isBuildState,
  parseBuildState,
} from "./builder.js";
export { BuildState } from "./types.js";
export type { BuildStatus, TestResults } from "./types.js";
