import { BuildState, type BuildStatus, type TestResults } from "./types.js";

const BUILD_STATES = new Set<string>([
  BuildState.Successful,
  BuildState.Failed,
  BuildState.InProgress,
  BuildState.Cancelled,
]);

export class InvalidBuildStatusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidBuildStatusError";
  }
}

export function isBuildState(value: string): value is BuildState {
  return BUILD_STATES.has(value);
}

export function parseBuildState(value: string): BuildState {
  const normalized = value.trim().toUpperCase();
  if (isBuildState(normalized)) {
    return normalized;
  }
  throw new InvalidBuildStatusError(
    `Unsupported build state: ${value} (expected one of ${[...BUILD_STATES].join(", ")})`,
  );
}

/**
 * Collects the fields of a build status until {@link build} freezes them.
 */
export class BuildStatusBuilder {
  private key: string;
  private state: BuildState;
  private url: string;
  private ref?: string;
  private name?: string;
  private description?: string;
  private buildNumber?: string;
  private duration?: number;
  private parent?: string;
  private testResults?: TestResults;
  private cancelledSupported = true;

  constructor(key: string, state: BuildState, url: string) {
    this.key = key;
    this.state = state;
    this.url = url;
  }

  setState(state: BuildState): this {
    this.state = state;
    return this;
  }

  setRef(ref: string | undefined): this {
    this.ref = ref;
    return this;
  }

  setName(name: string | undefined): this {
    this.name = name;
    return this;
  }

  setDescription(description: string | undefined): this {
    this.description = description;
    return this;
  }

  setBuildNumber(buildNumber: string | undefined): this {
    this.buildNumber = buildNumber;
    return this;
  }

  setDuration(duration: number | undefined): this {
    this.duration = duration;
    return this;
  }

  setParent(parent: string | undefined): this {
    this.parent = parent;
    return this;
  }

  setTestResults(testResults: TestResults | undefined): this {
    this.testResults = testResults;
    return this;
  }

  /**
   * For servers that predate the cancelled state: a cancelled build is then
   * reported as failed.
   */
  noCancelledState(): this {
    this.cancelledSupported = false;
    return this;
  }

  build(): BuildStatus {
    const errors: string[] = [];
    const key = requireText(this.key, "key", errors);
    const url = requireText(this.url, "url", errors);
    if (!isBuildState(this.state)) {
      errors.push(`state '${String(this.state)}' is not a build state`);
    }
    if (
      this.duration !== undefined &&
      (!Number.isInteger(this.duration) || this.duration < 0)
    ) {
      errors.push("duration must be a non-negative integer");
    }
    if (this.testResults) {
      for (const [name, count] of Object.entries(this.testResults)) {
        if (!Number.isInteger(count) || count < 0) {
          errors.push(`testResults.${name} must be a non-negative integer`);
        }
      }
    }
    if (errors.length > 0) {
      throw new InvalidBuildStatusError(
        `Invalid build status: ${errors.join("; ")}`,
      );
    }

    const state =
      !this.cancelledSupported && this.state === BuildState.Cancelled
        ? BuildState.Failed
        : this.state;

    const status: {
      -readonly [K in keyof BuildStatus]: BuildStatus[K];
    } = { key, state, url };
    assignOptional(status, "ref", this.ref);
    assignOptional(status, "name", this.name);
    assignOptional(status, "description", this.description);
    assignOptional(status, "buildNumber", this.buildNumber);
    assignOptional(status, "parent", this.parent);
    if (this.duration !== undefined) {
      status.duration = this.duration;
    }
    if (this.testResults) {
      status.testResults = Object.freeze({ ...this.testResults });
    }
    return Object.freeze(status);
  }
}

function requireText(value: string, field: string, errors: string[]): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    errors.push(`${field} must not be blank`);
    return "";
  }
  return value;
}

type OptionalTextField = "ref" | "name" | "description" | "buildNumber" | "parent";

function assignOptional(
  target: { [K in OptionalTextField]?: string },
  field: OptionalTextField,
  value: string | undefined,
): void {
  if (value !== undefined && value.length > 0) {
    target[field] = value;
  }
}
