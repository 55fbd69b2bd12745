export const enum BuildState {
  Successful = "SUCCESSFUL",
  Failed = "FAILED",
  InProgress = "INPROGRESS",
  Cancelled = "CANCELLED",
}

export interface TestResults {
  readonly successful: number;
  readonly failed: number;
  readonly skipped: number;
}

/**
 * A finalized build status as sent to the server. Optional fields are absent
 * (not null) when unset, so they drop out of the JSON body.
 */
export interface BuildStatus {
  readonly key: string;
  readonly state: BuildState;
  readonly url: string;
  readonly ref?: string;
  readonly name?: string;
  readonly description?: string;
  readonly buildNumber?: string;
  readonly duration?: number;
  readonly parent?: string;
  readonly testResults?: TestResults;
}
