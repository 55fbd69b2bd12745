import { BuildStatusBuilder, parseBuildState } from "../status/builder.js";

export interface StatusOptions {
  readonly key: string;
  readonly state: string;
  readonly url: string;
  readonly ref?: string;
  readonly name?: string;
  readonly description?: string;
  readonly buildNumber?: string;
  readonly duration?: number;
  readonly parent?: string;
}

export function builderFromOptions(options: StatusOptions): BuildStatusBuilder {
  return new BuildStatusBuilder(options.key, parseBuildState(options.state), options.url)
    .setRef(options.ref)
    .setName(options.name)
    .setDescription(options.description)
    .setBuildNumber(options.buildNumber)
    .setDuration(options.duration)
    .setParent(options.parent);
}

export function parseNonNegativeInteger(value: string, label: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new Error(`${label} must be a non-negative integer: ${value}`);
  }
  return parsed;
}
