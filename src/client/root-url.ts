import { InvalidArgumentError } from "./errors.js";

/** Supplies the externally reachable root URL of the CI instance. */
export interface DeploymentRootProvider {
  getRoot(): string;
}

export class StaticRootProvider implements DeploymentRootProvider {
  private readonly root: string;

  constructor(root: string) {
    this.root = parseRootUrl(root);
  }

  getRoot(): string {
    return this.root;
  }
}

function parseRootUrl(value: string): string {
  const root = value.trim();
  let url: URL;
  try {
    url = new URL(root);
  } catch {
    throw new InvalidArgumentError("rootUrl", `is not an absolute URL: ${value}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidArgumentError("rootUrl", `must use http or https: ${value}`);
  }
  return root;
}
