import crypto, { type KeyObject } from "node:crypto";
import { beforeAll, describe, expect, it, vi } from "vitest";
import { InvalidArgumentError } from "../../src/client/errors.js";
import { StaticRootProvider } from "../../src/client/root-url.js";
import {
  BuildStatusPoster,
  createBuildStatusPoster,
  type BuildStatusPosterOptions,
} from "../../src/client/status-poster.js";
import type { BuildStatusConfig } from "../../src/config/types.js";
import { DryRunRequestExecutor } from "../../src/http/dry-run-executor.js";
import { ServerError } from "../../src/http/errors.js";
import type { RequestExecutor } from "../../src/http/types.js";
import { BuildStatusBuilder } from "../../src/status/builder.js";
import { BuildState, type BuildStatus } from "../../src/status/types.js";
import { StaticKeyProvider } from "../../src/trust/key-provider.js";
import { StatusSigningError } from "../../src/trust/signer.js";
import type { KeyProvider } from "../../src/trust/types.js";
import { verifyStatusHeaders } from "../../src/trust/verifier.js";

const BASE_URL = "https://git.example.com";
const BUILD_URL = "https://ci.example.com/job/demo/3";

let privateKey: KeyObject;
let publicKey: KeyObject;

beforeAll(() => {
  const pair = crypto.generateKeyPairSync("rsa", { modulusLength: 2048 });
  privateKey = pair.privateKey;
  publicKey = pair.publicKey;
});

const failingProvider: KeyProvider = {
  getPrivate: async () => {
    throw new Error("key store offline");
  },
};

function options(overrides: Partial<BuildStatusPosterOptions> = {}): BuildStatusPosterOptions {
  return {
    executor: new DryRunRequestExecutor(BASE_URL),
    projectKey: "PRJ",
    repoSlug: "repo1",
    revisionSha: "abc123",
    keyProvider: new StaticKeyProvider(privateKey),
    rootProvider: new StaticRootProvider("https://ci.example.com/"),
    supportsCancelledState: true,
    ...overrides,
  };
}

function builder(state: BuildState = BuildState.Successful): BuildStatusBuilder {
  return new BuildStatusBuilder("BUILD-3", state, BUILD_URL).setRef("refs/heads/main");
}

function recordingExecutor(events: string[]) {
  return {
    getBaseUrl: () => new URL(BASE_URL),
    makePostRequest: vi.fn(async () => {
      events.push("request");
    }),
  };
}

describe("build status url", () => {
  it("addresses the commit's builds resource", () => {
    const poster = new BuildStatusPoster(options());
    const url = poster.buildStatusUrl();

    expect(url.pathname).toBe("/rest/api/1.0/projects/PRJ/repos/repo1/commits/abc123/builds");
    expect(url.toString()).toBe(
      "https://git.example.com/rest/api/1.0/projects/PRJ/repos/repo1/commits/abc123/builds",
    );
  });

  it("keeps the server's context path", () => {
    const poster = new BuildStatusPoster(
      options({ executor: new DryRunRequestExecutor("https://git.example.com/bitbucket/") }),
    );

    expect(poster.buildStatusUrl().pathname).toBe(
      "/bitbucket/rest/api/1.0/projects/PRJ/repos/repo1/commits/abc123/builds",
    );
  });

  it("escapes each segment on its own", () => {
    const poster = new BuildStatusPoster(
      options({ projectKey: "~ADMIN", repoSlug: "my repo", revisionSha: "a/b?c" }),
    );

    expect(poster.buildStatusUrl().pathname).toBe(
      "/rest/api/1.0/projects/~ADMIN/repos/my%20repo/commits/a%2Fb%3Fc/builds",
    );
  });

  it("trims addressing fields", () => {
    const poster = new BuildStatusPoster(options({ projectKey: "  PRJ ", revisionSha: "abc123\n" }));

    expect(poster.buildStatusUrl().pathname).toBe(
      "/rest/api/1.0/projects/PRJ/repos/repo1/commits/abc123/builds",
    );
  });
});

describe("poster construction", () => {
  it.each([
    ["projectKey", { projectKey: "" }],
    ["repoSlug", { repoSlug: "   " }],
    ["revisionSha", { revisionSha: "\t" }],
  ] as const)("fails fast on a blank %s", (name, override) => {
    const events: string[] = [];
    const executor = recordingExecutor(events);

    expect(() => new BuildStatusPoster(options({ executor, ...override }))).toThrow(
      new InvalidArgumentError(name),
    );
    expect(() => new BuildStatusPoster(options({ executor, ...override }))).toThrow(
      `${name} must not be blank`,
    );
    expect(executor.makePostRequest).not.toHaveBeenCalled();
  });

  it.each([
    ["projectKey", { projectKey: "." }, "."],
    ["repoSlug", { repoSlug: " .. " }, ".."],
    ["revisionSha", { revisionSha: ".." }, ".."],
  ] as const)("rejects a dot segment as %s", (name, override, segment) => {
    expect(() => new BuildStatusPoster(options(override))).toThrow(
      `${name} must not be a dot segment: ${segment}`,
    );
  });

  it("keeps dotted names that are not dot segments", () => {
    const poster = new BuildStatusPoster(options({ repoSlug: "...", projectKey: ".hidden" }));

    expect(poster.buildStatusUrl().pathname).toBe(
      "/rest/api/1.0/projects/.hidden/repos/.../commits/abc123/builds",
    );
  });

  it("rejects an empty retry budget", () => {
    expect(() => new BuildStatusPoster(options({ retryAttempts: 0 }))).toThrow(
      "retryAttempts must be a positive integer",
    );
  });
});

describe("posting", () => {
  it("sends the status with signature headers and the default retry budget", async () => {
    const executor = new DryRunRequestExecutor(BASE_URL);
    const poster = new BuildStatusPoster(options({ executor }));
    const seen: BuildStatus[] = [];

    await poster.post(builder(), (status) => seen.push(status));

    expect(executor.requests).toHaveLength(1);
    const [request] = executor.requests;
    expect(request?.url).toBe(
      "https://git.example.com/rest/api/1.0/projects/PRJ/repos/repo1/commits/abc123/builds",
    );
    expect(request?.retry).toEqual({ maxAttempts: 3 });
    expect(request?.body).toBe(seen[0]);
    expect(request?.headers["base-url"]).toBe("https://ci.example.com/");
    expect(request?.headers["bbs-signature-algorithm"]).toBe("SHA256withRSA");

    const [status] = seen;
    if (!status || !request) {
      throw new Error("nothing was posted");
    }
    expect(verifyStatusHeaders({ status, headers: request.headers, publicKey }).ok).toBe(true);
  });

  it("passes a custom retry budget to the executor", async () => {
    const executor = new DryRunRequestExecutor(BASE_URL);
    const poster = new BuildStatusPoster(options({ executor, retryAttempts: 5 }));

    await poster.post(builder(), () => undefined);

    expect(executor.requests[0]?.retry).toEqual({ maxAttempts: 5 });
  });

  it("downgrades cancelled when the server lacks the state", async () => {
    const executor = new DryRunRequestExecutor(BASE_URL);
    const poster = new BuildStatusPoster(options({ executor, supportsCancelledState: false }));
    const hook = vi.fn();

    await poster.post(builder(BuildState.Cancelled), hook);

    expect(hook).toHaveBeenCalledWith(expect.objectContaining({ state: BuildState.Failed }));
    expect(executor.requests[0]?.body).toEqual(
      expect.objectContaining({ state: BuildState.Failed }),
    );
  });

  it("keeps cancelled when the server supports it", async () => {
    const executor = new DryRunRequestExecutor(BASE_URL);
    const poster = new BuildStatusPoster(options({ executor }));

    await poster.post(builder(BuildState.Cancelled), () => undefined);

    expect(executor.requests[0]?.body).toEqual(
      expect.objectContaining({ state: BuildState.Cancelled }),
    );
  });

  it("calls the hook once, before any request", async () => {
    const events: string[] = [];
    const executor = recordingExecutor(events);
    const poster = new BuildStatusPoster(options({ executor }));
    const hook = vi.fn(() => {
      events.push("hook");
    });

    await poster.post(builder(), hook);

    expect(hook).toHaveBeenCalledTimes(1);
    expect(events).toEqual(["hook", "request"]);
  });

  it("hands the hook the finalized status", async () => {
    const poster = new BuildStatusPoster(options());
    const hook = vi.fn();

    await poster.post(builder(), hook);

    const [status] = hook.mock.calls[0] ?? [];
    expect(status).toEqual({
      key: "BUILD-3",
      state: "SUCCESSFUL",
      url: BUILD_URL,
      ref: "refs/heads/main",
    });
    expect(Object.isFrozen(status)).toBe(true);
  });

  it("still posts, unsigned, when signing fails", async () => {
    const executor = new DryRunRequestExecutor(BASE_URL);
    const poster = new BuildStatusPoster(options({ executor, keyProvider: failingProvider }));
    const hook = vi.fn();

    await poster.post(builder(), hook);

    expect(hook).toHaveBeenCalledTimes(1);
    expect(executor.requests[0]?.headers).toEqual({ "base-url": "https://ci.example.com/" });
  });

  it("aborts the post when signing fails closed", async () => {
    const executor = new DryRunRequestExecutor(BASE_URL);
    const poster = new BuildStatusPoster(
      options({ executor, keyProvider: failingProvider, signingFailureMode: "closed" }),
    );
    const hook = vi.fn();

    await expect(poster.post(builder(), hook)).rejects.toThrow(StatusSigningError);
    expect(hook).toHaveBeenCalledTimes(1);
    expect(executor.requests).toHaveLength(0);
  });

  it("lets transport errors reach the caller", async () => {
    const executor: RequestExecutor = {
      getBaseUrl: () => new URL(BASE_URL),
      makePostRequest: async (url) => {
        throw new ServerError(500, url.toString(), "boom");
      },
    };
    const poster = new BuildStatusPoster(options({ executor }));

    await expect(poster.post(builder(), () => undefined)).rejects.toThrow(ServerError);
  });

  it("does not retain the builder's later changes", async () => {
    const executor = new DryRunRequestExecutor(BASE_URL);
    const poster = new BuildStatusPoster(options({ executor }));
    const statusBuilder = builder();

    await poster.post(statusBuilder, () => {
      statusBuilder.setState(BuildState.Failed);
    });

    expect(executor.requests[0]?.body).toEqual(
      expect.objectContaining({ state: BuildState.Successful }),
    );
  });
});

describe("poster factory", () => {
  const config: BuildStatusConfig = {
    server: { baseUrl: BASE_URL, credentials: { type: "anonymous" } },
    signing: { failureMode: "open" },
    rootUrl: "https://ci.example.com/",
    supportsCancelledState: false,
    retry: { maxAttempts: 4 },
  };

  it("wires the configured defaults", async () => {
    const executor = new DryRunRequestExecutor(BASE_URL);
    const poster = createBuildStatusPoster(config, {
      projectKey: "PRJ",
      repoSlug: "repo1",
      revisionSha: "abc123",
      keyProvider: new StaticKeyProvider(privateKey),
      executor,
    });

    await poster.post(builder(BuildState.Cancelled), () => undefined);

    expect(executor.requests[0]?.retry).toEqual({ maxAttempts: 4 });
    expect(executor.requests[0]?.body).toEqual(
      expect.objectContaining({ state: BuildState.Failed }),
    );
  });

  it("requires a key when none is injected", () => {
    expect(() =>
      createBuildStatusPoster(config, {
        projectKey: "PRJ",
        repoSlug: "repo1",
        revisionSha: "abc123",
      }),
    ).toThrow("signing.private_key is required");
  });

  it("requires a root url when none is injected", () => {
    expect(() =>
      createBuildStatusPoster(
        { ...config, rootUrl: undefined },
        {
          projectKey: "PRJ",
          repoSlug: "repo1",
          revisionSha: "abc123",
          keyProvider: new StaticKeyProvider(privateKey),
        },
      ),
    ).toThrow("root_url is required");
  });
});
