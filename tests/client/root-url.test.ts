import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../../src/client/errors.js";
import { StaticRootProvider } from "../../src/client/root-url.js";

describe("static root provider", () => {
  it("returns the configured root as given, trimmed", () => {
    expect(new StaticRootProvider(" https://ci.example.com ").getRoot()).toBe(
      "https://ci.example.com",
    );
    expect(new StaticRootProvider("https://CI.example.com/jenkins").getRoot()).toBe(
      "https://CI.example.com/jenkins",
    );
  });

  it("rejects relative and non-http urls", () => {
    expect(() => new StaticRootProvider("ci.example.com")).toThrow(InvalidArgumentError);
    expect(() => new StaticRootProvider("ftp://ci.example.com")).toThrow(
      "rootUrl must use http or https: ftp://ci.example.com",
    );
  });
});
