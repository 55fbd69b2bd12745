import crypto, { type KeyObject } from "node:crypto";
import fs from "node:fs/promises";
import type { KeyProvider } from "./types.js";

export type KeyProviderErrorCode =
  | "KEY_NOT_FOUND"
  | "KEY_READ_ERROR"
  | "INVALID_KEY_FORMAT";

export class KeyProviderError extends Error {
  constructor(
    message: string,
    public readonly code: KeyProviderErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "KeyProviderError";
  }
}

/**
 * Reads a PEM private key (PKCS#8 or PKCS#1) from disk on first use and
 * keeps the parsed key for later calls.
 */
export class FileKeyProvider implements KeyProvider {
  private cached?: Promise<KeyObject>;

  constructor(private readonly keyPath: string) {}

  getPrivate(): Promise<KeyObject> {
    if (!this.cached) {
      const pending = loadPrivateKey(this.keyPath);
      // a failed read is retried on the next call
      void pending.catch(() => {
        if (this.cached === pending) {
          this.cached = undefined;
        }
      });
      this.cached = pending;
    }
    return this.cached;
  }
}

export class StaticKeyProvider implements KeyProvider {
  private readonly key: KeyObject;

  constructor(key: KeyObject | string) {
    this.key = typeof key === "string" ? parsePrivateKey(key) : key;
    if (this.key.type !== "private") {
      throw new KeyProviderError(
        `Expected a private key, got a ${this.key.type} key`,
        "INVALID_KEY_FORMAT",
      );
    }
  }

  async getPrivate(): Promise<KeyObject> {
    return this.key;
  }
}

export async function loadPrivateKey(keyPath: string): Promise<KeyObject> {
  return parsePrivateKey(await readKeyFile(keyPath));
}

export async function loadPublicKey(keyPath: string): Promise<KeyObject> {
  return parsePublicKey(await readKeyFile(keyPath));
}

export function parsePrivateKey(pem: string): KeyObject {
  try {
    return crypto.createPrivateKey({ key: pem, format: "pem" });
  } catch (error) {
    throw new KeyProviderError("Private key is not a valid PEM key", "INVALID_KEY_FORMAT", {
      cause: error,
    });
  }
}

export function parsePublicKey(pem: string): KeyObject {
  try {
    return crypto.createPublicKey({ key: pem, format: "pem" });
  } catch (error) {
    throw new KeyProviderError("Public key is not a valid PEM key", "INVALID_KEY_FORMAT", {
      cause: error,
    });
  }
}

async function readKeyFile(keyPath: string): Promise<string> {
  let raw: string;
  try {
    raw = await fs.readFile(keyPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new KeyProviderError(`Key file not found: ${keyPath}`, "KEY_NOT_FOUND", {
        cause: error,
      });
    }
    throw new KeyProviderError(`Unable to read key file: ${keyPath}`, "KEY_READ_ERROR", {
      cause: error,
    });
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new KeyProviderError(`Key file is empty: ${keyPath}`, "INVALID_KEY_FORMAT");
  }
  return trimmed;
}
