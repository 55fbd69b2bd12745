import crypto, { type KeyObject } from "node:crypto";
import type { DeploymentRootProvider } from "../client/root-url.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { BuildStatus } from "../status/types.js";
import {
  BASE_URL_HEADER,
  SIGNATURE_ALGORITHM_HEADER,
  SIGNATURE_HEADER,
  type KeyProvider,
  type SignatureEnvelope,
  type SigningFailureMode,
} from "./types.js";

const HASH_ALGORITHM = "SHA256";

// Algorithm ids as the receiving server names them, mapped to Node digests.
const SUPPORTED_ALGORITHMS = new Map<string, string>([
  ["SHA256withRSA", "sha256"],
]);

export class StatusSigningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StatusSigningError";
  }
}

export interface StatusSignerOptions {
  readonly keyProvider: KeyProvider;
  readonly rootProvider: DeploymentRootProvider;
  readonly failureMode?: SigningFailureMode;
  readonly logger?: Logger;
}

/**
 * Produces the request headers that let the server verify a build status
 * came from this instance.
 *
 * In the default "open" failure mode a signing problem never stops the post:
 * the headers then carry only the root URL and the server sees an unsigned
 * request.
 */
export class StatusSigner {
  private readonly keyProvider: KeyProvider;
  private readonly rootProvider: DeploymentRootProvider;
  private readonly failureMode: SigningFailureMode;
  private readonly logger: Logger;

  constructor(options: StatusSignerOptions) {
    this.keyProvider = options.keyProvider;
    this.rootProvider = options.rootProvider;
    this.failureMode = options.failureMode ?? "open";
    this.logger = options.logger ?? noopLogger;
  }

  async computeHeaders(status: BuildStatus): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      [BASE_URL_HEADER]: this.rootProvider.getRoot(),
    };

    let envelope: SignatureEnvelope;
    try {
      const key = await this.keyProvider.getPrivate();
      envelope = signStatus(status, key);
    } catch (error) {
      if (this.failureMode === "closed") {
        throw error instanceof StatusSigningError
          ? error
          : new StatusSigningError(`Unable to sign build status: ${describe(error)}`, {
              cause: error,
            });
      }
      this.logger.warn("Error signing build status, continuing without signature", {
        key: status.key,
        error: describe(error),
      });
      return headers;
    }

    headers[SIGNATURE_HEADER] = envelope.signature;
    headers[SIGNATURE_ALGORITHM_HEADER] = envelope.algorithm;
    return headers;
  }
}

/**
 * Algorithm id for a key, such as `SHA256withRSA`.
 */
export function signatureAlgorithmFor(key: KeyObject): string {
  if (!key.asymmetricKeyType) {
    throw new StatusSigningError("Signing key is not an asymmetric key");
  }
  return `${HASH_ALGORITHM}with${key.asymmetricKeyType.toUpperCase()}`;
}

export function isSupportedAlgorithm(algorithm: string): boolean {
  return SUPPORTED_ALGORITHMS.has(algorithm);
}

export function digestFor(algorithm: string): string {
  const digest = SUPPORTED_ALGORITHMS.get(algorithm);
  if (!digest) {
    throw new StatusSigningError(`Unsupported signature algorithm: ${algorithm}`);
  }
  return digest;
}

/**
 * The signed fields in order: key, ref (only when present), state, url.
 * Their UTF-8 bytes are concatenated with no separator.
 */
export function canonicalStatusBytes(status: BuildStatus): Buffer {
  const parts = [status.key];
  if (status.ref !== undefined) {
    parts.push(status.ref);
  }
  parts.push(status.state, status.url);
  return Buffer.concat(parts.map((part) => Buffer.from(part, "utf8")));
}

export function signStatus(status: BuildStatus, key: KeyObject): SignatureEnvelope {
  if (key.type !== "private") {
    throw new StatusSigningError(`Expected a private key, got a ${key.type} key`);
  }
  const algorithm = signatureAlgorithmFor(key);
  const digest = digestFor(algorithm);

  let signature: Buffer;
  try {
    const signer = crypto.createSign(digest);
    signer.update(canonicalStatusBytes(status));
    signer.end();
    signature = signer.sign(key);
  } catch (error) {
    throw new StatusSigningError(`Signing with ${algorithm} failed: ${describe(error)}`, {
      cause: error,
    });
  }

  return { signature: signature.toString("base64"), algorithm };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
