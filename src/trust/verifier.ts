import crypto, { type KeyObject } from "node:crypto";
import type { BuildStatus } from "../status/types.js";
import { canonicalStatusBytes, digestFor, isSupportedAlgorithm } from "./signer.js";
import {
  SIGNATURE_ALGORITHM_HEADER,
  SIGNATURE_HEADER,
  type Result,
  type SignatureEnvelope,
} from "./types.js";

export class UnsignedStatusError extends Error {
  constructor() {
    super("Build status is unsigned");
    this.name = "UnsignedStatusError";
  }
}

export interface VerifyInput {
  readonly status: BuildStatus;
  readonly headers: Headers | Readonly<Record<string, string>>;
  readonly publicKey: KeyObject;
}

/**
 * Checks the signature headers of a build status request against the
 * sender's public key. A request without signature headers yields
 * {@link UnsignedStatusError}; it is not treated as malformed.
 */
export function verifyStatusHeaders(input: VerifyInput): Result<SignatureEnvelope> {
  const signature = readHeader(input.headers, SIGNATURE_HEADER);
  const algorithm = readHeader(input.headers, SIGNATURE_ALGORITHM_HEADER);
  if (signature === undefined && algorithm === undefined) {
    return { ok: false, error: new UnsignedStatusError() };
  }
  if (!signature || !algorithm) {
    return {
      ok: false,
      error: new Error(
        `Both ${SIGNATURE_HEADER} and ${SIGNATURE_ALGORITHM_HEADER} are required`,
      ),
    };
  }
  return verifyEnvelope(input.status, { signature, algorithm }, input.publicKey);
}

export function verifyEnvelope(
  status: BuildStatus,
  envelope: SignatureEnvelope,
  publicKey: KeyObject,
): Result<SignatureEnvelope> {
  if (!isSupportedAlgorithm(envelope.algorithm)) {
    return {
      ok: false,
      error: new Error(`Unsupported signature algorithm: ${envelope.algorithm}`),
    };
  }

  try {
    const verifier = crypto.createVerify(digestFor(envelope.algorithm));
    verifier.update(canonicalStatusBytes(status));
    verifier.end();
    const valid = verifier.verify(publicKey, Buffer.from(envelope.signature, "base64"));
    if (!valid) {
      return { ok: false, error: new Error("Signature verification failed") };
    }
    return { ok: true, value: envelope };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error : new Error("Verify failed"),
    };
  }
}

function readHeader(
  headers: Headers | Readonly<Record<string, string>>,
  name: string,
): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
}
