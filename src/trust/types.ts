import type { KeyObject } from "node:crypto";

export const BASE_URL_HEADER = "base-url";
export const SIGNATURE_HEADER = "BBS-Signature";
export const SIGNATURE_ALGORITHM_HEADER = "BBS-Signature-Algorithm";

export interface SignatureEnvelope {
  /** Base64 of the detached signature bytes. */
  readonly signature: string;
  readonly algorithm: string;
}

export type SigningFailureMode = "open" | "closed";

export interface KeyProvider {
  getPrivate(): Promise<KeyObject>;
}

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };
