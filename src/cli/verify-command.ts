import { loadPublicKey } from "../trust/key-provider.js";
import type { SignatureEnvelope } from "../trust/types.js";
import { verifyEnvelope } from "../trust/verifier.js";
import { builderFromOptions, type StatusOptions } from "./status-options.js";

export interface VerifyOptions extends StatusOptions {
  readonly pub: string;
  readonly signature: string;
  readonly algorithm: string;
}

export async function runVerifyCommand(options: VerifyOptions): Promise<SignatureEnvelope> {
  const publicKey = await loadPublicKey(options.pub);
  const status = builderFromOptions(options).build();
  const result = verifyEnvelope(
    status,
    { signature: options.signature, algorithm: options.algorithm },
    publicKey,
  );

  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
