export {
  FileKeyProvider,
  KeyProviderError,
  StaticKeyProvider,
  loadPrivateKey,
  loadPublicKey,
  parsePrivateKey,
  parsePublicKey,
} from "./key-provider.js";
export type { KeyProviderErrorCode } from "./key-provider.js";
export {
  StatusSigner,
  StatusSigningError,
  canonicalStatusBytes,
  signStatus,
  signatureAlgorithmFor,
} from "./signer.js";
export type { StatusSignerOptions } from "./signer.js";
export { UnsignedStatusError, verifyEnvelope, verifyStatusHeaders } from "./verifier.js";
export type { VerifyInput } from "./verifier.js";
export {
  BASE_URL_HEADER,
  SIGNATURE_ALGORITHM_HEADER,
  SIGNATURE_HEADER,
} from "./types.js";
export type {
  KeyProvider,
  Result,
  SignatureEnvelope,
  SigningFailureMode,
} from "./types.js";
