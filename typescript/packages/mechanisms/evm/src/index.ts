// Engine
export { AuthorizationEngine } from "./engine";
export type {
  AuthorizationEngineOptions,
  AuthorizationEngineDependencies,
  ApprovalHook,
  AuthorizationUsedHook,
  AuthorizationCanceledHook,
  AuthorizationFailureHook,
} from "./engine";

// Managers
export { PermitManager } from "./permit";
export { TransferAuthorizationManager } from "./authorization";
export { requireValidSignature } from "./context";
export type { AuthorizationContext } from "./context";

// Domain and hashing
export { DomainSeparatorProvider, hashAuthorizationDomain, staticNetworkIdentity } from "./domain";
export {
  StructuredHashBuilder,
  toTypedDataDigest,
  hashPermitStruct,
  hashTransferAuthorizationStruct,
  hashReceiveAuthorizationStruct,
  hashCancelAuthorizationStruct,
} from "./hash";
export {
  buildPermitTypedData,
  buildTransferAuthorizationTypedData,
  buildReceiveAuthorizationTypedData,
  buildCancelAuthorizationTypedData,
} from "./typedData";

// Signatures
export { SignatureVerifier, isValidMagicResponse, rawKeyAccountResolver } from "./verifier";
export type { SignatureVerifierOptions } from "./verifier";
export { recoverRawSigner } from "./ecdsa";
export type { RecoverOptions } from "./ecdsa";
export { createPublicClientAccountResolver } from "./resolver";
export type { EvmCodeReader } from "./resolver";

// Config
export {
  EngineConfigSchema,
  EngineEnvSchema,
  parseEngineConfig,
  loadEngineConfigFromEnv,
  getConfigChainId,
} from "./config";
export type { EngineConfig, EngineConfigInput } from "./config";

export * from "./constants";
export * from "./types";
export { getEvmChainId, createNonce, toSignatureBytes } from "./utils";
