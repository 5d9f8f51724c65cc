import type { AuthorizationErrorCode } from "../errors";
import type { Address, Hex } from "./index";

export type AuthorizationOperation =
  | "permit"
  | "transferWithAuthorization"
  | "receiveWithAuthorization"
  | "cancelAuthorization";

/**
 * Emitted after a permit has set `allowance(owner, spender) = value`.
 */
export type ApprovalEvent = {
  owner: Address;
  spender: Address;
  value: bigint;
};

/**
 * Emitted after a transfer or receive authorization consumed its nonce.
 */
export type AuthorizationUsedEvent = {
  authorizer: Address;
  nonce: Hex;
};

/**
 * Emitted after a cancel retired a nonce without a transfer.
 */
export type AuthorizationCanceledEvent = {
  authorizer: Address;
  nonce: Hex;
};

/**
 * Emitted when an operation is rejected. Nothing was committed.
 */
export type AuthorizationFailureEvent = {
  operation: AuthorizationOperation;
  /** Signer (owner, from or authorizer) named by the rejected request */
  signer: Address;
  /** Taxonomy code, absent when the failure came from the ledger */
  code?: AuthorizationErrorCode;
  error: Error;
};
