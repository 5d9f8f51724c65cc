/**
 * Type definitions for signed payloads
 */

import type { Address, Hex } from "@permitkit/core";
import type {
  CancelAuthorizationRequest,
  PermitRequest,
  ReceiveAuthorizationRequest,
  TransferAuthorizationRequest,
} from "@permitkit/evm";
import type { PRIMARY_TYPES } from "./constants";

export type PrimaryType = (typeof PRIMARY_TYPES)[number];

/**
 * Fields common to every signed payload. Integers travel as decimal strings.
 */
export interface SignedPayloadEnvelope {
  version: "1";
  primaryType: PrimaryType;
}

export interface PermitPayload extends SignedPayloadEnvelope {
  primaryType: "Permit";
  message: {
    owner: Address;
    spender: Address;
    value: string;
    deadline: string;
  };
  /** Owner's signature over the permit at its current nonce */
  signature: Hex;
}

export interface TransferAuthorizationMessagePayload {
  from: Address;
  to: Address;
  value: string;
  validAfter: string;
  validBefore: string;
  nonce: Hex;
}

export interface TransferAuthorizationPayload extends SignedPayloadEnvelope {
  primaryType: "TransferWithAuthorization";
  message: TransferAuthorizationMessagePayload;
  signature: Hex;
}

export interface ReceiveAuthorizationPayload extends SignedPayloadEnvelope {
  primaryType: "ReceiveWithAuthorization";
  message: TransferAuthorizationMessagePayload;
  signature: Hex;
}

export interface CancelAuthorizationPayload extends SignedPayloadEnvelope {
  primaryType: "CancelAuthorization";
  message: {
    authorizer: Address;
    nonce: Hex;
  };
  signature: Hex;
}

export type SignedPayload =
  | PermitPayload
  | TransferAuthorizationPayload
  | ReceiveAuthorizationPayload
  | CancelAuthorizationPayload;

/**
 * A signed payload converted to the request an engine operation takes.
 */
export type ParsedSignedPayload =
  | { primaryType: "Permit"; request: PermitRequest }
  | { primaryType: "TransferWithAuthorization"; request: TransferAuthorizationRequest }
  | { primaryType: "ReceiveWithAuthorization"; request: ReceiveAuthorizationRequest }
  | { primaryType: "CancelAuthorization"; request: CancelAuthorizationRequest };
