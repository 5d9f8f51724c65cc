/**
 * Typed data for wallets and EIP-712 signers (`signTypedData`, `eth_signTypedData_v4`).
 * Signing the returned object yields a signature the engine accepts.
 */

import { getAddress } from "viem";
import {
  authorizationTypes,
  cancelAuthorizationTypes,
  permitTypes,
  receiveAuthorizationTypes,
} from "./constants";
import type {
  AuthorizationDomain,
  CancelAuthorizationMessage,
  PermitMessage,
  ReceiveAuthorizationMessage,
  TransferAuthorizationMessage,
} from "./types";

function toSigningDomain(domain: AuthorizationDomain) {
  return {
    name: domain.name,
    version: domain.version,
    chainId: domain.chainId,
    verifyingContract: getAddress(domain.verifyingContract),
  };
}

/**
 * Builds EIP-2612 Permit typed data.
 *
 * @param domain - The deployment domain
 * @param message - The permit, with the owner's current nonce
 * @returns Typed data ready for signing
 */
export function buildPermitTypedData(domain: AuthorizationDomain, message: PermitMessage) {
  return {
    domain: toSigningDomain(domain),
    types: permitTypes,
    primaryType: "Permit" as const,
    message: {
      owner: getAddress(message.owner),
      spender: getAddress(message.spender),
      value: message.value,
      nonce: message.nonce,
      deadline: message.deadline,
    },
  };
}

/**
 * Builds EIP-3009 TransferWithAuthorization typed data.
 *
 * @param domain - The deployment domain
 * @param message - The authorization
 * @returns Typed data ready for signing
 */
export function buildTransferAuthorizationTypedData(
  domain: AuthorizationDomain,
  message: TransferAuthorizationMessage,
) {
  return {
    domain: toSigningDomain(domain),
    types: authorizationTypes,
    primaryType: "TransferWithAuthorization" as const,
    message: toAuthorizationMessage(message),
  };
}

/**
 * Builds EIP-3009 ReceiveWithAuthorization typed data.
 *
 * @param domain - The deployment domain
 * @param message - The authorization
 * @returns Typed data ready for signing
 */
export function buildReceiveAuthorizationTypedData(
  domain: AuthorizationDomain,
  message: ReceiveAuthorizationMessage,
) {
  return {
    domain: toSigningDomain(domain),
    types: receiveAuthorizationTypes,
    primaryType: "ReceiveWithAuthorization" as const,
    message: toAuthorizationMessage(message),
  };
}

/**
 * Builds EIP-3009 CancelAuthorization typed data.
 *
 * @param domain - The deployment domain
 * @param message - Authorizer and nonce to retire
 * @returns Typed data ready for signing
 */
export function buildCancelAuthorizationTypedData(
  domain: AuthorizationDomain,
  message: CancelAuthorizationMessage,
) {
  return {
    domain: toSigningDomain(domain),
    types: cancelAuthorizationTypes,
    primaryType: "CancelAuthorization" as const,
    message: {
      authorizer: getAddress(message.authorizer),
      nonce: message.nonce,
    },
  };
}

function toAuthorizationMessage(message: TransferAuthorizationMessage) {
  return {
    from: getAddress(message.from),
    to: getAddress(message.to),
    value: message.value,
    validAfter: message.validAfter,
    validBefore: message.validBefore,
    nonce: message.nonce,
  };
}
