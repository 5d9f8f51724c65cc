import { concat, isHex, numberToHex, toHex } from "viem";
import {
  AUTHORIZATION_ERROR_CODES,
  AuthorizationError,
  isAddressLike,
  isBytes32,
  isUint256,
  type Address,
  type Hex,
} from "@permitkit/core";
import type { SignatureLike } from "./types";

/**
 * Extract chain ID from a CAIP-2 network string (e.g., "eip155:84532" -> 84532)
 *
 * @param network - The network identifier
 * @returns The chain ID, exact at any size
 * @throws Error if the network is not an eip155 CAIP-2 identifier
 */
export function getEvmChainId(network: string): bigint {
  const [namespace, reference, ...rest] = network.split(":");
  if (namespace !== "eip155" || reference === undefined || rest.length > 0) {
    throw new Error(`Unsupported network format: ${network}`);
  }
  if (!/^\d+$/.test(reference)) {
    throw new Error(`Invalid CAIP-2 chain ID: ${reference}`);
  }
  return BigInt(reference);
}

/**
 * Create a random 32-byte nonce for authorization
 *
 * @returns A hex-encoded 32-byte nonce
 */
export function createNonce(): Hex {
  if (typeof globalThis.crypto === "undefined") {
    throw new Error("Crypto API not available");
  }

  return toHex(globalThis.crypto.getRandomValues(new Uint8Array(32)));
}

/**
 * Packs a signature into its byte form.
 *
 * @param signature - Packed hex, or `{ v, r, s }`
 * @returns The signature bytes as hex
 * @throws AuthorizationError(INVALID_SIGNATURE) if the signature is not well-formed hex
 */
export function toSignatureBytes(signature: SignatureLike): Hex {
  if (typeof signature === "string") {
    if (!isHex(signature, { strict: true }) || signature.length % 2 !== 0) {
      throw new AuthorizationError(
        AUTHORIZATION_ERROR_CODES.INVALID_SIGNATURE,
        "Signature must be an even-length hex string",
      );
    }
    return signature;
  }

  const v =
    typeof signature.v === "bigint" || Number.isInteger(signature.v) ? BigInt(signature.v) : -1n;
  if (!isBytes32(signature.r) || !isBytes32(signature.s) || v < 0n || v > 255n) {
    throw new AuthorizationError(
      AUTHORIZATION_ERROR_CODES.INVALID_SIGNATURE,
      "Split signature needs 32-byte r and s and a one-byte v",
    );
  }
  return concat([signature.r, signature.s, numberToHex(v, { size: 1 })]);
}

/**
 * Rejects a value that is not a 20-byte hex address.
 *
 * @param value - The value to check
 * @param field - Field name for the error message
 */
export function assertAddress(value: Address, field: string): void {
  if (!isAddressLike(value)) {
    throw new AuthorizationError(
      AUTHORIZATION_ERROR_CODES.INVALID_PARAMETERS,
      `${field} must be a 20-byte hex address, got ${String(value)}`,
    );
  }
}

/**
 * Rejects a value that is not a 32-byte hex string.
 *
 * @param value - The value to check
 * @param field - Field name for the error message
 */
export function assertBytes32(value: Hex, field: string): void {
  if (!isBytes32(value)) {
    throw new AuthorizationError(
      AUTHORIZATION_ERROR_CODES.INVALID_PARAMETERS,
      `${field} must be a 32-byte hex string, got ${String(value)}`,
    );
  }
}

/**
 * Rejects a value outside the uint256 range.
 *
 * @param value - The value to check
 * @param field - Field name for the error message
 */
export function assertUint256(value: bigint, field: string): void {
  if (typeof value !== "bigint" || !isUint256(value)) {
    throw new AuthorizationError(
      AUTHORIZATION_ERROR_CODES.INVALID_PARAMETERS,
      `${field} must be a uint256, got ${String(value)}`,
    );
  }
}
