import type { Address, Hex } from "../types";

/**
 * Largest uint256 value. As a permit deadline it means "never expires".
 */
export const MAX_UINT256 = 2n ** 256n - 1n;

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;

/**
 * Checks that a value is a 20-byte 0x-prefixed hex address (any casing).
 *
 * @param value - The value to check
 * @returns true if the value is address-shaped
 */
export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Checks that a value is a 32-byte 0x-prefixed hex string.
 *
 * @param value - The value to check
 * @returns true if the value is bytes32-shaped
 */
export function isBytes32(value: unknown): value is Hex {
  return typeof value === "string" && BYTES32_PATTERN.test(value);
}

/**
 * Checks that a bigint fits in an unsigned 256-bit word.
 *
 * @param value - The value to check
 * @returns true if 0 <= value <= 2^256 - 1
 */
export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}

/**
 * Lowercases an address so that differently-checksummed spellings share one key.
 *
 * @param address - The address to normalize
 * @returns The lowercase address
 */
export function normalizeAddress(address: Address): Address {
  return `0x${address.slice(2).toLowerCase()}`;
}

/**
 * Compares two addresses case-insensitively.
 *
 * @param a - First address
 * @param b - Second address
 * @returns true if both denote the same account
 */
export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Builds the store key for a (signer, nonce) pair in the random-nonce space.
 *
 * @param signer - The authorizer address
 * @param nonce - The 32-byte nonce
 * @returns A key unique to the pair regardless of hex casing
 */
export function replayKey(signer: Address, nonce: Hex): string {
  return `${signer.toLowerCase()}:${nonce.toLowerCase()}`;
}
