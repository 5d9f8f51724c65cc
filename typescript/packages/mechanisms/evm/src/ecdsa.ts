import { hexToBigInt, hexToNumber, isHex, recoverAddress, slice } from "viem";
import type { Address, Hex } from "@permitkit/core";
import { ECDSA_SIGNATURE_LENGTH, SECP256K1_HALF_N, SECP256K1_N } from "./constants";

export type RecoverOptions = {
  /** Reject `s > n/2` (EIP-2 malleability hardening) */
  enforceLowS: boolean;
};

/**
 * Recovers the address that produced a 65-byte `r ‖ s ‖ v` signature over a digest.
 *
 * Mirrors `ecrecover`: `v` must be 27 or 28 and `r`, `s` must be in `[1, n)`.
 *
 * @param digest - The signed 32-byte digest
 * @param signature - The packed signature
 * @param options - Canonical-form checks
 * @returns The recovered address, or undefined if the signature is malformed or unrecoverable
 */
export async function recoverRawSigner(
  digest: Hex,
  signature: Hex,
  options: RecoverOptions,
): Promise<Address | undefined> {
  if (!isHex(signature, { strict: true }) || signature.length !== 2 + ECDSA_SIGNATURE_LENGTH * 2) {
    return undefined;
  }

  const r = hexToBigInt(slice(signature, 0, 32));
  const s = hexToBigInt(slice(signature, 32, 64));
  const v = hexToNumber(slice(signature, 64, 65));

  if (v !== 27 && v !== 28) {
    return undefined;
  }
  if (r === 0n || s === 0n || r >= SECP256K1_N || s >= SECP256K1_N) {
    return undefined;
  }
  if (options.enforceLowS && s > SECP256K1_HALF_N) {
    return undefined;
  }

  try {
    return await recoverAddress({ hash: digest, signature });
  } catch {
    // r is not the x-coordinate of a curve point
    return undefined;
  }
}
