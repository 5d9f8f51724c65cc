import { isHex } from "viem";
import { sameAddress, type Address, type Hex } from "@permitkit/core";
import { ERC1271_MAGIC_WORD } from "./constants";
import { recoverRawSigner } from "./ecdsa";
import type { AccountResolver } from "./types";

export type SignatureVerifierOptions = {
  /** Reject high-s ECDSA signatures from raw-key signers. Defaults to true. */
  enforceLowS?: boolean;
};

/**
 * Checks ERC-1271 return data: at least one 32-byte word, and that word is
 * `bytes32(0x1626ba7e)`.
 *
 * @param returnData - Raw return data of `isValidSignature`
 * @returns true only for the magic value
 */
export function isValidMagicResponse(returnData: Hex): boolean {
  if (!isHex(returnData, { strict: true }) || returnData.length < 2 + 64) {
    return false;
  }
  return returnData.slice(0, 2 + 64).toLowerCase() === ERC1271_MAGIC_WORD;
}

/**
 * Treats every identity as a raw key. For deployments without contract accounts.
 */
export const rawKeyAccountResolver: AccountResolver = {
  resolve: () => ({ kind: "rawKey" }),
};

/**
 * Decides whether a signature is valid for a claimed signer.
 *
 * The signer is resolved once per call into a raw key (ECDSA recovery must
 * yield the signer) or a programmable account (its ERC-1271 entry point must
 * answer the magic value). Every failure is reported as `false`.
 */
export class SignatureVerifier {
  private readonly enforceLowS: boolean;

  /**
   * Creates a SignatureVerifier.
   *
   * @param accounts - Probe for programmable accounts
   * @param options - Verification options
   */
  constructor(
    private readonly accounts: AccountResolver,
    options: SignatureVerifierOptions = {},
  ) {
    this.enforceLowS = options.enforceLowS ?? true;
  }

  /**
   * Verifies a signature over a digest.
   *
   * @param signer - The claimed signer
   * @param digest - The 32-byte EIP-712 digest
   * @param signature - Signature bytes
   * @returns true if the signer authorized the digest
   */
  async isValid(signer: Address, digest: Hex, signature: Hex): Promise<boolean> {
    const signerKind = await this.accounts.resolve(signer);

    switch (signerKind.kind) {
      case "rawKey": {
        const recovered = await recoverRawSigner(digest, signature, {
          enforceLowS: this.enforceLowS,
        });
        return recovered !== undefined && sameAddress(recovered, signer);
      }
      case "programmable": {
        try {
          const returnData = await signerKind.account.isValidSignature(digest, signature);
          return isValidMagicResponse(returnData);
        } catch {
          // a reverting account rejects the signature
          return false;
        }
      }
    }
  }
}
