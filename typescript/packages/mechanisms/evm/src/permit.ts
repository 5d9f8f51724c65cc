import {
  AUTHORIZATION_ERROR_CODES,
  AuthorizationError,
  InMemoryPermitNonceStore,
  MAX_UINT256,
  KeyedLock,
  normalizeAddress,
  type Address,
  type ApprovalEvent,
  type PermitNonceStore,
} from "@permitkit/core";
import { requireValidSignature, type AuthorizationContext } from "./context";
import type { PermitRequest } from "./types";
import { assertAddress, assertUint256 } from "./utils";

/**
 * EIP-2612 approvals protected by a per-owner sequential nonce.
 *
 * Each permit consumes the owner's next counter value, so an owner cannot hold
 * two independently redeemable permits for later counter values.
 */
export class PermitManager {
  private readonly locks = new KeyedLock();

  /**
   * Creates a PermitManager.
   *
   * @param context - Hashing, verification, ledger and clock
   * @param nonceStore - Per-owner counters, empty by default
   */
  constructor(
    private readonly context: AuthorizationContext,
    private readonly nonceStore: PermitNonceStore = new InMemoryPermitNonceStore(),
  ) {}

  /**
   * Next nonce the owner must sign.
   *
   * @param owner - The permit owner
   * @returns The owner's current counter
   */
  nonces(owner: Address): bigint {
    assertAddress(owner, "owner");
    return this.nonceStore.current(owner);
  }

  /**
   * Sets `allowance(owner, spender) = value` from the owner's signature.
   *
   * @param request - Owner, spender, value, deadline and signature
   * @returns The approval that was applied
   * @throws AuthorizationError EXPIRED_AUTHORIZATION, ALREADY_USED_OR_CANCELED or INVALID_SIGNATURE
   */
  async permit(request: PermitRequest): Promise<ApprovalEvent> {
    const { owner, spender, value, deadline } = request;
    assertAddress(owner, "owner");
    assertAddress(spender, "spender");
    assertUint256(value, "value");
    assertUint256(deadline, "deadline");

    this.assertNotExpired(deadline);

    // A signer callback re-entering permit() for this owner would wait on itself.
    const key = normalizeAddress(owner);
    if (this.locks.isHeldByCaller(key)) {
      throw new AuthorizationError(
        AUTHORIZATION_ERROR_CODES.ALREADY_USED_OR_CANCELED,
        `A permit for ${owner} is already being processed`,
      );
    }

    return this.locks.runExclusive(key, async () => {
      // The clock may have moved while an earlier permit held the owner.
      this.assertNotExpired(deadline);

      const nonce = this.nonceStore.current(owner);
      const digest = this.context.hasher.permitDigest({ owner, spender, value, nonce, deadline });
      await requireValidSignature(this.context, owner, digest, request.signature);

      await this.context.ledger.approve(owner, spender, value);
      this.nonceStore.advance(owner, nonce);

      return { owner, spender, value };
    });
  }

  private assertNotExpired(deadline: bigint): void {
    if (deadline !== MAX_UINT256 && deadline < this.context.clock.now()) {
      throw new AuthorizationError(
        AUTHORIZATION_ERROR_CODES.EXPIRED_AUTHORIZATION,
        `Permit expired at ${deadline}`,
      );
    }
  }
}
