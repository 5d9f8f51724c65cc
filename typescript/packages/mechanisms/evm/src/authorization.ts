import {
  AUTHORIZATION_ERROR_CODES,
  AuthorizationError,
  InMemoryAuthorizationStateStore,
  KeyedLock,
  replayKey,
  sameAddress,
  type Address,
  type AuthorizationCanceledEvent,
  type AuthorizationStateStore,
  type AuthorizationUsedEvent,
  type Hex,
} from "@permitkit/core";
import { requireValidSignature, type AuthorizationContext } from "./context";
import type {
  CancelAuthorizationRequest,
  ReceiveAuthorizationRequest,
  TransferAuthorizationMessage,
  TransferAuthorizationRequest,
} from "./types";
import { assertAddress, assertBytes32, assertUint256 } from "./utils";

type AuthorizationKind = "transfer" | "receive";

/**
 * EIP-3009 transfer, receive and cancel authorizations with client-chosen
 * random nonces.
 *
 * Each (authorizer, nonce) pair moves from unused to used exactly once. Nonces
 * carry no ordering, so a signer can hand out many authorizations at once and
 * have them redeemed in any order.
 */
export class TransferAuthorizationManager {
  private readonly locks = new KeyedLock();

  /**
   * Creates a TransferAuthorizationManager.
   *
   * @param context - Hashing, verification, ledger and clock
   * @param states - Used (authorizer, nonce) pairs, empty by default
   */
  constructor(
    private readonly context: AuthorizationContext,
    private readonly states: AuthorizationStateStore = new InMemoryAuthorizationStateStore(),
  ) {}

  /**
   * Whether an authorization nonce has been used or canceled.
   *
   * @param authorizer - The signer
   * @param nonce - The 32-byte nonce
   * @returns true once the pair is used
   */
  authorizationState(authorizer: Address, nonce: Hex): boolean {
    assertAddress(authorizer, "authorizer");
    assertBytes32(nonce, "nonce");
    return this.states.isUsed(authorizer, nonce);
  }

  /**
   * Executes a signed transfer. Anyone may submit it.
   *
   * @param request - The signed authorization
   * @returns The consumed (authorizer, nonce)
   * @throws AuthorizationError NOT_YET_VALID, EXPIRED_AUTHORIZATION, ALREADY_USED_OR_CANCELED or INVALID_SIGNATURE
   */
  async transferWithAuthorization(
    request: TransferAuthorizationRequest,
  ): Promise<AuthorizationUsedEvent> {
    return this.consume("transfer", request);
  }

  /**
   * Executes a signed transfer submitted by its payee.
   *
   * Only `to` may submit, so an observer of the signed message cannot settle
   * it ahead of the payee.
   *
   * @param caller - Identity submitting the authorization
   * @param request - The signed authorization
   * @returns The consumed (authorizer, nonce)
   * @throws AuthorizationError UNAUTHORIZED_CALLER, plus everything transferWithAuthorization throws
   */
  async receiveWithAuthorization(
    caller: Address,
    request: ReceiveAuthorizationRequest,
  ): Promise<AuthorizationUsedEvent> {
    assertAddress(caller, "caller");
    assertAddress(request.to, "to");
    if (!sameAddress(caller, request.to)) {
      throw new AuthorizationError(
        AUTHORIZATION_ERROR_CODES.UNAUTHORIZED_CALLER,
        `Caller ${caller} is not the payee ${request.to}`,
      );
    }
    return this.consume("receive", request);
  }

  /**
   * Retires an unused nonce without moving funds.
   *
   * @param request - Authorizer, nonce and the authorizer's signature
   * @returns The canceled (authorizer, nonce)
   * @throws AuthorizationError ALREADY_USED_OR_CANCELED or INVALID_SIGNATURE
   */
  async cancelAuthorization(
    request: CancelAuthorizationRequest,
  ): Promise<AuthorizationCanceledEvent> {
    const { authorizer, nonce } = request;
    assertAddress(authorizer, "authorizer");
    assertBytes32(nonce, "nonce");

    return this.exclusive(authorizer, nonce, async () => {
      this.assertUnused(authorizer, nonce);

      const digest = this.context.hasher.cancelAuthorizationDigest({ authorizer, nonce });
      await requireValidSignature(this.context, authorizer, digest, request.signature);

      this.states.markUsed(authorizer, nonce);
      return { authorizer, nonce };
    });
  }

  private async consume(
    kind: AuthorizationKind,
    request: TransferAuthorizationRequest,
  ): Promise<AuthorizationUsedEvent> {
    const { from, to, value, validAfter, validBefore, nonce } = request;
    assertAddress(from, "from");
    assertAddress(to, "to");
    assertUint256(value, "value");
    assertUint256(validAfter, "validAfter");
    assertUint256(validBefore, "validBefore");
    assertBytes32(nonce, "nonce");

    this.assertWithinWindow(validAfter, validBefore);

    return this.exclusive(from, nonce, async () => {
      // Re-read after waiting behind an earlier holder of the same nonce.
      this.assertWithinWindow(validAfter, validBefore);
      this.assertUnused(from, nonce);

      const message: TransferAuthorizationMessage = { from, to, value, validAfter, validBefore, nonce };
      const digest =
        kind === "transfer"
          ? this.context.hasher.transferAuthorizationDigest(message)
          : this.context.hasher.receiveAuthorizationDigest(message);
      await requireValidSignature(this.context, from, digest, request.signature);

      await this.context.ledger.transfer(from, to, value);
      this.states.markUsed(from, nonce);

      return { authorizer: from, nonce };
    });
  }

  private assertWithinWindow(validAfter: bigint, validBefore: bigint): void {
    const now = this.context.clock.now();
    if (now <= validAfter) {
      throw new AuthorizationError(
        AUTHORIZATION_ERROR_CODES.NOT_YET_VALID,
        `Authorization is not valid until after ${validAfter}`,
      );
    }
    if (now >= validBefore) {
      throw new AuthorizationError(
        AUTHORIZATION_ERROR_CODES.EXPIRED_AUTHORIZATION,
        `Authorization expired at ${validBefore}`,
      );
    }
  }

  private assertUnused(authorizer: Address, nonce: Hex): void {
    if (this.states.isUsed(authorizer, nonce)) {
      throw this.usedOrCanceled(authorizer, nonce);
    }
  }

  /**
   * Runs an operation holding the (authorizer, nonce) lock. Concurrent
   * submissions queue behind the holder; a call re-entered from inside the
   * holder's own signature check is rejected.
   *
   * @param authorizer - The signer
   * @param nonce - The 32-byte nonce
   * @param action - The operation
   * @returns The operation's result
   */
  private exclusive<T>(authorizer: Address, nonce: Hex, action: () => Promise<T>): Promise<T> {
    const key = replayKey(authorizer, nonce);
    if (this.locks.isHeldByCaller(key)) {
      return Promise.reject(this.usedOrCanceled(authorizer, nonce));
    }
    return this.locks.runExclusive(key, action);
  }

  private usedOrCanceled(authorizer: Address, nonce: Hex): AuthorizationError {
    return new AuthorizationError(
      AUTHORIZATION_ERROR_CODES.ALREADY_USED_OR_CANCELED,
      `Authorization ${nonce} of ${authorizer} is used or canceled`,
    );
  }
}
