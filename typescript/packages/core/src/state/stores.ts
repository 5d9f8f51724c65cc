import type { Address, Hex } from "../types";
import { normalizeAddress, replayKey } from "../utils";

/**
 * Per-owner sequential permit counters.
 */
export interface PermitNonceStore {
  /** Current counter for the owner; 0 for an owner never seen */
  current(owner: Address): bigint;
  /**
   * Moves the owner's counter from `expected` to `expected + 1`.
   * Throws if the counter is not at `expected`.
   */
  advance(owner: Address, expected: bigint): bigint;
}

/**
 * Used/unused state of (signer, random nonce) pairs. There is no way back to unused.
 */
export interface AuthorizationStateStore {
  isUsed(signer: Address, nonce: Hex): boolean;
  /** Throws if the pair is already used */
  markUsed(signer: Address, nonce: Hex): void;
}

/**
 * Map-backed permit counter store.
 */
export class InMemoryPermitNonceStore implements PermitNonceStore {
  private readonly counters = new Map<string, bigint>();

  /**
   * Reads the owner's counter.
   *
   * @param owner - The permit owner
   * @returns The next nonce the owner must sign
   */
  current(owner: Address): bigint {
    return this.counters.get(normalizeAddress(owner)) ?? 0n;
  }

  /**
   * Advances the owner's counter by exactly one.
   *
   * @param owner - The permit owner
   * @param expected - The value the counter must currently hold
   * @returns The new counter value
   */
  advance(owner: Address, expected: bigint): bigint {
    const current = this.current(owner);
    if (current !== expected) {
      throw new Error(`Permit nonce for ${owner} is ${current}, expected ${expected}`);
    }
    const next = current + 1n;
    this.counters.set(normalizeAddress(owner), next);
    return next;
  }
}

/**
 * Set-backed authorization state store.
 */
export class InMemoryAuthorizationStateStore implements AuthorizationStateStore {
  private readonly used = new Set<string>();

  /**
   * Checks whether a (signer, nonce) pair has been consumed.
   *
   * @param signer - The authorizer
   * @param nonce - The 32-byte nonce
   * @returns true once the pair is used or canceled
   */
  isUsed(signer: Address, nonce: Hex): boolean {
    return this.used.has(replayKey(signer, nonce));
  }

  /**
   * Marks a (signer, nonce) pair as used.
   *
   * @param signer - The authorizer
   * @param nonce - The 32-byte nonce
   */
  markUsed(signer: Address, nonce: Hex): void {
    const key = replayKey(signer, nonce);
    if (this.used.has(key)) {
      throw new Error(`Authorization ${nonce} of ${signer} is already used`);
    }
    this.used.add(key);
  }
}
