import type { Address, LedgerPort } from "../types";
import { normalizeAddress } from "../utils";

export const LEDGER_ERROR_REASONS = {
  INSUFFICIENT_BALANCE: "insufficient_balance",
  INVALID_AMOUNT: "invalid_amount",
} as const;

export type LedgerErrorReason = (typeof LEDGER_ERROR_REASONS)[keyof typeof LEDGER_ERROR_REASONS];

/**
 * Rejected ledger mutation. The ledger is unchanged.
 */
export class LedgerError extends Error {
  /**
   * Creates a LedgerError.
   *
   * @param reason - Machine-readable reason
   * @param message - Human-readable description
   */
  constructor(
    readonly reason: LedgerErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

/**
 * Reference ledger holding balances and allowances in memory.
 *
 * Used by the end-to-end scenarios and handy for simulations; production
 * deployments plug their own storage in through {@link LedgerPort}.
 */
export class InMemoryLedger implements LedgerPort {
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();

  /**
   * Credits new units to an account.
   *
   * @param to - Account to credit
   * @param value - Amount to mint
   */
  mint(to: Address, value: bigint): void {
    if (value < 0n) {
      throw new LedgerError(LEDGER_ERROR_REASONS.INVALID_AMOUNT, `Cannot mint ${value}`);
    }
    this.balances.set(normalizeAddress(to), this.balanceOf(to) + value);
  }

  /**
   * Moves units between accounts.
   *
   * @param from - Debited account
   * @param to - Credited account
   * @param value - Amount to move
   */
  transfer(from: Address, to: Address, value: bigint): void {
    if (value < 0n) {
      throw new LedgerError(LEDGER_ERROR_REASONS.INVALID_AMOUNT, `Cannot transfer ${value}`);
    }
    const fromBalance = this.balanceOf(from);
    if (fromBalance < value) {
      throw new LedgerError(
        LEDGER_ERROR_REASONS.INSUFFICIENT_BALANCE,
        `Balance of ${from} is ${fromBalance}, cannot transfer ${value}`,
      );
    }
    this.balances.set(normalizeAddress(from), fromBalance - value);
    this.balances.set(normalizeAddress(to), this.balanceOf(to) + value);
  }

  /**
   * Replaces the allowance of a spender over an owner's balance.
   *
   * @param owner - Account whose balance may be spent
   * @param spender - Account allowed to spend
   * @param value - New allowance
   */
  approve(owner: Address, spender: Address, value: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), value);
  }

  /**
   * Reads an account balance.
   *
   * @param account - The account
   * @returns The balance, 0 for unknown accounts
   */
  balanceOf(account: Address): bigint {
    return this.balances.get(normalizeAddress(account)) ?? 0n;
  }

  /**
   * Reads an allowance.
   *
   * @param owner - Account whose balance may be spent
   * @param spender - Account allowed to spend
   * @returns The allowance, 0 if never set
   */
  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${normalizeAddress(owner)}:${normalizeAddress(spender)}`;
}
