export type Hex = `0x${string}`;
export type Address = `0x${string}`;

/**
 * Console-shaped logger accepted by the engine. Defaults to `console`.
 */
export type Logger = Pick<Console, "debug" | "warn" | "error">;

/**
 * Ledger mutators the authorization core drives on success.
 * Each call must be all-or-nothing: either the mutation lands or the call throws.
 */
export interface LedgerPort {
  transfer(from: Address, to: Address, value: bigint): void | Promise<void>;
  approve(owner: Address, spender: Address, value: bigint): void | Promise<void>;
}

/**
 * Source of the current time in unix seconds.
 */
export interface Clock {
  now(): bigint;
}

export type {
  ApprovalEvent,
  AuthorizationUsedEvent,
  AuthorizationCanceledEvent,
  AuthorizationFailureEvent,
  AuthorizationOperation,
} from "./events";
