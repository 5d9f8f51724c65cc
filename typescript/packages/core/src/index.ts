export * from "./types";
export * from "./errors";
export * from "./utils";
export * from "./clock";
export type { PermitNonceStore, AuthorizationStateStore } from "./state/stores";
export { InMemoryPermitNonceStore, InMemoryAuthorizationStateStore } from "./state/stores";
export { KeyedLock } from "./state/locks";
export type { LedgerErrorReason } from "./ledger/inMemoryLedger";
export { InMemoryLedger, LedgerError, LEDGER_ERROR_REASONS } from "./ledger/inMemoryLedger";
