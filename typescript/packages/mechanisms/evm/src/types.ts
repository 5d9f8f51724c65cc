import type { Address, Hex } from "@permitkit/core";

/**
 * Signature as 65 packed bytes (`r ‖ s ‖ v`, or arbitrary bytes for contract
 * accounts), or the split form taken by the `v, r, s` ABI overloads.
 */
export type SignatureLike = Hex | { v: number | bigint; r: Hex; s: Hex };

/**
 * EIP-712 domain of a deployment, as advertised by EIP-5267 `eip712Domain()`.
 */
export type AuthorizationDomain = {
  name: string;
  version: string;
  chainId: bigint;
  verifyingContract: Address;
};

export type Eip712DomainDescription = AuthorizationDomain & {
  fields: Hex;
  salt: Hex;
  extensions: bigint[];
};

/**
 * Network and deployment identity, read afresh every time a domain separator is built.
 */
export interface NetworkIdentity {
  chainId(): bigint;
  verifyingContract(): Address;
}

export type PermitMessage = {
  owner: Address;
  spender: Address;
  value: bigint;
  nonce: bigint;
  deadline: bigint;
};

export type TransferAuthorizationMessage = {
  from: Address;
  to: Address;
  value: bigint;
  validAfter: bigint;
  validBefore: bigint;
  nonce: Hex;
};

export type ReceiveAuthorizationMessage = TransferAuthorizationMessage;

export type CancelAuthorizationMessage = {
  authorizer: Address;
  nonce: Hex;
};

/**
 * A permit as submitted. The nonce is not part of the request: the owner's
 * current counter is used.
 */
export type PermitRequest = Omit<PermitMessage, "nonce"> & {
  signature: SignatureLike;
};

export type TransferAuthorizationRequest = TransferAuthorizationMessage & {
  signature: SignatureLike;
};

export type ReceiveAuthorizationRequest = TransferAuthorizationRequest;

export type CancelAuthorizationRequest = CancelAuthorizationMessage & {
  signature: SignatureLike;
};

/**
 * Account with its own signature validation logic (ERC-1271).
 *
 * `isValidSignature` returns the raw ABI return data of the account's entry point.
 */
export interface ProgrammableAccount {
  isValidSignature(digest: Hex, signature: Hex): Hex | Promise<Hex>;
}

/**
 * How a signer identity is verified.
 */
export type SignerKind =
  | { kind: "rawKey" }
  | { kind: "programmable"; account: ProgrammableAccount };

/**
 * Probe telling raw-key identities apart from programmable accounts.
 */
export interface AccountResolver {
  resolve(address: Address): SignerKind | Promise<SignerKind>;
}
