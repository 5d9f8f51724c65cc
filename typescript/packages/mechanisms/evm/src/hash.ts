import { concat, encodeAbiParameters, keccak256, parseAbiParameters } from "viem";
import { normalizeAddress, type Hex } from "@permitkit/core";
import {
  CANCEL_AUTHORIZATION_TYPEHASH,
  EIP712_PREFIX,
  PERMIT_TYPEHASH,
  RECEIVE_WITH_AUTHORIZATION_TYPEHASH,
  TRANSFER_WITH_AUTHORIZATION_TYPEHASH,
} from "./constants";
import type { DomainSeparatorProvider } from "./domain";
import type {
  CancelAuthorizationMessage,
  PermitMessage,
  ReceiveAuthorizationMessage,
  TransferAuthorizationMessage,
} from "./types";

const PERMIT_PARAMETERS = parseAbiParameters(
  "bytes32, address, address, uint256, uint256, uint256",
);
const AUTHORIZATION_PARAMETERS = parseAbiParameters(
  "bytes32, address, address, uint256, uint256, uint256, bytes32",
);
const CANCEL_PARAMETERS = parseAbiParameters("bytes32, address, bytes32");

/**
 * Final EIP-712 digest: `keccak256(0x1901 ‖ domainSeparator ‖ structHash)`.
 *
 * @param domainSeparator - The domain separator
 * @param structHash - The message struct hash
 * @returns The digest a signer signs
 */
export function toTypedDataDigest(domainSeparator: Hex, structHash: Hex): Hex {
  return keccak256(concat([EIP712_PREFIX, domainSeparator, structHash]));
}

/**
 * Struct hash of an EIP-2612 Permit.
 *
 * @param message - The permit fields
 * @returns keccak256 of the type-hash and encoded fields
 */
export function hashPermitStruct(message: PermitMessage): Hex {
  return keccak256(
    encodeAbiParameters(PERMIT_PARAMETERS, [
      PERMIT_TYPEHASH,
      normalizeAddress(message.owner),
      normalizeAddress(message.spender),
      message.value,
      message.nonce,
      message.deadline,
    ]),
  );
}

/**
 * Struct hash of an EIP-3009 TransferWithAuthorization.
 *
 * @param message - The authorization fields
 * @returns keccak256 of the type-hash and encoded fields
 */
export function hashTransferAuthorizationStruct(message: TransferAuthorizationMessage): Hex {
  return hashAuthorizationStruct(TRANSFER_WITH_AUTHORIZATION_TYPEHASH, message);
}

/**
 * Struct hash of an EIP-3009 ReceiveWithAuthorization. Same fields as a
 * transfer, distinct type-hash.
 *
 * @param message - The authorization fields
 * @returns keccak256 of the type-hash and encoded fields
 */
export function hashReceiveAuthorizationStruct(message: ReceiveAuthorizationMessage): Hex {
  return hashAuthorizationStruct(RECEIVE_WITH_AUTHORIZATION_TYPEHASH, message);
}

/**
 * Struct hash of an EIP-3009 CancelAuthorization.
 *
 * @param message - Authorizer and nonce
 * @returns keccak256 of the type-hash and encoded fields
 */
export function hashCancelAuthorizationStruct(message: CancelAuthorizationMessage): Hex {
  return keccak256(
    encodeAbiParameters(CANCEL_PARAMETERS, [
      CANCEL_AUTHORIZATION_TYPEHASH,
      normalizeAddress(message.authorizer),
      message.nonce,
    ]),
  );
}

function hashAuthorizationStruct(typeHash: Hex, message: TransferAuthorizationMessage): Hex {
  return keccak256(
    encodeAbiParameters(AUTHORIZATION_PARAMETERS, [
      typeHash,
      normalizeAddress(message.from),
      normalizeAddress(message.to),
      message.value,
      message.validAfter,
      message.validBefore,
      message.nonce,
    ]),
  );
}

/**
 * Reproduces the digests signers saw, under the provider's current domain.
 */
export class StructuredHashBuilder {
  /**
   * Creates a StructuredHashBuilder.
   *
   * @param domain - Provider of the current domain separator
   */
  constructor(private readonly domain: DomainSeparatorProvider) {}

  /**
   * Digest of an EIP-2612 Permit.
   *
   * @param message - Owner, spender, value, the owner's current nonce and deadline
   * @returns The 32-byte digest the owner signed
   */
  permitDigest(message: PermitMessage): Hex {
    return this.digest(hashPermitStruct(message));
  }

  /**
   * Digest of an EIP-3009 TransferWithAuthorization.
   *
   * @param message - The authorization fields
   * @returns The 32-byte digest the authorizer signed
   */
  transferAuthorizationDigest(message: TransferAuthorizationMessage): Hex {
    return this.digest(hashTransferAuthorizationStruct(message));
  }

  /**
   * Digest of an EIP-3009 ReceiveWithAuthorization. Differs from the transfer
   * digest only in its type hash.
   *
   * @param message - The authorization fields
   * @returns The 32-byte digest the authorizer signed
   */
  receiveAuthorizationDigest(message: ReceiveAuthorizationMessage): Hex {
    return this.digest(hashReceiveAuthorizationStruct(message));
  }

  /**
   * Digest of an EIP-3009 CancelAuthorization.
   *
   * @param message - Authorizer and nonce
   * @returns The 32-byte digest the authorizer signed
   */
  cancelAuthorizationDigest(message: CancelAuthorizationMessage): Hex {
    return this.digest(hashCancelAuthorizationStruct(message));
  }

  private digest(structHash: Hex): Hex {
    return toTypedDataDigest(this.domain.domainSeparator(), structHash);
  }
}
