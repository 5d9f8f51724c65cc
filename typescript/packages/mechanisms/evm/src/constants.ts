import { keccak256, toHex } from "viem";

// EIP-712 canonical type declarations. These strings are hashed into the
// type-hashes below and must match what wallets sign byte for byte.
export const EIP712_DOMAIN_TYPE =
  "EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)";
export const PERMIT_TYPE =
  "Permit(address owner,address spender,uint256 value,uint256 nonce,uint256 deadline)";
export const TRANSFER_WITH_AUTHORIZATION_TYPE =
  "TransferWithAuthorization(address from,address to,uint256 value,uint256 validAfter,uint256 validBefore,bytes32 nonce)";
export const RECEIVE_WITH_AUTHORIZATION_TYPE =
  "ReceiveWithAuthorization(address from,address to,uint256 value,uint256 validAfter,uint256 validBefore,bytes32 nonce)";
export const CANCEL_AUTHORIZATION_TYPE = "CancelAuthorization(address authorizer,bytes32 nonce)";

export const EIP712_DOMAIN_TYPEHASH = keccak256(toHex(EIP712_DOMAIN_TYPE));
export const PERMIT_TYPEHASH = keccak256(toHex(PERMIT_TYPE));
export const TRANSFER_WITH_AUTHORIZATION_TYPEHASH = keccak256(
  toHex(TRANSFER_WITH_AUTHORIZATION_TYPE),
);
export const RECEIVE_WITH_AUTHORIZATION_TYPEHASH = keccak256(
  toHex(RECEIVE_WITH_AUTHORIZATION_TYPE),
);
export const CANCEL_AUTHORIZATION_TYPEHASH = keccak256(toHex(CANCEL_AUTHORIZATION_TYPE));

/**
 * Prefix of every EIP-712 digest: `0x19 0x01`.
 */
export const EIP712_PREFIX = "0x1901" as const;

/**
 * EIP-5267 field bitmap for a domain made of name, version, chainId and verifyingContract.
 */
export const EIP712_DOMAIN_FIELDS = "0x0f" as const;

// EIP-2612 Permit types for EIP-712 signing
export const permitTypes = {
  Permit: [
    { name: "owner", type: "address" },
    { name: "spender", type: "address" },
    { name: "value", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

// EIP-3009 TransferWithAuthorization types for EIP-712 signing
export const authorizationTypes = {
  TransferWithAuthorization: [
    { name: "from", type: "address" },
    { name: "to", type: "address" },
    { name: "value", type: "uint256" },
    { name: "validAfter", type: "uint256" },
    { name: "validBefore", type: "uint256" },
    { name: "nonce", type: "bytes32" },
  ],
} as const;

// EIP-3009 ReceiveWithAuthorization types for EIP-712 signing
export const receiveAuthorizationTypes = {
  ReceiveWithAuthorization: [
    { name: "from", type: "address" },
    { name: "to", type: "address" },
    { name: "value", type: "uint256" },
    { name: "validAfter", type: "uint256" },
    { name: "validBefore", type: "uint256" },
    { name: "nonce", type: "bytes32" },
  ],
} as const;

// EIP-3009 CancelAuthorization types for EIP-712 signing
export const cancelAuthorizationTypes = {
  CancelAuthorization: [
    { name: "authorizer", type: "address" },
    { name: "nonce", type: "bytes32" },
  ],
} as const;

/**
 * ERC-1271 `isValidSignature(bytes32,bytes)` selector, returned by a contract
 * account that accepts the signature.
 */
export const ERC1271_MAGIC_VALUE = "0x1626ba7e" as const;

/**
 * The magic value as the 32-byte ABI word a conforming account returns.
 */
export const ERC1271_MAGIC_WORD = `${ERC1271_MAGIC_VALUE}${"00".repeat(28)}` as const;

// ERC-1271 ABI for contract account signature validation
export const erc1271ABI = [
  {
    inputs: [
      { name: "hash", type: "bytes32" },
      { name: "signature", type: "bytes" },
    ],
    name: "isValidSignature",
    outputs: [{ name: "magicValue", type: "bytes4" }],
    stateMutability: "view",
    type: "function",
  },
] as const;

/**
 * secp256k1 group order.
 */
export const SECP256K1_N = 0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

/**
 * Upper bound of a canonical (low-s) ECDSA `s` value, `n / 2`.
 */
export const SECP256K1_HALF_N = SECP256K1_N / 2n;

/**
 * Length in bytes of an `r ‖ s ‖ v` ECDSA signature.
 */
export const ECDSA_SIGNATURE_LENGTH = 65;
