/**
 * Constants for signed-payload intake
 */

/**
 * Version tag every signed payload carries.
 */
export const SIGNED_PAYLOAD_VERSION = "1";

/**
 * EIP-712 primary types accepted as signed payloads.
 */
export const PRIMARY_TYPES = [
  "Permit",
  "TransferWithAuthorization",
  "ReceiveWithAuthorization",
  "CancelAuthorization",
] as const;

export const ADDRESS_PATTERN = "^0x[a-fA-F0-9]{40}$";
export const BYTES32_PATTERN = "^0x[a-fA-F0-9]{64}$";
export const UINT_PATTERN = "^(0|[1-9][0-9]*)$";
export const SIGNATURE_PATTERN = "^0x([a-fA-F0-9]{2})+$";

/**
 * Decimal digits of 2^256 - 1.
 */
export const UINT256_MAX_DIGITS = 78;
