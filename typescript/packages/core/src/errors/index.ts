/**
 * @fileoverview Error codes and messages for signed authorizations
 * @module @permitkit/core/errors
 */

/**
 * Error codes for rejected authorizations.
 */
export const AUTHORIZATION_ERROR_CODES = {
  /** Permit deadline or authorization validBefore has passed */
  EXPIRED_AUTHORIZATION: "EXPIRED_AUTHORIZATION",
  /** Current time is not after validAfter */
  NOT_YET_VALID: "NOT_YET_VALID",
  /** Nonce already used or canceled, or currently being consumed */
  ALREADY_USED_OR_CANCELED: "ALREADY_USED_OR_CANCELED",
  /** Signature did not verify for the claimed signer */
  INVALID_SIGNATURE: "INVALID_SIGNATURE",
  /** Receive authorization submitted by someone other than the payee */
  UNAUTHORIZED_CALLER: "UNAUTHORIZED_CALLER",
  /** Malformed address, nonce or integer field */
  INVALID_PARAMETERS: "INVALID_PARAMETERS",
} as const;

/**
 * Type for authorization error code values.
 */
export type AuthorizationErrorCode =
  (typeof AUTHORIZATION_ERROR_CODES)[keyof typeof AUTHORIZATION_ERROR_CODES];

/**
 * Human-readable error messages for authorization error codes.
 */
export const AUTHORIZATION_ERROR_MESSAGES: Record<AuthorizationErrorCode, string> = {
  [AUTHORIZATION_ERROR_CODES.EXPIRED_AUTHORIZATION]: "The authorization has expired.",
  [AUTHORIZATION_ERROR_CODES.NOT_YET_VALID]: "The authorization is not yet valid.",
  [AUTHORIZATION_ERROR_CODES.ALREADY_USED_OR_CANCELED]:
    "The authorization nonce has already been used or canceled.",
  [AUTHORIZATION_ERROR_CODES.INVALID_SIGNATURE]:
    "The signature is invalid or could not be verified for the signer.",
  [AUTHORIZATION_ERROR_CODES.UNAUTHORIZED_CALLER]: "The caller must be the payee.",
  [AUTHORIZATION_ERROR_CODES.INVALID_PARAMETERS]: "The authorization parameters are malformed.",
};

/**
 * Gets a human-readable error message for an authorization error code.
 *
 * @param code - The authorization error code
 * @returns Human-readable error message
 */
export function getAuthorizationErrorMessage(code: string): string {
  return isAuthorizationErrorCode(code)
    ? AUTHORIZATION_ERROR_MESSAGES[code]
    : "An unknown authorization error occurred.";
}

/**
 * Checks whether a string is one of the known authorization error codes.
 *
 * @param code - The candidate code
 * @returns true if the code is part of the taxonomy
 */
export function isAuthorizationErrorCode(code: string): code is AuthorizationErrorCode {
  return Object.values<string>(AUTHORIZATION_ERROR_CODES).includes(code);
}

/**
 * Terminal failure of a signed authorization. No state was changed.
 */
export class AuthorizationError extends Error {
  readonly code: AuthorizationErrorCode;
  readonly details?: string[];

  /**
   * Creates an AuthorizationError.
   *
   * @param code - The taxonomy code
   * @param message - Optional message, defaults to the code's standard message
   * @param details - Optional list of individual problems (validation errors)
   */
  constructor(code: AuthorizationErrorCode, message?: string, details?: string[]) {
    super(message ?? AUTHORIZATION_ERROR_MESSAGES[code]);
    this.name = "AuthorizationError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Narrows an unknown value to an AuthorizationError, optionally of one code.
 *
 * @param error - The value to test
 * @param code - Optional code the error must carry
 * @returns true if `error` is an AuthorizationError (with `code`, when given)
 */
export function isAuthorizationError(
  error: unknown,
  code?: AuthorizationErrorCode,
): error is AuthorizationError {
  return error instanceof AuthorizationError && (code === undefined || error.code === code);
}
