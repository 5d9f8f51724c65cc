/**
 * Conversion between signed payloads and engine requests
 */

import { AUTHORIZATION_ERROR_CODES, AuthorizationError, type Hex } from "@permitkit/core";
import { toSignatureBytes, type TransferAuthorizationRequest } from "@permitkit/evm";
import { SIGNED_PAYLOAD_VERSION } from "./constants";
import type {
  ParsedSignedPayload,
  SignedPayload,
  TransferAuthorizationMessagePayload,
} from "./types";
import { checkSignedPayload } from "./validation";

/**
 * Validates a signed payload and converts it to an engine request.
 *
 * @param input - Untrusted JSON value
 * @returns The primary type and the request with integer fields as bigint
 * @throws AuthorizationError(INVALID_PARAMETERS) listing every validation error
 *
 * @example
 * ```typescript
 * const parsed = parseSignedPayload(JSON.parse(body));
 * if (parsed.primaryType === "Permit") {
 *   await engine.permit(parsed.request);
 * }
 * ```
 */
export function parseSignedPayload(input: unknown): ParsedSignedPayload {
  const checked = checkSignedPayload(input);
  if (!checked.valid) {
    throw new AuthorizationError(
      AUTHORIZATION_ERROR_CODES.INVALID_PARAMETERS,
      `Invalid signed payload: ${checked.errors.join("; ")}`,
      checked.errors,
    );
  }

  const { payload } = checked;
  switch (payload.primaryType) {
    case "Permit":
      return {
        primaryType: payload.primaryType,
        request: {
          owner: payload.message.owner,
          spender: payload.message.spender,
          value: BigInt(payload.message.value),
          deadline: BigInt(payload.message.deadline),
          signature: payload.signature,
        },
      };
    case "TransferWithAuthorization":
      return {
        primaryType: payload.primaryType,
        request: toAuthorizationRequest(payload.message, payload.signature),
      };
    case "ReceiveWithAuthorization":
      return {
        primaryType: payload.primaryType,
        request: toAuthorizationRequest(payload.message, payload.signature),
      };
    case "CancelAuthorization":
      return {
        primaryType: payload.primaryType,
        request: {
          authorizer: payload.message.authorizer,
          nonce: payload.message.nonce,
          signature: payload.signature,
        },
      };
  }
}

/**
 * Encodes an engine request as a signed payload, for clients handing a
 * signature to whoever submits it.
 *
 * @param parsed - Primary type and signed request
 * @returns The JSON-ready payload
 */
export function encodeSignedPayload(parsed: ParsedSignedPayload): SignedPayload {
  switch (parsed.primaryType) {
    case "Permit": {
      const { request } = parsed;
      return {
        version: SIGNED_PAYLOAD_VERSION,
        primaryType: parsed.primaryType,
        message: {
          owner: request.owner,
          spender: request.spender,
          value: request.value.toString(),
          deadline: request.deadline.toString(),
        },
        signature: toSignatureBytes(request.signature),
      };
    }
    case "TransferWithAuthorization":
      return {
        version: SIGNED_PAYLOAD_VERSION,
        primaryType: parsed.primaryType,
        message: toAuthorizationMessagePayload(parsed.request),
        signature: toSignatureBytes(parsed.request.signature),
      };
    case "ReceiveWithAuthorization":
      return {
        version: SIGNED_PAYLOAD_VERSION,
        primaryType: parsed.primaryType,
        message: toAuthorizationMessagePayload(parsed.request),
        signature: toSignatureBytes(parsed.request.signature),
      };
    case "CancelAuthorization":
      return {
        version: SIGNED_PAYLOAD_VERSION,
        primaryType: parsed.primaryType,
        message: { authorizer: parsed.request.authorizer, nonce: parsed.request.nonce },
        signature: toSignatureBytes(parsed.request.signature),
      };
  }
}

function toAuthorizationRequest(
  message: TransferAuthorizationMessagePayload,
  signature: Hex,
): TransferAuthorizationRequest {
  return {
    from: message.from,
    to: message.to,
    value: BigInt(message.value),
    validAfter: BigInt(message.validAfter),
    validBefore: BigInt(message.validBefore),
    nonce: message.nonce,
    signature,
  };
}

function toAuthorizationMessagePayload(
  request: TransferAuthorizationRequest,
): TransferAuthorizationMessagePayload {
  return {
    from: request.from,
    to: request.to,
    value: request.value.toString(),
    validAfter: request.validAfter.toString(),
    validBefore: request.validBefore.toString(),
    nonce: request.nonce,
  };
}
