/**
 * JSON Schemas for signed payloads, one per EIP-712 primary type
 */

import {
  ADDRESS_PATTERN,
  BYTES32_PATTERN,
  PRIMARY_TYPES,
  SIGNATURE_PATTERN,
  UINT256_MAX_DIGITS,
  UINT_PATTERN,
} from "./constants";

const SCHEMA_DIALECT = "https://json-schema.org/draft/2020-12/schema";

const address = (description: string) => ({
  type: "string",
  pattern: ADDRESS_PATTERN,
  description,
});

const uint256 = (description: string) => ({
  type: "string",
  pattern: UINT_PATTERN,
  maxLength: UINT256_MAX_DIGITS,
  description,
});

const bytes32 = (description: string) => ({
  type: "string",
  pattern: BYTES32_PATTERN,
  description,
});

const signature = {
  type: "string",
  pattern: SIGNATURE_PATTERN,
  description: "65-byte r || s || v signature, or the bytes a contract account validates.",
};

const version = { type: "string", const: "1", description: "Payload version identifier." };

/**
 * Wraps a message schema in the payload envelope.
 *
 * @param primaryType - The EIP-712 primary type
 * @param message - Schema of the message fields
 * @returns The payload schema
 */
function payloadSchema(
  primaryType: string,
  message: { properties: Record<string, object>; required: readonly string[] },
) {
  return {
    $schema: SCHEMA_DIALECT,
    type: "object",
    properties: {
      version,
      primaryType: { type: "string", const: primaryType },
      message: {
        type: "object",
        properties: message.properties,
        required: message.required,
        additionalProperties: false,
      },
      signature,
    },
    required: ["version", "primaryType", "message", "signature"],
    additionalProperties: false,
  } as const;
}

const authorizationMessage = {
  properties: {
    from: address("The authorizer (payer)."),
    to: address("The payee."),
    value: uint256("Amount to transfer."),
    validAfter: uint256("Unix time after which the authorization is valid."),
    validBefore: uint256("Unix time before which the authorization is valid."),
    nonce: bytes32("Random 32-byte nonce chosen by the authorizer."),
  },
  required: ["from", "to", "value", "validAfter", "validBefore", "nonce"],
} as const;

/**
 * Envelope check run before the per-type schema is chosen.
 */
export const SIGNED_PAYLOAD_ENVELOPE_SCHEMA = {
  $schema: SCHEMA_DIALECT,
  type: "object",
  properties: {
    version,
    primaryType: { type: "string", enum: PRIMARY_TYPES },
  },
  required: ["version", "primaryType"],
} as const;

export const PERMIT_PAYLOAD_SCHEMA = payloadSchema("Permit", {
  properties: {
    owner: address("The token owner granting the allowance."),
    spender: address("The address being approved."),
    value: uint256("Allowance to set."),
    deadline: uint256("Unix time after which the permit expires."),
  },
  required: ["owner", "spender", "value", "deadline"],
});

export const TRANSFER_AUTHORIZATION_PAYLOAD_SCHEMA = payloadSchema(
  "TransferWithAuthorization",
  authorizationMessage,
);

export const RECEIVE_AUTHORIZATION_PAYLOAD_SCHEMA = payloadSchema(
  "ReceiveWithAuthorization",
  authorizationMessage,
);

export const CANCEL_AUTHORIZATION_PAYLOAD_SCHEMA = payloadSchema("CancelAuthorization", {
  properties: {
    authorizer: address("The authorizer retiring the nonce."),
    nonce: bytes32("The nonce to retire."),
  },
  required: ["authorizer", "nonce"],
});
