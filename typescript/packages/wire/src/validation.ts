/**
 * Validation functions for signed payloads
 *
 * Payloads are checked against the JSON schema of their primary type, then
 * for semantic correctness (integers must fit in a uint256).
 */

import Ajv, { type ErrorObject, type ValidateFunction } from "ajv/dist/2020.js";
import { MAX_UINT256 } from "@permitkit/core";
import {
  CANCEL_AUTHORIZATION_PAYLOAD_SCHEMA,
  PERMIT_PAYLOAD_SCHEMA,
  RECEIVE_AUTHORIZATION_PAYLOAD_SCHEMA,
  SIGNED_PAYLOAD_ENVELOPE_SCHEMA,
  TRANSFER_AUTHORIZATION_PAYLOAD_SCHEMA,
} from "./schema";
import type {
  CancelAuthorizationPayload,
  PermitPayload,
  ReceiveAuthorizationPayload,
  SignedPayload,
  SignedPayloadEnvelope,
  TransferAuthorizationPayload,
} from "./types";

/**
 * Result of payload validation
 */
export interface ValidationResult {
  /** Whether the validation passed */
  valid: boolean;
  /** Error messages if validation failed */
  errors?: string[];
}

/**
 * Outcome of {@link checkSignedPayload}: the typed payload, or why it was refused.
 */
export type PayloadCheck =
  | { valid: true; payload: SignedPayload }
  | { valid: false; errors: string[] };

const ajv = new Ajv({ strict: false, allErrors: true });

const validateEnvelope = ajv.compile<SignedPayloadEnvelope>(SIGNED_PAYLOAD_ENVELOPE_SCHEMA);
const validatePermit = ajv.compile<PermitPayload>(PERMIT_PAYLOAD_SCHEMA);
const validateTransfer = ajv.compile<TransferAuthorizationPayload>(
  TRANSFER_AUTHORIZATION_PAYLOAD_SCHEMA,
);
const validateReceive = ajv.compile<ReceiveAuthorizationPayload>(
  RECEIVE_AUTHORIZATION_PAYLOAD_SCHEMA,
);
const validateCancel = ajv.compile<CancelAuthorizationPayload>(CANCEL_AUTHORIZATION_PAYLOAD_SCHEMA);

/**
 * Checks a payload and returns it typed when it is valid.
 *
 * @param input - Untrusted JSON value
 * @returns The typed payload, or the list of errors
 */
export function checkSignedPayload(input: unknown): PayloadCheck {
  if (!validateEnvelope(input)) {
    return { valid: false, errors: formatErrors(validateEnvelope.errors) };
  }

  const checked = matchSchema(input);
  if (!checked.valid) {
    return checked;
  }

  const errors = uint256Errors(checked.payload);
  return errors.length > 0 ? { valid: false, errors } : checked;
}

/**
 * Validates a signed payload against its schema and the uint256 range.
 *
 * @param input - Untrusted JSON value
 * @returns Validation result with errors if invalid
 *
 * @example
 * ```typescript
 * const result = validateSignedPayload(JSON.parse(body));
 * if (!result.valid) {
 *   console.error("Payload rejected:", result.errors);
 * }
 * ```
 */
export function validateSignedPayload(input: unknown): ValidationResult {
  const checked = checkSignedPayload(input);
  return checked.valid ? { valid: true } : { valid: false, errors: checked.errors };
}

function matchSchema(envelope: SignedPayloadEnvelope): PayloadCheck {
  switch (envelope.primaryType) {
    case "Permit":
      return run(validatePermit, envelope);
    case "TransferWithAuthorization":
      return run(validateTransfer, envelope);
    case "ReceiveWithAuthorization":
      return run(validateReceive, envelope);
    case "CancelAuthorization":
      return run(validateCancel, envelope);
  }
}

function run<T extends SignedPayload>(validate: ValidateFunction<T>, input: unknown): PayloadCheck {
  if (validate(input)) {
    return { valid: true, payload: input };
  }
  return { valid: false, errors: formatErrors(validate.errors) };
}

function uint256Errors(payload: SignedPayload): string[] {
  const fields: Array<[string, string]> =
    payload.primaryType === "Permit"
      ? [
          ["value", payload.message.value],
          ["deadline", payload.message.deadline],
        ]
      : payload.primaryType === "CancelAuthorization"
        ? []
        : [
            ["value", payload.message.value],
            ["validAfter", payload.message.validAfter],
            ["validBefore", payload.message.validBefore],
          ];

  return fields
    .filter(([, value]) => BigInt(value) > MAX_UINT256)
    .map(([field]) => `/message/${field}: must fit in a uint256`);
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (
    errors?.map(err => {
      const path = err.instancePath || "(root)";
      return `${path}: ${err.message}`;
    }) ?? ["Unknown validation error"]
  );
}
