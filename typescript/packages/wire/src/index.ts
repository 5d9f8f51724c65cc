/**
 * Signed-payload intake
 *
 * Lets a relayer accept signed permits and transfer authorizations as JSON
 * and hand them to an `AuthorizationEngine`.
 *
 * ```typescript
 * import { submitSignedPayload, validateSignedPayload } from "@permitkit/wire";
 *
 * const body = JSON.parse(rawBody);
 * const result = validateSignedPayload(body);
 * if (!result.valid) {
 *   return reply(400, result.errors);
 * }
 * const { event } = await submitSignedPayload(engine, body, { caller: sessionAddress });
 * ```
 *
 * @module
 */

export { SIGNED_PAYLOAD_VERSION, PRIMARY_TYPES } from "./constants";

export type {
  PrimaryType,
  SignedPayloadEnvelope,
  PermitPayload,
  TransferAuthorizationMessagePayload,
  TransferAuthorizationPayload,
  ReceiveAuthorizationPayload,
  CancelAuthorizationPayload,
  SignedPayload,
  ParsedSignedPayload,
} from "./types";

export {
  SIGNED_PAYLOAD_ENVELOPE_SCHEMA,
  PERMIT_PAYLOAD_SCHEMA,
  TRANSFER_AUTHORIZATION_PAYLOAD_SCHEMA,
  RECEIVE_AUTHORIZATION_PAYLOAD_SCHEMA,
  CANCEL_AUTHORIZATION_PAYLOAD_SCHEMA,
} from "./schema";

export { validateSignedPayload, checkSignedPayload } from "./validation";
export type { ValidationResult, PayloadCheck } from "./validation";

export { parseSignedPayload, encodeSignedPayload } from "./parse";

export { submitSignedPayload } from "./submit";
export type { SubmitOptions, SubmitResult } from "./submit";
