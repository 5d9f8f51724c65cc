import {
  AUTHORIZATION_ERROR_CODES,
  AuthorizationError,
  type Address,
  type ApprovalEvent,
  type AuthorizationCanceledEvent,
  type AuthorizationUsedEvent,
} from "@permitkit/core";
import type { AuthorizationEngine } from "@permitkit/evm";
import { parseSignedPayload } from "./parse";

export interface SubmitOptions {
  /**
   * Identity submitting the payload. Required for ReceiveWithAuthorization,
   * where it must be the payee.
   */
  caller?: Address;
}

export type SubmitResult =
  | { primaryType: "Permit"; event: ApprovalEvent }
  | { primaryType: "TransferWithAuthorization"; event: AuthorizationUsedEvent }
  | { primaryType: "ReceiveWithAuthorization"; event: AuthorizationUsedEvent }
  | { primaryType: "CancelAuthorization"; event: AuthorizationCanceledEvent };

/**
 * Parses a signed payload and runs the matching engine operation.
 *
 * @param engine - The engine to submit to
 * @param input - Untrusted JSON value
 * @param options - Submission options
 * @returns The primary type and the event of the committed operation
 * @throws AuthorizationError for an invalid payload or a rejected operation
 */
export async function submitSignedPayload(
  engine: AuthorizationEngine,
  input: unknown,
  options: SubmitOptions = {},
): Promise<SubmitResult> {
  const parsed = parseSignedPayload(input);

  switch (parsed.primaryType) {
    case "Permit":
      return { primaryType: parsed.primaryType, event: await engine.permit(parsed.request) };
    case "TransferWithAuthorization":
      return {
        primaryType: parsed.primaryType,
        event: await engine.transferWithAuthorization(parsed.request),
      };
    case "ReceiveWithAuthorization": {
      if (options.caller === undefined) {
        throw new AuthorizationError(
          AUTHORIZATION_ERROR_CODES.UNAUTHORIZED_CALLER,
          "A receive authorization needs the submitting caller",
        );
      }
      return {
        primaryType: parsed.primaryType,
        event: await engine.receiveWithAuthorization(options.caller, parsed.request),
      };
    }
    case "CancelAuthorization":
      return {
        primaryType: parsed.primaryType,
        event: await engine.cancelAuthorization(parsed.request),
      };
  }
}
