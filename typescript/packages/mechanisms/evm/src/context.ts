import {
  AUTHORIZATION_ERROR_CODES,
  AuthorizationError,
  type Address,
  type Clock,
  type Hex,
  type LedgerPort,
} from "@permitkit/core";
import type { StructuredHashBuilder } from "./hash";
import type { SignatureLike } from "./types";
import { toSignatureBytes } from "./utils";
import type { SignatureVerifier } from "./verifier";

/**
 * Collaborators shared by the permit and transfer-authorization managers.
 */
export type AuthorizationContext = {
  hasher: StructuredHashBuilder;
  verifier: SignatureVerifier;
  ledger: LedgerPort;
  clock: Clock;
};

/**
 * Verifies a signature and throws INVALID_SIGNATURE unless it holds.
 *
 * @param context - The shared collaborators
 * @param signer - The claimed signer
 * @param digest - The digest the signer must have signed
 * @param signature - The submitted signature
 */
export async function requireValidSignature(
  context: AuthorizationContext,
  signer: Address,
  digest: Hex,
  signature: SignatureLike,
): Promise<void> {
  const bytes = toSignatureBytes(signature);
  if (!(await context.verifier.isValid(signer, digest, bytes))) {
    throw new AuthorizationError(
      AUTHORIZATION_ERROR_CODES.INVALID_SIGNATURE,
      `Invalid signature for ${signer}`,
    );
  }
}
