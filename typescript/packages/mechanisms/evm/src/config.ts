import { z } from "zod";
import { isAddressLike, type Address } from "@permitkit/core";
import { getEvmChainId } from "./utils";

/**
 * Zod schema for an engine deployment: the EIP-712 domain strings, the CAIP-2
 * network and the verifying contract address.
 */
export const EngineConfigSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  network: z.string().regex(/^eip155:\d+$/, "network must be a CAIP-2 eip155 identifier"),
  verifyingContract: z.custom<Address>(isAddressLike, "verifyingContract must be a 20-byte hex address"),
  enforceLowS: z.boolean().default(true),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Environment variables read by {@link loadEngineConfigFromEnv}.
 */
export const EngineEnvSchema = z.object({
  PERMITKIT_DOMAIN_NAME: z.string(),
  PERMITKIT_DOMAIN_VERSION: z.string(),
  PERMITKIT_NETWORK: z.string(),
  PERMITKIT_VERIFYING_CONTRACT: z.string(),
  PERMITKIT_ENFORCE_LOW_S: z.enum(["true", "false"]).optional(),
});

/**
 * Validates an engine configuration.
 *
 * @param input - Untrusted configuration object
 * @returns The validated configuration with defaults applied
 * @throws Error listing every invalid field
 */
export function parseEngineConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid engine config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Reads an engine configuration from environment variables.
 *
 * @param env - The environment, `process.env` by default
 * @returns The validated configuration
 * @throws Error if a variable is missing or invalid
 */
export function loadEngineConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const result = EngineEnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid engine environment: ${formatIssues(result.error)}`);
  }
  const vars = result.data;

  return parseEngineConfig({
    name: vars.PERMITKIT_DOMAIN_NAME,
    version: vars.PERMITKIT_DOMAIN_VERSION,
    network: vars.PERMITKIT_NETWORK,
    verifyingContract: vars.PERMITKIT_VERIFYING_CONTRACT,
    enforceLowS:
      vars.PERMITKIT_ENFORCE_LOW_S === undefined ? undefined : vars.PERMITKIT_ENFORCE_LOW_S === "true",
  });
}

/**
 * Chain id of a validated configuration.
 *
 * @param config - The engine configuration
 * @returns The numeric chain id
 */
export function getConfigChainId(config: EngineConfig): bigint {
  return getEvmChainId(config.network);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
