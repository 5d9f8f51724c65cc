import { describe, it, expect } from "vitest";
import { getConfigChainId, loadEngineConfigFromEnv, parseEngineConfig } from "../../src/config";
import { VERIFYING_CONTRACT } from "../mocks";

const env = {
  PERMITKIT_DOMAIN_NAME: "USD Coin",
  PERMITKIT_DOMAIN_VERSION: "2",
  PERMITKIT_NETWORK: "eip155:84532",
  PERMITKIT_VERIFYING_CONTRACT: VERIFYING_CONTRACT,
};

describe("parseEngineConfig", () => {
  it("should apply the low-s default", () => {
    const config = parseEngineConfig({
      name: "USD Coin",
      version: "2",
      network: "eip155:8453",
      verifyingContract: VERIFYING_CONTRACT,
    });

    expect(config).toEqual({
      name: "USD Coin",
      version: "2",
      network: "eip155:8453",
      verifyingContract: VERIFYING_CONTRACT,
      enforceLowS: true,
    });
    expect(getConfigChainId(config)).toBe(8453n);
  });

  it("should reject a non-eip155 network", () => {
    expect(() =>
      parseEngineConfig({
        name: "USD Coin",
        version: "2",
        network: "solana:5eykt4UsFv8P8NJdTREpY1vzqKqZKvdp",
        verifyingContract: VERIFYING_CONTRACT,
      }),
    ).toThrow("Invalid engine config: network: network must be a CAIP-2 eip155 identifier");
  });

  it("should list every invalid field", () => {
    expect(() =>
      parseEngineConfig({ name: "", version: "2", network: "eip155:1", verifyingContract: "0x12" }),
    ).toThrow(
      "Invalid engine config: name: String must contain at least 1 character(s); verifyingContract: verifyingContract must be a 20-byte hex address",
    );
  });
});

describe("loadEngineConfigFromEnv", () => {
  it("should read the configuration from the environment", () => {
    expect(loadEngineConfigFromEnv(env)).toEqual({
      name: "USD Coin",
      version: "2",
      network: "eip155:84532",
      verifyingContract: VERIFYING_CONTRACT,
      enforceLowS: true,
    });
  });

  it("should read the low-s switch", () => {
    expect(loadEngineConfigFromEnv({ ...env, PERMITKIT_ENFORCE_LOW_S: "false" }).enforceLowS).toBe(
      false,
    );
  });

  it("should name a missing variable", () => {
    const { PERMITKIT_NETWORK: _network, ...rest } = env;

    expect(() => loadEngineConfigFromEnv(rest)).toThrow(
      "Invalid engine environment: PERMITKIT_NETWORK: Required",
    );
  });
});
