import { describe, it, expect } from "vitest";
import {
  MAX_UINT256,
  isAddressLike,
  isBytes32,
  isUint256,
  normalizeAddress,
  replayKey,
  sameAddress,
} from "../../../src/utils";

describe("Core utils", () => {
  it("should recognise address-shaped strings", () => {
    expect(isAddressLike("0x742d35Cc6634C0532925a3b844Bc9e7595f0bEb0")).toBe(true);
    expect(isAddressLike("0x742d35Cc6634C0532925a3b844Bc9e7595f0bEb")).toBe(false);
    expect(isAddressLike("742d35Cc6634C0532925a3b844Bc9e7595f0bEb0")).toBe(false);
    expect(isAddressLike(42)).toBe(false);
  });

  it("should recognise bytes32 strings", () => {
    expect(isBytes32(`0x${"00".repeat(32)}`)).toBe(true);
    expect(isBytes32(`0x${"00".repeat(31)}`)).toBe(false);
    expect(isBytes32(`0x${"zz".repeat(32)}`)).toBe(false);
  });

  it("should bound uint256", () => {
    expect(isUint256(0n)).toBe(true);
    expect(isUint256(MAX_UINT256)).toBe(true);
    expect(isUint256(MAX_UINT256 + 1n)).toBe(false);
    expect(isUint256(-1n)).toBe(false);
  });

  it("should normalize and compare addresses case-insensitively", () => {
    const checksummed = "0x742d35Cc6634C0532925a3b844Bc9e7595f0bEb0";

    expect(normalizeAddress(checksummed)).toBe("0x742d35cc6634c0532925a3b844bc9e7595f0beb0");
    expect(sameAddress(checksummed, "0x742d35cc6634c0532925a3b844bc9e7595f0beb0")).toBe(true);
    expect(sameAddress(checksummed, "0x0000000000000000000000000000000000000000")).toBe(false);
  });

  it("should build one replay key per (signer, nonce) pair", () => {
    const nonce = `0x${"Ab".repeat(32)}` as const;

    expect(replayKey("0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA", nonce)).toBe(
      `0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa:0x${"ab".repeat(32)}`,
    );
  });
});
