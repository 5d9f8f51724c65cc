import { describe, it, expect, vi } from "vitest";
import { keccak256, toHex } from "viem";
import { ERC1271_MAGIC_VALUE, ERC1271_MAGIC_WORD } from "../../src/constants";
import { SignatureVerifier, isValidMagicResponse, rawKeyAccountResolver } from "../../src/verifier";
import {
  CONTRACT_WALLET,
  MockAccountResolver,
  MockProgrammableAccount,
  ownerAccount,
  strangerAccount,
} from "../mocks";

const digest = keccak256(toHex("offline authorization"));

describe("isValidMagicResponse", () => {
  it("should accept the magic word", () => {
    expect(isValidMagicResponse(ERC1271_MAGIC_WORD)).toBe(true);
  });

  it("should accept uppercase hex", () => {
    expect(isValidMagicResponse(`0x1626BA7E${"00".repeat(28)}`)).toBe(true);
  });

  it("should reject the bare four-byte selector", () => {
    expect(isValidMagicResponse(ERC1271_MAGIC_VALUE)).toBe(false);
  });

  it("should reject a word with non-zero padding", () => {
    expect(isValidMagicResponse(`0x1626ba7e${"00".repeat(27)}01`)).toBe(false);
  });

  it("should reject empty return data", () => {
    expect(isValidMagicResponse("0x")).toBe(false);
  });

  it("should read only the first word of longer return data", () => {
    expect(isValidMagicResponse(`${ERC1271_MAGIC_WORD}${"ff".repeat(32)}`)).toBe(true);
  });
});

describe("SignatureVerifier", () => {
  describe("raw keys", () => {
    const verifier = new SignatureVerifier(rawKeyAccountResolver);

    it("should accept the signer's own signature", async () => {
      const signature = await ownerAccount.sign({ hash: digest });

      await expect(verifier.isValid(ownerAccount.address, digest, signature)).resolves.toBe(true);
    });

    it("should reject a signature by someone else", async () => {
      const signature = await strangerAccount.sign({ hash: digest });

      await expect(verifier.isValid(ownerAccount.address, digest, signature)).resolves.toBe(false);
    });

    it("should match the signer regardless of address casing", async () => {
      const signature = await ownerAccount.sign({ hash: digest });
      const lower = ownerAccount.address.toLowerCase();

      await expect(verifier.isValid(`0x${lower.slice(2)}`, digest, signature)).resolves.toBe(true);
    });

    it("should reject malformed bytes", async () => {
      await expect(verifier.isValid(ownerAccount.address, digest, "0x1234")).resolves.toBe(false);
    });
  });

  describe("programmable accounts", () => {
    it("should accept when the account answers the magic value", async () => {
      const account = new MockProgrammableAccount();
      const verifier = new SignatureVerifier(
        new MockAccountResolver().register(CONTRACT_WALLET, account),
      );

      await expect(verifier.isValid(CONTRACT_WALLET, digest, "0xdeadbeef")).resolves.toBe(true);
      expect(account.calls).toEqual([{ digest, signature: "0xdeadbeef" }]);
    });

    it("should reject any other answer", async () => {
      const account = new MockProgrammableAccount(`0xffffffff${"00".repeat(28)}`);
      const verifier = new SignatureVerifier(
        new MockAccountResolver().register(CONTRACT_WALLET, account),
      );

      await expect(verifier.isValid(CONTRACT_WALLET, digest, "0xdeadbeef")).resolves.toBe(false);
    });

    it("should reject when the account throws", async () => {
      const account = new MockProgrammableAccount(ERC1271_MAGIC_WORD, () => {
        throw new Error("execution reverted");
      });
      const verifier = new SignatureVerifier(
        new MockAccountResolver().register(CONTRACT_WALLET, account),
      );

      await expect(verifier.isValid(CONTRACT_WALLET, digest, "0xdeadbeef")).resolves.toBe(false);
    });

    it("should not fall back to ECDSA for a programmable account", async () => {
      const account = new MockProgrammableAccount(`0x${"00".repeat(32)}`);
      const verifier = new SignatureVerifier(
        new MockAccountResolver().register(ownerAccount.address, account),
      );
      const signature = await ownerAccount.sign({ hash: digest });

      await expect(verifier.isValid(ownerAccount.address, digest, signature)).resolves.toBe(false);
    });
  });

  it("should propagate a failing account probe", async () => {
    const verifier = new SignatureVerifier({
      resolve: vi.fn().mockRejectedValue(new Error("rpc unavailable")),
    });

    await expect(verifier.isValid(CONTRACT_WALLET, digest, "0x")).rejects.toThrow(
      "rpc unavailable",
    );
  });
});
