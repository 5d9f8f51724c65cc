import { describe, it, expect, vi } from "vitest";
import { encodeFunctionData, keccak256, toHex } from "viem";
import { ERC1271_MAGIC_WORD, erc1271ABI } from "../../src/constants";
import { createPublicClientAccountResolver, type EvmCodeReader } from "../../src/resolver";
import { CONTRACT_WALLET, ownerAccount } from "../mocks";

const digest = keccak256(toHex("offline authorization"));

function createMockClient(code: `0x${string}` | undefined, data?: `0x${string}`) {
  return {
    getCode: vi.fn().mockResolvedValue(code),
    call: vi.fn().mockResolvedValue({ data }),
  } satisfies EvmCodeReader;
}

describe("createPublicClientAccountResolver", () => {
  it("should treat an address without code as a raw key", async () => {
    const client = createMockClient("0x");
    const resolver = createPublicClientAccountResolver(client);

    await expect(resolver.resolve(ownerAccount.address)).resolves.toEqual({ kind: "rawKey" });
    expect(client.getCode).toHaveBeenCalledWith({ address: ownerAccount.address });
  });

  it("should treat a missing code response as a raw key", async () => {
    const resolver = createPublicClientAccountResolver(createMockClient(undefined));

    await expect(resolver.resolve(ownerAccount.address)).resolves.toEqual({ kind: "rawKey" });
  });

  it("should call isValidSignature on an address with code", async () => {
    const client = createMockClient("0x6080", ERC1271_MAGIC_WORD);
    const resolver = createPublicClientAccountResolver(client);

    const signerKind = await resolver.resolve(CONTRACT_WALLET);
    if (signerKind.kind !== "programmable") {
      throw new Error("expected a programmable account");
    }

    await expect(signerKind.account.isValidSignature(digest, "0xdeadbeef")).resolves.toBe(
      ERC1271_MAGIC_WORD,
    );
    expect(client.call).toHaveBeenCalledWith({
      to: CONTRACT_WALLET,
      data: encodeFunctionData({
        abi: erc1271ABI,
        functionName: "isValidSignature",
        args: [digest, "0xdeadbeef"],
      }),
    });
  });

  it("should return empty data when the call returns nothing", async () => {
    const resolver = createPublicClientAccountResolver(createMockClient("0x6080"));

    const signerKind = await resolver.resolve(CONTRACT_WALLET);
    if (signerKind.kind !== "programmable") {
      throw new Error("expected a programmable account");
    }

    await expect(signerKind.account.isValidSignature(digest, "0x")).resolves.toBe("0x");
  });
});
