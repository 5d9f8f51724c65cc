import { describe, it, expect } from "vitest";
import {
  CANCEL_AUTHORIZATION_TYPEHASH,
  EIP712_DOMAIN_TYPEHASH,
  ERC1271_MAGIC_WORD,
  PERMIT_TYPEHASH,
  RECEIVE_WITH_AUTHORIZATION_TYPEHASH,
  SECP256K1_HALF_N,
  TRANSFER_WITH_AUTHORIZATION_TYPEHASH,
} from "../../src/constants";

describe("EVM Constants", () => {
  describe("type-hashes", () => {
    it("should match the EIP-712 domain type-hash", () => {
      expect(EIP712_DOMAIN_TYPEHASH).toBe(
        "0x8b73c3c69bb8fe3d512ecc4cf759cc79239f7b179b0ffacaa9a75d522b39400f",
      );
    });

    it("should match the EIP-2612 Permit type-hash", () => {
      expect(PERMIT_TYPEHASH).toBe(
        "0x6e71edae12b1b97f4d1f60370fef10105fa2faae0126114a169c64845d6126c9",
      );
    });

    it("should match the EIP-3009 type-hashes", () => {
      expect(TRANSFER_WITH_AUTHORIZATION_TYPEHASH).toBe(
        "0x7c7c6cdb67a18743f49ec6fa9b35f50d52ed05cbed4cc592e13b44501c1a2267",
      );
      expect(RECEIVE_WITH_AUTHORIZATION_TYPEHASH).toBe(
        "0xd099cc98ef71107a616c4f0f941f04c322d8e254fe26b3c6668db87aae413de8",
      );
      expect(CANCEL_AUTHORIZATION_TYPEHASH).toBe(
        "0x158b0a9edf7a828aad02f63cd515c68ef2f50ba807396f6d12842833a1597429",
      );
    });

    it("should give transfer and receive distinct type-hashes", () => {
      expect(TRANSFER_WITH_AUTHORIZATION_TYPEHASH).not.toBe(RECEIVE_WITH_AUTHORIZATION_TYPEHASH);
    });
  });

  it("should pad the ERC-1271 magic value to one ABI word", () => {
    expect(ERC1271_MAGIC_WORD).toBe(
      "0x1626ba7e00000000000000000000000000000000000000000000000000000000",
    );
  });

  it("should halve the secp256k1 order", () => {
    expect(SECP256K1_HALF_N).toBe(
      0x7fffffffffffffffffffffffffffffff5d576e7357a4501ddfe92f46681b20a0n,
    );
  });
});
