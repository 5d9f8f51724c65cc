import { describe, it, expect } from "vitest";
import { concat, hexToBigInt, hexToNumber, keccak256, numberToHex, slice, toHex } from "viem";
import type { Hex } from "@permitkit/core";
import { SECP256K1_N } from "../../src/constants";
import { recoverRawSigner } from "../../src/ecdsa";
import { ownerAccount } from "../mocks";

const digest = keccak256(toHex("offline authorization"));

/**
 * Builds the high-s twin of a signature: same signer, `s' = n - s`, flipped parity.
 *
 * @param signature - A low-s signature
 * @returns The malleated signature
 */
function malleate(signature: Hex): Hex {
  const s = hexToBigInt(slice(signature, 32, 64));
  const v = hexToNumber(slice(signature, 64, 65));
  return concat([
    slice(signature, 0, 32),
    numberToHex(SECP256K1_N - s, { size: 32 }),
    numberToHex(v === 27 ? 28 : 27, { size: 1 }),
  ]);
}

describe("recoverRawSigner", () => {
  it("should recover the signing address", async () => {
    const signature = await ownerAccount.sign({ hash: digest });

    await expect(recoverRawSigner(digest, signature, { enforceLowS: true })).resolves.toBe(
      ownerAccount.address,
    );
  });

  it("should reject the high-s twin when low-s is enforced", async () => {
    const signature = malleate(await ownerAccount.sign({ hash: digest }));

    await expect(
      recoverRawSigner(digest, signature, { enforceLowS: true }),
    ).resolves.toBeUndefined();
  });

  it("should accept the high-s twin when low-s is not enforced", async () => {
    const signature = malleate(await ownerAccount.sign({ hash: digest }));

    await expect(recoverRawSigner(digest, signature, { enforceLowS: false })).resolves.toBe(
      ownerAccount.address,
    );
  });

  it("should reject a signature that is not 65 bytes", async () => {
    const signature = await ownerAccount.sign({ hash: digest });

    await expect(
      recoverRawSigner(digest, slice(signature, 0, 64), { enforceLowS: true }),
    ).resolves.toBeUndefined();
    await expect(
      recoverRawSigner(digest, concat([signature, "0x00"]), { enforceLowS: true }),
    ).resolves.toBeUndefined();
  });

  it("should reject v outside 27 and 28", async () => {
    const signature = await ownerAccount.sign({ hash: digest });
    const withV = (v: number) => concat([slice(signature, 0, 64), numberToHex(v, { size: 1 })]);

    await expect(recoverRawSigner(digest, withV(0), { enforceLowS: true })).resolves.toBeUndefined();
    await expect(recoverRawSigner(digest, withV(29), { enforceLowS: true })).resolves.toBeUndefined();
  });

  it("should reject a zero r or s", async () => {
    const signature = await ownerAccount.sign({ hash: digest });
    const zero = numberToHex(0, { size: 32 });

    await expect(
      recoverRawSigner(digest, concat([zero, slice(signature, 32, 65)]), { enforceLowS: true }),
    ).resolves.toBeUndefined();
    await expect(
      recoverRawSigner(
        digest,
        concat([slice(signature, 0, 32), zero, slice(signature, 64, 65)]),
        { enforceLowS: false },
      ),
    ).resolves.toBeUndefined();
  });

  it("should reject an s at or above the group order", async () => {
    const signature = await ownerAccount.sign({ hash: digest });

    await expect(
      recoverRawSigner(
        digest,
        concat([slice(signature, 0, 32), numberToHex(SECP256K1_N, { size: 32 }), "0x1b"]),
        { enforceLowS: false },
      ),
    ).resolves.toBeUndefined();
  });

  it("should not recover the signer from a different digest", async () => {
    const signature = await ownerAccount.sign({ hash: digest });
    const recovered = await recoverRawSigner(keccak256(toHex("something else")), signature, {
      enforceLowS: true,
    });

    expect(recovered).not.toBe(ownerAccount.address);
  });
});
