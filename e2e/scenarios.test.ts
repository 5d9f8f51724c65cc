/**
 * End-to-end flows
 *
 * Wallets sign typed data, a relayer receives the signatures as JSON and
 * submits them to an engine over an in-memory ledger.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { privateKeyToAccount } from "viem/accounts";
import {
  AUTHORIZATION_ERROR_CODES,
  InMemoryLedger,
  type Address,
  type Clock,
} from "@permitkit/core";
import {
  AuthorizationEngine,
  buildPermitTypedData,
  buildReceiveAuthorizationTypedData,
  buildTransferAuthorizationTypedData,
  createNonce,
  parseEngineConfig,
} from "@permitkit/evm";
import { encodeSignedPayload, submitSignedPayload } from "@permitkit/wire";

const T = 1_700_000_000n;

const signerX = privateKeyToAccount(`0x${"0a".padStart(64, "0")}`);
const signerY = privateKeyToAccount(`0x${"0b".padStart(64, "0")}`);
const spenderS: Address = "0x5353535353535353535353535353535353535353";
const payeeZ: Address = "0x5a5a5a5a5a5a5a5a5a5a5a5a5a5a5a5a5a5a5a5a";
const relayer: Address = "0x7272727272727272727272727272727272727272";

const config = parseEngineConfig({
  name: "Example Token",
  version: "1",
  network: "eip155:8453",
  verifyingContract: "0x1000000000000000000000000000000000000001",
});

class StepClock implements Clock {
  current = T;

  now(): bigint {
    return this.current;
  }
}

describe("Offline authorization end to end", () => {
  let ledger: InMemoryLedger;
  let clock: StepClock;
  let engine: AuthorizationEngine;
  const domain = {
    name: config.name,
    version: config.version,
    chainId: 8453n,
    verifyingContract: config.verifyingContract,
  };

  beforeEach(() => {
    ledger = new InMemoryLedger();
    clock = new StepClock();
    engine = AuthorizationEngine.fromConfig(config, {
      ledger,
      clock,
      logger: { debug: () => undefined, warn: () => undefined, error: () => undefined },
    });
  });

  it("applies a permit once and refuses its replay", async () => {
    const signature = await signerX.signTypedData(
      buildPermitTypedData(domain, {
        owner: signerX.address,
        spender: spenderS,
        value: 1000n,
        nonce: engine.nonces(signerX.address),
        deadline: T + 3600n,
      }),
    );
    const payload = JSON.stringify(
      encodeSignedPayload({
        primaryType: "Permit",
        request: {
          owner: signerX.address,
          spender: spenderS,
          value: 1000n,
          deadline: T + 3600n,
          signature,
        },
      }),
    );

    clock.current = T + 10n;
    await submitSignedPayload(engine, JSON.parse(payload));

    expect(ledger.allowance(signerX.address, spenderS)).toBe(1000n);
    expect(engine.nonces(signerX.address)).toBe(1n);

    await expect(submitSignedPayload(engine, JSON.parse(payload))).rejects.toMatchObject({
      code: AUTHORIZATION_ERROR_CODES.INVALID_SIGNATURE,
    });
    expect(engine.nonces(signerX.address)).toBe(1n);
  });

  it("settles a transfer authorization once across transfer and receive", async () => {
    ledger.mint(signerY.address, 80n);
    const nonce = createNonce();
    const message = {
      from: signerY.address,
      to: payeeZ,
      value: 50n,
      validAfter: 0n,
      validBefore: T + 86400n,
      nonce,
    };
    const transferSignature = await signerY.signTypedData(
      buildTransferAuthorizationTypedData(domain, message),
    );
    const receiveSignature = await signerY.signTypedData(
      buildReceiveAuthorizationTypedData(domain, message),
    );

    clock.current = T + 5n;
    const result = await submitSignedPayload(
      engine,
      encodeSignedPayload({
        primaryType: "TransferWithAuthorization",
        request: { ...message, signature: transferSignature },
      }),
      { caller: relayer },
    );

    expect(result).toEqual({
      primaryType: "TransferWithAuthorization",
      event: { authorizer: signerY.address, nonce },
    });
    expect(ledger.balanceOf(payeeZ)).toBe(50n);
    expect(ledger.balanceOf(signerY.address)).toBe(30n);
    expect(engine.authorizationState(signerY.address, nonce)).toBe(true);

    await expect(
      submitSignedPayload(
        engine,
        encodeSignedPayload({
          primaryType: "ReceiveWithAuthorization",
          request: { ...message, signature: receiveSignature },
        }),
        { caller: payeeZ },
      ),
    ).rejects.toMatchObject({ code: AUTHORIZATION_ERROR_CODES.ALREADY_USED_OR_CANCELED });
    expect(ledger.balanceOf(payeeZ)).toBe(50n);
  });
});
