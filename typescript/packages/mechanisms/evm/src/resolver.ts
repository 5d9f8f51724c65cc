import { encodeFunctionData } from "viem";
import type { Address, Hex } from "@permitkit/core";
import { erc1271ABI } from "./constants";
import type { AccountResolver, SignerKind } from "./types";

/**
 * Chain reads needed to probe accounts. A viem PublicClient satisfies it.
 */
export type EvmCodeReader = {
  getCode(args: { address: Address }): Promise<Hex | undefined>;
  call(args: { to: Address; data: Hex }): Promise<{ data?: Hex }>;
};

/**
 * Resolves signers against chain state: an address with deployed code is a
 * programmable account whose ERC-1271 `isValidSignature` is reached by `eth_call`.
 *
 * @param client - Chain reader, typically a viem PublicClient
 * @returns An AccountResolver backed by the chain
 *
 * @example
 * ```typescript
 * const client = createPublicClient({ chain: base, transport: http() });
 * const accounts = createPublicClientAccountResolver(client);
 * ```
 */
export function createPublicClientAccountResolver(client: EvmCodeReader): AccountResolver {
  return {
    async resolve(address: Address): Promise<SignerKind> {
      const code = await client.getCode({ address });
      if (code === undefined || code === "0x") {
        return { kind: "rawKey" };
      }

      return {
        kind: "programmable",
        account: {
          async isValidSignature(digest: Hex, signature: Hex): Promise<Hex> {
            const { data } = await client.call({
              to: address,
              data: encodeFunctionData({
                abi: erc1271ABI,
                functionName: "isValidSignature",
                args: [digest, signature],
              }),
            });
            return data ?? "0x";
          },
        },
      };
    },
  };
}
