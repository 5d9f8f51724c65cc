import { encodeAbiParameters, keccak256, parseAbiParameters, toHex } from "viem";
import { normalizeAddress, type Hex } from "@permitkit/core";
import { EIP712_DOMAIN_FIELDS, EIP712_DOMAIN_TYPEHASH } from "./constants";
import type { AuthorizationDomain, Eip712DomainDescription, NetworkIdentity } from "./types";

const DOMAIN_PARAMETERS = parseAbiParameters("bytes32, bytes32, bytes32, uint256, address");
const ZERO_SALT: Hex = `0x${"00".repeat(32)}`;

/**
 * Computes the EIP-712 domain separator of one deployment.
 *
 * @param domain - Name, version, chain id and verifying contract
 * @returns The 32-byte domain separator
 */
export function hashAuthorizationDomain(domain: AuthorizationDomain): Hex {
  return keccak256(
    encodeAbiParameters(DOMAIN_PARAMETERS, [
      EIP712_DOMAIN_TYPEHASH,
      keccak256(toHex(domain.name)),
      keccak256(toHex(domain.version)),
      domain.chainId,
      normalizeAddress(domain.verifyingContract),
    ]),
  );
}

/**
 * Binds signatures to a protocol name/version and to the current network and deployment.
 *
 * Nothing is cached: the chain id and verifying contract are read from the
 * {@link NetworkIdentity} on every call, so the separator follows a chain split.
 */
export class DomainSeparatorProvider {
  /**
   * Creates a DomainSeparatorProvider.
   *
   * @param name - EIP-712 domain name
   * @param version - EIP-712 domain version
   * @param network - Source of the current chain id and deployment address
   */
  constructor(
    readonly name: string,
    readonly version: string,
    private readonly network: NetworkIdentity,
  ) {}

  /**
   * The domain as of now.
   *
   * @returns Name, version, current chain id and verifying contract
   */
  domain(): AuthorizationDomain {
    return {
      name: this.name,
      version: this.version,
      chainId: this.network.chainId(),
      verifyingContract: this.network.verifyingContract(),
    };
  }

  /**
   * Computes the current domain separator.
   *
   * @returns The 32-byte domain separator
   */
  domainSeparator(): Hex {
    return hashAuthorizationDomain(this.domain());
  }

  /**
   * Describes the domain the way EIP-5267 `eip712Domain()` does.
   *
   * @returns The domain fields bitmap and values
   */
  eip712Domain(): Eip712DomainDescription {
    return {
      fields: EIP712_DOMAIN_FIELDS,
      ...this.domain(),
      salt: ZERO_SALT,
      extensions: [],
    };
  }
}

/**
 * Builds a NetworkIdentity that never changes.
 *
 * @param chainId - The chain id
 * @param verifyingContract - The deployment address
 * @returns A fixed identity
 */
export function staticNetworkIdentity(
  chainId: bigint | number,
  verifyingContract: `0x${string}`,
): NetworkIdentity {
  const id = BigInt(chainId);
  return {
    chainId: () => id,
    verifyingContract: () => verifyingContract,
  };
}
