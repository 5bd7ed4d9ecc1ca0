/**
 * IPv4 address blocks.
 *
 * Wraps `ip-address` so the rest of the evaluator only deals with parsed,
 * validated networks. IPv6 literals are rejected here; rules carry them as
 * plain strings instead.
 */

import { Address4 } from "ip-address";
import { CidrParseError } from "../errors";

// Octets written with a leading zero ("01", "010") are ambiguous and never valid.
const LEADING_ZERO_OCTET = /(^|\.)0\d/;

export class AddressBlock {
  private constructor(
    /** The literal this block was parsed from, used verbatim in messages */
    public readonly literal: string,
    private readonly network: Address4
  ) {}

  /**
   * Parse an IPv4 CIDR literal. A bare address is treated as a /32.
   *
   * @throws CidrParseError if the literal is not a valid IPv4 address or CIDR
   */
  static parse(literal: string): AddressBlock {
    const [address] = literal.trim().split("/");
    if (LEADING_ZERO_OCTET.test(address)) {
      throw new CidrParseError(literal);
    }
    try {
      return new AddressBlock(literal, new Address4(literal.trim()));
    } catch (error) {
      throw new CidrParseError(
        literal,
        error instanceof Error ? error : undefined
      );
    }
  }

  static from(value: string | AddressBlock): AddressBlock {
    return typeof value === "string" ? AddressBlock.parse(value) : value;
  }

  get prefixLength(): number {
    return this.network.subnetMask;
  }

  /** Network address with host bits cleared, e.g. "172.31.0.0" for 172.31.4.5/16 */
  get networkAddress(): string {
    return this.network.startAddress().correctForm();
  }

  /**
   * True when every address in `inner` is also in this block.
   */
  contains(inner: AddressBlock): boolean {
    return inner.network.isInSubnet(this.network);
  }

  toString(): string {
    return `${this.networkAddress}/${this.prefixLength}`;
  }
}

/**
 * Prefix containment test. String arguments are parsed first and may throw
 * {@link CidrParseError}.
 */
export function contains(
  outer: string | AddressBlock,
  inner: string | AddressBlock
): boolean {
  return AddressBlock.from(outer).contains(AddressBlock.from(inner));
}

/**
 * Orders blocks by network address, then by prefix length.
 */
export function compareAddressBlocks(a: AddressBlock, b: AddressBlock): number {
  const left = a.networkAddress.split(".").map(Number);
  const right = b.networkAddress.split(".").map(Number);

  for (let i = 0; i < 4; i++) {
    if (left[i] !== right[i]) {
      return left[i] - right[i];
    }
  }
  return a.prefixLength - b.prefixLength;
}
