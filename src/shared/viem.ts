import { getAddress, isAddress, zeroAddress, type Address } from "viem";

export const addressPattern = /^0x[a-fA-F0-9]{40}$/;

export { zeroAddress };

/** Checksums an address so map keys and stored documents agree on one spelling. */
export function asAddress(value: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new Error(`invalid-address: ${value}`);
  }
  return getAddress(value);
}

export function isZeroAddress(value: Address): boolean {
  return value.toLowerCase() === zeroAddress;
}
