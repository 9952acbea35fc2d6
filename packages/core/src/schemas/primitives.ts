import { z } from "zod";
import { getAddress, isAddress, zeroAddress, type Address, type Hex } from "viem";

import { InvalidAddressError, InvalidValueError } from "../errors/catalog.js";

const BYTES32_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const HEX_BYTES_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;
const UINT_PATTERN = /^(?:0|[1-9][0-9]*)$/;

export function isBytes32(value: unknown): value is Hex {
  return typeof value === "string" && BYTES32_PATTERN.test(value);
}

export function isHexBytes(value: unknown): value is Hex {
  return typeof value === "string" && HEX_BYTES_PATTERN.test(value);
}

export function isZeroAddress(address: string): boolean {
  return address.toLowerCase() === zeroAddress;
}

/** Checksum an address, throwing InvalidAddressError on malformed input. */
export function normalizeAddress(value: string, field = "address"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new InvalidAddressError({ field, value });
  }
  return getAddress(value);
}

/** Same as normalizeAddress, but also rejects the zero address. */
export function requireNonZeroAddress(value: string, field = "address"): Address {
  const address = normalizeAddress(value, field);
  if (isZeroAddress(address)) {
    throw new InvalidAddressError({ field, reason: "zero address" });
  }
  return address;
}

export function sameAddress(a: string | null, b: string | null): boolean {
  if (a === null || b === null) return false;
  return a.toLowerCase() === b.toLowerCase();
}

/** Lowercase a bytes32 id so it keys storage consistently. */
export function normalizeBytes32(value: string, field = "id"): Hex {
  if (!isBytes32(value)) {
    throw new InvalidValueError({ field, value, reason: "expected 32-byte hex" });
  }
  const lowered = value.toLowerCase();
  return isBytes32(lowered) ? lowered : value;
}

export function byteLength(hex: Hex): number {
  return (hex.length - 2) / 2;
}

export const bytes32Schema = z
  .custom<Hex>(isBytes32, { message: "Expected 32-byte hex string" })
  .transform((value) => normalizeBytes32(value));

export const hexBytesSchema = z.custom<Hex>(isHexBytes, {
  message: "Expected 0x-prefixed hex bytes",
});

export const addressSchema = z
  .custom<Address>(
    (value) => typeof value === "string" && isAddress(value, { strict: false }),
    { message: "Expected an EVM address" },
  )
  .transform((value) => getAddress(value));

/** Non-negative integer carried as a decimal string (or a safe JS integer). */
export const uintSchema = z
  .union([
    z.string().regex(UINT_PATTERN, "Expected a non-negative integer string"),
    z.number().int().nonnegative(),
  ])
  .transform((value) => BigInt(value));
