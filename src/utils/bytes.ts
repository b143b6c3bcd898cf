import {
  bytesToHex as toHexNoPrefix,
  hexToBytes as fromHexNoPrefix,
} from "@noble/hashes/utils";
import type { Address, Hex } from "../core/types";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHexNoPrefix(bytes)}`;

export const hexToBytes = (hex: Hex): Uint8Array => fromHexNoPrefix(hex.slice(2));

export const isHex = (s: string): s is Hex => /^0x([0-9a-fA-F]{2})*$/.test(s);

export const isAddress = (s: string): s is Address => /^0x[0-9a-fA-F]{40}$/.test(s);

export const normalizeAddress = (a: Address): Address => `0x${a.slice(2).toLowerCase()}`;

export const sameAddress = (a: Address, b: Address): boolean =>
  normalizeAddress(a) === normalizeAddress(b);

/** Unsigned big-endian comparison of two equal-width byte strings. */
export const compareBytes = (a: Uint8Array, b: Uint8Array): number => {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
};
