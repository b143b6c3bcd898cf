import { concatBytes } from "@noble/hashes/utils";
import { bytesToHex, normalizeAddress } from "../utils/bytes";
import type { Address, Hex } from "./types";

export type SignatureEntry = {
  signer: Address;
  signature: Uint8Array;
};

/**
 * Orders collected signatures by the signer's roster position and
 * concatenates them into the blob `ThresholdSignerSet.verify` expects.
 */
export const packSignatures = (
  roster: readonly Address[],
  entries: readonly SignatureEntry[],
): Hex => {
  const position = new Map(roster.map((a, i) => [normalizeAddress(a), i]));
  const ordered = entries.map((e) => {
    const at = position.get(normalizeAddress(e.signer));
    if (at === undefined) throw new RangeError(`${e.signer} is not in the roster`);
    return { at, signature: e.signature };
  });
  ordered.sort((a, b) => a.at - b.at);
  return bytesToHex(concatBytes(...ordered.map((e) => e.signature)));
};
