import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { keccak_256 as keccak } from "@noble/hashes/sha3";
import { concatBytes } from "@noble/hashes/utils";
import { encTransaction, FORMAT_VERSION } from "../src/codec/rlp";
import { domainSeparator } from "../src/core/domain";
import {
  encodeTransactionData,
  getMessageHash,
  getTransactionHash,
  hashTransactionStruct,
} from "../src/core/hash";
import type { Domain } from "../src/core/types";
import { asUniqueId } from "../src/types/brands";
import { bytesToHex, compareBytes, hexToBytes } from "../src/utils/bytes";
import { mkDescriptor } from "./helpers/tx";

const domain: Domain = {
  chainId: 1n,
  verifyingContract: "0x00000000000000000000000000000000000000bb",
};

describe("Canonical hashing", () => {
  it("uses format version 1", () => {
    expect(FORMAT_VERSION).toBe(1);
  });

  it("separates domains by chain and by contract", () => {
    const base = bytesToHex(domainSeparator(domain));
    expect(bytesToHex(domainSeparator({ ...domain }))).toBe(base);
    expect(bytesToHex(domainSeparator({ ...domain, chainId: 2n }))).not.toBe(base);
    expect(
      bytesToHex(
        domainSeparator({ ...domain, verifyingContract: "0x00000000000000000000000000000000000000bc" }),
      ),
    ).not.toBe(base);
  });

  it("prefixes the struct hash with 0x1901 and the domain separator", () => {
    const tx = mkDescriptor();
    const id = asUniqueId(42n);
    const preimage = encodeTransactionData(tx, id, domain);
    expect(preimage).toHaveLength(66);
    expect(preimage).toEqual(
      concatBytes(Uint8Array.of(0x19, 0x01), domainSeparator(domain), hashTransactionStruct(tx, id)),
    );
    expect(getTransactionHash(tx, id, domain)).toEqual(keccak(preimage));
  });

  it("hashes the struct encoding", () => {
    const tx = mkDescriptor();
    const id = asUniqueId(3n);
    expect(hashTransactionStruct(tx, id)).toEqual(keccak(encTransaction(tx, id)));
  });

  it("does not collide for distinct unique ids", () => {
    fc.assert(
      fc.property(
        fc.bigUint({ max: 2n ** 256n - 1n }),
        fc.bigUint({ max: 2n ** 256n - 1n }),
        (a, b) => {
          fc.pre(a !== b);
          const tx = mkDescriptor();
          const ha = getTransactionHash(tx, asUniqueId(a), domain);
          const hb = getTransactionHash(tx, asUniqueId(b), domain);
          return compareBytes(ha, hb) !== 0;
        },
      ),
      { numRuns: 50 },
    );
  });

  it("does not confuse adjacent fields", () => {
    // identical bytes moved between value and gas fields must not collide
    const id = asUniqueId(1n);
    const a = getTransactionHash(mkDescriptor({ value: 1n, safeTxGas: 0n }), id, domain);
    const b = getTransactionHash(mkDescriptor({ value: 0n, safeTxGas: 1n }), id, domain);
    expect(compareBytes(a, b)).not.toBe(0);
  });

  it("keeps message hashes apart from transaction hashes", () => {
    const message = hexToBytes("0x68656c6c6f");
    const h1 = getMessageHash(message, domain);
    expect(h1).toHaveLength(32);
    expect(getMessageHash(message, domain)).toEqual(h1);
    expect(getMessageHash(message, { ...domain, chainId: 2n })).not.toEqual(h1);
  });
});
