import { describe, it, expect, beforeEach } from "vitest";
import { TransactionAuthorizer } from "../src/core/authorizer";
import { MemoryUniqueIdStore } from "../src/core/ledger";
import { EIP1271_HASH_MAGIC_VALUE, EIP1271_MAGIC_VALUE } from "../src/core/validator";
import type { Hex } from "../src/core/types";
import { silentLogger } from "../src/logging";
import { asUniqueId } from "../src/types/brands";
import { hexToBytes } from "../src/utils/bytes";
import { mkSigners, rosterOf, sigBlob } from "./helpers/crypto";
import { mkDescriptor } from "./helpers/tx";
import { GATEWAY, MemoryWallet } from "./helpers/wallet";

describe("SignatureValidator", () => {
  const [A, B, C] = mkSigners(3);
  const data: Hex = "0x68656c6c6f"; // "hello"
  let store: MemoryUniqueIdStore;
  let authorizer: TransactionAuthorizer;

  beforeEach(async () => {
    store = new MemoryUniqueIdStore();
    authorizer = await TransactionAuthorizer.create({
      address: GATEWAY,
      chainId: 10n,
      wallet: new MemoryWallet(),
      signers: rosterOf([A, B, C]),
      threshold: 2,
      store,
      logger: silentLogger(),
    });
  });

  const signData = (signers = [A, B]) =>
    sigBlob(hexToBytes(authorizer.validator.getMessageHash(data)), signers);

  it("returns the magic value for a threshold signature", () => {
    expect(authorizer.validator.isValidSignature(data, signData())).toBe(EIP1271_MAGIC_VALUE);
    expect(EIP1271_MAGIC_VALUE).toBe("0x20c13b0b");
  });

  it("is deterministic and leaves all state untouched", () => {
    const sig = signData([B, C]);
    const first = authorizer.validator.isValidSignature(data, sig);
    const second = authorizer.validator.isValidSignature(data, sig);
    expect(second).toBe(first);
    expect(store.size).toBe(0);
    expect(authorizer.getOwners()).toEqual([A.address, B.address, C.address]);
    expect(authorizer.getThreshold()).toBe(2);
  });

  it("fails for other data", () => {
    expect(() => authorizer.validator.isValidSignature("0x68656c6c6e", signData())).toThrow(
      /^SignatureVerificationFailed/,
    );
  });

  it("fails below threshold", () => {
    expect(() => authorizer.validator.isValidSignature(data, signData([C]))).toThrow(
      /^SignatureVerificationFailed/,
    );
  });

  it("does not accept a transaction signature as a message signature", () => {
    const txHash = hexToBytes(authorizer.getTransactionHash(mkDescriptor({ data }), asUniqueId(0n)));
    expect(() => authorizer.validator.isValidSignature(data, sigBlob(txHash, [A, B]))).toThrow(
      /^SignatureVerificationFailed/,
    );
  });

  it("validates signatures over a 32-byte hash", () => {
    const hash: Hex = `0x${"ab".repeat(32)}`;
    const sig = sigBlob(hexToBytes(authorizer.validator.getMessageHash(hash)), [A, C]);
    expect(authorizer.validator.isValidHashSignature(hash, sig)).toBe(EIP1271_HASH_MAGIC_VALUE);
    expect(() => authorizer.validator.isValidHashSignature("0xabcd", sig)).toThrow(/^InvalidInput/);
  });
});
