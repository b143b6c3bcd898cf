import { describe, it, expect } from "vitest";
import { ValiError } from "valibot";
import { loadConfig } from "../src/config";
import { Operation } from "../src/core/types";
import { parseDescriptor, parseRequest, parseUniqueId, ZERO_ADDRESS } from "../src/model/validation";
import { codeOf } from "./helpers/errors";

describe("Input validation", () => {
  describe("parseDescriptor", () => {
    it("fills defaults and lower-cases addresses", () => {
      expect(parseDescriptor({ to: "0x00000000000000000000000000000000000000AB" })).toEqual({
        to: "0x00000000000000000000000000000000000000ab",
        value: 0n,
        data: "0x",
        operation: Operation.Call,
        safeTxGas: 0n,
        baseGas: 0n,
        gasPrice: 0n,
        gasToken: ZERO_ADDRESS,
        refundReceiver: ZERO_ADDRESS,
      });
    });

    it("accepts decimal, hex and number amounts", () => {
      const d = parseDescriptor({
        to: ZERO_ADDRESS,
        value: "0x10",
        safeTxGas: "250",
        baseGas: 7,
        gasPrice: 3n,
        operation: 1,
      });
      expect([d.value, d.safeTxGas, d.baseGas, d.gasPrice]).toEqual([16n, 250n, 7n, 3n]);
      expect(d.operation).toBe(Operation.DelegateCall);
    });

    it.each([
      { to: "0x1234" },
      { to: ZERO_ADDRESS, value: -1 },
      { to: ZERO_ADDRESS, value: 2n ** 256n },
      { to: ZERO_ADDRESS, data: "0xabc" },
      { to: ZERO_ADDRESS, operation: 2 },
      { to: ZERO_ADDRESS, gasPrice: 1.5 },
    ])("rejects %o", (input) => {
      expect(codeOf(() => parseDescriptor(input))).toBe("InvalidInput");
    });
  });

  describe("parseUniqueId", () => {
    it("accepts the full 256-bit range", () => {
      expect(parseUniqueId(42)).toBe(42n);
      expect(parseUniqueId("0x2a")).toBe(42n);
      expect(parseUniqueId(2n ** 256n - 1n)).toBe(2n ** 256n - 1n);
    });

    it("rejects values outside it", () => {
      expect(codeOf(() => parseUniqueId(2n ** 256n))).toBe("InvalidInput");
      expect(codeOf(() => parseUniqueId("-1"))).toBe("InvalidInput");
    });
  });

  describe("parseRequest", () => {
    it("requires 32-byte proof entries", () => {
      const base = { descriptor: { to: ZERO_ADDRESS }, uniqueId: 1, signatures: "0x" };
      expect(parseRequest(base).walletSignatures).toBe("0x");
      expect(codeOf(() => parseRequest({ ...base, proof: ["0x01"] }))).toBe("InvalidInput");
    });
  });
});

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ logLevel: "info", logPretty: false, maxProofDepth: 64 });
  });

  it("reads overrides", () => {
    expect(loadConfig({ LOG_LEVEL: "debug", LOG_PRETTY: "1", MAX_PROOF_DEPTH: "16" })).toEqual({
      logLevel: "debug",
      logPretty: true,
      maxProofDepth: 16,
    });
  });

  it("rejects unknown values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ValiError);
    expect(() => loadConfig({ MAX_PROOF_DEPTH: "0" })).toThrow(ValiError);
  });
});
