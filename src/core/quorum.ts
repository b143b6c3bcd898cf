import { MalformedSignatureComponent, type SignatureScheme } from "../crypto/scheme";
import { secp256k1Scheme } from "../crypto/secp256k1";
import { bytesToHex, normalizeAddress } from "../utils/bytes";
import { AuthorizationError } from "./errors";
import type { Address, Signer, SignerRoster } from "./types";

/**
 * Fixed roster of signers plus the number of them that must sign.
 * Initialized exactly once; verification never mutates it.
 */
export class ThresholdSignerSet {
  private roster: SignerRoster | null = null;
  private index = new Map<Address, number>();

  constructor(readonly scheme: SignatureScheme = secp256k1Scheme) {}

  get isInitialized(): boolean {
    return this.roster !== null;
  }

  initialize(signers: readonly Signer[], threshold: number): void {
    if (this.roster) throw new AuthorizationError("AlreadyInitialized");
    if (!Number.isInteger(threshold) || threshold < 1 || threshold > signers.length)
      throw new AuthorizationError(
        "InvalidThreshold",
        `threshold ${threshold} for ${signers.length} signer(s)`,
      );

    const index = new Map<Address, number>();
    const normalized = signers.map((s, i): Signer => {
      const address = normalizeAddress(s.address);
      if (index.has(address)) throw new AuthorizationError("DuplicateSigner", address);
      try {
        this.scheme.checkSigner?.(s);
      } catch (err) {
        throw new AuthorizationError("InvalidInput", `signer ${address}`, { cause: err });
      }
      index.set(address, i);
      return s.pubKey ? { address, pubKey: s.pubKey } : { address };
    });

    this.index = index;
    this.roster = { threshold, signers: normalized };
  }

  getOwners(): Address[] {
    return this.roster ? this.roster.signers.map((s) => s.address) : [];
  }

  getThreshold(): number {
    return this.roster ? this.roster.threshold : 0;
  }

  isOwner(address: Address): boolean {
    return this.index.has(normalizeAddress(address));
  }

  /** Roster position of `address`, -1 when not a member. */
  positionOf(address: Address): number {
    return this.index.get(normalizeAddress(address)) ?? -1;
  }

  /**
   * Checks `blob` over `hash` and returns the signers in roster order.
   * Every component must be well formed, belong to a roster member, and
   * appear strictly after the previous one.
   */
  verify(hash: Uint8Array, blob: Uint8Array): Address[] {
    const roster = this.roster;
    if (!roster) throw new AuthorizationError("SignatureVerificationFailed", "signer set not initialized");

    const width = this.scheme.signatureLength;
    if (blob.length % width !== 0)
      throw new AuthorizationError(
        "MalformedSignatureBlob",
        `length ${blob.length} is not a multiple of ${width}`,
      );
    const count = blob.length / width;
    if (count > roster.signers.length)
      throw new AuthorizationError(
        "MalformedSignatureBlob",
        `${count} signatures for ${roster.signers.length} signer(s)`,
      );
    if (count < roster.threshold)
      throw new AuthorizationError(
        "SignatureVerificationFailed",
        `${count} of ${roster.threshold} required signatures`,
      );

    const signers: Address[] = [];
    let last = -1;
    for (let i = 0; i < count; i++) {
      const component = blob.subarray(i * width, (i + 1) * width);
      const signer = this.recoverOne(hash, component, roster.signers.slice(last + 1), i);
      if (signer === null)
        throw new AuthorizationError("SignatureVerificationFailed", `signature ${i} has no roster signer`);
      const position = this.positionOf(signer);
      if (position < 0)
        throw new AuthorizationError("SignatureVerificationFailed", `${signer} is not a signer`);
      if (position <= last)
        throw new AuthorizationError(
          "SignatureVerificationFailed",
          `${signer} out of roster order or repeated`,
        );
      last = position;
      signers.push(roster.signers[position].address);
    }
    return signers;
  }

  /** Boolean form of `verify`; only signature failures map to false. */
  check(hash: Uint8Array, blob: Uint8Array): boolean {
    try {
      this.verify(hash, blob);
      return true;
    } catch (err) {
      if (err instanceof AuthorizationError) return false;
      throw err;
    }
  }

  private recoverOne(
    hash: Uint8Array,
    component: Uint8Array,
    candidates: readonly Signer[],
    i: number,
  ): Address | null {
    try {
      return this.scheme.recover(hash, component, candidates);
    } catch (err) {
      if (err instanceof MalformedSignatureComponent)
        throw new AuthorizationError(
          "MalformedSignatureBlob",
          `signature ${i} (${bytesToHex(component.subarray(0, 8))}…): ${err.message}`,
          { cause: err },
        );
      throw err;
    }
  }
}
