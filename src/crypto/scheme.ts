import type { Address, Signer } from "../core/types";

/**
 * Supplied signing capability. A signature blob is the concatenation of
 * `signatureLength`-byte components, one per signer.
 */
export interface SignatureScheme {
  readonly name: string;
  readonly signatureLength: number;
  /**
   * Resolves the signer of one component over `hash`.
   * Returns null when no candidate produced it; throws when the component
   * cannot be parsed at all.
   */
  recover(hash: Uint8Array, signature: Uint8Array, candidates: readonly Signer[]): Address | null;
  /** Throws when a roster entry cannot be used with this scheme. */
  checkSigner?(signer: Signer): void;
}

export class MalformedSignatureComponent extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedSignatureComponent";
  }
}
