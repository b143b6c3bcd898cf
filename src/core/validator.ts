import { bytesToHex, hexToBytes, isHex } from "../utils/bytes";
import { AuthorizationError } from "./errors";
import { getMessageHash } from "./hash";
import type { ThresholdSignerSet } from "./quorum";
import type { Domain, Hex } from "./types";

/** isValidSignature(bytes,bytes) success marker */
export const EIP1271_MAGIC_VALUE: Hex = "0x20c13b0b";
/** isValidSignature(bytes32,bytes) success marker */
export const EIP1271_HASH_MAGIC_VALUE: Hex = "0x1626ba7e";

const bytesOf = (h: string, what: string): Uint8Array => {
  if (!isHex(h)) throw new AuthorizationError("InvalidInput", `${what} is not hex`);
  return hexToBytes(h);
};

/**
 * Read-only "is this blob signed by our roster" query for the guarded
 * wallet's own signature dispatch. Touches neither the ledger nor the roster.
 */
export class SignatureValidator {
  constructor(
    private readonly signerSet: ThresholdSignerSet,
    private readonly domain: Domain,
  ) {}

  /** Hash the roster is expected to have signed for `data`. */
  getMessageHash(data: Hex): Hex {
    return bytesToHex(getMessageHash(bytesOf(data, "data"), this.domain));
  }

  isValidSignature(data: Hex, signature: Hex): Hex {
    const digest = getMessageHash(bytesOf(data, "data"), this.domain);
    this.signerSet.verify(digest, bytesOf(signature, "signature"));
    return EIP1271_MAGIC_VALUE;
  }

  isValidHashSignature(hash: Hex, signature: Hex): Hex {
    const raw = bytesOf(hash, "hash");
    if (raw.length !== 32) throw new AuthorizationError("InvalidInput", "hash must be 32 bytes");
    this.signerSet.verify(getMessageHash(raw, this.domain), bytesOf(signature, "signature"));
    return EIP1271_HASH_MAGIC_VALUE;
  }
}
