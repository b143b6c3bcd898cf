import { bls12_381 as bls } from "@noble/curves/bls12-381";
import { keccak_256 } from "@noble/hashes/sha3";
import type { Address } from "../core/types";
import { bytesToHex, hexToBytes } from "../utils/bytes";
import { MalformedSignatureComponent, type SignatureScheme } from "./scheme";

export const randomBlsPriv = (): Uint8Array => bls.utils.randomPrivateKey();

export const blsPub = (priv: Uint8Array): Uint8Array => bls.getPublicKey(priv);

// BLS keys carry no address of their own; derive a stable handle from the key
export const blsAddr = (pubKey: Uint8Array): Address =>
  bytesToHex(keccak_256(pubKey).subarray(-20));

export const blsSign = (hash: Uint8Array, priv: Uint8Array): Uint8Array => bls.sign(hash, priv);

/**
 * Short-public-key BLS (G1 keys, 96-byte G2 signatures). Signatures do not
 * identify their signer, so each roster key is tried in order.
 */
export const blsScheme: SignatureScheme = {
  name: "bls12-381",
  signatureLength: 96,
  recover(hash, signature, candidates) {
    try {
      bls.G2.ProjectivePoint.fromHex(signature);
    } catch (err) {
      throw new MalformedSignatureComponent("invalid bls signature point", { cause: err });
    }
    for (const member of candidates) {
      if (member.pubKey && bls.verify(signature, hash, hexToBytes(member.pubKey)))
        return member.address;
    }
    return null;
  },
  checkSigner(signer) {
    if (!signer.pubKey) throw new Error(`signer ${signer.address} has no bls public key`);
    bls.G1.ProjectivePoint.fromHex(hexToBytes(signer.pubKey));
  },
};
