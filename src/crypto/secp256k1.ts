import { secp256k1 } from "@noble/curves/secp256k1";
import { keccak_256 } from "@noble/hashes/sha3";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import type { Address } from "../core/types";
import { bytesToHex } from "../utils/bytes";
import { MalformedSignatureComponent, type SignatureScheme } from "./scheme";

export type PrivKey = Uint8Array;
export type PubKey = Uint8Array;

const PERSONAL_PREFIX = utf8ToBytes("\x19Ethereum Signed Message:\n32");

/** Digest an eth_sign wallet produces when asked to sign a 32-byte hash. */
export const personalMessageHash = (hash: Uint8Array): Uint8Array =>
  keccak_256(concatBytes(PERSONAL_PREFIX, hash));

export const randomPriv = (): PrivKey => secp256k1.utils.randomPrivateKey();

export const pub = (priv: PrivKey): PubKey => secp256k1.getPublicKey(priv, false);

export const addr = (pubKey: PubKey): Address =>
  bytesToHex(keccak_256(pubKey.subarray(1)).subarray(-20));

/* ── signing (off-core, used by signers and tests) ───────── */

// r || s || v with v = 27 + recovery
export const signHash = (hash: Uint8Array, priv: PrivKey): Uint8Array => {
  const sig = secp256k1.sign(hash, priv);
  return concatBytes(sig.toCompactRawBytes(), Uint8Array.of(27 + sig.recovery));
};

// eth_sign flavour: v = 31 + recovery
export const signPersonal = (hash: Uint8Array, priv: PrivKey): Uint8Array => {
  const sig = secp256k1.sign(personalMessageHash(hash), priv);
  return concatBytes(sig.toCompactRawBytes(), Uint8Array.of(31 + sig.recovery));
};

/* ── verification ────────────────────────────────────────── */

const recoverAddress = (digest: Uint8Array, compact: Uint8Array, bit: number): Address => {
  try {
    const point = secp256k1.Signature.fromCompact(compact)
      .addRecoveryBit(bit)
      .recoverPublicKey(digest);
    return addr(point.toRawBytes(false));
  } catch (err) {
    throw new MalformedSignatureComponent("unrecoverable ecdsa signature", { cause: err });
  }
};

export const secp256k1Scheme: SignatureScheme = {
  name: "secp256k1",
  signatureLength: 65,
  recover(hash, signature) {
    if (signature.length !== 65)
      throw new MalformedSignatureComponent(`expected 65 bytes, got ${signature.length}`);
    const compact = signature.subarray(0, 64);
    const v = signature[64];
    if (v === 27 || v === 28) return recoverAddress(hash, compact, v - 27);
    if (v === 31 || v === 32) return recoverAddress(personalMessageHash(hash), compact, v - 31);
    throw new MalformedSignatureComponent(`unsupported v ${v}`);
  },
};

export const signerKeyPair = () => {
  const priv = randomPriv();
  const pubKey = pub(priv);
  return { priv, pub: pubKey, address: addr(pubKey) };
};

export type SignerKeyPair = ReturnType<typeof signerKeyPair>;
