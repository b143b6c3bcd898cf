import { keccak_256 } from "@noble/hashes/sha3";
import { concatBytes } from "@noble/hashes/utils";
import { compareBytes } from "../utils/bytes";
import { AuthorizationError } from "./errors";

export const DEFAULT_MAX_PROOF_DEPTH = 64;

/**
 * Sorted-pair node hash: keccak256(min(a, b) || max(a, b)), comparing the
 * two 32-byte values as unsigned big-endian integers. Tree builders must use
 * the same rule.
 */
export const hashPair = (a: Uint8Array, b: Uint8Array): Uint8Array =>
  compareBytes(a, b) <= 0 ? keccak_256(concatBytes(a, b)) : keccak_256(concatBytes(b, a));

/* ── verifier side ───────────────────────────────────────── */

/**
 * Folds `leaf` through `proof` and returns the effective root. The result is
 * what the threshold signature must cover.
 */
export const include = (
  proof: readonly Uint8Array[],
  leaf: Uint8Array,
  maxDepth: number = DEFAULT_MAX_PROOF_DEPTH,
): Uint8Array => {
  if (leaf.length !== 32) throw new AuthorizationError("MalformedProof", "leaf must be 32 bytes");
  if (proof.length > maxDepth)
    throw new AuthorizationError("MalformedProof", `proof depth ${proof.length} exceeds ${maxDepth}`);
  return proof.reduce((node, sibling, i) => {
    if (sibling.length !== 32)
      throw new AuthorizationError("MalformedProof", `sibling ${i} is ${sibling.length} bytes`);
    return hashPair(node, sibling);
  }, leaf);
};

/* ── builder side ────────────────────────────────────────── */

export type MerkleTree = {
  /** layers[0] are the leaves, the last layer holds the root alone */
  readonly layers: readonly (readonly Uint8Array[])[];
  readonly root: Uint8Array;
};

export const buildMerkleTree = (leaves: readonly Uint8Array[]): MerkleTree => {
  if (leaves.length === 0) throw new RangeError("cannot build a tree without leaves");
  const layers: Uint8Array[][] = [[...leaves]];
  let level = layers[0];
  while (level.length > 1) {
    const next: Uint8Array[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = i + 1 < level.length ? level[i + 1] : left;
      next.push(hashPair(left, right));
    }
    layers.push(next);
    level = next;
  }
  return { layers, root: level[0] };
};

export const merkleRoot = (leaves: readonly Uint8Array[]): Uint8Array =>
  buildMerkleTree(leaves).root;

export const getMerkleProof = (tree: MerkleTree, index: number): Uint8Array[] => {
  const leafCount = tree.layers[0].length;
  if (!Number.isInteger(index) || index < 0 || index >= leafCount)
    throw new RangeError(`leaf index ${index} out of range`);
  const proof: Uint8Array[] = [];
  let i = index;
  for (const layer of tree.layers.slice(0, -1)) {
    const sibling = i % 2 === 0 ? i + 1 : i - 1;
    // odd tail pairs with itself
    proof.push(sibling < layer.length ? layer[sibling] : layer[i]);
    i = Math.floor(i / 2);
  }
  return proof;
};
