import { keccak_256 } from "@noble/hashes/sha3";
import { concatBytes } from "@noble/hashes/utils";
import { encMessage, encTransaction } from "../codec/rlp";
import type { UniqueId } from "../types/brands";
import { domainSeparator } from "./domain";
import type { Domain, TransactionDescriptor } from "./types";

/* ── 0x19 0x01 || domainSeparator || structHash ───────────── */
const SIGNING_PREFIX = Uint8Array.of(0x19, 0x01);

const prefixed = (domain: Domain, structHash: Uint8Array): Uint8Array =>
  concatBytes(SIGNING_PREFIX, domainSeparator(domain), structHash);

/* ── transaction struct hash ─────────────────────────────── */
export const hashTransactionStruct = (tx: TransactionDescriptor, uniqueId: UniqueId): Uint8Array =>
  keccak_256(encTransaction(tx, uniqueId));

/** Pre-image handed to off-chain signers. */
export const encodeTransactionData = (
  tx: TransactionDescriptor,
  uniqueId: UniqueId,
  domain: Domain,
): Uint8Array => prefixed(domain, hashTransactionStruct(tx, uniqueId));

/* ── canonical transaction hash ──────────────────────────── */
export const getTransactionHash = (
  tx: TransactionDescriptor,
  uniqueId: UniqueId,
  domain: Domain,
): Uint8Array => keccak_256(encodeTransactionData(tx, uniqueId, domain));

/* ── off-chain message hash (isValidSignature path) ──────── */
export const getMessageHash = (message: Uint8Array, domain: Domain): Uint8Array =>
  keccak_256(prefixed(domain, keccak_256(encMessage(message))));
