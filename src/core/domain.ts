import { keccak_256 } from "@noble/hashes/sha3";
import { encDomain } from "../codec/rlp";
import type { Domain } from "./types";

/**
 * Binds signed payloads to one deployment on one chain. Two domains that
 * differ in either field never share a separator.
 */
export const domainSeparator = (domain: Domain): Uint8Array => keccak_256(encDomain(domain));
