// Canonical signing format. Pure RLP encode helpers over fixed-order field lists.

import { encode as rlpEncode, type Input } from "rlp";
import { keccak_256 } from "@noble/hashes/sha3";
import type { UniqueId } from "../types/brands";
import type { Domain, TransactionDescriptor } from "../core/types";
import { hexToBytes } from "../utils/bytes";

/* — format constants — */
export const FORMAT_VERSION = 1;
export const DOMAIN_TAG = "ThresholdGateway/Domain";
export const TX_TYPE_TAG = "ThresholdGateway/Transaction";
export const MESSAGE_TYPE_TAG = "ThresholdGateway/Message";

const enc = (fields: Input[]): Uint8Array => rlpEncode(fields);

/* — domain — */
export const encDomain = (d: Domain): Uint8Array =>
  enc([DOMAIN_TAG, FORMAT_VERSION, d.chainId, hexToBytes(d.verifyingContract)]);

/* — transaction struct — */
export const encTransaction = (tx: TransactionDescriptor, uniqueId: UniqueId): Uint8Array =>
  enc([
    TX_TYPE_TAG,
    FORMAT_VERSION,
    hexToBytes(tx.to),
    tx.value,
    keccak_256(hexToBytes(tx.data)),
    tx.operation,
    tx.safeTxGas,
    tx.baseGas,
    tx.gasPrice,
    hexToBytes(tx.gasToken),
    hexToBytes(tx.refundReceiver),
    uniqueId,
  ]);

/* — off-chain message — */
export const encMessage = (message: Uint8Array): Uint8Array =>
  enc([MESSAGE_TYPE_TAG, FORMAT_VERSION, keccak_256(message)]);
