import * as v from "valibot";
import { MAX_UINT256, asUniqueId, type UniqueId } from "../types/brands";
import { AuthorizationError } from "../core/errors";
import {
  Operation,
  type Address,
  type AuthorizationRequest,
  type Hex,
  type TransactionDescriptor,
} from "../core/types";
import { isAddress, isHex, normalizeAddress } from "../utils/bytes";

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export const hexSchema = v.custom<Hex>(
  (s) => typeof s === "string" && isHex(s),
  "expected 0x-prefixed hex with whole bytes",
);

export const hash32Schema = v.pipe(hexSchema, v.length(66, "expected a 32-byte hash"));

export const addressSchema = v.pipe(
  v.custom<Address>((s) => typeof s === "string" && isAddress(s), "expected a 20-byte address"),
  v.transform(normalizeAddress),
);

export const uint256Schema = v.pipe(
  v.union([
    v.bigint(),
    v.pipe(v.number(), v.integer()),
    v.pipe(v.string(), v.regex(/^(0x[0-9a-fA-F]+|\d+)$/)),
  ]),
  v.transform((x) => BigInt(x)),
  v.minValue(0n),
  v.maxValue(MAX_UINT256),
);

export const uniqueIdSchema = v.pipe(uint256Schema, v.transform<bigint, UniqueId>(asUniqueId));

export const descriptorSchema = v.object({
  to: addressSchema,
  value: v.optional(uint256Schema, 0n),
  data: v.optional(hexSchema, "0x"),
  operation: v.optional(v.enum(Operation), Operation.Call),
  safeTxGas: v.optional(uint256Schema, 0n),
  baseGas: v.optional(uint256Schema, 0n),
  gasPrice: v.optional(uint256Schema, 0n),
  gasToken: v.optional(addressSchema, ZERO_ADDRESS),
  refundReceiver: v.optional(addressSchema, ZERO_ADDRESS),
});

export const requestSchema = v.object({
  descriptor: descriptorSchema,
  uniqueId: uniqueIdSchema,
  signatures: hexSchema,
  proof: v.optional(v.array(hash32Schema)),
  walletSignatures: v.optional(hexSchema, "0x"),
});

export type DescriptorInput = v.InferInput<typeof descriptorSchema>;
export type RequestInput = v.InferInput<typeof requestSchema>;

const parseOrThrow = <S extends v.GenericSchema>(schema: S, input: unknown, what: string) => {
  const result = v.safeParse(schema, input);
  if (!result.success) {
    const issues = result.issues
      .map((i) => `${v.getDotPath(i) ?? what}: ${i.message}`)
      .join("; ");
    throw new AuthorizationError("InvalidInput", `${what}: ${issues}`);
  }
  return result.output;
};

export const parseDescriptor = (input: unknown): TransactionDescriptor =>
  parseOrThrow(descriptorSchema, input, "descriptor");

export const parseUniqueId = (input: unknown): UniqueId =>
  parseOrThrow(uniqueIdSchema, input, "uniqueId");

export const parseRequest = (input: unknown): AuthorizationRequest =>
  parseOrThrow(requestSchema, input, "request");
