export { TransactionAuthorizer, type AuthorizerOptions } from "./core/authorizer";
export { ThresholdSignerSet } from "./core/quorum";
export { UniqueIdLedger, MemoryUniqueIdStore, type UniqueIdStore } from "./core/ledger";
export {
  include,
  hashPair,
  buildMerkleTree,
  getMerkleProof,
  merkleRoot,
  DEFAULT_MAX_PROOF_DEPTH,
  type MerkleTree,
} from "./core/merkle";
export {
  SignatureValidator,
  EIP1271_MAGIC_VALUE,
  EIP1271_HASH_MAGIC_VALUE,
} from "./core/validator";
export { domainSeparator } from "./core/domain";
export {
  getTransactionHash,
  encodeTransactionData,
  hashTransactionStruct,
  getMessageHash,
} from "./core/hash";
export { packSignatures, type SignatureEntry } from "./core/signatures";
export {
  AuthorizationError,
  isAuthorizationError,
  type AuthorizationErrorCode,
} from "./core/errors";
export { FORMAT_VERSION } from "./codec/rlp";
export type { SignatureScheme } from "./crypto/scheme";
export { MalformedSignatureComponent } from "./crypto/scheme";
export { secp256k1Scheme, signHash, signPersonal, personalMessageHash } from "./crypto/secp256k1";
export { blsScheme, blsSign, blsPub, blsAddr, randomBlsPriv } from "./crypto/bls";
export {
  parseDescriptor,
  parseRequest,
  parseUniqueId,
  ZERO_ADDRESS,
  type DescriptorInput,
  type RequestInput,
} from "./model/validation";
export { loadConfig, type GatewayConfig } from "./config";
export { makeLogger, silentLogger, type ILogger, type LogLevel } from "./logging";
export { asUniqueId, type UniqueId } from "./types/brands";
export * from "./core/types";
