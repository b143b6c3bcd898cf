import type { UniqueId } from "../types/brands";

export type Hex = `0x${string}`;
export type Address = `0x${string}`;

/* ── transaction descriptor ──────────────────────────────── */
export enum Operation {
  Call = 0,
  DelegateCall = 1,
}

export type TransactionDescriptor = {
  to: Address;
  value: bigint;
  data: Hex;
  operation: Operation;
  safeTxGas: bigint;
  baseGas: bigint;
  gasPrice: bigint;
  gasToken: Address;
  refundReceiver: Address;
};

/* ── signing domain ──────────────────────────────────────── */
export type Domain = {
  chainId: bigint;
  verifyingContract: Address;
};

/* ── signer roster ───────────────────────────────────────── */
export type Signer = {
  address: Address;
  pubKey?: Hex; // only for schemes that cannot recover an address
};

export type SignerRoster = {
  readonly threshold: number;
  readonly signers: readonly Signer[];
};

/* ── authorization request / result ──────────────────────── */
export type AuthorizationRequest = {
  descriptor: TransactionDescriptor;
  uniqueId: UniqueId;
  signatures: Hex;
  proof?: readonly Hex[];
  walletSignatures?: Hex; // forwarded untouched to the wallet
};

export type ExecutionResult = {
  success: boolean;
  returnData?: Hex;
};

export type AuthorizationResult = ExecutionResult & {
  uniqueId: UniqueId;
  txHash: Hex; // canonical hash of the descriptor
  signedHash: Hex; // what the signers actually signed (root when batched)
  signers: Address[];
};

/* ── external collaborators ──────────────────────────────── */
export interface WalletCollaborator {
  readonly address: Address;
  isOwner(address: Address): Promise<boolean>;
  execute(
    descriptor: TransactionDescriptor,
    walletSignatures: Hex,
  ): Promise<ExecutionResult>;
}
