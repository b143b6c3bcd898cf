import type { SignatureScheme } from "../crypto/scheme";
import * as v from "valibot";
import { loadConfig, type GatewayConfig } from "../config";
import { makeLogger, type ILogger } from "../logging";
import { parseRequest } from "../model/validation";
import type { UniqueId } from "../types/brands";
import { bytesToHex, hexToBytes, normalizeAddress } from "../utils/bytes";
import { domainSeparator } from "./domain";
import { AuthorizationError } from "./errors";
import { getTransactionHash } from "./hash";
import { UniqueIdLedger, type UniqueIdStore } from "./ledger";
import { DEFAULT_MAX_PROOF_DEPTH, include } from "./merkle";
import { ThresholdSignerSet } from "./quorum";
import type {
  Address,
  AuthorizationRequest,
  AuthorizationResult,
  Domain,
  Hex,
  Signer,
  TransactionDescriptor,
  WalletCollaborator,
} from "./types";
import { SignatureValidator } from "./validator";

export type AuthorizerOptions = {
  /** identity of this gateway; must already be an owner of `wallet` */
  address: Address;
  chainId: bigint;
  wallet: WalletCollaborator;
  signers: readonly Signer[];
  threshold: number;
  scheme?: SignatureScheme;
  store?: UniqueIdStore;
  logger?: ILogger;
  maxProofDepth?: number;
};

const envConfig = (): GatewayConfig => {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof v.ValiError)
      throw new AuthorizationError("InvalidInput", `environment: ${err.message}`, { cause: err });
    throw err;
  }
};

/* ──────────── authorizer ──────────── */
export class TransactionAuthorizer {
  readonly domain: Domain;
  readonly signerSet: ThresholdSignerSet;
  readonly ledger: UniqueIdLedger;
  readonly validator: SignatureValidator;
  private readonly maxProofDepth: number;

  private readonly wallet: WalletCollaborator;

  private constructor(
    opts: AuthorizerOptions,
    private readonly log: ILogger,
  ) {
    this.wallet = opts.wallet;
    this.domain = { chainId: opts.chainId, verifyingContract: normalizeAddress(opts.address) };
    this.signerSet = new ThresholdSignerSet(opts.scheme);
    this.ledger = new UniqueIdLedger(opts.wallet.address, opts.store, log);
    this.validator = new SignatureValidator(this.signerSet, this.domain);
    this.maxProofDepth = opts.maxProofDepth ?? DEFAULT_MAX_PROOF_DEPTH;
  }

  /**
   * Sets up the signer roster, then confirms the gateway is a recognised
   * owner of the wallet it guards.
   */
  static async create(opts: AuthorizerOptions): Promise<TransactionAuthorizer> {
    // the environment only fills in what the caller left out
    const config =
      opts.logger && opts.maxProofDepth !== undefined ? undefined : envConfig();
    const log =
      opts.logger ?? makeLogger(config?.logLevel, { pretty: config?.logPretty });
    const authorizer = new TransactionAuthorizer(
      { ...opts, maxProofDepth: opts.maxProofDepth ?? config?.maxProofDepth },
      log,
    );
    authorizer.signerSet.initialize(opts.signers, opts.threshold);

    if (!(await opts.wallet.isOwner(authorizer.address)))
      throw new AuthorizationError(
        "NotOwnerOfWallet",
        `${authorizer.address} is not an owner of ${opts.wallet.address}`,
      );

    log.info(
      {
        gateway: authorizer.address,
        wallet: opts.wallet.address,
        chainId: opts.chainId.toString(),
        signers: authorizer.signerSet.getOwners().length,
        threshold: opts.threshold,
        scheme: authorizer.signerSet.scheme.name,
      },
      "authorizer initialized",
    );
    return authorizer;
  }

  get address(): Address {
    return this.domain.verifyingContract;
  }

  get domainSeparator(): Hex {
    return bytesToHex(domainSeparator(this.domain));
  }

  getOwners(): Address[] {
    return this.signerSet.getOwners();
  }

  getThreshold(): number {
    return this.signerSet.getThreshold();
  }

  isConsumed(id: UniqueId): boolean {
    return this.ledger.isConsumed(id);
  }

  getTransactionHash(descriptor: TransactionDescriptor, uniqueId: UniqueId): Hex {
    return bytesToHex(getTransactionHash(descriptor, uniqueId, this.domain));
  }

  revoke(caller: Address, id: UniqueId): void {
    this.ledger.revoke(caller, id);
  }

  /**
   * One-shot authorization: verify, consume the unique ID, then hand the
   * descriptor to the wallet. The ID stays consumed when the wallet reports
   * failure; it is released only if the whole call aborts.
   */
  async authorize(request: AuthorizationRequest): Promise<AuthorizationResult> {
    const req = parseRequest(request);
    const id = req.uniqueId;
    return this.ledger.atomically(async () => {
      if (this.ledger.isConsumed(id)) throw new AuthorizationError("IdAlreadyConsumed", id.toString());

      const txHash = getTransactionHash(req.descriptor, id, this.domain);
      const signedHash = req.proof
        ? include(req.proof.map(hexToBytes), txHash, this.maxProofDepth)
        : txHash;
      const signers = this.signerSet.verify(signedHash, hexToBytes(req.signatures));

      // consume before executing: a re-entrant call must already see it
      this.ledger.consume(id);

      const result = await this.wallet.execute(req.descriptor, req.walletSignatures ?? "0x");
      const out: AuthorizationResult = {
        ...result,
        uniqueId: id,
        txHash: bytesToHex(txHash),
        signedHash: bytesToHex(signedHash),
        signers,
      };
      const fields = { uniqueId: id.toString(), txHash: out.txHash, batched: req.proof !== undefined };
      if (result.success) this.log.info(fields, "execution success");
      else this.log.info(fields, "execution failure");
      return out;
    });
  }
}
