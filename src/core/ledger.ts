import { AsyncLocalStorage } from "node:async_hooks";
import type { ILogger } from "../logging";
import type { UniqueId } from "../types/brands";
import { normalizeAddress, sameAddress } from "../utils/bytes";
import { AuthorizationError } from "./errors";
import type { Address } from "./types";

/* ── storage ─────────────────────────────────────────────── */

export interface UniqueIdStore {
  has(id: UniqueId): boolean;
  add(id: UniqueId): void;
  /** Only used to undo writes of an aborted call. */
  delete(id: UniqueId): void;
}

export class MemoryUniqueIdStore implements UniqueIdStore {
  private readonly ids = new Set<UniqueId>();

  has(id: UniqueId): boolean {
    return this.ids.has(id);
  }

  add(id: UniqueId): void {
    this.ids.add(id);
  }

  delete(id: UniqueId): void {
    this.ids.delete(id);
  }

  get size(): number {
    return this.ids.size;
  }
}

/* ── ledger ──────────────────────────────────────────────── */

/**
 * Sparse replay registry. An ID goes from unseen to consumed once, either by
 * use or by revocation, and later reads cannot tell which.
 */
export class UniqueIdLedger {
  /**
   * Writes of the innermost open unit. Top-level units are not serialized:
   * concurrent calls interleave at every `await` and each keeps its own
   * journal, so an abort releases only what that unit consumed.
   */
  private readonly journal = new AsyncLocalStorage<UniqueId[]>();
  /** Revocations are final; rollback never releases these. */
  private readonly revoked = new Set<UniqueId>();
  readonly owner: Address;

  constructor(
    owner: Address,
    private readonly store: UniqueIdStore = new MemoryUniqueIdStore(),
    private readonly log?: ILogger,
  ) {
    this.owner = normalizeAddress(owner);
  }

  isConsumed(id: UniqueId): boolean {
    return this.store.has(id);
  }

  consume(id: UniqueId): void {
    if (this.store.has(id)) throw new AuthorizationError("IdAlreadyConsumed", id.toString());
    this.write(id);
  }

  /** Blocks `id` ahead of use. Only the owning wallet may call this. */
  revoke(caller: Address, id: UniqueId): void {
    if (!sameAddress(caller, this.owner))
      throw new AuthorizationError("Unauthorized", `${caller} may not revoke`);
    this.revoked.add(id);
    if (!this.store.has(id)) this.store.add(id);
    this.log?.info({ uniqueId: id.toString() }, "unique id revoked");
  }

  /**
   * Runs `fn` as one all-or-nothing unit: if it throws, every ID written
   * through this ledger inside it (nested calls included) is released again.
   * An ID revoked while the unit was open stays consumed, whichever call
   * first wrote it.
   */
  async atomically<T>(fn: () => Promise<T>): Promise<T> {
    const parent = this.journal.getStore();
    const writes: UniqueId[] = [];
    try {
      const result = await this.journal.run(writes, fn);
      parent?.push(...writes);
      return result;
    } catch (err) {
      for (const id of writes.reverse()) if (!this.revoked.has(id)) this.store.delete(id);
      throw err;
    }
  }

  private write(id: UniqueId): void {
    this.store.add(id);
    this.journal.getStore()?.push(id);
  }
}
