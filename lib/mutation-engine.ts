import {
  DuplicateError,
  LinkError,
  NotFoundError,
  fromTransportError,
} from "@/lib/errors";
import { LinkCollection, type CollectionEntry } from "@/lib/link-collection";
import {
  applyPatch,
  buildTentativeLink,
  createTentativeId,
  isTentativeId,
  prepareDraft,
  preparePatch,
  type Link,
  type LinkDraft,
  type LinkPatch,
  type PreparedDraft,
} from "@/lib/links";

/** Who is acting. Passed in explicitly instead of read from a session global. */
export type SessionContext = {
  ownerId: string;
  accessToken?: string | null;
};

export type CreateOutcome =
  | { queued: false; link: Link }
  | { queued: true; confirmation: Promise<Link> };

export interface RemoteLinkGateway {
  createLink(context: SessionContext, draft: PreparedDraft): Promise<CreateOutcome>;
  updateLink(context: SessionContext, linkId: string, patch: LinkPatch): Promise<Link>;
  deleteLink(context: SessionContext, linkId: string): Promise<void>;
}

export type MutationEvent =
  | { type: "applied"; kind: MutationKind; linkId: string }
  | { type: "queued"; linkId: string }
  | { type: "confirmed"; kind: MutationKind; link: Link; previousId: string }
  | { type: "deleted"; linkId: string }
  | { type: "rolled-back"; kind: MutationKind; linkId: string; error: LinkError };

export type MutationKind = "create" | "update" | "delete";

type MutationObserver = (event: MutationEvent) => void;

type PendingUpdate = { seq: number; patch: LinkPatch };

type Ledger = {
  /** Last state the store acknowledged. Rebuilds start from here. */
  base: Link;
  updates: PendingUpdate[];
  inFlight: number;
};

export type MutationEngineOptions = {
  now?: () => Date;
};

const toLinkError = (error: unknown) =>
  error instanceof LinkError ? error : fromTransportError(error);

/**
 * Applies create/update/delete to the local collection first, then to the
 * store. Remote calls for one link run in sequence order; a failed call
 * rolls the entry back only while it still carries that call's sequence
 * number, otherwise later mutations are replayed on the last confirmed state.
 */
export class OptimisticMutationEngine {
  private readonly observers = new Set<MutationObserver>();
  private readonly ledgers = new Map<string, Ledger>();
  private readonly chains = new Map<string, Promise<unknown>>();
  private readonly confirmedIds = new Map<string, string>();
  private readonly chainKeys = new Map<string, string>();
  private readonly now: () => Date;

  constructor(
    private readonly collection: LinkCollection,
    private readonly gateway: RemoteLinkGateway,
    private readonly context: SessionContext,
    options: MutationEngineOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  subscribe(observer: MutationObserver) {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  get ownerId() {
    return this.context.ownerId;
  }

  /** Ids with local mutations the store has not settled yet. */
  hasPendingMutations(linkId: string) {
    const ledger = this.ledgers.get(linkId);
    return Boolean(ledger && ledger.inFlight > 0);
  }

  /**
   * Validation and the duplicate check throw synchronously; nothing is
   * inserted when they fail. The returned promise settles with the stored link.
   */
  create(draft: LinkDraft): Promise<Link> {
    const prepared = prepareDraft(draft);
    if (this.collection.hasNormalizedUrl(prepared.normalizedUrl)) {
      throw new DuplicateError(prepared.normalizedUrl);
    }

    const tentativeId = createTentativeId();
    const tentative = buildTentativeLink(
      this.context.ownerId,
      prepared,
      tentativeId,
      this.now().toISOString()
    );
    this.collection.insertAt(0, {
      key: tentativeId,
      link: tentative,
      seq: 1,
      tentative: true,
      tombstoned: false,
      queued: false,
    });
    this.ledgers.set(tentativeId, { base: tentative, updates: [], inFlight: 1 });
    this.emit({ type: "applied", kind: "create", linkId: tentativeId });

    return this.enqueue(tentativeId, () => this.runCreate(tentativeId, prepared));
  }

  update(linkId: string, patch: LinkPatch): Promise<Link> {
    const id = this.currentId(linkId);
    const entry = this.collection.find(id);
    if (!entry || entry.tombstoned) {
      throw new NotFoundError();
    }
    const prepared = preparePatch(patch);
    const seq = entry.seq + 1;
    const snapshot = entry.link;
    const ledger = this.ledgerFor(entry);
    ledger.updates.push({ seq, patch: prepared });
    ledger.inFlight += 1;

    this.collection.put(id, {
      ...entry,
      link: applyPatch(entry.link, prepared, this.now().toISOString()),
      seq,
    });
    this.emit({ type: "applied", kind: "update", linkId: id });

    return this.enqueue(id, () => this.runUpdate(id, seq, prepared, snapshot));
  }

  delete(linkId: string): Promise<void> {
    const id = this.currentId(linkId);
    const entry = this.collection.find(id);
    if (!entry || entry.tombstoned) {
      throw new NotFoundError();
    }
    const seq = entry.seq + 1;
    this.ledgerFor(entry).inFlight += 1;
    this.collection.put(id, { ...entry, tombstoned: true, seq });
    this.emit({ type: "applied", kind: "delete", linkId: id });

    return this.enqueue(id, () => this.runDelete(id, seq));
  }

  /**
   * Folds store-side changes made outside this engine (metadata enrichment)
   * into the cache without disturbing pending local edits.
   */
  acceptRemote(link: Link) {
    const id = this.currentId(link.id);
    const entry = this.collection.find(id);
    if (!entry) {
      return false;
    }
    const ledger = this.ledgers.get(id);
    if (ledger) {
      ledger.base = link;
      this.collection.put(id, { ...entry, link: this.rebuild(ledger) });
    } else {
      this.collection.put(id, { ...entry, link });
    }
    return true;
  }

  private async runCreate(tentativeId: string, draft: PreparedDraft) {
    try {
      let outcome = await this.gateway.createLink(this.context, draft);
      if (outcome.queued) {
        const entry = this.collection.find(tentativeId);
        if (entry) {
          this.collection.put(tentativeId, { ...entry, queued: true });
        }
        this.emit({ type: "queued", linkId: tentativeId });
        outcome = { queued: false, link: await outcome.confirmation };
      }
      return this.confirmCreate(tentativeId, outcome.link);
    } catch (error) {
      const linkError = toLinkError(error);
      const entry = this.collection.find(tentativeId);
      if (entry && entry.tentative) {
        this.collection.remove(tentativeId);
      }
      this.ledgers.delete(tentativeId);
      console.error("Failed to save link", linkError);
      this.emit({ type: "rolled-back", kind: "create", linkId: tentativeId, error: linkError });
      throw linkError;
    }
  }

  private confirmCreate(tentativeId: string, stored: Link) {
    const ledger = this.ledgers.get(tentativeId);
    this.ledgers.delete(tentativeId);
    this.confirmedIds.set(tentativeId, stored.id);
    this.chainKeys.set(stored.id, this.chainKeyFor(tentativeId));

    const entry = this.collection.find(tentativeId);
    if (ledger && entry) {
      ledger.base = stored;
      ledger.inFlight -= 1;
      const next: CollectionEntry = {
        ...entry,
        link: this.rebuild(ledger),
        tentative: false,
        queued: false,
      };
      this.collection.put(tentativeId, next);
      if (ledger.inFlight > 0) {
        this.ledgers.set(stored.id, ledger);
      }
    } else if (!this.collection.find(stored.id)) {
      console.warn("Saved link was no longer in the collection", stored.id);
    }

    this.emit({ type: "confirmed", kind: "create", link: stored, previousId: tentativeId });
    return stored;
  }

  private async runUpdate(
    linkId: string,
    seq: number,
    patch: LinkPatch,
    snapshot: Link
  ) {
    try {
      const remoteId = this.resolveRemoteId(linkId);
      const stored = await this.gateway.updateLink(this.context, remoteId, patch);
      const id = this.currentId(linkId);
      const ledger = this.settle(id, seq);
      const entry = this.collection.find(id);
      // a tombstoned entry still takes the stored row so a failed delete restores it
      if (entry) {
        if (entry.seq === seq || !ledger) {
          this.collection.put(id, { ...entry, link: stored });
        } else {
          ledger.base = stored;
          this.collection.put(id, { ...entry, link: this.rebuild(ledger) });
        }
      } else if (ledger) {
        ledger.base = stored;
      }
      this.emit({ type: "confirmed", kind: "update", link: stored, previousId: id });
      return stored;
    } catch (error) {
      const linkError = toLinkError(error);
      const id = this.currentId(linkId);
      const ledger = this.settle(id, seq);
      const entry = this.collection.find(id);
      if (entry) {
        // with no later edit the rebuild is exactly the pre-mutation snapshot;
        // otherwise the later edits are replayed on the last confirmed state
        const restored =
          entry.seq === seq && (!ledger || ledger.updates.length === 0)
            ? (ledger?.base ?? snapshot)
            : ledger
              ? this.rebuild(ledger)
              : snapshot;
        this.collection.put(id, { ...entry, link: restored });
      }
      console.error("Failed to update link", linkError);
      this.emit({ type: "rolled-back", kind: "update", linkId: id, error: linkError });
      throw linkError;
    }
  }

  private async runDelete(linkId: string, seq: number) {
    try {
      await this.gateway.deleteLink(this.context, this.resolveRemoteId(linkId));
      const id = this.currentId(linkId);
      this.settle(id, seq);
      this.ledgers.delete(id);
      this.collection.remove(id);
      this.emit({ type: "deleted", linkId: id });
    } catch (error) {
      const linkError = toLinkError(error);
      const id = this.currentId(linkId);
      this.settle(id, seq);
      const entry = this.collection.find(id);
      if (entry && entry.seq === seq) {
        this.collection.put(id, { ...entry, tombstoned: false });
      }
      console.error("Failed to delete link", linkError);
      this.emit({ type: "rolled-back", kind: "delete", linkId: id, error: linkError });
      throw linkError;
    }
  }

  private ledgerFor(entry: CollectionEntry) {
    const id = entry.link.id;
    let ledger = this.ledgers.get(id);
    if (!ledger) {
      ledger = { base: entry.link, updates: [], inFlight: 0 };
      this.ledgers.set(id, ledger);
    }
    return ledger;
  }

  /** Drops a finished operation from the ledger; returns the ledger if still live. */
  private settle(id: string, seq: number) {
    const ledger = this.ledgers.get(id);
    if (!ledger) {
      return null;
    }
    ledger.updates = ledger.updates.filter((update) => update.seq !== seq);
    ledger.inFlight = Math.max(0, ledger.inFlight - 1);
    if (ledger.inFlight === 0) {
      this.ledgers.delete(id);
    }
    return ledger;
  }

  private rebuild(ledger: Ledger) {
    return ledger.updates
      .slice()
      .sort((left, right) => left.seq - right.seq)
      .reduce(
        (link, update) => applyPatch(link, update.patch, link.updatedAt),
        ledger.base
      );
  }

  private currentId(id: string) {
    return this.confirmedIds.get(id) ?? id;
  }

  private resolveRemoteId(id: string) {
    const current = this.currentId(id);
    if (isTentativeId(current)) {
      throw new NotFoundError("Link was never saved");
    }
    return current;
  }

  private chainKeyFor(id: string) {
    return this.chainKeys.get(id) ?? id;
  }

  /** Runs remote calls for the same link one after another, in issue order. */
  private enqueue<T>(id: string, task: () => Promise<T>): Promise<T> {
    const key = this.chainKeyFor(id);
    const previous = this.chains.get(key) ?? Promise.resolve();
    const run = previous.then(task, task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.chains.set(key, tail);
    void tail.then(() => {
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    });
    return run;
  }

  private emit(event: MutationEvent) {
    this.observers.forEach((observer) => {
      try {
        observer(event);
      } catch (error) {
        console.error("Mutation observer failed", error);
      }
    });
  }
}
