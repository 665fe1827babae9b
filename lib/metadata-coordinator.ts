import {
  METADATA_MAX_ATTEMPTS,
  METADATA_RETRY_BATCH_SIZE,
  METADATA_RETRY_MIN_INTERVAL_MS,
  METADATA_SWEEP_DEBOUNCE_MS,
  DEFAULT_METADATA_FETCH_TIMEOUT_MS,
} from "@/lib/config";
import {
  ExhaustedRetriesError,
  LinkError,
  NetworkError,
  fromTransportError,
} from "@/lib/errors";
import type { SessionContext } from "@/lib/mutation-engine";
import type { Link, LinkMetadata, MetadataState } from "@/lib/links";

export type MetadataStatus =
  | "pending"
  | "fetching"
  | "complete"
  | "awaiting-retry"
  | "exhausted";

export type RetryTrigger = "foreground" | "online" | "user-refresh";

/** Durable home of the attempt counter. Every retry decision reads from here. */
export interface MetadataAttemptStore {
  /** Counts an attempt before it runs; null when the budget is already spent. */
  recordAttempt(context: SessionContext, linkId: string, at: Date): Promise<MetadataState | null>;
  complete(context: SessionContext, linkId: string, metadata: LinkMetadata): Promise<Link>;
  reset(context: SessionContext, linkId: string): Promise<MetadataState>;
  listIncomplete(context: SessionContext, limit: number): Promise<Link[]>;
}

export type MetadataFetcher = (url: string, signal: AbortSignal) => Promise<LinkMetadata>;

export type EnrichResult = {
  linkId: string;
  status: MetadataStatus;
  link?: Link;
  error?: LinkError;
};

export type MetadataCoordinatorOptions = {
  now?: () => Date;
  timeoutMs?: number;
  maxAttempts?: number;
  batchSize?: number;
  /** Called with the stored link after a successful attempt. */
  onLinkUpdated?: (link: Link) => void;
};

type StatusListener = (linkId: string, status: MetadataStatus) => void;

const isPlaceholder = (metadata: LinkMetadata) => {
  const title = metadata.title?.trim().toLowerCase();
  return !title || title === metadata.domain.trim().toLowerCase();
};

/**
 * Enriches links in the background. Attempts are counted in the durable
 * store before the network call, so a crash mid-fetch still spends budget and
 * a restarted process resumes from the stored count. Retries only happen on
 * explicit triggers; there is no timer loop.
 */
export class MetadataCoordinator {
  private readonly fetching = new Set<string>();
  private readonly known = new Map<string, MetadataState>();
  private readonly listeners = new Set<StatusListener>();
  private readonly now: () => Date;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly batchSize: number;
  private readonly onLinkUpdated: (link: Link) => void;
  private lastSweepAt: number | null = null;

  constructor(
    private readonly store: MetadataAttemptStore,
    private readonly fetchMetadata: MetadataFetcher,
    private readonly context: SessionContext,
    options: MetadataCoordinatorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.timeoutMs = options.timeoutMs ?? DEFAULT_METADATA_FETCH_TIMEOUT_MS;
    this.maxAttempts = Math.min(options.maxAttempts ?? METADATA_MAX_ATTEMPTS, METADATA_MAX_ATTEMPTS);
    this.batchSize = options.batchSize ?? METADATA_RETRY_BATCH_SIZE;
    this.onLinkUpdated = options.onLinkUpdated ?? (() => undefined);
  }

  subscribe(listener: StatusListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getStatus(link: Pick<Link, "id" | "metadataState">): MetadataStatus {
    if (this.fetching.has(link.id)) {
      return "fetching";
    }
    return this.statusFor(this.known.get(link.id) ?? link.metadataState);
  }

  /** One attempt for a link, normally right after its create is confirmed. */
  async enrich(link: Pick<Link, "id" | "url" | "metadataState">): Promise<EnrichResult> {
    if (this.fetching.has(link.id)) {
      return { linkId: link.id, status: "fetching" };
    }
    if (link.metadataState.complete) {
      return { linkId: link.id, status: "complete" };
    }

    this.fetching.add(link.id);
    this.emit(link.id, "fetching");
    let result: EnrichResult | undefined;
    try {
      result = await this.attempt(link);
      return result;
    } finally {
      this.fetching.delete(link.id);
      this.emit(link.id, result?.status ?? this.getStatus(link));
    }
  }

  /** Drops what is remembered about a link, e.g. once it was deleted. */
  forget(linkId: string) {
    this.known.delete(linkId);
  }

  /**
   * Retries links the store still lists as incomplete. Sweeps closer together
   * than the debounce window are dropped, as are links tried within the last
   * minute.
   */
  async retryIncomplete(trigger: RetryTrigger): Promise<EnrichResult[]> {
    const startedAt = this.now().getTime();
    if (this.lastSweepAt !== null && startedAt - this.lastSweepAt < METADATA_SWEEP_DEBOUNCE_MS) {
      return [];
    }
    this.lastSweepAt = startedAt;

    let candidates: Link[];
    try {
      candidates = await this.store.listIncomplete(this.context, this.batchSize);
    } catch (error) {
      console.error(`Failed to load links for metadata retry (${trigger})`, error);
      return [];
    }

    const eligible = candidates.filter((link) => {
      const { attempts, complete, lastAttemptAt } = link.metadataState;
      if (complete || attempts >= this.maxAttempts || this.fetching.has(link.id)) {
        return false;
      }
      if (!lastAttemptAt) {
        return true;
      }
      return startedAt - Date.parse(lastAttemptAt) >= METADATA_RETRY_MIN_INTERVAL_MS;
    });

    return Promise.all(eligible.map((link) => this.enrich(link)));
  }

  /**
   * User-initiated refresh: clears the stored budget, then makes one attempt.
   */
  async refreshLink(link: Pick<Link, "id" | "url" | "metadataState">): Promise<EnrichResult> {
    if (this.fetching.has(link.id)) {
      return { linkId: link.id, status: "fetching" };
    }
    let state: MetadataState;
    try {
      state = await this.store.reset(this.context, link.id);
    } catch (error) {
      const linkError = error instanceof LinkError ? error : fromTransportError(error);
      console.error("Failed to reset metadata attempts", linkError);
      return { linkId: link.id, status: this.getStatus(link), error: linkError };
    }
    this.known.set(link.id, state);
    return this.enrich({ ...link, metadataState: state });
  }

  private async attempt(link: Pick<Link, "id" | "url">): Promise<EnrichResult> {
    let state: MetadataState | null;
    try {
      state = await this.store.recordAttempt(this.context, link.id, this.now());
    } catch (error) {
      const linkError = error instanceof LinkError ? error : fromTransportError(error);
      console.error("Failed to record metadata attempt", linkError);
      return { linkId: link.id, status: this.statusFor(this.known.get(link.id)), error: linkError };
    }

    if (!state) {
      const exhausted: MetadataState = {
        attempts: this.maxAttempts,
        lastAttemptAt: this.known.get(link.id)?.lastAttemptAt ?? null,
        complete: false,
      };
      this.known.set(link.id, exhausted);
      return { linkId: link.id, status: "exhausted", error: new ExhaustedRetriesError(link.id) };
    }
    this.known.set(link.id, state);

    try {
      const metadata = await this.fetchWithTimeout(link.url);
      if (isPlaceholder(metadata)) {
        throw new NetworkError("Page returned no usable title");
      }
      const stored = await this.store.complete(this.context, link.id, metadata);
      // complete links carry their own state from here on
      this.known.delete(link.id);
      this.onLinkUpdated(stored);
      return { linkId: link.id, status: "complete", link: stored };
    } catch (error) {
      const linkError = error instanceof LinkError ? error : fromTransportError(error);
      const status = this.statusFor(state);
      console.warn(
        `Metadata attempt ${state.attempts}/${this.maxAttempts} failed for ${link.url}`,
        linkError.message
      );
      return {
        linkId: link.id,
        status,
        error: status === "exhausted" ? new ExhaustedRetriesError(link.id) : linkError,
      };
    }
  }

  private fetchWithTimeout(url: string) {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new NetworkError("Metadata request timed out"));
      }, this.timeoutMs);
    });
    return Promise.race([this.fetchMetadata(url, controller.signal), timeout]).finally(() => {
      clearTimeout(timeoutId);
    });
  }

  private statusFor(state: MetadataState | undefined): MetadataStatus {
    if (!state) {
      return "pending";
    }
    if (state.complete) {
      return "complete";
    }
    if (state.attempts >= this.maxAttempts) {
      return "exhausted";
    }
    return state.attempts === 0 ? "pending" : "awaiting-retry";
  }

  private emit(linkId: string, status: MetadataStatus) {
    this.listeners.forEach((listener) => listener(linkId, status));
  }
}
