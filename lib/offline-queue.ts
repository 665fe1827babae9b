const STORAGE_KEY = "linkshelf-offline-request-queue";

type OfflineRequest = {
  id: string;
  url: string;
  method: string;
  headers?: Record<string, string>;
  body?: string | null;
  createdAt: number;
};

export type QueueableRequest = {
  url: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string | null;
};

export type QueueResult =
  | { queued: false; response: Response }
  | { queued: true; id: string; delivered: Promise<Response> };

export type QueueStorage = Pick<Storage, "getItem" | "setItem">;

export type OfflineQueueOptions = {
  storage?: QueueStorage | null;
  fetcher?: typeof fetch;
  isOnline?: () => boolean;
  storageKey?: string;
};

const isClient = () => typeof window !== "undefined";

const defaultStorage = (): QueueStorage | null =>
  isClient() ? window.localStorage : null;

const defaultIsOnline = () =>
  !(typeof navigator !== "undefined" && navigator.onLine === false);

const createId = () =>
  typeof crypto !== "undefined" && typeof crypto.randomUUID === "function"
    ? crypto.randomUUID()
    : `queued-${Date.now()}-${Math.random().toString(16).slice(2)}`;

const isOfflineError = (error: unknown) => {
  if (
    typeof error === "object" &&
    error !== null &&
    (error as { name?: unknown }).name === "AbortError"
  ) {
    return true;
  }
  return error instanceof TypeError;
};

// 4xx answers are final; only server-side failures are worth replaying
const isFinalResponse = (response: Response) =>
  response.ok || (response.status >= 400 && response.status < 500);

/**
 * Persists requests that could not be delivered and replays them in order
 * once connectivity returns. Callers that enqueue in this process get a
 * `delivered` promise; entries restored after a restart are replayed blind.
 */
export class OfflineRequestQueue {
  private readonly storage: () => QueueStorage | null;
  private readonly fetcher: typeof fetch;
  private readonly isOnline: () => boolean;
  private readonly storageKey: string;
  private readonly waiters = new Map<string, (response: Response) => void>();
  private flushInFlight: Promise<void> | null = null;

  constructor(options: OfflineQueueOptions = {}) {
    this.storage =
      options.storage === undefined ? defaultStorage : () => options.storage ?? null;
    this.fetcher = options.fetcher ?? ((input, init) => fetch(input, init));
    this.isOnline = options.isOnline ?? defaultIsOnline;
    this.storageKey = options.storageKey ?? STORAGE_KEY;
  }

  private readQueue(): OfflineRequest[] {
    const storage = this.storage();
    if (!storage) {
      return [];
    }
    try {
      const stored = storage.getItem(this.storageKey);
      if (!stored) {
        return [];
      }
      const parsed: unknown = JSON.parse(stored);
      if (!Array.isArray(parsed)) {
        return [];
      }
      return parsed.filter(
        (entry): entry is OfflineRequest =>
          Boolean(entry && typeof entry.id === "string" && typeof entry.url === "string")
      );
    } catch (error) {
      console.warn("Failed to read offline queue", error);
      return [];
    }
  }

  private writeQueue(entries: OfflineRequest[]) {
    const storage = this.storage();
    if (!storage) {
      return;
    }
    try {
      storage.setItem(this.storageKey, JSON.stringify(entries));
    } catch (error) {
      console.warn("Failed to persist offline queue", error);
    }
  }

  private enqueue(request: QueueableRequest): QueueResult {
    const entry: OfflineRequest = {
      id: createId(),
      url: request.url,
      method: request.method ?? "GET",
      headers: request.headers,
      body: request.body ?? null,
      createdAt: Date.now(),
    };
    this.writeQueue([...this.readQueue(), entry]);
    const delivered = new Promise<Response>((resolve) => {
      this.waiters.set(entry.id, resolve);
    });
    return { queued: true, id: entry.id, delivered };
  }

  /** Queueing needs somewhere durable to put the request. */
  canQueue() {
    return this.storage() !== null;
  }

  async send(
    request: QueueableRequest,
    options: { queueable?: boolean } = {}
  ): Promise<QueueResult> {
    const queueable = Boolean(options.queueable) && this.canQueue();
    if (queueable && !this.isOnline()) {
      return this.enqueue(request);
    }

    try {
      const response = await this.fetcher(request.url, {
        method: request.method ?? "GET",
        headers: request.headers,
        body: request.body ?? undefined,
      });
      return { queued: false, response };
    } catch (error) {
      if (queueable && isOfflineError(error)) {
        return this.enqueue(request);
      }
      throw error;
    }
  }

  flush(): Promise<void> {
    if (this.flushInFlight) {
      return this.flushInFlight;
    }
    if (!this.isOnline()) {
      return Promise.resolve();
    }
    const pending = this.readQueue();
    if (!pending.length) {
      return Promise.resolve();
    }
    this.flushInFlight = (async () => {
      const remaining: OfflineRequest[] = [];
      for (let index = 0; index < pending.length; index += 1) {
        const entry = pending[index];
        if (!this.isOnline()) {
          remaining.push(...pending.slice(index));
          break;
        }
        try {
          const response = await this.fetcher(entry.url, {
            method: entry.method,
            headers: entry.headers,
            body: entry.body ?? undefined,
          });
          if (!isFinalResponse(response)) {
            remaining.push(entry);
            continue;
          }
          const waiter = this.waiters.get(entry.id);
          this.waiters.delete(entry.id);
          waiter?.(response);
        } catch (error) {
          if (!isOfflineError(error)) {
            console.error("Queued request failed", error);
          }
          remaining.push(entry);
        }
      }
      // requests queued while this flush ran must survive it
      const sentIds = new Set(pending.map((entry) => entry.id));
      const queuedMeanwhile = this.readQueue().filter((entry) => !sentIds.has(entry.id));
      this.writeQueue([...remaining, ...queuedMeanwhile]);
    })()
      .catch((error) => {
        console.error("Failed to flush offline queue", error);
      })
      .finally(() => {
        this.flushInFlight = null;
      });
    return this.flushInFlight;
  }

  hasQueuedRequests() {
    return this.readQueue().length > 0;
  }
}

export const offlineQueue = new OfflineRequestQueue();
