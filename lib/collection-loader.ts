import { DEFAULT_LINK_PAGE_SIZE, SCROLL_LOAD_THRESHOLD } from "@/lib/config";
import { LinkCollection, toEntry, type CollectionEntry } from "@/lib/link-collection";
import type { SessionContext } from "@/lib/mutation-engine";
import type { Link, Tag } from "@/lib/links";

export type PageQuery = {
  pageIndex: number;
  pageSize: number;
  spaceId?: string | null;
};

export type PageFetcher = (context: SessionContext, query: PageQuery) => Promise<Link[]>;

export type PaginationCursor = {
  /** Index of the next page to request. */
  pageIndex: number;
  pageSize: number;
  exhausted: boolean;
};

export type CollectionLoaderOptions = {
  pageSize?: number;
  spaceId?: string | null;
  /** Ids the mutation engine has not settled with the store yet. */
  hasPendingMutations?: (linkId: string) => boolean;
};

type LoaderListener = (state: LoaderState) => void;

export type LoaderState = {
  cursor: PaginationCursor;
  loading: boolean;
  error: unknown;
};

/**
 * Loads an owner's links page by page into a `LinkCollection`. Page loads for
 * one cursor never overlap; a refresh supersedes any load still in flight.
 */
export class PaginatedCollectionLoader {
  private cursor: PaginationCursor;
  private inFlight: Promise<void> | null = null;
  private generation = 0;
  private error: unknown = null;
  private readonly listeners = new Set<LoaderListener>();
  private readonly spaceId: string | null;
  private readonly isPending: (linkId: string) => boolean;

  constructor(
    private readonly collection: LinkCollection,
    private readonly fetchPage: PageFetcher,
    private readonly context: SessionContext,
    options: CollectionLoaderOptions = {}
  ) {
    this.cursor = {
      pageIndex: 0,
      pageSize: options.pageSize ?? DEFAULT_LINK_PAGE_SIZE,
      exhausted: false,
    };
    this.spaceId = options.spaceId ?? null;
    this.isPending = options.hasPendingMutations ?? (() => false);
  }

  getState(): LoaderState {
    return {
      cursor: { ...this.cursor },
      loading: this.inFlight !== null,
      error: this.error,
    };
  }

  subscribe(listener: LoaderListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get isLoading() {
    return this.inFlight !== null;
  }

  loadFirstPage() {
    if (this.cursor.pageIndex > 0 || this.inFlight) {
      return this.refresh();
    }
    return this.runLoad(0, "replace");
  }

  /** No-op while a page is loading or once the collection is exhausted. */
  loadNextPage(): Promise<void> {
    if (this.inFlight || this.cursor.exhausted) {
      return Promise.resolve();
    }
    return this.runLoad(this.cursor.pageIndex, "append");
  }

  /**
   * Drops a page still in flight. Used when a loader for another space takes
   * over the shared collection; the cursor is kept, and the next
   * `loadFirstPage` starts over.
   */
  suspend() {
    this.generation += 1;
    if (this.inFlight) {
      this.inFlight = null;
      this.notify();
    }
  }

  /** Starts over from page 0 and replaces the loaded window. */
  refresh(): Promise<void> {
    this.generation += 1;
    this.inFlight = null;
    this.cursor = { ...this.cursor, pageIndex: 0, exhausted: false };
    return this.runLoad(0, "replace");
  }

  private runLoad(pageIndex: number, mode: "append" | "replace") {
    const generation = this.generation;
    const load = (async () => {
      try {
        const links = await this.fetchPage(this.context, {
          pageIndex,
          pageSize: this.cursor.pageSize,
          spaceId: this.spaceId,
        });
        if (generation !== this.generation) {
          return;
        }
        if (mode === "replace") {
          this.mergeReplace(links);
        } else {
          this.mergeAppend(links);
        }
        this.error = null;
        this.cursor = {
          ...this.cursor,
          pageIndex: pageIndex + 1,
          exhausted: links.length < this.cursor.pageSize,
        };
      } catch (error) {
        if (generation !== this.generation) {
          return;
        }
        console.error("Failed to load links", error);
        this.error = error;
        throw error;
      } finally {
        if (generation === this.generation) {
          this.inFlight = null;
          this.notify();
        }
      }
    })();
    this.inFlight = load;
    this.notify();
    return load;
  }

  private hasLocalChanges(entry: CollectionEntry) {
    return entry.tentative || entry.tombstoned || this.isPending(entry.link.id);
  }

  private pendingCreateUrls() {
    return new Set(
      this.collection
        .getEntries()
        .filter((entry) => entry.tentative)
        .map((entry) => entry.link.normalizedUrl)
    );
  }

  private mergeAppend(links: Link[]) {
    const pendingUrls = this.pendingCreateUrls();
    const next = [...this.collection.getEntries()];
    const indexById = new Map(next.map((entry, index) => [entry.link.id, index]));

    for (const link of links) {
      const index = indexById.get(link.id);
      if (index !== undefined) {
        if (!this.hasLocalChanges(next[index])) {
          next[index] = { ...next[index], link };
        }
        continue;
      }
      if (pendingUrls.has(link.normalizedUrl)) {
        continue;
      }
      indexById.set(link.id, next.length);
      next.push(toEntry(link));
    }
    this.collection.replaceAll(next);
  }

  /**
   * Server rows replace the window. Entries with unsettled local mutations
   * survive: pending creates stay on top, other pending entries keep their
   * local state wherever the server lists them, or trail the page otherwise.
   */
  private mergeReplace(links: Link[]) {
    const current = this.collection.getEntries();
    const local = new Map(
      current
        .filter((entry) => this.hasLocalChanges(entry))
        .map((entry) => [entry.link.id, entry])
    );
    const pendingUrls = this.pendingCreateUrls();
    const placed = new Set<string>();

    const head = current.filter((entry) => entry.tentative);
    head.forEach((entry) => placed.add(entry.link.id));

    const body: CollectionEntry[] = [];
    for (const link of links) {
      if (placed.has(link.id) || pendingUrls.has(link.normalizedUrl)) {
        continue;
      }
      placed.add(link.id);
      body.push(local.get(link.id) ?? toEntry(link));
    }

    const tail = current.filter(
      (entry) => !placed.has(entry.link.id) && local.has(entry.link.id)
    );

    this.collection.replaceAll([...head, ...body, ...tail]);
  }

  private notify() {
    const state = this.getState();
    this.listeners.forEach((listener) => listener(state));
  }
}

/**
 * True once the reader has passed `threshold` of the loaded items, e.g. the
 * 24th of 30 at the default 0.8.
 */
export function shouldLoadMore(
  viewedCount: number,
  loadedCount: number,
  threshold: number = SCROLL_LOAD_THRESHOLD
) {
  if (loadedCount <= 0) {
    return false;
  }
  return viewedCount >= Math.ceil(loadedCount * threshold);
}

/**
 * Case-insensitive OR match over title, note, domain, url and tag names of
 * the links already loaded.
 */
export function filterLinks(
  links: readonly Link[],
  query: string,
  tags: ReadonlyMap<string, Pick<Tag, "name">> = new Map()
): Link[] {
  const needle = query.trim().toLowerCase();
  if (!needle) {
    return [...links];
  }
  const matches = (value: string | null | undefined) =>
    Boolean(value && value.toLowerCase().includes(needle));

  return links.filter(
    (link) =>
      matches(link.title) ||
      matches(link.note) ||
      matches(link.domain) ||
      matches(link.url) ||
      link.tagIds.some((tagId) => matches(tags.get(tagId)?.name))
  );
}
