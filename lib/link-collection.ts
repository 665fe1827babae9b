import type { Link } from "@/lib/links";

export type CollectionEntry = {
  /** Render key; keeps the tentative id after the store assigns a real one. */
  key: string;
  link: Link;
  /** Sequence number of the last local operation applied to this entry. */
  seq: number;
  tentative: boolean;
  tombstoned: boolean;
  queued: boolean;
};

type Listener = () => void;

export const toEntry = (link: Link, seq = 0): CollectionEntry => ({
  key: link.id,
  link,
  seq,
  tentative: false,
  tombstoned: false,
  queued: false,
});

/**
 * Ordered, observable cache of the links loaded for one view. Only the
 * mutation engine and the page loader's merge step write to it.
 */
export class LinkCollection {
  private entries: CollectionEntry[] = [];
  private visible: readonly Link[] = [];
  private readonly listeners = new Set<Listener>();

  subscribe = (listener: Listener) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /** Stable between changes, so it can back `useSyncExternalStore`. */
  getSnapshot = (): readonly Link[] => this.visible;

  getEntries(): readonly CollectionEntry[] {
    return this.entries;
  }

  get size() {
    return this.entries.length;
  }

  find(id: string) {
    return this.entries.find((entry) => entry.link.id === id);
  }

  indexOf(id: string) {
    return this.entries.findIndex((entry) => entry.link.id === id);
  }

  hasNormalizedUrl(normalizedUrl: string) {
    return this.entries.some(
      (entry) => !entry.tombstoned && entry.link.normalizedUrl === normalizedUrl
    );
  }

  insertAt(index: number, entry: CollectionEntry) {
    const position = Math.max(0, Math.min(index, this.entries.length));
    this.commit([
      ...this.entries.slice(0, position),
      entry,
      ...this.entries.slice(position),
    ]);
  }

  /** Replaces the entry currently stored under `id`, keeping its position. */
  put(id: string, entry: CollectionEntry) {
    const index = this.indexOf(id);
    if (index === -1) {
      return false;
    }
    const next = [...this.entries];
    next[index] = entry;
    this.commit(next);
    return true;
  }

  remove(id: string) {
    const index = this.indexOf(id);
    if (index === -1) {
      return null;
    }
    const removed = this.entries[index];
    this.commit(this.entries.filter((_, position) => position !== index));
    return { entry: removed, index };
  }

  replaceAll(entries: CollectionEntry[]) {
    this.commit([...entries]);
  }

  clear() {
    this.commit([]);
  }

  private commit(next: CollectionEntry[]) {
    this.entries = next;
    this.visible = next
      .filter((entry) => !entry.tombstoned)
      .map((entry) => entry.link);
    this.listeners.forEach((listener) => listener());
  }
}
