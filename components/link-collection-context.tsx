"use client";

import {
  createContext,
  useCallback,
  useContext,
  useEffect,
  useMemo,
  useState,
  useSyncExternalStore,
  type ReactNode,
} from "react";
import { useSession } from "next-auth/react";
import { useToast } from "@/components/toast-provider";
import { PaginatedCollectionLoader, type LoaderState } from "@/lib/collection-loader";
import { DEFAULT_LINK_PAGE_SIZE } from "@/lib/config";
import { LinkError } from "@/lib/errors";
import { LinkApiClient } from "@/lib/link-api";
import { LinkCollection, type CollectionEntry } from "@/lib/link-collection";
import type { Link, LinkDraft, LinkPatch, Space, Tag } from "@/lib/links";
import { MetadataCoordinator, type MetadataStatus } from "@/lib/metadata-coordinator";
import { OptimisticMutationEngine, type SessionContext } from "@/lib/mutation-engine";
import { offlineQueue } from "@/lib/offline-queue";

type LinkCollectionContextValue = {
  links: readonly Link[];
  loaderState: LoaderState;
  tags: Tag[];
  spaces: Space[];
  activeSpaceId: string | null;
  tagsById: ReadonlyMap<string, Tag>;
  isReady: boolean;
  entryFor: (linkId: string) => CollectionEntry | undefined;
  metadataStatus: (link: Link) => MetadataStatus;
  saveLink: (draft: LinkDraft) => boolean;
  /** Resolves false when the change was rolled back. */
  updateLink: (linkId: string, patch: LinkPatch) => Promise<boolean>;
  deleteLink: (linkId: string) => Promise<void>;
  markOpened: (linkId: string) => void;
  loadNextPage: () => void;
  selectSpace: (spaceId: string | null) => void;
  refresh: () => Promise<void>;
  refreshMetadata: (link: Link) => Promise<void>;
};

const LinkCollectionContext = createContext<LinkCollectionContextValue | null>(null);

const EMPTY_LINKS: readonly Link[] = [];
const EMPTY_ENTRIES: readonly CollectionEntry[] = [];
const INITIAL_LOADER_STATE: LoaderState = {
  cursor: { pageIndex: 0, pageSize: DEFAULT_LINK_PAGE_SIZE, exhausted: false },
  loading: false,
  error: null,
};

type Core = {
  collection: LinkCollection;
  engine: OptimisticMutationEngine;
  loaderFor: (spaceId: string | null) => PaginatedCollectionLoader;
  coordinator: MetadataCoordinator;
  api: LinkApiClient;
  context: SessionContext;
};

const isRetryable = (error: unknown) => error instanceof LinkError && error.retryable;

const createCore = (ownerId: string): Core => {
  const context: SessionContext = { ownerId };
  const api = new LinkApiClient();
  const collection = new LinkCollection();
  const engine = new OptimisticMutationEngine(collection, api, context);
  // one cursor per space; "" keys the unfiltered view
  const loaders = new Map<string, PaginatedCollectionLoader>();
  const loaderFor = (spaceId: string | null) => {
    const key = spaceId ?? "";
    let loader = loaders.get(key);
    if (!loader) {
      loader = new PaginatedCollectionLoader(collection, api.fetchPage, context, {
        spaceId,
        hasPendingMutations: (linkId) => engine.hasPendingMutations(linkId),
      });
      loaders.set(key, loader);
    }
    return loader;
  };
  const coordinator = new MetadataCoordinator(api, api.fetchMetadata, context, {
    onLinkUpdated: (link) => {
      engine.acceptRemote(link);
    },
  });
  return { collection, engine, loaderFor, coordinator, api, context };
};

export function LinkCollectionProvider({ children }: { children: ReactNode }) {
  const { data: session, status } = useSession();
  const ownerId = status === "authenticated" ? session?.user?.id ?? null : null;
  const { showToast, showError } = useToast();

  const core = useMemo(() => (ownerId ? createCore(ownerId) : null), [ownerId]);
  const [loaderState, setLoaderState] = useState<LoaderState>(INITIAL_LOADER_STATE);
  const [statuses, setStatuses] = useState<Record<string, MetadataStatus>>({});
  const [tags, setTags] = useState<Tag[]>([]);
  const [spaces, setSpaces] = useState<Space[]>([]);
  const [activeSpaceId, setActiveSpaceId] = useState<string | null>(null);
  const loader = useMemo(
    () => (core ? core.loaderFor(activeSpaceId) : null),
    [core, activeSpaceId]
  );

  const subscribe = useCallback(
    (listener: () => void) => (core ? core.collection.subscribe(listener) : () => undefined),
    [core]
  );
  const getSnapshot = useCallback(
    () => (core ? core.collection.getSnapshot() : EMPTY_LINKS),
    [core]
  );
  const links = useSyncExternalStore(subscribe, getSnapshot, () => EMPTY_LINKS);
  const getEntries = useCallback(
    () => (core ? core.collection.getEntries() : EMPTY_ENTRIES),
    [core]
  );
  const entries = useSyncExternalStore(subscribe, getEntries, () => EMPTY_ENTRIES);

  useEffect(() => {
    if (!core) {
      return;
    }
    const unsubscribeMetadata = core.coordinator.subscribe((linkId, status) => {
      setStatuses((current) => ({ ...current, [linkId]: status }));
    });
    const unsubscribeEngine = core.engine.subscribe((event) => {
      if (event.type === "queued") {
        showToast("Saved offline", "info", "It will sync when you're back online");
      }
      if (event.type === "confirmed" && event.kind === "create") {
        void core.coordinator.enrich(event.link);
      }
      if (event.type === "deleted") {
        const { linkId } = event;
        core.coordinator.forget(linkId);
        setStatuses(({ [linkId]: _removed, ...rest }) => rest);
      }
    });

    void core.coordinator.retryIncomplete("foreground");
    void offlineQueue.flush();

    Promise.all([core.api.listTags(core.context), core.api.listSpaces(core.context)])
      .then(([loadedTags, loadedSpaces]) => {
        setTags(loadedTags);
        setSpaces(loadedSpaces);
      })
      .catch((error: unknown) => {
        console.error("Failed to load tags and spaces", error);
      });

    return () => {
      unsubscribeMetadata();
      unsubscribeEngine();
    };
  }, [core, showError, showToast]);

  useEffect(() => {
    if (!loader) {
      return;
    }
    const unsubscribe = loader.subscribe(setLoaderState);
    loader.loadFirstPage().catch((error: unknown) => {
      showError(error);
    });
    return () => {
      unsubscribe();
      loader.suspend();
    };
  }, [loader, showError]);

  useEffect(() => {
    if (!core || typeof window === "undefined") {
      return;
    }
    const handleVisibility = () => {
      if (document.visibilityState !== "visible") {
        return;
      }
      void offlineQueue.flush();
      void core.coordinator.retryIncomplete("foreground");
    };
    const handleOnline = () => {
      void offlineQueue.flush();
      void core.coordinator.retryIncomplete("online");
    };
    document.addEventListener("visibilitychange", handleVisibility);
    window.addEventListener("online", handleOnline);
    return () => {
      document.removeEventListener("visibilitychange", handleVisibility);
      window.removeEventListener("online", handleOnline);
    };
  }, [core]);

  const tagsById = useMemo(() => new Map(tags.map((tag) => [tag.id, tag])), [tags]);

  const entriesById = useMemo(
    () => new Map(entries.map((entry) => [entry.link.id, entry])),
    [entries]
  );
  const entryFor = useCallback((linkId: string) => entriesById.get(linkId), [entriesById]);

  const metadataStatus = useCallback(
    (link: Link): MetadataStatus =>
      statuses[link.id] ?? (core ? core.coordinator.getStatus(link) : "pending"),
    [core, statuses]
  );

  /**
   * Returns false when the draft was rejected up front (invalid or already
   * saved); the remote outcome is reported through toasts.
   */
  const saveLink = useCallback(
    (draft: LinkDraft) => {
      if (!core) {
        showToast("Sign in to save links", "info");
        return false;
      }
      let pending: Promise<Link>;
      try {
        pending = core.engine.create(draft);
      } catch (error) {
        showError(error);
        return false;
      }
      pending.then(
        () => showToast("Link saved"),
        (error: unknown) => showError(error)
      );
      return true;
    },
    [core, showError, showToast]
  );

  const updateLink = useCallback(
    async (linkId: string, patch: LinkPatch) => {
      if (!core) {
        return false;
      }
      try {
        await core.engine.update(linkId, patch);
        showToast("Link updated");
        return true;
      } catch (error) {
        showError(error);
        return false;
      }
    },
    [core, showError, showToast]
  );

  const deleteLink = useCallback(
    async (linkId: string) => {
      if (!core) {
        return;
      }
      const attempt = async (): Promise<void> => {
        try {
          await core.engine.delete(linkId);
          showToast("Link removed", "info");
        } catch (error) {
          showError(
            error,
            isRetryable(error) ? { label: "Retry", run: () => void attempt() } : undefined
          );
        }
      };
      await attempt();
    },
    [core, showError, showToast]
  );

  const markOpened = useCallback(
    (linkId: string) => {
      if (!core) {
        return;
      }
      core.engine.update(linkId, { openedAt: new Date().toISOString() }).catch((error: unknown) => {
        console.warn("Failed to record link open", error);
      });
    },
    [core]
  );

  const loadNextPage = useCallback(() => {
    loader?.loadNextPage().catch((error: unknown) => {
      showError(error);
    });
  }, [loader, showError]);

  const selectSpace = useCallback((spaceId: string | null) => {
    setActiveSpaceId(spaceId);
  }, []);

  const refresh = useCallback(async () => {
    if (!core || !loader) {
      return;
    }
    try {
      await loader.refresh();
    } catch (error) {
      showError(
        error,
        isRetryable(error)
          ? {
              label: "Retry",
              run: () => {
                loader.refresh().catch((retryError: unknown) => showError(retryError));
              },
            }
          : undefined
      );
      return;
    }
    await core.coordinator.retryIncomplete("user-refresh");
  }, [core, loader, showError]);

  const refreshMetadata = useCallback(
    async (link: Link) => {
      if (!core) {
        return;
      }
      const result = await core.coordinator.refreshLink(link);
      if (result.status === "complete") {
        showToast("Preview updated");
      } else if (result.error) {
        showError(result.error);
      }
    },
    [core, showError, showToast]
  );

  const value = useMemo<LinkCollectionContextValue>(
    () => ({
      links,
      loaderState,
      tags,
      spaces,
      activeSpaceId,
      tagsById,
      isReady: Boolean(core),
      entryFor,
      metadataStatus,
      saveLink,
      updateLink,
      deleteLink,
      markOpened,
      loadNextPage,
      selectSpace,
      refresh,
      refreshMetadata,
    }),
    [
      links,
      loaderState,
      tags,
      spaces,
      activeSpaceId,
      tagsById,
      core,
      entryFor,
      metadataStatus,
      saveLink,
      updateLink,
      deleteLink,
      markOpened,
      loadNextPage,
      selectSpace,
      refresh,
      refreshMetadata,
    ]
  );

  return (
    <LinkCollectionContext.Provider value={value}>{children}</LinkCollectionContext.Provider>
  );
}

export function useLinkCollection() {
  const context = useContext(LinkCollectionContext);
  if (!context) {
    throw new Error("useLinkCollection must be used within a LinkCollectionProvider");
  }
  return context;
}
