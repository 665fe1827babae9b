"use client";

import { useCallback, useEffect, useMemo, useState } from "react";
import { signIn, signOut, useSession } from "next-auth/react";
import { useLinkCollection } from "@/components/link-collection-context";
import { EditLinkDialog } from "@/components/edit-link-dialog";
import { SaveLinkDialog } from "@/components/save-link-dialog";
import { useShareIntent } from "@/components/use-share-intent";
import { filterLinks, shouldLoadMore } from "@/lib/collection-loader";
import { displayTitle, type Link } from "@/lib/links";
import type { MetadataStatus } from "@/lib/metadata-coordinator";

type DialogState = {
  isOpen: boolean;
  initialUrl: string | null;
  skipUrlStep: boolean;
};

const CLOSED_DIALOG: DialogState = { isOpen: false, initialUrl: null, skipUrlStep: false };

const statusLabels: Partial<Record<MetadataStatus, string>> = {
  fetching: "Loading preview…",
  "awaiting-retry": "Preview pending",
  exhausted: "No preview",
};

function LinkCard({ link, onEdit }: { link: Link; onEdit: (link: Link) => void }) {
  const { entryFor, metadataStatus, tagsById, deleteLink, markOpened, refreshMetadata } =
    useLinkCollection();
  const entry = entryFor(link.id);
  const status = metadataStatus(link);
  const statusLabel = statusLabels[status];
  const isSaving = Boolean(entry?.tentative);

  return (
    <li className="flex gap-4 rounded-3xl border border-slate-200 bg-white p-4 shadow-sm">
      {link.thumbnailUrl ? (
        <img
          src={link.thumbnailUrl}
          alt=""
          className="h-16 w-16 flex-none rounded-2xl object-cover"
          loading="lazy"
        />
      ) : (
        <div className="flex h-16 w-16 flex-none items-center justify-center rounded-2xl bg-slate-100 text-lg font-semibold uppercase text-slate-400">
          {(link.domain ?? "?").slice(0, 1)}
        </div>
      )}
      <div className="min-w-0 flex-1">
        <a
          href={link.url}
          target="_blank"
          rel="noopener noreferrer"
          onClick={() => {
            if (!isSaving) {
              markOpened(link.id);
            }
          }}
          className="block truncate text-sm font-semibold text-slate-900 hover:underline"
        >
          {displayTitle(link)}
        </a>
        <p className="truncate text-xs text-slate-500">{link.domain}</p>
        {link.note && <p className="mt-1 line-clamp-2 text-xs text-slate-600">{link.note}</p>}
        <div className="mt-2 flex flex-wrap items-center gap-2 text-[11px]">
          {link.tagIds.map((tagId) => {
            const tag = tagsById.get(tagId);
            return tag ? (
              <span
                key={tagId}
                className="rounded-full px-2 py-0.5 font-semibold text-white"
                style={{ backgroundColor: tag.color }}
              >
                {tag.name}
              </span>
            ) : null;
          })}
          {isSaving && (
            <span className="font-semibold text-amber-600">
              {entry?.queued ? "Waiting for connection" : "Saving…"}
            </span>
          )}
          {!isSaving && statusLabel && <span className="text-slate-400">{statusLabel}</span>}
        </div>
      </div>
      <div className="flex flex-none flex-col items-end gap-2">
        <button
          type="button"
          disabled={isSaving}
          onClick={() => onEdit(link)}
          className="text-[10px] font-semibold uppercase tracking-[0.2em] text-slate-500 transition hover:text-slate-700 disabled:opacity-40"
        >
          Edit
        </button>
        <button
          type="button"
          disabled={isSaving}
          onClick={() => void deleteLink(link.id)}
          className="text-[10px] font-semibold uppercase tracking-[0.2em] text-rose-500 transition hover:text-rose-700 disabled:opacity-40"
        >
          Delete
        </button>
        {!isSaving && status !== "complete" && status !== "fetching" && (
          <button
            type="button"
            onClick={() => void refreshMetadata(link)}
            className="text-[10px] font-semibold uppercase tracking-[0.2em] text-slate-500 transition hover:text-slate-700"
          >
            Refresh
          </button>
        )}
      </div>
    </li>
  );
}

export default function Home() {
  const { data: session, status } = useSession();
  const {
    links,
    loaderState,
    spaces,
    activeSpaceId,
    tagsById,
    isReady,
    entryFor,
    loadNextPage,
    selectSpace,
    refresh,
  } = useLinkCollection();
  const [query, setQuery] = useState("");
  const [dialog, setDialog] = useState<DialogState>(CLOSED_DIALOG);
  const [editing, setEditing] = useState<Link | null>(null);

  const handleShare = useCallback((share: { url: string }) => {
    setDialog({ isOpen: true, initialUrl: share.url, skipUrlStep: true });
  }, []);
  useShareIntent(handleShare);

  const visibleLinks = useMemo(
    () => filterLinks(links, query, tagsById),
    [links, query, tagsById]
  );
  const isSearching = query.trim().length > 0;

  useEffect(() => {
    if (!isReady || isSearching) {
      return;
    }
    const handleScroll = () => {
      const { scrollHeight } = document.documentElement;
      if (scrollHeight <= 0) {
        return;
      }
      const ratio = Math.min(1, (window.scrollY + window.innerHeight) / scrollHeight);
      if (shouldLoadMore(Math.round(ratio * links.length), links.length)) {
        loadNextPage();
      }
    };
    window.addEventListener("scroll", handleScroll, { passive: true });
    return () => window.removeEventListener("scroll", handleScroll);
  }, [isReady, isSearching, links.length, loadNextPage]);

  if (status === "loading") {
    return <main className="mx-auto max-w-2xl px-4 py-10 text-sm text-slate-500">Loading…</main>;
  }

  if (status !== "authenticated") {
    return (
      <main className="mx-auto flex max-w-2xl flex-col items-center gap-4 px-4 py-20 text-center">
        <h1 className="text-2xl font-semibold text-slate-900">Linkshelf</h1>
        <p className="text-sm text-slate-600">Save links from anywhere and find them again.</p>
        <button
          type="button"
          onClick={() => void signIn("google")}
          className="rounded-2xl bg-slate-900 px-5 py-3 text-sm font-semibold text-white"
        >
          Sign in with Google
        </button>
      </main>
    );
  }

  return (
    <main className="mx-auto max-w-2xl px-4 py-6">
      <header className="flex items-center justify-between gap-3">
        <h1 className="text-xl font-semibold text-slate-900">Linkshelf</h1>
        <div className="flex items-center gap-3">
          <button
            type="button"
            onClick={() => void refresh()}
            disabled={loaderState.loading}
            className="text-[10px] font-semibold uppercase tracking-[0.3em] text-slate-500 disabled:opacity-40"
          >
            Refresh
          </button>
          <button
            type="button"
            onClick={() => void signOut()}
            className="text-[10px] font-semibold uppercase tracking-[0.3em] text-slate-500"
            title={session?.user?.email ?? undefined}
          >
            Sign out
          </button>
        </div>
      </header>

      <div className="mt-4 flex gap-2">
        <input
          type="search"
          value={query}
          onChange={(event) => setQuery(event.target.value)}
          placeholder="Search loaded links"
          className="flex-1 rounded-2xl border border-slate-200 px-4 py-3 text-sm focus:border-slate-400 focus:outline-none"
        />
        <button
          type="button"
          onClick={() => setDialog({ isOpen: true, initialUrl: null, skipUrlStep: false })}
          className="rounded-2xl bg-slate-900 px-4 py-3 text-sm font-semibold text-white"
        >
          Save link
        </button>
      </div>

      {spaces.length > 0 && (
        <nav className="mt-4 flex flex-wrap gap-2" aria-label="Spaces">
          {[{ id: null, name: "All" }, ...spaces].map((space) => {
            const selected = space.id === activeSpaceId;
            return (
              <button
                key={space.id ?? "all"}
                type="button"
                onClick={() => selectSpace(space.id)}
                aria-pressed={selected}
                className={`rounded-full border px-3 py-1 text-xs font-semibold transition ${
                  selected
                    ? "border-slate-900 bg-slate-900 text-white"
                    : "border-slate-200 text-slate-600 hover:border-slate-400"
                }`}
              >
                {space.name}
              </button>
            );
          })}
        </nav>
      )}

      <ul className="mt-6 space-y-3">
        {visibleLinks.map((link) => (
          <LinkCard key={entryFor(link.id)?.key ?? link.id} link={link} onEdit={setEditing} />
        ))}
      </ul>

      {!visibleLinks.length && !loaderState.loading && (
        <p className="mt-10 text-center text-sm text-slate-500">
          {isSearching ? "No loaded links match your search." : "Nothing saved yet."}
        </p>
      )}
      {loaderState.loading && (
        <p className="mt-6 text-center text-xs text-slate-400">Loading links…</p>
      )}
      {!isSearching && !loaderState.loading && !loaderState.cursor.exhausted && links.length > 0 && (
        <button
          type="button"
          onClick={loadNextPage}
          className="mx-auto mt-6 block text-[10px] font-semibold uppercase tracking-[0.3em] text-slate-500"
        >
          Load more
        </button>
      )}

      <SaveLinkDialog
        isOpen={dialog.isOpen}
        initialUrl={dialog.initialUrl}
        skipUrlStep={dialog.skipUrlStep}
        onClose={() => setDialog(CLOSED_DIALOG)}
      />
      <EditLinkDialog link={editing} onClose={() => setEditing(null)} />
    </main>
  );
}
