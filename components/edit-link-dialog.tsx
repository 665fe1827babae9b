"use client";

import { useEffect, useState, type FormEvent } from "react";
import { useLinkCollection } from "@/components/link-collection-context";
import { LinkDetailsFields } from "@/components/link-details-fields";
import { detailsOf, displayTitle, patchFromDetails, type Link, type LinkDetails } from "@/lib/links";

type EditLinkDialogProps = {
  link: Link | null;
  onClose: () => void;
};

export function EditLinkDialog({ link, onClose }: EditLinkDialogProps) {
  const { updateLink } = useLinkCollection();
  const [details, setDetails] = useState<LinkDetails>({ note: "", spaceId: "", tagIds: [] });
  const [isSaving, setIsSaving] = useState(false);

  useEffect(() => {
    if (!link) {
      return;
    }
    setDetails(detailsOf(link));
    setIsSaving(false);
  }, [link]);

  if (!link) {
    return null;
  }

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    setIsSaving(true);
    const updated = await updateLink(link.id, patchFromDetails(details));
    setIsSaving(false);
    if (updated) {
      onClose();
    }
  };

  return (
    <div className="fixed inset-0 z-[1100] flex items-end justify-center bg-slate-900/40 p-4 sm:items-center">
      <div
        role="dialog"
        aria-modal="true"
        aria-labelledby="edit-link-title"
        className="w-full max-w-md rounded-3xl bg-white p-6 shadow-2xl"
      >
        <div className="flex items-center justify-between gap-3">
          <h2 id="edit-link-title" className="truncate text-lg font-semibold text-slate-900">
            {displayTitle(link)}
          </h2>
          <button
            type="button"
            onClick={onClose}
            className="text-[10px] font-semibold uppercase tracking-[0.3em] text-slate-500 transition hover:text-slate-700"
          >
            Close
          </button>
        </div>
        <form onSubmit={(event) => void handleSubmit(event)} className="mt-4 space-y-4">
          <LinkDetailsFields value={details} onChange={setDetails} />
          <button
            type="submit"
            disabled={isSaving}
            className="w-full rounded-2xl bg-slate-900 px-4 py-3 text-sm font-semibold text-white transition hover:bg-slate-700 disabled:opacity-40"
          >
            {isSaving ? "Saving…" : "Save changes"}
          </button>
        </form>
      </div>
    </div>
  );
}
