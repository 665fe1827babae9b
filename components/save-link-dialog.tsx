"use client";

import { useEffect, useState, type FormEvent } from "react";
import { useLinkCollection } from "@/components/link-collection-context";
import { LinkDetailsFields } from "@/components/link-details-fields";
import { extractDomain, validateUrl } from "@/lib/link-url";
import { patchFromDetails, type LinkDetails } from "@/lib/links";

type SaveLinkDialogProps = {
  isOpen: boolean;
  initialUrl?: string | null;
  /** Shared links skip the URL step and land on the details form. */
  skipUrlStep?: boolean;
  onClose: () => void;
};

type Step = "url" | "details";

const EMPTY_DETAILS: LinkDetails = { note: "", spaceId: "", tagIds: [] };

export function SaveLinkDialog({ isOpen, initialUrl, skipUrlStep, onClose }: SaveLinkDialogProps) {
  const { saveLink } = useLinkCollection();
  const [step, setStep] = useState<Step>("url");
  const [url, setUrl] = useState("");
  const [details, setDetails] = useState<LinkDetails>(EMPTY_DETAILS);
  const [urlError, setUrlError] = useState<string | null>(null);

  useEffect(() => {
    if (!isOpen) {
      return;
    }
    setUrl(initialUrl ?? "");
    setDetails(EMPTY_DETAILS);
    setUrlError(null);
    setStep(skipUrlStep && initialUrl && !validateUrl(initialUrl) ? "details" : "url");
  }, [isOpen, initialUrl, skipUrlStep]);

  if (!isOpen) {
    return null;
  }

  const handleUrlSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const error = validateUrl(url);
    setUrlError(error);
    if (!error) {
      setStep("details");
    }
  };

  const handleSave = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const accepted = saveLink({ url, ...patchFromDetails(details) });
    if (accepted) {
      onClose();
    }
  };

  return (
    <div className="fixed inset-0 z-[1100] flex items-end justify-center bg-slate-900/40 p-4 sm:items-center">
      <div
        role="dialog"
        aria-modal="true"
        aria-labelledby="save-link-title"
        className="w-full max-w-md rounded-3xl bg-white p-6 shadow-2xl"
      >
        <div className="flex items-center justify-between">
          <h2 id="save-link-title" className="text-lg font-semibold text-slate-900">
            {step === "url" ? "Save a link" : extractDomain(url)}
          </h2>
          <button
            type="button"
            onClick={onClose}
            className="text-[10px] font-semibold uppercase tracking-[0.3em] text-slate-500 transition hover:text-slate-700"
          >
            Close
          </button>
        </div>

        {step === "url" ? (
          <form onSubmit={handleUrlSubmit} className="mt-4 space-y-3">
            <input
              autoFocus
              type="text"
              inputMode="url"
              value={url}
              onChange={(event) => setUrl(event.target.value)}
              placeholder="Paste a link"
              className="w-full rounded-2xl border border-slate-200 px-4 py-3 text-sm focus:border-slate-400 focus:outline-none"
            />
            {urlError && <p className="text-xs font-medium text-rose-600">{urlError}</p>}
            <button
              type="submit"
              className="w-full rounded-2xl bg-slate-900 px-4 py-3 text-sm font-semibold text-white transition hover:bg-slate-700"
            >
              Continue
            </button>
          </form>
        ) : (
          <form onSubmit={handleSave} className="mt-4 space-y-4">
            <p className="truncate text-xs text-slate-500">{url}</p>
            <LinkDetailsFields value={details} onChange={setDetails} />
            <div className="flex gap-2">
              <button
                type="button"
                onClick={() => setStep("url")}
                className="flex-1 rounded-2xl border border-slate-200 px-4 py-3 text-sm font-semibold text-slate-700"
              >
                Back
              </button>
              <button
                type="submit"
                className="flex-1 rounded-2xl bg-slate-900 px-4 py-3 text-sm font-semibold text-white transition hover:bg-slate-700"
              >
                Save
              </button>
            </div>
          </form>
        )}
      </div>
    </div>
  );
}
