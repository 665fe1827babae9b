import { ValidationError } from "@/lib/errors";
import { extractCapturedUrl, extractDomain, normalizeUrl } from "@/lib/link-url";

export const NOTE_MAX_LENGTH = 200;
export const TENTATIVE_ID_PREFIX = "tentative-";

export type MetadataState = {
  attempts: number;
  lastAttemptAt: string | null;
  complete: boolean;
};

export type Link = {
  id: string;
  ownerId: string;
  url: string;
  normalizedUrl: string;
  domain: string | null;
  title: string | null;
  description: string | null;
  thumbnailUrl: string | null;
  note: string | null;
  spaceId: string | null;
  tagIds: string[];
  createdAt: string;
  updatedAt: string;
  openedAt: string | null;
  metadataState: MetadataState;
};

export type LinkDraft = {
  url: string;
  note?: string | null;
  spaceId?: string | null;
  tagIds?: string[];
};

export type PreparedDraft = {
  url: string;
  normalizedUrl: string;
  domain: string;
  note: string | null;
  spaceId: string | null;
  tagIds: string[];
};

export type LinkPatch = {
  note?: string | null;
  spaceId?: string | null;
  tagIds?: string[];
  openedAt?: string | null;
};

/** Editable fields as a form holds them; "" is unsorted. */
export type LinkDetails = {
  note: string;
  spaceId: string;
  tagIds: string[];
};

export type LinkMetadata = {
  title: string;
  description: string | null;
  thumbnailUrl: string | null;
  domain: string;
};

export type Tag = {
  id: string;
  name: string;
  color: string;
  usageCount: number;
};

export type Space = {
  id: string;
  name: string;
  color: string;
  linkCount: number;
};

export const emptyMetadataState = (): MetadataState => ({
  attempts: 0,
  lastAttemptAt: null,
  complete: false,
});

export const isTentativeId = (id: string) => id.startsWith(TENTATIVE_ID_PREFIX);

export const createTentativeId = () =>
  typeof crypto !== "undefined" && typeof crypto.randomUUID === "function"
    ? `${TENTATIVE_ID_PREFIX}${crypto.randomUUID()}`
    : `${TENTATIVE_ID_PREFIX}${Date.now()}-${Math.random().toString(16).slice(2)}`;

export function normalizeNote(note: string | null | undefined): string | null {
  if (note === null || note === undefined) {
    return null;
  }
  const trimmed = note.trim();
  if (trimmed.length > NOTE_MAX_LENGTH) {
    throw new ValidationError(
      `Note must be ${NOTE_MAX_LENGTH} characters or fewer`
    );
  }
  return trimmed.length ? trimmed : null;
}

export const normalizeTagIds = (tagIds: readonly string[] | undefined) =>
  Array.from(
    new Set((tagIds ?? []).map((tagId) => tagId.trim()).filter(Boolean))
  ).sort();

const normalizeSpaceId = (spaceId: string | null | undefined) => {
  const trimmed = spaceId?.trim();
  return trimmed ? trimmed : null;
};

export function prepareDraft(draft: LinkDraft): PreparedDraft {
  const url = extractCapturedUrl(draft.url);
  return {
    url,
    normalizedUrl: normalizeUrl(url),
    domain: extractDomain(url),
    note: normalizeNote(draft.note),
    spaceId: normalizeSpaceId(draft.spaceId),
    tagIds: normalizeTagIds(draft.tagIds),
  };
}

export const detailsOf = (link: Link): LinkDetails => ({
  note: link.note ?? "",
  spaceId: link.spaceId ?? "",
  tagIds: [...link.tagIds],
});

export const patchFromDetails = (details: LinkDetails): LinkPatch => ({
  note: details.note.trim() ? details.note : null,
  spaceId: details.spaceId || null,
  tagIds: details.tagIds,
});

export function preparePatch(patch: LinkPatch): LinkPatch {
  const prepared: LinkPatch = {};
  if (patch.note !== undefined) {
    prepared.note = normalizeNote(patch.note);
  }
  if (patch.spaceId !== undefined) {
    prepared.spaceId = normalizeSpaceId(patch.spaceId);
  }
  if (patch.tagIds !== undefined) {
    prepared.tagIds = normalizeTagIds(patch.tagIds);
  }
  if (patch.openedAt !== undefined) {
    if (patch.openedAt !== null && Number.isNaN(Date.parse(patch.openedAt))) {
      throw new ValidationError("openedAt must be an ISO timestamp");
    }
    prepared.openedAt = patch.openedAt;
  }
  return prepared;
}

export const applyPatch = (link: Link, patch: LinkPatch, updatedAt: string): Link => ({
  ...link,
  ...patch,
  tagIds: patch.tagIds ?? link.tagIds,
  updatedAt,
});

/**
 * Builds the record shown before the store acknowledges a create. The domain
 * doubles as the title until enrichment lands.
 */
export function buildTentativeLink(
  ownerId: string,
  draft: PreparedDraft,
  id: string,
  now: string
): Link {
  return {
    id,
    ownerId,
    url: draft.url,
    normalizedUrl: draft.normalizedUrl,
    domain: draft.domain,
    title: draft.domain,
    description: null,
    thumbnailUrl: null,
    note: draft.note,
    spaceId: draft.spaceId,
    tagIds: draft.tagIds,
    createdAt: now,
    updatedAt: now,
    openedAt: null,
    metadataState: emptyMetadataState(),
  };
}

export const displayTitle = (link: Pick<Link, "title" | "domain" | "url">) =>
  link.title?.trim() || link.domain || link.url;

const readString = (value: unknown) => (typeof value === "string" ? value : null);

const readTimestamp = (value: unknown) => {
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return null;
};

const hydrateMetadataState = (raw: unknown): MetadataState => {
  if (!raw || typeof raw !== "object") {
    return emptyMetadataState();
  }
  const candidate = raw as Record<string, unknown>;
  const attempts =
    typeof candidate.attempts === "number" && Number.isFinite(candidate.attempts)
      ? Math.max(0, Math.floor(candidate.attempts))
      : 0;
  return {
    attempts,
    lastAttemptAt: readTimestamp(candidate.lastAttemptAt),
    complete: candidate.complete === true,
  };
};

/**
 * Validates a link coming back over the wire. Returns null for anything that
 * lacks the identifying fields.
 */
export function hydrateLink(raw: unknown): Link | null {
  if (!raw || typeof raw !== "object") {
    return null;
  }
  const candidate = raw as Record<string, unknown>;
  const id = readString(candidate.id);
  const ownerId = readString(candidate.ownerId);
  const url = readString(candidate.url);
  const normalizedUrl = readString(candidate.normalizedUrl);
  const createdAt = readTimestamp(candidate.createdAt);
  if (!id || !ownerId || !url || !normalizedUrl || !createdAt) {
    return null;
  }
  return {
    id,
    ownerId,
    url,
    normalizedUrl,
    domain: readString(candidate.domain),
    title: readString(candidate.title),
    description: readString(candidate.description),
    thumbnailUrl: readString(candidate.thumbnailUrl),
    note: readString(candidate.note),
    spaceId: readString(candidate.spaceId),
    tagIds: Array.isArray(candidate.tagIds)
      ? normalizeTagIds(
          candidate.tagIds.filter((tagId): tagId is string => typeof tagId === "string")
        )
      : [],
    createdAt,
    updatedAt: readTimestamp(candidate.updatedAt) ?? createdAt,
    openedAt: readTimestamp(candidate.openedAt),
    metadataState: hydrateMetadataState(candidate.metadataState),
  };
}

export const hydrateLinkList = (raw: unknown) =>
  Array.isArray(raw)
    ? raw.map(hydrateLink).filter((link): link is Link => link !== null)
    : [];
