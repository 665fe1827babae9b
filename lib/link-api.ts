import { ValidationError, fromResponse, fromTransportError } from "@/lib/errors";
import {
  hydrateLink,
  hydrateLinkList,
  type Link,
  type LinkMetadata,
  type LinkPatch,
  type MetadataState,
  type PreparedDraft,
  type Space,
  type Tag,
} from "@/lib/links";
import type { MetadataAttemptStore } from "@/lib/metadata-coordinator";
import type { CreateOutcome, RemoteLinkGateway, SessionContext } from "@/lib/mutation-engine";
import { OfflineRequestQueue, offlineQueue, type QueueResult } from "@/lib/offline-queue";
import type { PageQuery } from "@/lib/collection-loader";

type ResponseBody = Record<string, unknown> | null;

const readBody = async (response: Response): Promise<ResponseBody> => {
  const body: unknown = await response.json().catch(() => null);
  return body && typeof body === "object" && !Array.isArray(body)
    ? (body as Record<string, unknown>)
    : null;
};

const expectOk = async (response: Response) => {
  const body = await readBody(response);
  if (!response.ok) {
    throw fromResponse(response.status, body);
  }
  return body;
};

const readLink = (body: ResponseBody) => {
  const link = hydrateLink(body?.link);
  if (!link) {
    throw new ValidationError("Server returned an unreadable link");
  }
  return link;
};

const readState = (body: ResponseBody): MetadataState => {
  const state = body?.state;
  if (!state || typeof state !== "object") {
    throw new ValidationError("Server returned an unreadable metadata state");
  }
  const candidate = state as Record<string, unknown>;
  return {
    attempts: typeof candidate.attempts === "number" ? candidate.attempts : 0,
    lastAttemptAt: typeof candidate.lastAttemptAt === "string" ? candidate.lastAttemptAt : null,
    complete: candidate.complete === true,
  };
};

export type LinkApiClientOptions = {
  baseUrl?: string;
  fetcher?: typeof fetch;
  queue?: OfflineRequestQueue;
};

/**
 * Browser side of the route handlers. Creates go through the offline queue;
 * everything else needs the network now.
 */
export class LinkApiClient implements RemoteLinkGateway, MetadataAttemptStore {
  private readonly baseUrl: string;
  private readonly fetcher: typeof fetch;
  private readonly queue: OfflineRequestQueue;

  constructor(options: LinkApiClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? "";
    this.fetcher = options.fetcher ?? ((input, init) => fetch(input, init));
    this.queue = options.queue ?? offlineQueue;
  }

  private headers(context: SessionContext, json = false) {
    const headers: Record<string, string> = {};
    if (json) {
      headers["Content-Type"] = "application/json";
    }
    if (context.accessToken) {
      headers.Authorization = `Bearer ${context.accessToken}`;
    }
    return headers;
  }

  private async request(path: string, init: RequestInit) {
    try {
      return await this.fetcher(`${this.baseUrl}${path}`, { cache: "no-store", ...init });
    } catch (error) {
      throw fromTransportError(error);
    }
  }

  async createLink(context: SessionContext, draft: PreparedDraft): Promise<CreateOutcome> {
    let result: QueueResult;
    try {
      result = await this.queue.send(
        {
          url: `${this.baseUrl}/api/links`,
          method: "POST",
          headers: this.headers(context, true),
          body: JSON.stringify({
            url: draft.url,
            note: draft.note,
            spaceId: draft.spaceId,
            tagIds: draft.tagIds,
          }),
        },
        { queueable: true }
      );
    } catch (error) {
      throw fromTransportError(error);
    }

    if (result.queued) {
      return {
        queued: true,
        confirmation: result.delivered.then(async (response) => readLink(await expectOk(response))),
      };
    }
    return { queued: false, link: readLink(await expectOk(result.response)) };
  }

  async updateLink(context: SessionContext, linkId: string, patch: LinkPatch): Promise<Link> {
    const response = await this.request(`/api/links/${encodeURIComponent(linkId)}`, {
      method: "PATCH",
      headers: this.headers(context, true),
      body: JSON.stringify(patch),
    });
    return readLink(await expectOk(response));
  }

  async deleteLink(context: SessionContext, linkId: string): Promise<void> {
    const response = await this.request(`/api/links/${encodeURIComponent(linkId)}`, {
      method: "DELETE",
      headers: this.headers(context),
    });
    if (response.status === 404) {
      // already gone on the server; nothing to roll back
      return;
    }
    await expectOk(response);
  }

  fetchPage = async (context: SessionContext, query: PageQuery): Promise<Link[]> => {
    const params = new URLSearchParams({
      page: String(query.pageIndex),
      pageSize: String(query.pageSize),
    });
    if (query.spaceId) {
      params.set("spaceId", query.spaceId);
    }
    const response = await this.request(`/api/links?${params.toString()}`, {
      headers: this.headers(context),
    });
    const body = await expectOk(response);
    return hydrateLinkList(body?.links);
  };

  async recordAttempt(context: SessionContext, linkId: string, at: Date) {
    const response = await this.request(
      `/api/links/${encodeURIComponent(linkId)}/metadata`,
      {
        method: "POST",
        headers: this.headers(context, true),
        body: JSON.stringify({ at: at.toISOString() }),
      }
    );
    if (response.status === 409) {
      const body = await readBody(response);
      const error = fromResponse(response.status, body);
      if (error.code === "exhausted") {
        return null;
      }
      throw error;
    }
    return readState(await expectOk(response));
  }

  async complete(context: SessionContext, linkId: string, metadata: LinkMetadata) {
    const response = await this.request(
      `/api/links/${encodeURIComponent(linkId)}/metadata`,
      {
        method: "PUT",
        headers: this.headers(context, true),
        body: JSON.stringify(metadata),
      }
    );
    return readLink(await expectOk(response));
  }

  async reset(context: SessionContext, linkId: string) {
    const response = await this.request(
      `/api/links/${encodeURIComponent(linkId)}/metadata`,
      { method: "DELETE", headers: this.headers(context) }
    );
    return readState(await expectOk(response));
  }

  async listIncomplete(context: SessionContext, limit: number) {
    const response = await this.request(
      `/api/links/incomplete-metadata?limit=${encodeURIComponent(String(limit))}`,
      { headers: this.headers(context) }
    );
    const body = await expectOk(response);
    return hydrateLinkList(body?.links);
  }

  /** Goes through the server-side proxy; pages cannot be fetched cross-origin. */
  fetchMetadata = async (url: string, signal: AbortSignal): Promise<LinkMetadata> => {
    const response = await this.request(`/api/metadata?url=${encodeURIComponent(url)}`, {
      signal,
    });
    const body = await expectOk(response);
    const metadata = body?.metadata;
    if (!metadata || typeof metadata !== "object") {
      throw new ValidationError("Metadata response was malformed");
    }
    const candidate = metadata as Record<string, unknown>;
    const domain = typeof candidate.domain === "string" ? candidate.domain : "";
    return {
      title: typeof candidate.title === "string" ? candidate.title : domain,
      description: typeof candidate.description === "string" ? candidate.description : null,
      thumbnailUrl: typeof candidate.thumbnailUrl === "string" ? candidate.thumbnailUrl : null,
      domain,
    };
  };

  async listTags(context: SessionContext): Promise<Tag[]> {
    const response = await this.request("/api/tags", { headers: this.headers(context) });
    const body = await expectOk(response);
    return Array.isArray(body?.tags) ? body.tags.filter(isTag) : [];
  }

  async listSpaces(context: SessionContext): Promise<Space[]> {
    const response = await this.request("/api/spaces", { headers: this.headers(context) });
    const body = await expectOk(response);
    return Array.isArray(body?.spaces) ? body.spaces.filter(isSpace) : [];
  }
}

type NamedEntity = Record<string, unknown> & { id: string; name: string; color: string };

const isNamedEntity = (value: unknown): value is NamedEntity => {
  if (!value || typeof value !== "object") {
    return false;
  }
  const candidate = value as Record<string, unknown>;
  return (
    typeof candidate.id === "string" &&
    typeof candidate.name === "string" &&
    typeof candidate.color === "string"
  );
};

const isTag = (value: unknown): value is Tag =>
  isNamedEntity(value) && typeof value.usageCount === "number";

const isSpace = (value: unknown): value is Space =>
  isNamedEntity(value) && typeof value.linkCount === "number";

