/// <reference types="jest" />

import { DuplicateError } from "@/lib/errors";
import { LinkApiClient } from "@/lib/link-api";
import { prepareDraft } from "@/lib/links";
import { OfflineRequestQueue, type QueueStorage } from "@/lib/offline-queue";

class MemoryStorage implements QueueStorage {
  private readonly values = new Map<string, string>();

  getItem(key: string) {
    return this.values.get(key) ?? null;
  }

  setItem(key: string, value: string) {
    this.values.set(key, value);
  }
}

const jsonResponse = (status: number, body: unknown) =>
  ({
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  }) as unknown as Response;

const wireLink = {
  id: "link-1",
  ownerId: "user-1",
  url: "https://example.com/a",
  normalizedUrl: "https://example.com/a",
  domain: "example.com",
  title: "example.com",
  createdAt: "2026-01-01T00:00:00.000Z",
  updatedAt: "2026-01-01T00:00:00.000Z",
  tagIds: [],
  metadataState: { attempts: 0, lastAttemptAt: null, complete: false },
};

const context = { ownerId: "user-1", accessToken: "test-token" };

const setup = (online = true) => {
  const fetcher = jest.fn();
  const state = { online };
  const queue = new OfflineRequestQueue({
    storage: new MemoryStorage(),
    fetcher: fetcher as unknown as typeof fetch,
    isOnline: () => state.online,
  });
  const client = new LinkApiClient({
    baseUrl: "https://app.test",
    fetcher: fetcher as unknown as typeof fetch,
    queue,
  });
  return { fetcher, state, queue, client };
};

describe("LinkApiClient", () => {
  it("posts creates and reads back the stored link", async () => {
    const { fetcher, client } = setup();
    fetcher.mockResolvedValue(jsonResponse(201, { link: wireLink }));

    const outcome = await client.createLink(context, prepareDraft({ url: "https://example.com/a" }));

    expect(outcome).toMatchObject({ queued: false, link: { id: "link-1" } });
    expect(fetcher).toHaveBeenCalledWith("https://app.test/api/links", {
      method: "POST",
      headers: { "Content-Type": "application/json", Authorization: "Bearer test-token" },
      body: '{"url":"https://example.com/a","note":null,"spaceId":null,"tagIds":[]}',
    });
  });

  it("turns a duplicate answer into a duplicate error", async () => {
    const { fetcher, client } = setup();
    fetcher.mockResolvedValue(jsonResponse(409, { error: "Link already saved", code: "duplicate" }));

    await expect(
      client.createLink(context, prepareDraft({ url: "https://example.com/a" }))
    ).rejects.toBeInstanceOf(DuplicateError);
  });

  it("confirms queued creates once the queue delivers them", async () => {
    const { fetcher, state, queue, client } = setup(false);

    const outcome = await client.createLink(context, prepareDraft({ url: "https://example.com/a" }));
    expect(outcome.queued).toBe(true);
    expect(fetcher).not.toHaveBeenCalled();

    state.online = true;
    fetcher.mockResolvedValue(jsonResponse(201, { link: wireLink }));
    await queue.flush();

    if (!outcome.queued) {
      throw new Error("expected a queued outcome");
    }
    await expect(outcome.confirmation).resolves.toMatchObject({ id: "link-1" });
  });

  it("requests pages with their index and size", async () => {
    const { fetcher, client } = setup();
    fetcher.mockResolvedValue(jsonResponse(200, { links: [wireLink, { id: "broken" }] }));

    const links = await client.fetchPage(context, { pageIndex: 1, pageSize: 30, spaceId: "space-1" });

    expect(links.map((link) => link.id)).toEqual(["link-1"]);
    expect(fetcher).toHaveBeenCalledWith(
      "https://app.test/api/links?page=1&pageSize=30&spaceId=space-1",
      { cache: "no-store", headers: { Authorization: "Bearer test-token" } }
    );
  });

  it("treats deleting a missing link as done", async () => {
    const { fetcher, client } = setup();
    fetcher.mockResolvedValue(jsonResponse(404, { error: "Link not found", code: "not_found" }));

    await expect(client.deleteLink(context, "link-1")).resolves.toBeUndefined();
  });

  it("reads a spent metadata budget as null", async () => {
    const { fetcher, client } = setup();
    fetcher.mockResolvedValue(
      jsonResponse(409, { error: "Metadata enrichment gave up", code: "exhausted" })
    );

    await expect(
      client.recordAttempt(context, "link-1", new Date("2026-01-01T00:00:00.000Z"))
    ).resolves.toBeNull();
  });

  it("maps transport failures to network errors", async () => {
    const { fetcher, client } = setup();
    fetcher.mockRejectedValue(new TypeError("fetch failed"));

    await expect(client.listTags(context)).rejects.toMatchObject({
      code: "network",
      message: "Unable to reach the server",
    });
  });
});
