/// <reference types="jest" />

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

const fakeResponse = (status: number) =>
  ({ ok: status >= 200 && status < 300, status }) as unknown as Response;

type FetchMock = jest.Mock<Promise<Response>, Parameters<typeof fetch>>;

const setup = (online = true) => {
  const storage = new MemoryStorage();
  const fetcher: FetchMock = jest.fn();
  const state = { online };
  const queue = new OfflineRequestQueue({
    storage,
    fetcher,
    isOnline: () => state.online,
    storageKey: "test-queue",
  });
  return { storage, fetcher, state, queue };
};

const request = { url: "/api/links", method: "POST", body: '{"url":"https://example.com"}' };

afterEach(() => {
  jest.restoreAllMocks();
});

describe("OfflineRequestQueue", () => {
  it("sends directly while online", async () => {
    const { fetcher, queue } = setup();
    fetcher.mockResolvedValue(fakeResponse(201));

    const result = await queue.send(request, { queueable: true });

    expect(result.queued).toBe(false);
    expect(fetcher).toHaveBeenCalledWith("/api/links", {
      method: "POST",
      headers: undefined,
      body: '{"url":"https://example.com"}',
    });
  });

  it("queues while offline and delivers on flush", async () => {
    const { storage, fetcher, state, queue } = setup(false);

    const result = await queue.send(request, { queueable: true });
    expect(result.queued).toBe(true);
    expect(fetcher).not.toHaveBeenCalled();
    expect(JSON.parse(storage.getItem("test-queue") ?? "[]")).toHaveLength(1);

    state.online = true;
    const created = fakeResponse(201);
    fetcher.mockResolvedValue(created);
    await queue.flush();

    if (!result.queued) {
      throw new Error("expected a queued result");
    }
    await expect(result.delivered).resolves.toBe(created);
    expect(queue.hasQueuedRequests()).toBe(false);
  });

  it("keeps requests the server failed on", async () => {
    const { fetcher, state, queue } = setup(false);
    await queue.send(request, { queueable: true });

    state.online = true;
    fetcher.mockResolvedValue(fakeResponse(503));
    await queue.flush();

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(queue.hasQueuedRequests()).toBe(true);
  });

  it("drops requests the server rejected as final", async () => {
    const { fetcher, state, queue } = setup(false);
    const result = await queue.send(request, { queueable: true });

    state.online = true;
    fetcher.mockResolvedValue(fakeResponse(409));
    await queue.flush();

    expect(queue.hasQueuedRequests()).toBe(false);
    if (result.queued) {
      await expect(result.delivered).resolves.toMatchObject({ status: 409 });
    }
  });

  it("queues a queueable request when the network drops mid-flight", async () => {
    const { fetcher, queue } = setup();
    fetcher.mockRejectedValue(new TypeError("fetch failed"));

    const result = await queue.send(request, { queueable: true });

    expect(result.queued).toBe(true);
    expect(queue.hasQueuedRequests()).toBe(true);
  });

  it("surfaces transport errors for requests that may not be queued", async () => {
    const { fetcher, queue } = setup(false);
    fetcher.mockRejectedValue(new TypeError("fetch failed"));

    await expect(queue.send({ url: "/api/links/1", method: "DELETE" })).rejects.toThrow(
      "fetch failed"
    );
    expect(queue.hasQueuedRequests()).toBe(false);
  });

  it("does not queue without storage", async () => {
    const fetcher: FetchMock = jest.fn().mockRejectedValue(new TypeError("fetch failed"));
    const queue = new OfflineRequestQueue({ storage: null, fetcher, isOnline: () => false });

    expect(queue.canQueue()).toBe(false);
    await expect(queue.send(request, { queueable: true })).rejects.toBeInstanceOf(TypeError);
  });

  it("ignores a corrupt stored queue", () => {
    const { storage, queue } = setup();
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    storage.setItem("test-queue", "{not json");

    expect(queue.hasQueuedRequests()).toBe(false);
  });
});
