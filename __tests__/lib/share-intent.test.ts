/// <reference types="jest" />

import { ShareIntentReconciler, connectShareConsumer } from "@/lib/share-intent";

beforeEach(() => {
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("ShareIntentReconciler", () => {
  it("delivers a cold-start share exactly once", () => {
    const reconciler = new ShareIntentReconciler("linkshelf");
    expect(reconciler.receive("Look at https://docs.example.net!")).toBe(true);
    expect(reconciler.getSnapshot()).toEqual({
      status: "url-pending",
      share: { url: "https://docs.example.net" },
    });

    const onShare = jest.fn();
    const unsubscribe = connectShareConsumer(reconciler, onShare);
    expect(onShare).toHaveBeenCalledTimes(1);
    expect(onShare).toHaveBeenCalledWith({ url: "https://docs.example.net" });
    expect(reconciler.getSnapshot()).toEqual({ status: "initial" });

    // a consumer rebuilt after the first one must not see the share again
    unsubscribe();
    const rebuilt = jest.fn();
    connectShareConsumer(reconciler, rebuilt);
    expect(rebuilt).not.toHaveBeenCalled();
  });

  it("delivers warm shares to an attached consumer", () => {
    const reconciler = new ShareIntentReconciler("linkshelf");
    const onShare = jest.fn();
    connectShareConsumer(reconciler, onShare);

    reconciler.receive("https://example.com/a");
    reconciler.receive("https://example.com/b");

    expect(onShare.mock.calls).toEqual([
      [{ url: "https://example.com/a" }],
      [{ url: "https://example.com/b" }],
    ]);
    expect(reconciler.getSnapshot().status).toBe("initial");
  });

  it("keeps only the latest share until it is consumed", () => {
    const reconciler = new ShareIntentReconciler("linkshelf");
    reconciler.receive("https://example.com/first");
    reconciler.receive("https://example.com/second");

    expect(reconciler.consume()).toEqual({ url: "https://example.com/second" });
    expect(reconciler.consume()).toBeNull();
  });

  it("stops delivering after unsubscribe", () => {
    const reconciler = new ShareIntentReconciler("linkshelf");
    const onShare = jest.fn();
    const unsubscribe = connectShareConsumer(reconciler, onShare);
    unsubscribe();

    reconciler.receive("https://example.com/a");

    expect(onShare).not.toHaveBeenCalled();
    expect(reconciler.getSnapshot().status).toBe("url-pending");
  });

  it("ignores shared text without a link", () => {
    const reconciler = new ShareIntentReconciler("linkshelf");

    expect(reconciler.receive("no link here")).toBe(false);
    expect(reconciler.receive(null)).toBe(false);
    expect(reconciler.getSnapshot()).toEqual({ status: "initial" });
    expect(console.warn).toHaveBeenCalledWith("Ignoring share without a link");
  });

  it("accepts share deep links for its own scheme", () => {
    const reconciler = new ShareIntentReconciler("linkshelf");

    expect(reconciler.receiveDeepLink("linkshelf://share?url=https%3A%2F%2Fexample.com%2Fa")).toBe(
      true
    );
    expect(reconciler.consume()).toEqual({ url: "https://example.com/a" });
    expect(reconciler.receiveDeepLink("otherapp://share?url=https%3A%2F%2Fexample.com")).toBe(false);
  });

  it("reads deep links under a configured scheme", () => {
    const reconciler = new ShareIntentReconciler("linkshelf");

    expect(
      reconciler.receiveDeepLink("web+shelfdev://share?url=https%3A%2F%2Fexample.com%2Fb", "shelfdev")
    ).toBe(true);
    expect(reconciler.consume()).toEqual({ url: "https://example.com/b" });
    expect(
      reconciler.receiveDeepLink("linkshelf://share?url=https%3A%2F%2Fexample.com%2Fb", "shelfdev")
    ).toBe(false);
  });

  it("picks the first share-target field that carries a link", () => {
    const reconciler = new ShareIntentReconciler("linkshelf");

    reconciler.receiveSharePayload({
      title: "Cool page",
      text: "see https://example.com/x",
      url: null,
    });

    expect(reconciler.consume()).toEqual({ url: "https://example.com/x" });
  });
});
