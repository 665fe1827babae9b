/// <reference types="jest" />

import { ValidationError } from "@/lib/errors";
import {
  applyPatch,
  buildTentativeLink,
  detailsOf,
  displayTitle,
  hydrateLink,
  hydrateLinkList,
  isTentativeId,
  patchFromDetails,
  prepareDraft,
  preparePatch,
} from "@/lib/links";

describe("prepareDraft", () => {
  it("keeps the captured url and derives the duplicate key", () => {
    expect(
      prepareDraft({
        url: "Saw this: https://www.example.com/a/?utm_source=tw",
        note: "  worth a read ",
        spaceId: " ",
        tagIds: ["b", "a", "b", " "],
      })
    ).toEqual({
      url: "https://www.example.com/a/?utm_source=tw",
      normalizedUrl: "https://example.com/a",
      domain: "example.com",
      note: "worth a read",
      spaceId: null,
      tagIds: ["a", "b"],
    });
  });

  it("treats a blank note as no note and rejects long ones", () => {
    expect(prepareDraft({ url: "https://example.com", note: "   " }).note).toBeNull();
    expect(() => prepareDraft({ url: "https://example.com", note: "x".repeat(201) })).toThrow(
      ValidationError
    );
  });
});

describe("preparePatch", () => {
  it("only carries the fields that were given", () => {
    expect(preparePatch({ tagIds: ["z", "a"] })).toEqual({ tagIds: ["a", "z"] });
    expect(preparePatch({ note: null, spaceId: "space-1" })).toEqual({
      note: null,
      spaceId: "space-1",
    });
  });

  it("rejects malformed openedAt values", () => {
    expect(() => preparePatch({ openedAt: "yesterday" })).toThrow(
      "openedAt must be an ISO timestamp"
    );
  });
});

describe("tentative links", () => {
  it("shows the domain as title until metadata arrives", () => {
    const draft = prepareDraft({ url: "https://example.com/a" });
    const link = buildTentativeLink("user-1", draft, "tentative-1", "2026-01-01T00:00:00.000Z");

    expect(isTentativeId(link.id)).toBe(true);
    expect(link).toMatchObject({ title: "example.com", domain: "example.com", tagIds: [] });
    expect(link.metadataState).toEqual({ attempts: 0, lastAttemptAt: null, complete: false });
  });

  it("applies patches without dropping tags", () => {
    const draft = prepareDraft({ url: "https://example.com/a", tagIds: ["t1"] });
    const link = buildTentativeLink("user-1", draft, "tentative-1", "2026-01-01T00:00:00.000Z");

    expect(applyPatch(link, { note: "n" }, "2026-01-02T00:00:00.000Z")).toMatchObject({
      note: "n",
      tagIds: ["t1"],
      updatedAt: "2026-01-02T00:00:00.000Z",
    });
  });
});

describe("displayTitle", () => {
  it("falls back from title to domain to url", () => {
    expect(displayTitle({ title: " ", domain: "example.com", url: "https://example.com" })).toBe(
      "example.com"
    );
    expect(displayTitle({ title: null, domain: null, url: "https://example.com" })).toBe(
      "https://example.com"
    );
  });
});

describe("hydrateLink", () => {
  it("drops records without identifying fields", () => {
    expect(hydrateLink({ id: "a" })).toBeNull();
    expect(hydrateLinkList([{ id: "a" }, null, "x"])).toEqual([]);
  });

  it("fills optional fields", () => {
    const link = hydrateLink({
      id: "a",
      ownerId: "user-1",
      url: "https://example.com",
      normalizedUrl: "https://example.com",
      createdAt: "2026-01-01T00:00:00.000Z",
      tagIds: ["b", 3, "a"],
      metadataState: { attempts: 2.7, complete: true },
    });

    expect(link).toMatchObject({
      updatedAt: "2026-01-01T00:00:00.000Z",
      tagIds: ["a", "b"],
      title: null,
      metadataState: { attempts: 2, lastAttemptAt: null, complete: true },
    });
  });
});

describe("link details form", () => {
  it("fills the form from a saved link", () => {
    const link = hydrateLink({
      id: "a",
      ownerId: "user-1",
      url: "https://example.com",
      normalizedUrl: "https://example.com",
      createdAt: "2026-01-01T00:00:00.000Z",
      spaceId: "space-1",
      tagIds: ["t1"],
    });

    expect(link && detailsOf(link)).toEqual({ note: "", spaceId: "space-1", tagIds: ["t1"] });
  });

  it("turns a blank note and unsorted space into cleared fields", () => {
    expect(patchFromDetails({ note: "   ", spaceId: "", tagIds: ["t2"] })).toEqual({
      note: null,
      spaceId: null,
      tagIds: ["t2"],
    });
    expect(patchFromDetails({ note: "later", spaceId: "space-1", tagIds: [] })).toEqual({
      note: "later",
      spaceId: "space-1",
      tagIds: [],
    });
  });
});
