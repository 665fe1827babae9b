/// <reference types="jest" />

import { NetworkError, ValidationError } from "@/lib/errors";
import {
  decodeEntities,
  extractMetadataFromHtml,
  extractYouTubeVideoId,
  fetchPageMetadata,
  isYouTubeUrl,
  MAX_HTML_BYTES,
} from "@/lib/metadata";

type FakeReader = {
  read: jest.Mock;
  cancel: jest.Mock;
};

type FakeResponse = {
  ok: boolean;
  status: number;
  url?: string;
  headers?: { get: (name: string) => string | null };
  body?: { getReader: () => FakeReader };
  text?: () => Promise<string>;
  json?: () => Promise<unknown>;
};

const encoder = new TextEncoder();

const streamingBody = (reader: FakeReader) => ({ getReader: () => reader });

const redirectTo = (location: string): FakeResponse => ({
  ok: false,
  status: 302,
  headers: { get: (name) => (name.toLowerCase() === "location" ? location : null) },
});

const fakeFetch = (...responses: FakeResponse[]) => {
  const fetcher = jest.fn();
  responses.forEach((response) => fetcher.mockResolvedValueOnce(response));
  return fetcher;
};

const asFetch = (fetcher: jest.Mock) => fetcher as unknown as typeof fetch;

describe("extractMetadataFromHtml", () => {
  it("prefers Open Graph tags in either attribute order", () => {
    const html = `<html><head>
      <title>Fallback &amp; Title</title>
      <meta content="A &quot;quoted&quot; summary" property="og:description">
      <meta property="og:title" content="Shelf &amp; Co">
      <meta property="og:image" content="/images/cover.png">
    </head></html>`;

    expect(extractMetadataFromHtml(html, "https://example.com/articles/1")).toEqual({
      title: "Shelf & Co",
      description: 'A "quoted" summary',
      thumbnailUrl: "https://example.com/images/cover.png",
    });
  });

  it("falls back to JSON-LD inside a graph", () => {
    const html = `<script type="application/ld+json">
      {"@context":"https://schema.org","@graph":[{"@type":"NewsArticle","headline":"Graph headline",
      "description":"From JSON-LD","image":[{"url":"https://cdn.example.com/a.jpg"}]}]}
    </script><title>Page title</title>`;

    expect(extractMetadataFromHtml(html, "https://example.com/")).toEqual({
      title: "Graph headline",
      description: "From JSON-LD",
      thumbnailUrl: "https://cdn.example.com/a.jpg",
    });
  });

  it("uses the title element and description meta last", () => {
    const html =
      '<title>  Only title </title><meta name="description" content="Plain description">';

    expect(extractMetadataFromHtml(html, "https://example.com/")).toEqual({
      title: "Only title",
      description: "Plain description",
    });
  });

  it("makes protocol-relative images https", () => {
    const html = '<meta name="twitter:image" content="//cdn.example.com/b.png">';

    expect(extractMetadataFromHtml(html, "http://example.com/")).toEqual({
      thumbnailUrl: "https://cdn.example.com/b.png",
    });
  });

  it("skips malformed JSON-LD", () => {
    const html = '<script type="application/ld+json">{oops</script><title>Still here</title>';

    expect(extractMetadataFromHtml(html, "https://example.com/")).toEqual({ title: "Still here" });
  });
});

describe("decodeEntities", () => {
  it("decodes named and numeric entities", () => {
    expect(decodeEntities(" Tom &amp; Jerry&#39;s &#8220;show&#8221; ")).toBe(
      "Tom & Jerry's “show”"
    );
  });
});

describe("YouTube helpers", () => {
  it("recognises YouTube hosts", () => {
    expect(isYouTubeUrl("https://www.youtube.com/watch?v=abcdefghijk")).toBe(true);
    expect(isYouTubeUrl("https://youtu.be/abcdefghijk")).toBe(true);
    expect(isYouTubeUrl("https://notyoutube.com/watch?v=abcdefghijk")).toBe(false);
  });

  it("extracts video ids from each url shape", () => {
    expect(extractYouTubeVideoId("https://www.youtube.com/watch?feature=x&v=abcdefghijk")).toBe(
      "abcdefghijk"
    );
    expect(extractYouTubeVideoId("https://youtu.be/abcdefghijk?t=5")).toBe("abcdefghijk");
    expect(extractYouTubeVideoId("https://www.youtube.com/shorts/abcdefghijk")).toBe(
      "abcdefghijk"
    );
    expect(extractYouTubeVideoId("https://www.youtube.com/feed")).toBeNull();
  });
});

describe("fetchPageMetadata", () => {
  it("reads YouTube videos through oEmbed", async () => {
    const fetcher = fakeFetch({
      ok: true,
      status: 200,
      json: async () => ({ title: "Video title", author_name: "Channel" }),
    });
    const url = "https://www.youtube.com/watch?v=abcdefghijk";

    await expect(fetchPageMetadata(url, { timeoutMs: 1000, fetcher: asFetch(fetcher) })).resolves.toEqual({
      title: "Video title",
      description: "By Channel",
      thumbnailUrl: "https://img.youtube.com/vi/abcdefghijk/hqdefault.jpg",
      domain: "youtube.com",
    });
    expect(fetcher).toHaveBeenCalledWith(
      `https://www.youtube.com/oembed?url=${encodeURIComponent(url)}&format=json`,
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it("falls back to the domain when a page has no title", async () => {
    const fetcher = fakeFetch({
      ok: true,
      status: 200,
      url: "https://example.com/post",
      text: async () => "<html><body>no meta</body></html>",
    });

    await expect(
      fetchPageMetadata("https://www.example.com/post", { timeoutMs: 1000, fetcher: asFetch(fetcher) })
    ).resolves.toEqual({
      title: "example.com",
      description: null,
      thumbnailUrl: null,
      domain: "example.com",
    });
  });

  it("gives up on a body that never finishes and cancels it", async () => {
    const reader: FakeReader = {
      read: jest
        .fn()
        .mockResolvedValueOnce({ done: false, value: encoder.encode("<title>Slow") })
        .mockReturnValue(new Promise(() => undefined)),
      cancel: jest.fn().mockResolvedValue(undefined),
    };
    const fetcher = fakeFetch({ ok: true, status: 200, body: streamingBody(reader) });

    await expect(
      fetchPageMetadata("https://example.com/slow", { timeoutMs: 20, fetcher: asFetch(fetcher) })
    ).rejects.toEqual(new NetworkError("Page took too long to respond"));
    expect(reader.cancel).toHaveBeenCalledTimes(1);
  });

  it("stops reading once the byte budget is spent", async () => {
    const oversized = `<title>Big page</title>${"x".repeat(MAX_HTML_BYTES)}`;
    const reader: FakeReader = {
      read: jest
        .fn()
        .mockResolvedValueOnce({ done: false, value: encoder.encode(oversized) })
        .mockResolvedValue({ done: false, value: encoder.encode("<title>Too late</title>") }),
      cancel: jest.fn().mockResolvedValue(undefined),
    };
    const fetcher = fakeFetch({
      ok: true,
      status: 200,
      url: "https://example.com/big",
      body: streamingBody(reader),
    });

    const metadata = await fetchPageMetadata("https://example.com/big", {
      timeoutMs: 1000,
      fetcher: asFetch(fetcher),
    });

    expect(metadata.title).toBe("Big page");
    expect(reader.read).toHaveBeenCalledTimes(1);
    expect(reader.cancel).toHaveBeenCalledTimes(1);
  });

  it("refuses local and private hosts without fetching", async () => {
    const fetcher = fakeFetch();

    await expect(
      fetchPageMetadata("http://127.0.0.1:8080/admin", { timeoutMs: 1000, fetcher: asFetch(fetcher) })
    ).rejects.toEqual(new ValidationError("Local and private addresses cannot be previewed"));
    expect(fetcher).not.toHaveBeenCalled();
  });

  it("checks every redirect hop", async () => {
    const fetcher = fakeFetch(redirectTo("http://169.254.169.254/latest/meta-data"));

    await expect(
      fetchPageMetadata("https://example.com/go", { timeoutMs: 1000, fetcher: asFetch(fetcher) })
    ).rejects.toEqual(new ValidationError("Local and private addresses cannot be previewed"));
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it("follows relative redirects to public pages", async () => {
    const fetcher = fakeFetch(redirectTo("/moved"), {
      ok: true,
      status: 200,
      text: async () => "<title>Moved here</title>",
    });

    const metadata = await fetchPageMetadata("https://example.com/old", {
      timeoutMs: 1000,
      fetcher: asFetch(fetcher),
    });

    expect(metadata.title).toBe("Moved here");
    expect(fetcher).toHaveBeenLastCalledWith(
      "https://example.com/moved",
      expect.objectContaining({ redirect: "manual" })
    );
  });

  it("rejects error pages", async () => {
    const fetcher = fakeFetch({ ok: false, status: 404 });

    await expect(
      fetchPageMetadata("https://example.com/missing", { timeoutMs: 1000, fetcher: asFetch(fetcher) })
    ).rejects.toEqual(new NetworkError("Page answered with status 404"));
  });

  it("reports unreachable hosts as network errors", async () => {
    const fetcher = jest.fn().mockRejectedValue(new TypeError("fetch failed"));

    await expect(
      fetchPageMetadata("https://example.com/", { timeoutMs: 1000, fetcher: asFetch(fetcher) })
    ).rejects.toThrow("Unable to reach the server");
  });
});
