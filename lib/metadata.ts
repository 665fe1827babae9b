import { LinkError, NetworkError, ValidationError, fromTransportError } from "@/lib/errors";
import { extractDomain, isPublicHttpUrl } from "@/lib/link-url";
import type { LinkMetadata } from "@/lib/links";

export type ExtractedMetadata = {
  title?: string;
  description?: string;
  thumbnailUrl?: string;
};

const YOUTUBE_PATTERN = /^https?:\/\/(www\.|m\.)?(youtube\.com|youtu\.be)\//i;

export const isYouTubeUrl = (url: string) => YOUTUBE_PATTERN.test(url);

export function extractYouTubeVideoId(url: string): string | null {
  const patterns = [
    /[?&]v=([a-zA-Z0-9_-]{11})/,
    /youtu\.be\/([a-zA-Z0-9_-]{11})/,
    /\/(?:embed|shorts)\/([a-zA-Z0-9_-]{11})/,
  ];
  for (const pattern of patterns) {
    const match = url.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return null;
}

const ENTITY_MAP: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&#x27;": "'",
  "&apos;": "'",
  "&nbsp;": " ",
};

export const decodeEntities = (text: string) =>
  text
    .replace(/&(amp|lt|gt|quot|apos|nbsp|#39|#x27);/g, (entity) => ENTITY_MAP[entity] ?? entity)
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(Number(code)))
    .trim();

const escapeForPattern = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const readMetaContent = (html: string, attribute: "property" | "name", key: string) => {
  const escaped = escapeForPattern(key);
  const patterns = [
    new RegExp(
      `<meta[^>]*${attribute}=["']${escaped}["'][^>]*content=["']([^"']*)["']`,
      "i"
    ),
    new RegExp(
      `<meta[^>]*content=["']([^"']*)["'][^>]*${attribute}=["']${escaped}["']`,
      "i"
    ),
  ];
  for (const pattern of patterns) {
    const match = pattern.exec(html);
    if (match && match[1].trim()) {
      return decodeEntities(match[1]);
    }
  }
  return undefined;
};

type JsonLdNode = Record<string, unknown>;

const pickString = (...candidates: unknown[]) => {
  for (const candidate of candidates) {
    if (typeof candidate === "string" && candidate.trim()) {
      return candidate.trim();
    }
  }
  return undefined;
};

const readImage = (image: unknown): string | undefined => {
  if (typeof image === "string") {
    return image;
  }
  if (Array.isArray(image)) {
    return readImage(image[0]);
  }
  if (image && typeof image === "object") {
    return pickString((image as JsonLdNode).url);
  }
  return undefined;
};

const JSON_LD_TYPES = new Set([
  "Article",
  "NewsArticle",
  "BlogPosting",
  "WebPage",
  "VideoObject",
  "Product",
]);

const collectJsonLdNodes = (value: unknown, nodes: JsonLdNode[]) => {
  if (Array.isArray(value)) {
    value.forEach((item) => collectJsonLdNodes(item, nodes));
    return;
  }
  if (!value || typeof value !== "object") {
    return;
  }
  const node = value as JsonLdNode;
  if (typeof node["@type"] === "string" && JSON_LD_TYPES.has(node["@type"])) {
    nodes.push(node);
  }
  if (Array.isArray(node["@graph"])) {
    collectJsonLdNodes(node["@graph"], nodes);
  }
};

function extractFromJsonLd(html: string): ExtractedMetadata {
  const nodes: JsonLdNode[] = [];
  const pattern = /<script[^>]*type=["']application\/ld\+json["'][^>]*>([\s\S]*?)<\/script>/gi;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(html)) !== null) {
    try {
      collectJsonLdNodes(JSON.parse(match[1].trim()), nodes);
    } catch {
      continue;
    }
  }
  const result: ExtractedMetadata = {};
  for (const node of nodes) {
    result.title ??= pickString(node.headline, node.name);
    result.description ??= pickString(node.description);
    result.thumbnailUrl ??= readImage(node.image) ?? readImage(node.thumbnailUrl);
  }
  return result;
}

const resolveThumbnail = (candidate: string | undefined, pageUrl: string) => {
  if (!candidate) {
    return undefined;
  }
  if (candidate.startsWith("//")) {
    return `https:${candidate}`;
  }
  try {
    return new URL(candidate, pageUrl).toString();
  } catch {
    return undefined;
  }
};

/**
 * Reads title, description and preview image from an HTML document:
 * Open Graph first, then Twitter cards, JSON-LD, and finally `<title>` and
 * the description meta tag.
 */
export function extractMetadataFromHtml(html: string, pageUrl: string): ExtractedMetadata {
  const jsonLd = extractFromJsonLd(html);
  const titleMatch = /<title[^>]*>([^<]+)<\/title>/i.exec(html);

  const title =
    readMetaContent(html, "property", "og:title") ??
    readMetaContent(html, "name", "twitter:title") ??
    jsonLd.title ??
    (titleMatch ? decodeEntities(titleMatch[1]) : undefined);
  const description =
    readMetaContent(html, "property", "og:description") ??
    readMetaContent(html, "name", "twitter:description") ??
    jsonLd.description ??
    readMetaContent(html, "name", "description");
  const thumbnailUrl = resolveThumbnail(
    readMetaContent(html, "property", "og:image") ??
      readMetaContent(html, "name", "twitter:image") ??
      jsonLd.thumbnailUrl,
    pageUrl
  );

  return {
    ...(title ? { title } : {}),
    ...(description ? { description } : {}),
    ...(thumbnailUrl ? { thumbnailUrl } : {}),
  };
}

export type PageMetadataOptions = {
  timeoutMs: number;
  fetcher?: typeof fetch;
};

const BROWSER_HEADERS = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
};

/** Page bodies are read up to this many bytes; the rest is cancelled. */
export const MAX_HTML_BYTES = 512 * 1024;

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const requirePublicUrl = (url: string) => {
  if (!isPublicHttpUrl(url)) {
    throw new ValidationError("Local and private addresses cannot be previewed");
  }
};

/**
 * Runs `work` under one deadline that covers the body as well as the
 * headers. On expiry the signal aborts and the call fails with a NetworkError.
 */
async function withDeadline<T>(
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new NetworkError("Page took too long to respond"));
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), deadline]);
  } catch (error) {
    throw error instanceof LinkError ? error : fromTransportError(error);
  } finally {
    clearTimeout(timeoutId);
  }
}

async function readLimitedText(response: Response, signal: AbortSignal, maxBytes = MAX_HTML_BYTES) {
  if (!response.body) {
    return (await response.text()).slice(0, maxBytes);
  }
  const reader = response.body.getReader();
  const cancel = () => {
    reader.cancel().catch((error: unknown) => {
      console.warn("Failed to cancel page body", error);
    });
  };
  signal.addEventListener("abort", cancel, { once: true });

  const decoder = new TextDecoder();
  let received = 0;
  let html = "";
  try {
    while (received < maxBytes) {
      const result = await reader.read();
      if (result.done) {
        return html + decoder.decode();
      }
      const chunk = result.value.subarray(0, maxBytes - received);
      received += chunk.byteLength;
      html += decoder.decode(chunk, { stream: true });
    }
    cancel();
    return html + decoder.decode();
  } finally {
    signal.removeEventListener("abort", cancel);
  }
}

type OEmbedResponse = {
  title?: unknown;
  author_name?: unknown;
  thumbnail_url?: unknown;
};

async function fetchYouTubeMetadata(
  url: string,
  options: PageMetadataOptions
): Promise<LinkMetadata | null> {
  const fetcher = options.fetcher ?? fetch;
  const oembedUrl = `https://www.youtube.com/oembed?url=${encodeURIComponent(url)}&format=json`;
  const data = await withDeadline(options.timeoutMs, async (signal) => {
    const response = await fetcher(oembedUrl, { signal });
    if (!response.ok) {
      console.warn(`YouTube oEmbed answered ${response.status} for ${url}`);
      return null;
    }
    return (await response.json().catch(() => null)) as OEmbedResponse | null;
  });
  const title = pickString(data?.title);
  if (!title) {
    return null;
  }
  const videoId = extractYouTubeVideoId(url);
  return {
    title,
    description:
      typeof data?.author_name === "string" ? `By ${data.author_name}` : null,
    thumbnailUrl: videoId
      ? `https://img.youtube.com/vi/${videoId}/hqdefault.jpg`
      : pickString(data?.thumbnail_url) ?? null,
    domain: "youtube.com",
  };
}

/**
 * Server-side metadata lookup used by the metadata proxy route. Falls back
 * to the domain as title when the page carries nothing usable.
 */
export async function fetchPageMetadata(
  url: string,
  options: PageMetadataOptions
): Promise<LinkMetadata> {
  requirePublicUrl(url);
  const domain = extractDomain(url);

  if (isYouTubeUrl(url)) {
    const youtube = await fetchYouTubeMetadata(url, options);
    if (youtube) {
      return youtube;
    }
  }

  const fetcher = options.fetcher ?? fetch;
  const page = await withDeadline(options.timeoutMs, async (signal) => {
    // redirects are followed by hand so every hop gets the same host check
    let target = url;
    for (let hop = 0; ; hop += 1) {
      requirePublicUrl(target);
      const response = await fetcher(target, { headers: BROWSER_HEADERS, redirect: "manual", signal });
      const location = REDIRECT_STATUSES.has(response.status)
        ? response.headers.get("location")
        : null;
      if (location) {
        if (hop >= MAX_REDIRECTS) {
          throw new NetworkError("Page redirected too many times");
        }
        target = new URL(location, target).toString();
        continue;
      }
      if (!response.ok) {
        throw new NetworkError(`Page answered with status ${response.status}`);
      }
      return { html: await readLimitedText(response, signal), pageUrl: response.url || target };
    }
  });
  const extracted = extractMetadataFromHtml(page.html, page.pageUrl);

  return {
    title: extracted.title ?? domain,
    description: extracted.description ?? null,
    thumbnailUrl: extracted.thumbnailUrl ?? null,
    domain,
  };
}
