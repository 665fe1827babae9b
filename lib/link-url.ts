import { ValidationError } from "@/lib/errors";

// apostrophes are legal in paths; a closing quote is trimmed afterwards
const URL_TOKEN_PATTERN = /https?:\/\/[^\s<>"`]+/i;
const BARE_HOST_PATTERN = /^[a-z0-9-]+(\.[a-z0-9-]+)+(:\d+)?([/?#]\S*)?$/i;
const TRAILING_PUNCTUATION_PATTERN = /[.,;:!?'"]+$/;

const TRACKING_PARAMS = new Set(["fbclid", "gclid", "ref", "source"]);

export const isTrackingParam = (name: string) => {
  const key = name.toLowerCase();
  return key.startsWith("utm_") || TRACKING_PARAMS.has(key);
};

const trimTrailingPunctuation = (token: string) => {
  let candidate = token.replace(TRAILING_PUNCTUATION_PATTERN, "");
  // "(see https://example.com/a)": keep the paren only when it is balanced
  while (
    candidate.endsWith(")") &&
    (candidate.match(/\(/g)?.length ?? 0) < (candidate.match(/\)/g)?.length ?? 0)
  ) {
    candidate = candidate.slice(0, -1).replace(TRAILING_PUNCTUATION_PATTERN, "");
  }
  return candidate;
};

/**
 * Finds the first http(s) URL in free-form text. A bare host such as
 * `example.com/page` is accepted when it is the whole input.
 */
export function findUrl(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed) {
    return null;
  }
  const match = trimmed.match(URL_TOKEN_PATTERN);
  if (match) {
    return trimTrailingPunctuation(match[0]);
  }
  if (BARE_HOST_PATTERN.test(trimmed)) {
    return `https://${trimmed}`;
  }
  return null;
}

const parseHttpUrl = (candidate: string) => {
  try {
    const parsed = new URL(candidate);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return null;
    }
    if (!parsed.hostname) {
      return null;
    }
    return parsed;
  } catch {
    return null;
  }
};

const LOCAL_SUFFIXES = [".localhost", ".local", ".internal"];

const isPrivateIpv4 = (host: string) => {
  const match = /^(\d+)\.(\d+)\.\d+\.\d+$/.exec(host);
  if (!match) {
    return false;
  }
  const first = Number(match[1]);
  const second = Number(match[2]);
  return (
    first === 0 ||
    first === 10 ||
    first === 127 ||
    first >= 224 ||
    (first === 100 && second >= 64 && second <= 127) ||
    (first === 169 && second === 254) ||
    (first === 172 && second >= 16 && second <= 31) ||
    (first === 192 && second === 168)
  );
};

const isPrivateIpv6 = (host: string) => {
  if (!host.startsWith("[")) {
    return false;
  }
  const address = host.slice(1, -1);
  if (address === "::" || address === "::1") {
    return true;
  }
  // URL writes ::ffff:127.0.0.1 as ::ffff:7f00:1
  const mapped = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(address);
  if (mapped) {
    const high = parseInt(mapped[1], 16);
    const low = parseInt(mapped[2], 16);
    return isPrivateIpv4(`${high >> 8}.${high & 255}.${low >> 8}.${low & 255}`);
  }
  return /^f[cd]/.test(address) || /^fe[89ab]/.test(address);
};

/**
 * True for loopback, link-local, private-range and local-only hostnames,
 * judged on the literal host only (no DNS lookup).
 */
export function isPrivateHost(hostname: string) {
  const host = hostname.toLowerCase().replace(/\.$/, "");
  if (host === "localhost" || LOCAL_SUFFIXES.some((suffix) => host.endsWith(suffix))) {
    return true;
  }
  return isPrivateIpv4(host) || isPrivateIpv6(host);
}

export function isPublicHttpUrl(url: string) {
  const parsed = parseHttpUrl(url);
  return parsed !== null && !isPrivateHost(parsed.hostname);
}

export const stripWwwLabel = (hostname: string) => {
  let host = hostname;
  while (host.startsWith("www.") && host.slice(4).includes(".")) {
    host = host.slice(4);
  }
  return host;
};

const decodeParamName = (segment: string) => {
  const rawName = segment.split("=")[0] ?? "";
  try {
    return decodeURIComponent(rawName.replace(/\+/g, " "));
  } catch {
    return rawName;
  }
};

const stripTrackingParams = (search: string) => {
  if (!search || search === "?") {
    return "";
  }
  const kept = search
    .slice(1)
    .split("&")
    .filter((segment) => segment.length > 0 && !isTrackingParam(decodeParamName(segment)));
  return kept.length ? `?${kept.join("&")}` : "";
};

const stripTrailingSlashes = (pathname: string) => pathname.replace(/\/+$/, "");

const canonicalize = (candidate: string) => {
  const extracted = findUrl(candidate);
  const parsed = extracted ? parseHttpUrl(extracted) : null;
  if (!parsed) {
    return null;
  }

  const credentials = parsed.username
    ? `${parsed.username}${parsed.password ? `:${parsed.password}` : ""}@`
    : "";
  const host = stripWwwLabel(parsed.hostname) + (parsed.port ? `:${parsed.port}` : "");
  const path = stripTrailingSlashes(parsed.pathname);
  const search = stripTrackingParams(parsed.search);

  return `${parsed.protocol}//${credentials}${host}${path}${search}`;
};

const MAX_CANONICAL_PASSES = 4;

/**
 * Canonical form of a captured URL, used as the per-owner duplicate key.
 * Scheme and host are lower-cased, leading `www.` labels dropped, tracking
 * parameters removed, the fragment and trailing slashes dropped.
 * `normalizeUrl(normalizeUrl(x)) === normalizeUrl(x)` for every accepted input.
 */
export function normalizeUrl(rawUrl: string): string {
  let current = canonicalize(rawUrl);
  if (current === null) {
    throw new ValidationError("Please enter a valid URL");
  }
  // stripping a slash or a parameter can expose trailing punctuation
  for (let pass = 0; pass < MAX_CANONICAL_PASSES; pass += 1) {
    const next = canonicalize(current);
    if (next === null || next === current) {
      break;
    }
    current = next;
  }
  return current;
}

/**
 * Returns the URL a user meant to save (prose stripped, scheme ensured),
 * without any canonicalization.
 */
export function extractCapturedUrl(rawUrl: string): string {
  const extracted = findUrl(rawUrl);
  if (!extracted || !parseHttpUrl(extracted)) {
    throw new ValidationError("Please enter a valid URL");
  }
  return extracted;
}

export function validateUrl(rawUrl: string | null | undefined): string | null {
  if (!rawUrl || !rawUrl.trim()) {
    return "URL is required";
  }
  const extracted = findUrl(rawUrl);
  return extracted && parseHttpUrl(extracted) ? null : "Please enter a valid URL";
}

export function extractDomain(url: string): string {
  const extracted = findUrl(url);
  const parsed = extracted ? parseHttpUrl(extracted) : null;
  if (!parsed) {
    return url.trim();
  }
  return stripWwwLabel(parsed.hostname.toLowerCase());
}

/**
 * Decodes `scheme://share?url=<percent-encoded-url>` (or its `web+scheme:`
 * form). Anything else yields null.
 */
export function parseShareDeepLink(uri: string, scheme: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(uri.trim());
  } catch {
    return null;
  }
  // browsers only register custom protocols under the web+ prefix
  const expected = scheme.toLowerCase();
  if (parsed.protocol !== `${expected}:` && parsed.protocol !== `web+${expected}:`) {
    return null;
  }
  const route = parsed.hostname || parsed.pathname.replace(/^\/+/, "");
  if (route !== "share") {
    return null;
  }
  const shared = parsed.searchParams.get("url");
  return shared && shared.trim() ? shared.trim() : null;
}
