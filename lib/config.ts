export const DEFAULT_LINK_PAGE_SIZE = 30;
export const DEFAULT_METADATA_FETCH_TIMEOUT_MS = 10_000;
export const METADATA_MAX_ATTEMPTS = 3;
export const DEFAULT_SHARE_URI_SCHEME = "linkshelf";

/** Fraction of the loaded list a reader must pass before the next page loads. */
export const SCROLL_LOAD_THRESHOLD = 0.8;

export const METADATA_RETRY_BATCH_SIZE = 10;
export const METADATA_RETRY_MIN_INTERVAL_MS = 60_000;
export const METADATA_SWEEP_DEBOUNCE_MS = 1_000;

type Env = Record<string, string | undefined>;

const readPositiveInt = (env: Env, key: string, fallback: number, max?: number) => {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  if (max !== undefined && parsed > max) {
    console.warn(`${key} cannot exceed ${max}, using ${max}`);
    return max;
  }
  return parsed;
};

export type LinkshelfConfig = {
  linkPageSize: number;
  metadataFetchTimeoutMs: number;
  metadataMaxAttempts: number;
  shareUriScheme: string;
};

/**
 * Reads configuration at call time so tests and route handlers see the
 * current environment.
 */
export function readConfig(env: Env = process.env): LinkshelfConfig {
  const scheme = env.SHARE_URI_SCHEME?.trim().toLowerCase();
  return {
    linkPageSize: readPositiveInt(env, "LINK_PAGE_SIZE", DEFAULT_LINK_PAGE_SIZE, 100),
    metadataFetchTimeoutMs: readPositiveInt(
      env,
      "METADATA_FETCH_TIMEOUT_MS",
      DEFAULT_METADATA_FETCH_TIMEOUT_MS
    ),
    metadataMaxAttempts: readPositiveInt(
      env,
      "METADATA_MAX_ATTEMPTS",
      METADATA_MAX_ATTEMPTS,
      METADATA_MAX_ATTEMPTS
    ),
    shareUriScheme: scheme && /^[a-z][a-z0-9+.-]*$/.test(scheme) ? scheme : DEFAULT_SHARE_URI_SCHEME,
  };
}
