export type LinkErrorCode =
  | "validation"
  | "duplicate"
  | "network"
  | "conflict"
  | "exhausted"
  | "not_found"
  | "unauthorized";

export class LinkError extends Error {
  readonly code: LinkErrorCode;
  readonly retryable: boolean;

  constructor(
    code: LinkErrorCode,
    message: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

export class ValidationError extends LinkError {
  constructor(message: string) {
    super("validation", message);
  }
}

export class DuplicateError extends LinkError {
  readonly normalizedUrl: string | null;

  constructor(normalizedUrl: string | null, message = "Link already saved") {
    super("duplicate", message);
    this.normalizedUrl = normalizedUrl;
  }
}

export class NetworkError extends LinkError {
  constructor(message = "Network request failed", cause?: unknown) {
    super("network", message, { retryable: true, cause });
  }
}

export class ConflictError extends LinkError {
  constructor(message = "The change conflicts with newer data", cause?: unknown) {
    super("conflict", message, { cause });
  }
}

export class ExhaustedRetriesError extends LinkError {
  readonly linkId: string;

  constructor(linkId: string) {
    super("exhausted", `Metadata enrichment gave up for ${linkId}`);
    this.linkId = linkId;
  }
}

export class NotFoundError extends LinkError {
  constructor(message = "Link not found") {
    super("not_found", message);
  }
}

export class UnauthorizedError extends LinkError {
  constructor(message = "Unauthorized") {
    super("unauthorized", message);
  }
}

const STATUS_BY_CODE: Record<LinkErrorCode, number> = {
  validation: 400,
  unauthorized: 401,
  not_found: 404,
  duplicate: 409,
  exhausted: 409,
  conflict: 422,
  network: 503,
};

export const statusForError = (error: LinkError) => STATUS_BY_CODE[error.code];

type PgErrorLike = { code?: unknown; constraint?: unknown; message?: unknown };

const readPgCode = (error: unknown): string | null => {
  if (!error || typeof error !== "object") {
    return null;
  }
  const { code } = error as PgErrorLike;
  return typeof code === "string" ? code : null;
};

/**
 * Translates a Postgres driver error into the link error taxonomy.
 * Anything unrecognised is returned untouched so callers can still log it.
 */
export function fromDatabaseError(error: unknown, normalizedUrl?: string) {
  switch (readPgCode(error)) {
    case "23505":
      return new DuplicateError(normalizedUrl ?? null);
    case "23503":
      return new ConflictError(
        "A referenced space or tag no longer exists",
        error
      );
    case "23514":
      return new ValidationError("Note must be 200 characters or fewer");
    case "22P02":
      return new ValidationError("Invalid space or tag id");
    default:
      return error;
  }
}

const isAbortError = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  (error as { name?: unknown }).name === "AbortError";

/**
 * Errors thrown by `fetch` itself (no response at all) are transport failures.
 */
export function fromTransportError(error: unknown): LinkError {
  if (error instanceof LinkError) {
    return error;
  }
  if (isAbortError(error)) {
    return new NetworkError("Request timed out", error);
  }
  if (error instanceof TypeError) {
    return new NetworkError("Unable to reach the server", error);
  }
  return new NetworkError(
    error instanceof Error ? error.message : "Network request failed",
    error
  );
}

/**
 * Rebuilds a typed error from a route handler's `{ error, code }` body.
 */
export function fromResponse(
  status: number,
  body: { error?: unknown; code?: unknown } | null
): LinkError {
  const message =
    typeof body?.error === "string" && body.error.trim()
      ? body.error
      : `Request failed with status ${status}`;
  const code = typeof body?.code === "string" ? body.code : null;

  if (code === "duplicate" || (status === 409 && code !== "exhausted")) {
    return new DuplicateError(null, message);
  }
  if (code === "exhausted") {
    return new LinkError("exhausted", message);
  }
  if (code === "conflict" || status === 422) {
    return new ConflictError(message);
  }
  if (code === "validation" || status === 400) {
    return new ValidationError(message);
  }
  if (status === 401) {
    return new UnauthorizedError(message);
  }
  if (status === 404) {
    return new NotFoundError(message);
  }
  return new NetworkError(message);
}

export type FriendlyError = {
  message: string;
  suggestion?: string;
  tone: "error" | "info" | "success";
};

const FRIENDLY_BY_CODE: Record<LinkErrorCode, FriendlyError> = {
  validation: {
    message: "That doesn't look like a valid link",
    suggestion: "Make sure it starts with http:// or https://",
    tone: "error",
  },
  duplicate: {
    message: "You've already saved this link",
    suggestion: "Search your links to find it",
    tone: "info",
  },
  network: {
    message: "Unable to connect",
    suggestion: "Check your connection and try again",
    tone: "error",
  },
  conflict: {
    message: "That space or tag no longer exists",
    suggestion: "Pick another one and save again",
    tone: "error",
  },
  exhausted: {
    message: "Couldn't load a page preview",
    suggestion: "Refresh the link to try again",
    tone: "info",
  },
  not_found: {
    message: "This link was already removed",
    tone: "info",
  },
  unauthorized: {
    message: "Your session has expired",
    suggestion: "Sign in again to continue",
    tone: "error",
  },
};

export function getUserFriendlyError(error: unknown): FriendlyError {
  if (error instanceof ValidationError) {
    return { ...FRIENDLY_BY_CODE.validation, message: error.message };
  }
  if (error instanceof LinkError) {
    return FRIENDLY_BY_CODE[error.code];
  }
  return {
    message: "Something went wrong",
    suggestion: "Please try again",
    tone: "error",
  };
}
