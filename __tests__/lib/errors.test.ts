/// <reference types="jest" />

import {
  ConflictError,
  DuplicateError,
  LinkError,
  NetworkError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  fromDatabaseError,
  fromResponse,
  fromTransportError,
  getUserFriendlyError,
  statusForError,
} from "@/lib/errors";

describe("fromDatabaseError", () => {
  it("maps a unique violation to a duplicate of the given url", () => {
    const error = fromDatabaseError({ code: "23505" }, "https://example.com/a");
    expect(error).toBeInstanceOf(DuplicateError);
    expect(error).toMatchObject({ code: "duplicate", normalizedUrl: "https://example.com/a" });
  });

  it("maps foreign key and check violations", () => {
    expect(fromDatabaseError({ code: "23503" })).toBeInstanceOf(ConflictError);
    expect(fromDatabaseError({ code: "23514" })).toEqual(
      new ValidationError("Note must be 200 characters or fewer")
    );
    expect(fromDatabaseError({ code: "22P02" })).toBeInstanceOf(ValidationError);
  });

  it("returns unknown errors untouched", () => {
    const original = new Error("connection reset");
    expect(fromDatabaseError(original)).toBe(original);
    expect(fromDatabaseError("oops")).toBe("oops");
  });
});

describe("fromTransportError", () => {
  it("treats fetch type errors as retryable network failures", () => {
    const error = fromTransportError(new TypeError("fetch failed"));
    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe("Unable to reach the server");
    expect(error.retryable).toBe(true);
  });

  it("reports aborted requests as timeouts", () => {
    const abort = Object.assign(new Error("aborted"), { name: "AbortError" });
    expect(fromTransportError(abort).message).toBe("Request timed out");
  });

  it("passes link errors through", () => {
    const original = new NotFoundError();
    expect(fromTransportError(original)).toBe(original);
  });
});

describe("fromResponse", () => {
  it("rebuilds typed errors from the response code", () => {
    expect(fromResponse(409, { error: "Link already saved", code: "duplicate" })).toBeInstanceOf(
      DuplicateError
    );
    expect(fromResponse(409, { error: "Gave up", code: "exhausted" }).code).toBe("exhausted");
    expect(fromResponse(422, null)).toBeInstanceOf(ConflictError);
    expect(fromResponse(400, { error: "Bad url" })).toEqual(new ValidationError("Bad url"));
    expect(fromResponse(401, null)).toBeInstanceOf(UnauthorizedError);
    expect(fromResponse(404, null)).toBeInstanceOf(NotFoundError);
  });

  it("falls back to a network error carrying the status", () => {
    const error = fromResponse(500, null);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe("Request failed with status 500");
  });
});

describe("statusForError", () => {
  it("maps codes to http statuses", () => {
    expect(statusForError(new ValidationError("x"))).toBe(400);
    expect(statusForError(new DuplicateError(null))).toBe(409);
    expect(statusForError(new ConflictError())).toBe(422);
    expect(statusForError(new LinkError("exhausted", "done"))).toBe(409);
    expect(statusForError(new NetworkError())).toBe(503);
  });
});

describe("getUserFriendlyError", () => {
  it("explains duplicates as information", () => {
    expect(getUserFriendlyError(new DuplicateError("https://example.com"))).toEqual({
      message: "You've already saved this link",
      suggestion: "Search your links to find it",
      tone: "info",
    });
  });

  it("keeps the validation message", () => {
    expect(getUserFriendlyError(new ValidationError("URL is required")).message).toBe(
      "URL is required"
    );
  });

  it("falls back for unknown errors", () => {
    expect(getUserFriendlyError(new Error("boom"))).toEqual({
      message: "Something went wrong",
      suggestion: "Please try again",
      tone: "error",
    });
  });
});
