import { NextResponse } from "next/server";
import { LinkError, statusForError } from "@/lib/errors";

export const unauthorized = () =>
  NextResponse.json({ error: "Unauthorized", code: "unauthorized" }, { status: 401 });

export const badRequest = (error: string) =>
  NextResponse.json({ error, code: "validation" }, { status: 400 });

/**
 * Typed link errors answer with their own status and code; anything else is
 * logged and becomes a 500 carrying `fallback`.
 */
export function errorResponse(error: unknown, fallback: string) {
  if (error instanceof LinkError) {
    return NextResponse.json(
      { error: error.message, code: error.code },
      { status: statusForError(error) }
    );
  }
  console.error(fallback, error);
  return NextResponse.json({ error: fallback }, { status: 500 });
}

export async function readJson(request: Request): Promise<{ ok: true; payload: unknown } | { ok: false }> {
  try {
    return { ok: true, payload: await request.json() };
  } catch {
    return { ok: false };
  }
}

export const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

export const isOptionalString = (value: unknown): value is string | null | undefined =>
  value === undefined || value === null || typeof value === "string";

export function readNonNegativeInt(raw: string | null, fallback: number, max: number) {
  if (raw === null || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    return null;
  }
  return Math.min(parsed, max);
}
