import { NextResponse } from "next/server";
import { getCurrentUser } from "@/lib/auth";
import { readConfig } from "@/lib/config";
import {
  badRequest,
  errorResponse,
  isOptionalString,
  isStringArray,
  readJson,
  readNonNegativeInt,
  unauthorized,
} from "@/lib/http";
import { prepareDraft } from "@/lib/links";
import { insertLink, listLinks } from "@/lib/link-store";

const MAX_PAGE_SIZE = 100;

export async function GET(request: Request) {
  const user = await getCurrentUser();
  if (!user) {
    return unauthorized();
  }

  const { searchParams } = new URL(request.url);
  const { linkPageSize } = readConfig();
  const pageIndex = readNonNegativeInt(searchParams.get("page"), 0, Number.MAX_SAFE_INTEGER);
  const pageSize = readNonNegativeInt(searchParams.get("pageSize"), linkPageSize, MAX_PAGE_SIZE);
  if (pageIndex === null || pageSize === null || pageSize === 0) {
    return badRequest("page and pageSize must be non-negative integers");
  }
  const spaceId = searchParams.get("spaceId")?.trim() || null;

  try {
    const links = await listLinks(user.id, { pageIndex, pageSize, spaceId });
    return NextResponse.json({ links, hasMore: links.length === pageSize });
  } catch (error) {
    return errorResponse(error, "Unable to load links");
  }
}

export async function POST(request: Request) {
  const user = await getCurrentUser();
  if (!user) {
    return unauthorized();
  }

  const body = await readJson(request);
  if (!body.ok) {
    return badRequest("Invalid JSON");
  }

  const { url, note, spaceId, tagIds } = (body.payload ?? {}) as {
    url?: unknown;
    note?: unknown;
    spaceId?: unknown;
    tagIds?: unknown;
  };

  if (typeof url !== "string" || !url.trim()) {
    return badRequest("URL is required");
  }
  if (!isOptionalString(note)) {
    return badRequest("Note must be a string");
  }
  if (!isOptionalString(spaceId)) {
    return badRequest("spaceId must be a string");
  }
  if (tagIds !== undefined && !isStringArray(tagIds)) {
    return badRequest("tagIds must be an array of strings");
  }

  try {
    const draft = prepareDraft({ url, note, spaceId, tagIds });
    const link = await insertLink(user.id, draft);
    return NextResponse.json({ link }, { status: 201 });
  } catch (error) {
    return errorResponse(error, "Unable to save link");
  }
}
