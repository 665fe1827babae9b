import { NextResponse } from "next/server";
import { getCurrentUser } from "@/lib/auth";
import { readConfig } from "@/lib/config";
import { badRequest, unauthorized } from "@/lib/http";
import { ValidationError } from "@/lib/errors";
import { extractCapturedUrl, isPublicHttpUrl } from "@/lib/link-url";
import { fetchPageMetadata } from "@/lib/metadata";

export async function GET(request: Request) {
  const user = await getCurrentUser();
  if (!user) {
    return unauthorized();
  }

  const { searchParams } = new URL(request.url);
  const raw = searchParams.get("url");
  let url: string;
  try {
    url = extractCapturedUrl(raw ?? "");
  } catch {
    return badRequest("Please enter a valid URL");
  }
  if (!isPublicHttpUrl(url)) {
    return badRequest("Local and private addresses cannot be previewed");
  }

  try {
    const metadata = await fetchPageMetadata(url, {
      timeoutMs: readConfig().metadataFetchTimeoutMs,
    });
    return NextResponse.json({ metadata });
  } catch (error) {
    if (error instanceof ValidationError) {
      return badRequest(error.message);
    }
    console.warn(`Failed to fetch metadata for ${url}`, error);
    return NextResponse.json(
      { error: "Unable to fetch page metadata", code: "network" },
      { status: 502 }
    );
  }
}
