import { NextResponse } from "next/server";
import { getCurrentUser } from "@/lib/auth";
import { METADATA_RETRY_BATCH_SIZE, readConfig } from "@/lib/config";
import { badRequest, errorResponse, readNonNegativeInt, unauthorized } from "@/lib/http";
import { listIncompleteMetadata } from "@/lib/link-store";

const MAX_LIMIT = 50;

export async function GET(request: Request) {
  const user = await getCurrentUser();
  if (!user) {
    return unauthorized();
  }

  const { searchParams } = new URL(request.url);
  const limit = readNonNegativeInt(searchParams.get("limit"), METADATA_RETRY_BATCH_SIZE, MAX_LIMIT);
  if (!limit) {
    return badRequest("limit must be a positive integer");
  }

  try {
    const links = await listIncompleteMetadata(
      user.id,
      limit,
      readConfig().metadataMaxAttempts
    );
    return NextResponse.json({ links });
  } catch (error) {
    return errorResponse(error, "Unable to load links awaiting metadata");
  }
}
