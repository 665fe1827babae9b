import { NextResponse } from "next/server";
import { getCurrentUser } from "@/lib/auth";
import { errorResponse, unauthorized } from "@/lib/http";
import { listTags } from "@/lib/link-store";

export async function GET() {
  const user = await getCurrentUser();
  if (!user) {
    return unauthorized();
  }

  try {
    const tags = await listTags(user.id);
    return NextResponse.json({ tags });
  } catch (error) {
    return errorResponse(error, "Unable to load tags");
  }
}
