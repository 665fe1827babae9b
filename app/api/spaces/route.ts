import { NextResponse } from "next/server";
import { getCurrentUser } from "@/lib/auth";
import { errorResponse, unauthorized } from "@/lib/http";
import { listSpaces } from "@/lib/link-store";

export async function GET() {
  const user = await getCurrentUser();
  if (!user) {
    return unauthorized();
  }

  try {
    const spaces = await listSpaces(user.id);
    return NextResponse.json({ spaces });
  } catch (error) {
    return errorResponse(error, "Unable to load spaces");
  }
}
