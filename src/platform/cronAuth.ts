import crypto from "crypto";
import { NextResponse } from "next/server";

/**
 * Scheduler endpoints take `Authorization: Bearer <CRON_SECRET>`. Without a
 * configured secret they refuse everything.
 * Returns the error response to send, or null when the caller may proceed.
 */
export function rejectUnlessCron(request: Request, secret: string | null): Response | null {
  if (!secret) {
    console.error("cron_auth config_missing_secret");
    return NextResponse.json({ ok: false, error: "CRON_SECRET not configured" }, { status: 500 });
  }

  const auth = request.headers.get("authorization") ?? "";
  const provided = auth.startsWith("Bearer ") ? auth.slice(7).trim() : "";
  const a = Buffer.from(provided, "utf8");
  const b = Buffer.from(secret, "utf8");
  if (a.length !== b.length || !crypto.timingSafeEqual(a, b)) {
    return NextResponse.json({ ok: false, error: "Unauthorized" }, { status: 401 });
  }
  return null;
}
