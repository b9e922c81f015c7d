import { NextResponse } from "next/server";
import { rejectUnlessCron } from "@/src/platform/cronAuth";
import { logError } from "@/src/platform/db";
import { buildServices } from "@/src/platform/services";
import { pruneSessions } from "@/src/session/sessionStore";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  const services = buildServices();
  const rejected = rejectUnlessCron(request, services.config.cronSecret);
  if (rejected) return rejected;

  try {
    const pruned = await pruneSessions(services);
    return NextResponse.json({ ok: true, pruned });
  } catch (error) {
    const message = error instanceof Error ? error.message : "maintenance failed";
    console.error("cron_maintenance error", { error: message });
    await logError({
      correlation_id: "cron:maintenance",
      service: "scheduler",
      error_code: "maintenance_failed",
      message,
      details: { error: error instanceof Error ? error.stack : error },
    });
    return NextResponse.json({ ok: false, error: "Maintenance failed" }, { status: 500 });
  }
}
