import { NextResponse } from "next/server";
import { runDispatchCycle } from "@/src/alerts/sweep";
import { rejectUnlessCron } from "@/src/platform/cronAuth";
import { logError } from "@/src/platform/db";
import { buildServices } from "@/src/platform/services";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  const services = buildServices();
  const rejected = rejectUnlessCron(request, services.config.cronSecret);
  if (rejected) return rejected;

  try {
    const report = await runDispatchCycle(services);
    return NextResponse.json({ ok: true, report });
  } catch (error) {
    const message = error instanceof Error ? error.message : "dispatch failed";
    console.error("cron_dispatch error", { error: message });
    await logError({
      correlation_id: "cron:dispatch",
      service: "scheduler",
      error_code: "dispatch_failed",
      message,
      details: { error: error instanceof Error ? error.stack : error },
    });
    return NextResponse.json({ ok: false, error: "Dispatch failed" }, { status: 500 });
  }
}
