import { NextResponse } from "next/server";
import { getAlertStats, parseStatsDays } from "@/src/alerts/stats";
import { rejectUnlessCron } from "@/src/platform/cronAuth";
import { logError } from "@/src/platform/db";
import { buildServices, type AppServices } from "@/src/platform/services";

export type AlertStatsOptions = {
  services?: AppServices;
  logError?: typeof logError;
};

/** GET ?days=N for the operator stats. Storage errors stay in the logs. */
export async function handleAlertStatsGet(request: Request, options: AlertStatsOptions = {}): Promise<Response> {
  const services = options.services ?? buildServices();
  const rejected = rejectUnlessCron(request, services.config.cronSecret);
  if (rejected) return rejected;

  const days = parseStatsDays(new URL(request.url).searchParams.get("days"));
  if (days === null) {
    return NextResponse.json({ ok: false, error: "days must be an integer from 1 to 90" }, { status: 400 });
  }

  try {
    const stats = await getAlertStats(services.repo, services.now(), days);
    return NextResponse.json({ ok: true, days, stats });
  } catch (error) {
    const message = error instanceof Error ? error.message : "stats failed";
    console.error("alert_stats error", { error: message, days });
    await (options.logError ?? logError)({
      correlation_id: "ops:alert-stats",
      service: "ops",
      error_code: "stats_failed",
      message,
      details: { error: error instanceof Error ? error.stack : error },
    });
    return NextResponse.json({ ok: false, error: "Stats failed" }, { status: 500 });
  }
}
