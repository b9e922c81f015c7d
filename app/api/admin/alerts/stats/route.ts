import { handleAlertStatsGet } from "@/src/ops/handleAlertStats";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  return handleAlertStatsGet(request);
}
