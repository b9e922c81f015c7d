import { z } from "zod";
import { errorType } from "./alertRecord";
import type { AlertOutcomeRow, BatchOutcomeRow, NotificationRepository } from "./repository";
import type { AlertStatus, BatchStatus } from "./types";

export type AlertStats = {
  since: string;
  alerts: {
    total: number;
    byStatus: Record<AlertStatus, number>;
    clicked: number;
    /** (sent + delivered) / (sent + delivered + failed); null before anything settled. */
    successRate: number | null;
    clickRate: number | null;
    errorsByType: Record<string, number>;
  };
  batches: {
    total: number;
    byStatus: Record<BatchStatus, number>;
    itemsSent: number;
    errorsByType: Record<string, number>;
  };
};

function ratio(numerator: number, denominator: number): number | null {
  if (denominator === 0) return null;
  return Math.round((numerator / denominator) * 1000) / 1000;
}

function bump(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function summarizeOutcomes(
  since: string,
  alerts: AlertOutcomeRow[],
  batches: BatchOutcomeRow[]
): AlertStats {
  const byStatus: Record<AlertStatus, number> = { pending: 0, queued: 0, sent: 0, delivered: 0, failed: 0 };
  const alertErrors: Record<string, number> = {};
  let clicked = 0;

  for (const row of alerts) {
    byStatus[row.status]++;
    if (row.was_clicked) clicked++;
    if (row.status === "failed") bump(alertErrors, errorType(row.failure_reason));
  }

  const batchStatus: Record<BatchStatus, number> = { pending: 0, processing: 0, sent: 0, failed: 0 };
  const batchErrors: Record<string, number> = {};
  let itemsSent = 0;

  for (const row of batches) {
    batchStatus[row.status]++;
    if (row.status === "sent") itemsSent += row.item_count;
    if (row.status === "failed") bump(batchErrors, errorType(row.failure_reason));
  }

  const reached = byStatus.sent + byStatus.delivered;
  return {
    since,
    alerts: {
      total: alerts.length,
      byStatus,
      clicked,
      successRate: ratio(reached, reached + byStatus.failed),
      clickRate: ratio(clicked, reached),
      errorsByType: alertErrors,
    },
    batches: {
      total: batches.length,
      byStatus: batchStatus,
      itemsSent,
      errorsByType: batchErrors,
    },
  };
}

export async function getAlertStats(
  repo: Pick<NotificationRepository, "listAlertOutcomesSince" | "listBatchOutcomesSince">,
  now: Date,
  days: number
): Promise<AlertStats> {
  const since = new Date(now.getTime() - days * 86_400_000).toISOString();
  const [alerts, batches] = await Promise.all([repo.listAlertOutcomesSince(since), repo.listBatchOutcomesSince(since)]);
  return summarizeOutcomes(since, alerts, batches);
}

const DaysSchema = z.coerce.number().int().min(1).max(90);

export const DEFAULT_STATS_DAYS = 7;

/** `?days=N` for the stats views: 1..90, default 7. Null when out of range. */
export function parseStatsDays(raw: string | null | undefined): number | null {
  if (raw == null || raw.trim() === "") return DEFAULT_STATS_DAYS;
  const parsed = DaysSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
