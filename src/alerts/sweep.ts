import type { AppConfig } from "@/src/platform/config";
import { dispatchQueuedAlerts, releaseStaleAlertClaims, type QueueDispatchSummary } from "./alertService";
import {
  dispatchBatch,
  readyToSend,
  recoverStaleBatches,
  rescheduleDormant,
  type SchedulerDeps,
} from "./batchScheduler";

export type SweepDeps = SchedulerDeps & {
  config: Pick<AppConfig, "timeZone" | "batchStaleMinutes" | "dispatchLimit">;
};

export type SweepReport = {
  recovered: number;
  requeued: number;
  releasedClaims: number;
  rescheduled: number;
  batches: { sent: number; failed: number; skipped: number };
  alerts: QueueDispatchSummary;
};

/**
 * One scheduler tick. Order matters: stale batches are closed and their
 * items requeued before due batches are picked, so a recovered item can go
 * out in the same tick if its new batch is already due. Abandoned alert
 * claims are dropped before the queue dispatch for the same reason.
 */
export async function runDispatchCycle(deps: SweepDeps): Promise<SweepReport> {
  const limit = deps.config.dispatchLimit;

  const { recovered, requeued } = await recoverStaleBatches(deps);
  const releasedClaims = await releaseStaleAlertClaims(deps);
  const rescheduled = await rescheduleDormant(deps, limit);

  const batches = { sent: 0, failed: 0, skipped: 0 };
  for (const batch of await readyToSend(deps, limit)) {
    try {
      const outcome = await dispatchBatch(deps, batch);
      batches[outcome.status]++;
    } catch (error) {
      // Left in processing; the stale sweep picks it up after the grace window.
      batches.failed++;
      console.error("batch_dispatch_error", {
        batch_id: batch.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const alerts = await dispatchQueuedAlerts(deps, limit);

  const report: SweepReport = { recovered, requeued, releasedClaims, rescheduled, batches, alerts };
  console.info("dispatch_cycle", report);
  return report;
}
