import type { SendResult } from "@/src/platform/types";
import { recordClick, transition } from "./alertRecord";
import { enqueue, type SchedulerDeps } from "./batchScheduler";
import { publishCounterEvents } from "./counters";
import { isBatched } from "./frequency";
import { findMatching } from "./matcher";
import { renderAlertText } from "./render";
import type { Alert, AlertBatch, AlertEvent, ClickAction } from "./types";

export type AlertServiceDeps = SchedulerDeps;

export type FanOutSummary = {
  matched: number;
  queued: number;
  batched: number;
  duplicates: number;
  errors: number;
};

/**
 * Fans one event out to every matching subscription: immediate subscribers
 * get a queued alert, everyone else gets a pending alert inside their current
 * batch. Re-running for the same event creates nothing new.
 */
export async function processEvent(deps: AlertServiceDeps, event: AlertEvent): Promise<FanOutSummary> {
  const now = deps.now();
  const subscriptions = await deps.repo.listActiveSubscriptions();
  const matches = findMatching(event, subscriptions, { now, zone: deps.config.timeZone });
  const summary: FanOutSummary = { matched: matches.length, queued: 0, batched: 0, duplicates: 0, errors: 0 };

  for (const { subscription: sub, distanceKm } of matches) {
    try {
      const frequency = sub.alert_frequency;

      if (!isBatched(frequency)) {
        const alert = await deps.repo.insertAlert({
          event_id: event.id,
          subscription_id: sub.id,
          user_id: sub.user_id,
          alert_type: event.kind,
          status: "queued",
          is_batched: false,
          batch_id: null,
          distance_km: distanceKm,
          scheduled_for: now.toISOString(),
          queued_at: now.toISOString(),
        });
        if (alert) summary.queued++;
        else summary.duplicates++;
        continue;
      }

      // Alert row first: its (event, user) uniqueness is what keeps a
      // replayed event out of the batch.
      const alert = await deps.repo.insertAlert({
        event_id: event.id,
        subscription_id: sub.id,
        user_id: sub.user_id,
        alert_type: event.kind,
        status: "pending",
        is_batched: true,
        batch_id: null,
        distance_km: distanceKm,
        scheduled_for: null,
        queued_at: null,
      });
      if (!alert) {
        summary.duplicates++;
        continue;
      }

      let batch: AlertBatch;
      try {
        batch = await enqueue(deps, sub, frequency, event.id);
      } catch (error) {
        // Outside any batch nothing would ever send it, and a replay now
        // counts it as a duplicate.
        const reason = `batch_enqueue_failed: ${error instanceof Error ? error.message : String(error)}`;
        const patch = transition(alert, { kind: "failed", reason }, deps.now());
        if (patch) await deps.repo.updateAlertIf(alert.id, ["pending"], patch);
        throw error;
      }
      await deps.repo.updateAlertIf(alert.id, ["pending"], {
        batch_id: batch.id,
        scheduled_for: batch.scheduled_for,
      });
      summary.batched++;
    } catch (error) {
      summary.errors++;
      console.error("alert_fanout_failed", {
        event_id: event.id,
        subscription_id: sub.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  console.info("alert_fanout", { event_id: event.id, kind: event.kind, ...summary });
  return summary;
}

export type QueueDispatchSummary = { sent: number; failed: number; skipped: number };

/**
 * Sends queued alerts whose time has come, nearest first. Each alert is
 * claimed before its send so overlapping runs never deliver it twice.
 */
export async function dispatchQueuedAlerts(deps: AlertServiceDeps, limit: number): Promise<QueueDispatchSummary> {
  const summary: QueueDispatchSummary = { sent: 0, failed: 0, skipped: 0 };
  const due = await deps.repo.listDueQueuedAlerts(deps.now().toISOString(), limit);

  for (const alert of due) {
    const claimed = await deps.repo.claimAlertForDispatch(alert.id, deps.now().toISOString());
    if (!claimed) {
      summary.skipped++;
      continue;
    }

    try {
      const outcome = await sendQueuedAlert(deps, alert);
      summary[outcome]++;
    } catch (error) {
      // Still claimed; releaseStaleAlertClaims hands it back after the grace window.
      summary.failed++;
      console.error("alert_dispatch_error", {
        alert_id: alert.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (due.length > 0) console.info("alert_queue_dispatch", summary);
  return summary;
}

/**
 * Queued alerts whose dispatcher claimed them and then died before recording
 * an outcome. Their claim is dropped so the next dispatch picks them up.
 */
export async function releaseStaleAlertClaims(deps: Pick<AlertServiceDeps, "repo" | "now" | "config">): Promise<number> {
  const cutoff = new Date(deps.now().getTime() - deps.config.batchStaleMinutes * 60_000).toISOString();
  const released = await deps.repo.releaseStaleDispatchClaims(cutoff);
  if (released > 0) console.warn("alert_claims_released", { released, cutoff });
  return released;
}

async function sendQueuedAlert(deps: AlertServiceDeps, alert: Alert): Promise<"sent" | "failed"> {
  const [event, sub] = await Promise.all([
    deps.repo.getEvent(alert.event_id),
    deps.repo.getSubscription(alert.subscription_id),
  ]);

  let result: SendResult;
  if (!event || !event.is_active) {
    result = { ok: false, error: "event_inactive" };
  } else if (!sub) {
    result = { ok: false, error: "subscription_missing" };
  } else {
    try {
      result = await deps.messenger.send(sub.phone, renderAlertText(event, alert));
    } catch (error) {
      result = { ok: false, error: `send_failed: ${error instanceof Error ? error.message : String(error)}` };
    }
  }

  const now = deps.now();
  if (!result.ok) {
    const patch = transition(alert, { kind: "failed", reason: result.error }, now);
    if (patch) await deps.repo.updateAlertIf(alert.id, ["queued"], patch);
    console.warn("alert_send_failed", { alert_id: alert.id, reason: result.error });
    return "failed";
  }

  const patch = transition(alert, { kind: "sent", providerMessageId: result.providerMessageId }, now);
  const updated = patch ? await deps.repo.updateAlertIf(alert.id, ["queued"], patch) : null;
  if (updated) {
    await publishCounterEvents(deps.repo, [
      { type: "alert_sent", subscriptionId: alert.subscription_id, eventIds: [alert.event_id], at: now.toISOString() },
    ]);
  }
  return "sent";
}

export type ProviderStatus = "sent" | "delivered" | "read" | "failed";

/**
 * Delivery receipts from the messaging provider. A digest shares one provider
 * message id across all of its alerts, so every alert with that id moves.
 */
export async function applyProviderStatus(
  deps: Pick<AlertServiceDeps, "repo" | "now">,
  providerMessageId: string,
  status: ProviderStatus,
  errorText?: string
): Promise<number> {
  if (status === "sent") return 0;

  const alerts = await deps.repo.findAlertsByProviderMessageId(providerMessageId);
  const now = deps.now();
  let changed = 0;

  for (const alert of alerts) {
    const patch =
      status === "failed"
        ? transition(alert, { kind: "failed", reason: errorText ?? "provider_failed" }, now)
        : transition(alert, { kind: "delivered" }, now);
    if (!patch) continue;
    const updated = await deps.repo.updateAlertIf(alert.id, [alert.status], patch);
    if (updated) changed++;
  }
  return changed;
}

export type ClickResult =
  | { ok: true; alert: Alert; event: AlertEvent | null }
  | { ok: false; reason: "not_found" | "not_clickable" };

/**
 * Records the recipient's reaction to an alert. Only the first reaction on a
 * sent or delivered alert counts; the owning user must match.
 */
export async function recordAlertClick(
  deps: Pick<AlertServiceDeps, "repo" | "now">,
  args: { alertId: string; userId: string; action: ClickAction }
): Promise<ClickResult> {
  const alert = await deps.repo.getAlert(args.alertId);
  if (!alert || alert.user_id !== args.userId) return { ok: false, reason: "not_found" };

  const patch = recordClick(alert, args.action, deps.now());
  if (!patch) return { ok: false, reason: "not_clickable" };

  const updated = await deps.repo.markAlertClicked(alert.id, patch);
  if (!updated) return { ok: false, reason: "not_clickable" };

  await publishCounterEvents(deps.repo, [
    { type: "alert_clicked", subscriptionId: alert.subscription_id, eventId: alert.event_id, action: args.action },
  ]);

  const event = await deps.repo.getEvent(alert.event_id);
  return { ok: true, alert: updated, event };
}
