import type { AppConfig } from "@/src/platform/config";
import type { Messenger, SendResult } from "@/src/platform/types";
import { truncateReason } from "./alertRecord";
import { publishCounterEvents } from "./counters";
import { isBatched, nextDispatchAt } from "./frequency";
import { renderDigestText, type DigestItem } from "./render";
import type { NotificationRepository } from "./repository";
import type { AlertBatch, BatchedFrequency, Subscription } from "./types";

export type SchedulerDeps = {
  repo: NotificationRepository;
  messenger: Messenger;
  now: () => Date;
  config: Pick<AppConfig, "timeZone" | "batchStaleMinutes">;
};

const ACQUIRE_ATTEMPTS = 3;

export class BatchAcquireError extends Error {
  constructor(subscriptionId: string) {
    super(`Could not acquire a pending batch for subscription ${subscriptionId}`);
    this.name = "BatchAcquireError";
  }
}

/**
 * The pending batch for (subscription, frequency), created on first use.
 * Storage refuses a second pending row for the pair, so a losing insert just
 * reads back the winner.
 */
export async function getOrCreatePending(
  deps: Pick<SchedulerDeps, "repo" | "now" | "config">,
  sub: Pick<Subscription, "id" | "user_id">,
  frequency: BatchedFrequency
): Promise<AlertBatch> {
  for (let attempt = 0; attempt < ACQUIRE_ATTEMPTS; attempt++) {
    const existing = await deps.repo.findPendingBatch(sub.id, frequency);
    if (existing) return existing;

    const created = await deps.repo.insertPendingBatch({
      subscription_id: sub.id,
      user_id: sub.user_id,
      frequency,
      scheduled_for: nextDispatchAt(frequency, deps.now(), deps.config.timeZone).toISOString(),
    });
    if (created) {
      console.info("batch_created", {
        batch_id: created.id,
        subscription_id: sub.id,
        frequency,
        scheduled_for: created.scheduled_for,
      });
      return created;
    }
  }
  throw new BatchAcquireError(sub.id);
}

/** Set-union append. Null when the batch left `pending` in the meantime. */
export async function addItem(
  deps: Pick<SchedulerDeps, "repo">,
  batch: Pick<AlertBatch, "id">,
  eventId: string
): Promise<AlertBatch | null> {
  return deps.repo.appendBatchItem(batch.id, eventId);
}

/**
 * Appends the event to whichever batch is pending for the pair, acquiring a
 * fresh one if the current batch was claimed for dispatch mid-way.
 */
export async function enqueue(
  deps: Pick<SchedulerDeps, "repo" | "now" | "config">,
  sub: Pick<Subscription, "id" | "user_id">,
  frequency: BatchedFrequency,
  eventId: string
): Promise<AlertBatch> {
  for (let attempt = 0; attempt < ACQUIRE_ATTEMPTS; attempt++) {
    const batch = await getOrCreatePending(deps, sub, frequency);
    const appended = await addItem(deps, batch, eventId);
    if (appended) return appended;
  }
  throw new BatchAcquireError(sub.id);
}

/** Pending batches past their time with something in them. */
export async function readyToSend(
  deps: Pick<SchedulerDeps, "repo" | "now">,
  limit: number
): Promise<AlertBatch[]> {
  const due = await deps.repo.listDueBatches(deps.now().toISOString(), limit);
  return due.filter((b) => b.item_count > 0);
}

/** Empty batches past their time move to the next slot instead of going out empty. */
export async function rescheduleDormant(
  deps: Pick<SchedulerDeps, "repo" | "now" | "config">,
  limit: number
): Promise<number> {
  const now = deps.now();
  const due = await deps.repo.listDueBatches(now.toISOString(), limit);
  let moved = 0;

  for (const batch of due) {
    if (batch.item_count > 0) continue;
    const next = nextDispatchAt(batch.frequency, now, deps.config.timeZone).toISOString();
    const updated = await deps.repo.updateBatchIf(batch.id, "pending", { scheduled_for: next });
    if (updated) moved++;
  }
  return moved;
}

export type DispatchOutcome =
  | { status: "skipped" }
  | { status: "sent"; sent: number; failed: number }
  | { status: "failed"; reason: string };

async function failBatch(
  deps: Pick<SchedulerDeps, "repo" | "now">,
  batch: AlertBatch,
  reason: string
): Promise<DispatchOutcome> {
  const at = deps.now().toISOString();
  const failureReason = truncateReason(reason);

  await deps.repo.updateBatchIf(batch.id, "processing", {
    status: "failed",
    failed_at: at,
    failure_reason: failureReason,
    failed_count: batch.item_count,
  });
  await deps.repo.updateBatchAlerts(batch.subscription_id, batch.event_ids, "pending", {
    status: "failed",
    failed_at: at,
    failure_reason: failureReason,
    batch_id: batch.id,
  });

  console.warn("batch_failed", { batch_id: batch.id, reason: failureReason });
  return { status: "failed", reason: failureReason };
}

/**
 * Claims the batch (pending → processing) before sending anything, sends one
 * digest, then records the outcome on the batch and its alerts. A batch that
 * is already claimed is skipped.
 */
export async function dispatchBatch(deps: SchedulerDeps, batch: Pick<AlertBatch, "id">): Promise<DispatchOutcome> {
  const claimed = await deps.repo.updateBatchIf(batch.id, "pending", {
    status: "processing",
    processing_started_at: deps.now().toISOString(),
  });
  if (!claimed) return { status: "skipped" };

  const sub = await deps.repo.getSubscription(claimed.subscription_id);
  if (!sub) return failBatch(deps, claimed, "subscription_missing");

  const [events, alerts] = await Promise.all([
    deps.repo.getEvents(claimed.event_ids),
    deps.repo.listAlertsFor(claimed.subscription_id, claimed.event_ids),
  ]);
  const eventsById = new Map(events.map((e) => [e.id, e]));
  const pendingByEvent = new Map(alerts.filter((a) => a.status === "pending").map((a) => [a.event_id, a]));

  const items: DigestItem[] = [];
  const stale: string[] = [];
  for (const eventId of claimed.event_ids) {
    const event = eventsById.get(eventId);
    const alert = pendingByEvent.get(eventId);
    if (!alert) continue;
    if (event && event.is_active) items.push({ event, distanceKm: alert.distance_km });
    else stale.push(eventId);
  }

  if (items.length === 0) return failBatch(deps, claimed, "no_active_items");

  const body = renderDigestText(claimed, items, deps.config.timeZone);
  let result: SendResult;
  try {
    result = await deps.messenger.send(sub.phone, body);
  } catch (error) {
    result = { ok: false, error: `send_failed: ${error instanceof Error ? error.message : String(error)}` };
  }
  if (!result.ok) return failBatch(deps, claimed, result.error);

  const at = deps.now().toISOString();
  const sentIds = items.map((i) => i.event.id);

  await deps.repo.updateBatchIf(claimed.id, "processing", {
    status: "sent",
    sent_at: at,
    sent_count: sentIds.length,
    failed_count: stale.length,
    provider_message_id: result.providerMessageId,
  });
  await deps.repo.updateBatchAlerts(claimed.subscription_id, sentIds, "pending", {
    status: "sent",
    sent_at: at,
    provider_message_id: result.providerMessageId,
    batch_id: claimed.id,
  });
  if (stale.length > 0) {
    await deps.repo.updateBatchAlerts(claimed.subscription_id, stale, "pending", {
      status: "failed",
      failed_at: at,
      failure_reason: "event_inactive",
      batch_id: claimed.id,
    });
  }

  await publishCounterEvents(deps.repo, [
    { type: "alert_sent", subscriptionId: claimed.subscription_id, eventIds: sentIds, at },
  ]);

  console.info("batch_sent", {
    batch_id: claimed.id,
    subscription_id: claimed.subscription_id,
    sent: sentIds.length,
    skipped: stale.length,
  });
  return { status: "sent", sent: sentIds.length, failed: stale.length };
}

/**
 * Batches left in `processing` past the grace window (a dispatcher died
 * mid-send) are closed as failed. Their still-pending alerts move into the
 * subscription's current pending batch so the next slot picks them up.
 */
export async function recoverStaleBatches(
  deps: Pick<SchedulerDeps, "repo" | "now" | "config">
): Promise<{ recovered: number; requeued: number }> {
  const now = deps.now();
  const cutoff = new Date(now.getTime() - deps.config.batchStaleMinutes * 60_000).toISOString();
  const stale = await deps.repo.listProcessingStartedBefore(cutoff);

  let recovered = 0;
  let requeued = 0;

  for (const batch of stale) {
    const closed = await deps.repo.updateBatchIf(batch.id, "processing", {
      status: "failed",
      failed_at: now.toISOString(),
      failure_reason: "stale_processing",
    });
    if (!closed) continue;
    recovered++;

    const sub = await deps.repo.getSubscription(batch.subscription_id);
    const alerts = await deps.repo.listAlertsFor(batch.subscription_id, batch.event_ids);
    const pending = alerts.filter((a) => a.status === "pending");

    if (!sub || !sub.is_active) {
      await deps.repo.updateBatchAlerts(
        batch.subscription_id,
        pending.map((a) => a.event_id),
        "pending",
        { status: "failed", failed_at: now.toISOString(), failure_reason: "subscription_inactive" }
      );
      continue;
    }

    const frequency = isBatched(sub.alert_frequency) ? sub.alert_frequency : batch.frequency;
    for (const alert of pending) {
      const target = await enqueue(deps, sub, frequency, alert.event_id);
      await deps.repo.updateAlertIf(alert.id, ["pending"], {
        batch_id: target.id,
        scheduled_for: target.scheduled_for,
      });
      requeued++;
    }

    console.warn("batch_stale_recovered", {
      batch_id: batch.id,
      subscription_id: batch.subscription_id,
      requeued: pending.length,
    });
  }

  return { recovered, requeued };
}
