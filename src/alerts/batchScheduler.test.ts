import { describe, expect, it } from "vitest";
import { alertHarness } from "@/src/testing/harness";
import { eventInput, subscriptionInput } from "@/src/testing/fixtures";
import { validateNewSubscription } from "./subscription";
import {
  addItem,
  dispatchBatch,
  enqueue,
  getOrCreatePending,
  readyToSend,
  recoverStaleBatches,
  rescheduleDormant,
} from "./batchScheduler";

// 05:00 in Kolkata on Tue 2026-03-10
const BEFORE_SIX = "2026-03-09T23:30:00.000Z";
const SIX_AM = "2026-03-10T00:30:00.000Z";
const AFTER_SIX = "2026-03-10T00:31:00.000Z";

async function morningSubscriber(h: ReturnType<typeof alertHarness>) {
  return h.repo.insertSubscription(
    validateNewSubscription(subscriptionInput({ alert_frequency: "morning_only" }))
  );
}

async function pendingAlert(h: ReturnType<typeof alertHarness>, subId: string, eventId: string) {
  const alert = await h.repo.insertAlert({
    event_id: eventId,
    subscription_id: subId,
    user_id: "user-buyer",
    alert_type: "new_catch",
    status: "pending",
    is_batched: true,
    batch_id: null,
    distance_km: 1.2,
    scheduled_for: null,
    queued_at: null,
  });
  if (!alert) throw new Error("duplicate alert in fixture");
  return alert;
}

describe("getOrCreatePending", () => {
  it("converges concurrent callers on one pending batch", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await morningSubscriber(h);

    const batches = await Promise.all(
      Array.from({ length: 5 }, () => getOrCreatePending(h.deps, sub, "morning_only"))
    );

    expect(new Set(batches.map((b) => b.id)).size).toBe(1);
    expect(h.repo.batches.size).toBe(1);
    expect(batches[0]?.scheduled_for).toBe(SIX_AM);
  });

  it("keeps separate batches per frequency", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await morningSubscriber(h);

    const morning = await getOrCreatePending(h.deps, sub, "morning_only");
    const weekly = await getOrCreatePending(h.deps, sub, "weekly_digest");

    expect(morning.id).not.toBe(weekly.id);
    expect(weekly.scheduled_for).toBe("2026-03-15T02:30:00.000Z");
  });
});

describe("addItem", () => {
  it("adds each event once", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await morningSubscriber(h);
    const batch = await getOrCreatePending(h.deps, sub, "morning_only");

    await addItem(h.deps, batch, "evt-a");
    await addItem(h.deps, batch, "evt-b");
    const after = await addItem(h.deps, batch, "evt-a");

    expect(after?.event_ids).toEqual(["evt-a", "evt-b"]);
    expect(after?.item_count).toBe(2);
  });

  it("refuses a batch that is already being dispatched, and enqueue moves on", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await morningSubscriber(h);
    const first = await enqueue(h.deps, sub, "morning_only", "evt-a");
    await h.repo.updateBatchIf(first.id, "pending", { status: "processing" });

    expect(await addItem(h.deps, first, "evt-b")).toBeNull();

    const second = await enqueue(h.deps, sub, "morning_only", "evt-b");
    expect(second.id).not.toBe(first.id);
    expect(second.event_ids).toEqual(["evt-b"]);
  });
});

describe("readyToSend / rescheduleDormant", () => {
  it("only releases due batches with items; empty ones move to the next slot", async () => {
    const h = alertHarness(BEFORE_SIX);
    const withItems = await morningSubscriber(h);
    const empty = await morningSubscriber(h);
    const full = await enqueue(h.deps, withItems, "morning_only", "evt-a");
    const dormant = await getOrCreatePending(h.deps, empty, "morning_only");

    expect(await readyToSend(h.deps, 10)).toEqual([]);

    h.setNow(AFTER_SIX);
    expect((await readyToSend(h.deps, 10)).map((b) => b.id)).toEqual([full.id]);

    expect(await rescheduleDormant(h.deps, 10)).toBe(1);
    expect(h.repo.batches.get(dormant.id)?.scheduled_for).toBe("2026-03-11T00:30:00.000Z");
    expect(h.repo.batches.get(full.id)?.scheduled_for).toBe(SIX_AM);
  });
});

describe("dispatchBatch", () => {
  it("sends once even when two dispatchers race", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await morningSubscriber(h);
    const event = await h.repo.insertEvent(eventInput());
    await pendingAlert(h, sub.id, event.id);
    const batch = await enqueue(h.deps, sub, "morning_only", event.id);

    h.setNow(AFTER_SIX);
    const outcomes = await Promise.all([dispatchBatch(h.deps, batch), dispatchBatch(h.deps, batch)]);

    expect(outcomes.map((o) => o.status).sort()).toEqual(["sent", "skipped"]);
    expect(h.messenger.sent).toHaveLength(1);
  });

  it("records a send failure on the batch and its alerts", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await morningSubscriber(h);
    const event = await h.repo.insertEvent(eventInput());
    const alert = await pendingAlert(h, sub.id, event.id);
    const batch = await enqueue(h.deps, sub, "morning_only", event.id);

    h.setNow(AFTER_SIX);
    h.messenger.failNext("send_failed: WhatsApp send failed (401): bad token");
    const outcome = await dispatchBatch(h.deps, batch);

    expect(outcome).toEqual({ status: "failed", reason: "send_failed: WhatsApp send failed (401): bad token" });
    expect(h.repo.batches.get(batch.id)?.status).toBe("failed");
    expect(h.repo.alerts.get(alert.id)?.status).toBe("failed");
    expect(h.repo.alerts.get(alert.id)?.failed_at).toBe(AFTER_SIX);
  });

  it("fails a batch whose events were all withdrawn", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await morningSubscriber(h);
    const event = await h.repo.insertEvent(eventInput());
    await pendingAlert(h, sub.id, event.id);
    const batch = await enqueue(h.deps, sub, "morning_only", event.id);
    const stored = h.repo.events.get(event.id);
    if (stored) stored.is_active = false;

    h.setNow(AFTER_SIX);
    expect(await dispatchBatch(h.deps, batch)).toEqual({ status: "failed", reason: "no_active_items" });
    expect(h.messenger.sent).toHaveLength(0);
  });
});

describe("recoverStaleBatches", () => {
  it("closes batches stuck in processing and requeues their pending alerts", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await morningSubscriber(h);
    const event = await h.repo.insertEvent(eventInput());
    const alert = await pendingAlert(h, sub.id, event.id);
    const stuck = await enqueue(h.deps, sub, "morning_only", event.id);
    await h.repo.updateBatchIf(stuck.id, "pending", {
      status: "processing",
      processing_started_at: "2026-03-10T00:30:00.000Z",
    });

    h.setNow("2026-03-10T00:40:00.000Z");
    expect(await recoverStaleBatches(h.deps)).toEqual({ recovered: 0, requeued: 0 });

    h.setNow("2026-03-10T00:46:00.000Z");
    expect(await recoverStaleBatches(h.deps)).toEqual({ recovered: 1, requeued: 1 });

    expect(h.repo.batches.get(stuck.id)?.status).toBe("failed");
    const replacement = await h.repo.findPendingBatch(sub.id, "morning_only");
    expect(replacement?.event_ids).toEqual([event.id]);
    expect(replacement?.scheduled_for).toBe("2026-03-11T00:30:00.000Z");
    expect(h.repo.alerts.get(alert.id)?.batch_id).toBe(replacement?.id);
    expect(h.repo.alerts.get(alert.id)?.status).toBe("pending");
  });
});
