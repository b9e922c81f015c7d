import { describe, expect, it, vi } from "vitest";
import { eventInput, subscriptionInput } from "@/src/testing/fixtures";
import { alertHarness } from "@/src/testing/harness";
import { applyProviderStatus, dispatchQueuedAlerts, processEvent, recordAlertClick } from "./alertService";
import { validateNewSubscription } from "./subscription";
import { runDispatchCycle } from "./sweep";

const BEFORE_SIX = "2026-03-09T23:30:00.000Z"; // 05:00 Kolkata
const AFTER_SIX = "2026-03-10T00:31:00.000Z";

describe("immediate subscribers", () => {
  it("get exactly one queued alert with the distance frozen at creation", async () => {
    const h = alertHarness("2026-03-10T04:30:00.000Z");
    const sub = await h.repo.insertSubscription(validateNewSubscription(subscriptionInput()));
    const event = await h.repo.insertEvent(eventInput());

    expect(await processEvent(h.deps, event)).toEqual({
      matched: 1,
      queued: 1,
      batched: 0,
      duplicates: 0,
      errors: 0,
    });
    expect((await processEvent(h.deps, event)).duplicates).toBe(1);

    const alerts = [...h.repo.alerts.values()];
    expect(alerts).toHaveLength(1);
    expect(alerts[0]?.status).toBe("queued");
    expect(alerts[0]?.subscription_id).toBe(sub.id);
    expect(alerts[0]?.distance_km).toBeCloseTo(1.112, 2);
    expect(alerts[0]?.queued_at).toBe("2026-03-10T04:30:00.000Z");

    // Moving the subscriber afterwards does not change what was recorded.
    const stored = h.repo.subscriptions.get(sub.id);
    if (stored) stored.latitude = 9.9;
    expect(h.repo.alerts.get(alerts[0]?.id ?? "")?.distance_km).toBeCloseTo(1.112, 2);
  });

  it("are sent by the queue dispatcher and counted", async () => {
    const h = alertHarness("2026-03-10T04:30:00.000Z");
    const sub = await h.repo.insertSubscription(validateNewSubscription(subscriptionInput()));
    const event = await h.repo.insertEvent(eventInput());
    await processEvent(h.deps, event);

    expect(await dispatchQueuedAlerts(h.deps, 10)).toEqual({ sent: 1, failed: 0, skipped: 0 });
    expect(await dispatchQueuedAlerts(h.deps, 10)).toEqual({ sent: 0, failed: 0, skipped: 0 });

    const [alert] = [...h.repo.alerts.values()];
    expect(alert?.status).toBe("sent");
    expect(alert?.provider_message_id).toBe("wamid.test-1");
    expect(h.messenger.sent[0]?.phone).toBe("919800000001");
    expect(h.messenger.sent[0]?.content.split("\n")[1]).toBe("*Sardine* from Jetty Fresh");
    expect(h.repo.subscriptions.get(sub.id)?.alerts_received).toBe(1);
    expect(h.repo.events.get(event.id)?.alerts_sent).toBe(1);
  });
});

describe("interrupted dispatch", () => {
  it("hands an abandoned claim back once the grace window passes", async () => {
    const h = alertHarness("2026-03-10T04:30:00.000Z");
    await h.repo.insertSubscription(validateNewSubscription(subscriptionInput()));
    await processEvent(h.deps, await h.repo.insertEvent(eventInput()));
    vi.spyOn(h.repo, "getEvent").mockRejectedValueOnce(new Error("db down"));

    expect(await dispatchQueuedAlerts(h.deps, 10)).toEqual({ sent: 0, failed: 1, skipped: 0 });
    const [alert] = [...h.repo.alerts.values()];
    expect(alert?.status).toBe("queued");
    expect(alert?.dispatch_claimed_at).toBe("2026-03-10T04:30:00.000Z");

    h.setNow("2026-03-10T04:40:00.000Z");
    const early = await runDispatchCycle(h.deps);
    expect(early.releasedClaims).toBe(0);
    expect(early.alerts).toEqual({ sent: 0, failed: 0, skipped: 0 });

    h.setNow("2026-03-10T04:46:00.000Z");
    const late = await runDispatchCycle(h.deps);
    expect(late.releasedClaims).toBe(1);
    expect(late.alerts).toEqual({ sent: 1, failed: 0, skipped: 0 });
    expect(h.repo.alerts.get(alert?.id ?? "")?.status).toBe("sent");
    expect(h.messenger.sent).toHaveLength(1);
  });
});

describe("batched subscribers", () => {
  it("fail their alert when it cannot be put in a batch", async () => {
    const h = alertHarness(BEFORE_SIX);
    await h.repo.insertSubscription(validateNewSubscription(subscriptionInput({ alert_frequency: "morning_only" })));
    vi.spyOn(h.repo, "appendBatchItem").mockRejectedValueOnce(new Error("db down"));
    const event = await h.repo.insertEvent(eventInput());

    expect(await processEvent(h.deps, event)).toEqual({
      matched: 1,
      queued: 0,
      batched: 0,
      duplicates: 0,
      errors: 1,
    });
    const [alert] = [...h.repo.alerts.values()];
    expect(alert).toMatchObject({
      status: "failed",
      batch_id: null,
      failure_reason: "batch_enqueue_failed: db down",
      failed_at: BEFORE_SIX,
    });
    expect((await processEvent(h.deps, event)).duplicates).toBe(1);
  });

  it("collect three early-morning events into one digest sent after six", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await h.repo.insertSubscription(
      validateNewSubscription(subscriptionInput({ alert_frequency: "morning_only" }))
    );
    for (const title of ["Sardine", "Mackerel", "Prawns"]) {
      const event = await h.repo.insertEvent(eventInput({ title }));
      expect((await processEvent(h.deps, event)).batched).toBe(1);
    }

    const [batch] = [...h.repo.batches.values()];
    expect(h.repo.batches.size).toBe(1);
    expect(batch?.item_count).toBe(3);
    expect(batch?.scheduled_for).toBe("2026-03-10T00:30:00.000Z");
    expect([...h.repo.alerts.values()].every((a) => a.status === "pending" && a.batch_id === batch?.id)).toBe(
      true
    );

    h.setNow(AFTER_SIX);
    const report = await runDispatchCycle(h.deps);

    expect(report.batches).toEqual({ sent: 1, failed: 0, skipped: 0 });
    expect(h.repo.batches.get(batch?.id ?? "")?.status).toBe("sent");
    expect(h.repo.batches.get(batch?.id ?? "")?.sent_count).toBe(3);
    expect([...h.repo.alerts.values()].map((a) => a.status)).toEqual(["sent", "sent", "sent"]);
    expect(h.messenger.sent).toHaveLength(1);
    expect(h.messenger.sent[0]?.content.split("\n")[0]).toBe("☀️ Your morning catch digest (3)");
    expect(h.repo.subscriptions.get(sub.id)?.alerts_received).toBe(3);
  });

  it("start a fresh batch once the previous one went out", async () => {
    const h = alertHarness(BEFORE_SIX);
    await h.repo.insertSubscription(validateNewSubscription(subscriptionInput({ alert_frequency: "morning_only" })));
    await processEvent(h.deps, await h.repo.insertEvent(eventInput()));

    h.setNow(AFTER_SIX);
    await runDispatchCycle(h.deps);
    await processEvent(h.deps, await h.repo.insertEvent(eventInput({ title: "Tuna" })));

    const statuses = [...h.repo.batches.values()].map((b) => [b.status, b.scheduled_for]);
    expect(statuses).toEqual([
      ["sent", "2026-03-10T00:30:00.000Z"],
      ["pending", "2026-03-11T00:30:00.000Z"],
    ]);
  });
});

describe("delivery receipts and clicks", () => {
  it("moves every alert of a digest to delivered and records the first click", async () => {
    const h = alertHarness(BEFORE_SIX);
    const sub = await h.repo.insertSubscription(
      validateNewSubscription(subscriptionInput({ alert_frequency: "morning_only" }))
    );
    await processEvent(h.deps, await h.repo.insertEvent(eventInput()));
    await processEvent(h.deps, await h.repo.insertEvent(eventInput({ title: "Tuna" })));
    h.setNow(AFTER_SIX);
    await runDispatchCycle(h.deps);

    expect(await applyProviderStatus(h.deps, "wamid.test-1", "delivered")).toBe(2);
    expect(await applyProviderStatus(h.deps, "wamid.test-1", "failed", "late failure")).toBe(0);

    const [first] = [...h.repo.alerts.values()];
    const alertId = first?.id ?? "";
    const click = await recordAlertClick(h.deps, { alertId, userId: "user-buyer", action: "coming" });
    expect(click.ok).toBe(true);
    expect(await recordAlertClick(h.deps, { alertId, userId: "user-buyer", action: "message" })).toEqual({
      ok: false,
      reason: "not_clickable",
    });
    expect(await recordAlertClick(h.deps, { alertId, userId: "someone-else", action: "coming" })).toEqual({
      ok: false,
      reason: "not_found",
    });

    expect(h.repo.subscriptions.get(sub.id)?.alerts_clicked).toBe(1);
    expect(h.repo.events.get(first?.event_id ?? "")?.coming_count).toBe(1);
  });
});
