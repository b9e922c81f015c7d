import { describe, expect, it, vi } from "vitest";
import { processEvent } from "@/src/alerts/alertService";
import { validateNewSubscription } from "@/src/alerts/subscription";
import { eventInput, JETTY, NEARBY, subscriptionInput } from "@/src/testing/fixtures";
import { appHarness } from "@/src/testing/harness";
import { t } from "./messages";
import { handleInboundMessage } from "./router";
import type { InboundMessage } from "./types";

const BUYER = "919800000001";
const SELLER = "919800000009";

let seq = 0;

function text(phone: string, body: string): InboundMessage {
  return {
    messageId: `wamid.in-${++seq}`,
    phone,
    type: "text",
    text: body,
    selectionId: null,
    location: null,
    mediaId: null,
    receivedAt: "2026-03-10T04:00:00.000Z",
  };
}

function pin(phone: string, location: { latitude: number; longitude: number }): InboundMessage {
  return { ...text(phone, ""), type: "location", text: null, location };
}

async function handled(h: ReturnType<typeof appHarness>, message: InboundMessage) {
  const outcome = await handleInboundMessage(h.deps, message);
  if (outcome.status !== "handled") throw new Error(`expected handled, got ${outcome.status}`);
  return outcome;
}

describe("handleInboundMessage", () => {
  it("greets a first-time sender with the welcome and the menu", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    const out = await handled(h, text(BUYER, "hi"));

    expect(out.replies).toEqual([t("en", "welcome"), t("en", "menu")]);
    expect(out.session.current_flow).toBe("main_menu");
    expect(out.session.current_step).toBe("idle");
  });

  it("ignores a redelivered message id", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    const message = text(BUYER, "1");

    await handled(h, message);
    const again = await handleInboundMessage(h.deps, message);

    expect(again).toEqual({ status: "duplicate" });
    expect(h.sessions.rows.get(BUYER)?.current_step).toBe("awaiting_location");
  });

  it("lets the retry of a message through when its first transition failed", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "hi"));
    vi.spyOn(h.sessions, "updateIfVersion").mockRejectedValueOnce(new Error("db down"));
    const message = text(BUYER, "1");

    await expect(handleInboundMessage(h.deps, message)).rejects.toThrow("db down");
    expect(h.sessions.claims.has(message.messageId)).toBe(false);
    expect(h.sessions.rows.get(BUYER)?.current_step).toBe("idle");

    const retry = await handled(h, message);
    expect(retry.replies).toEqual([t("en", "subscribe_ask_location")]);
    expect(retry.session.current_step).toBe("awaiting_location");
    expect(h.sessions.claims.has(message.messageId)).toBe(true);
  });

  it("treats the session's last message id as already handled when the claim is gone", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    const message = text(BUYER, "1");

    await handled(h, message);
    h.sessions.claims.clear();

    expect(await handleInboundMessage(h.deps, message)).toEqual({ status: "duplicate" });
    expect(h.sessions.rows.get(BUYER)?.current_step).toBe("awaiting_location");
  });

  it("accepts menu keywords in place of numbers", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "hi"));

    const out = await handled(h, text(BUYER, "Fish"));
    expect(out.replies).toEqual([t("en", "subscribe_ask_location")]);
    expect(out.session.current_step).toBe("awaiting_location");
  });

  it("subscribes a new customer through location, radius and frequency", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");

    expect((await handled(h, text(BUYER, "1"))).replies).toEqual([t("en", "subscribe_ask_location")]);
    expect((await handled(h, pin(BUYER, JETTY))).replies).toEqual([t("en", "subscribe_ask_radius")]);
    expect((await handled(h, text(BUYER, "2"))).replies).toEqual([t("en", "subscribe_ask_frequency")]);

    const done = await handled(h, text(BUYER, "1"));
    expect(done.replies).toEqual([
      "✅ You're subscribed! We'll tell you about fresh fish within 5 km, as soon as it's posted.",
    ]);
    expect(done.session.current_flow).toBe("main_menu");
    expect(done.session.temp_data).toBeNull();

    const [sub] = [...h.repo.subscriptions.values()];
    expect(sub).toMatchObject({
      phone: BUYER,
      latitude: JETTY.latitude,
      longitude: JETTY.longitude,
      radius_km: 5,
      alert_frequency: "immediate",
      is_active: true,
    });
    const user = await h.users.findByPhone(BUYER);
    expect(sub?.user_id).toBe(user?.id);
  });

  it("keeps the step and re-asks on input the step cannot use", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "1"));

    const out = await handled(h, text(BUYER, "somewhere near the market"));
    expect(out.replies).toEqual([t("en", "location_invalid")]);
    expect(out.session.current_step).toBe("awaiting_location");
  });

  it("offers the remembered location on a second subscription", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "1"));
    await handled(h, pin(BUYER, JETTY));
    await handled(h, text(BUYER, "menu"));

    const again = await handled(h, text(BUYER, "1"));
    expect(again.replies).toEqual([`${t("en", "subscribe_ask_location")}\n${t("en", "subscribe_reuse_location")}`]);

    const same = await handled(h, text(BUYER, "same"));
    expect(same.session.current_step).toBe("awaiting_radius");
  });

  it("answers MENU from the middle of a flow by resetting to the main menu", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    h.users.add(SELLER, { fishSeller: { id: "seller-1", businessName: "Jetty Fresh" } });

    await handled(h, text(SELLER, "3"));
    await handled(h, text(SELLER, "Sardine"));
    const photo = await handled(h, text(SELLER, "180"));
    expect(photo.session.current_step).toBe("awaiting_photo");

    const out = await handled(h, text(SELLER, "menu"));
    expect(out.replies).toEqual([t("en", "menu")]);
    expect(out.session.current_flow).toBe("main_menu");
    expect(out.session.current_step).toBe("idle");
    expect(out.session.temp_data).toBeNull();
  });

  it("cancels a flow in progress but not from the menu", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "1"));

    const cancelled = await handled(h, text(BUYER, "cancel"));
    expect(cancelled.replies).toEqual([t("en", "cancelled"), t("en", "menu")]);
    expect(cancelled.session.current_step).toBe("idle");

    const idle = await handled(h, text(BUYER, "cancel"));
    expect(idle.replies).toEqual([t("en", "menu")]);
    expect(idle.session.current_step).toBe("main_menu");
  });

  it("drops a flow that went quiet past its timeout before reading the input", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "1"));

    h.setNow("2026-03-10T04:14:00.000Z");
    expect((await handled(h, text(BUYER, "nope"))).session.current_step).toBe("awaiting_location");

    h.setNow("2026-03-10T04:30:00.000Z");
    const out = await handled(h, text(BUYER, "menu"));
    expect(out.replies).toEqual([t("en", "session_expired"), t("en", "menu")]);
    expect(out.session.current_flow).toBe("main_menu");
  });

  it("sends non-sellers to registration instead of the catch flow", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    const out = await handled(h, text(BUYER, "3"));

    expect(out.replies).toEqual([t("en", "catch_not_seller"), t("en", "seller_ask_business_name")]);
    expect(out.session.current_flow).toBe("fish_seller_register");
    expect(out.session.current_step).toBe("awaiting_business_name");
  });

  it("registers a seller by stall name and location, then lets them post", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(SELLER, "sell"));

    expect((await handled(h, text(SELLER, "J"))).replies).toEqual([t("en", "seller_name_invalid")]);
    expect((await handled(h, text(SELLER, "Jetty Fresh"))).replies).toEqual([t("en", "seller_ask_location")]);

    const done = await handled(h, pin(SELLER, JETTY));
    expect(done.replies).toEqual(["✅ Jetty Fresh is registered! Send 3 or SELL to post your catch."]);
    expect(done.session.current_flow).toBe("main_menu");
    expect(done.session.temp_data).toBeNull();

    const seller = await h.users.findByPhone(SELLER);
    expect(seller?.profiles.fishSeller?.businessName).toBe("Jetty Fresh");

    expect((await handled(h, text(SELLER, "3"))).replies).toEqual([t("en", "catch_ask_type")]);
    await handled(h, text(SELLER, "Sardine"));
    await handled(h, text(SELLER, "180"));
    await handled(h, text(SELLER, "skip"));
    const posted = await handled(h, text(SELLER, "same"));

    expect(posted.replies).toEqual(["✅ Posted! 0 nearby buyers will hear about your Sardine."]);
    const [event] = [...h.repo.events.values()];
    expect(event).toMatchObject({
      source_id: seller?.profiles.fishSeller?.id,
      source_user_id: seller?.id,
      source_name: "Jetty Fresh",
      latitude: JETTY.latitude,
    });
  });

  it("moves a user who became a seller meanwhile on to the catch flow", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    const user = h.users.add(SELLER);
    await handled(h, text(SELLER, "3"));
    await handled(h, text(SELLER, "Jetty Fresh"));
    await h.users.registerFishSeller(user.id, { businessName: "Harbour Catch", ...NEARBY });

    const out = await handled(h, pin(SELLER, JETTY));
    expect(out.replies).toEqual([t("en", "catch_ask_type")]);
    expect(out.session.current_flow).toBe("fish_post_catch");
    expect(out.session.current_step).toBe("awaiting_fish_type");
  });

  it("publishes a catch, alerts a nearby buyer at once, and records the buyer's reply", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    const buyer = h.users.add(BUYER);
    const seller = h.users.add(SELLER, { fishSeller: { id: "seller-1", businessName: "Jetty Fresh" } });
    await h.repo.insertSubscription(validateNewSubscription(subscriptionInput({ user_id: buyer.id, phone: BUYER })));

    await handled(h, text(SELLER, "3"));
    await handled(h, text(SELLER, "Sardine"));
    await handled(h, text(SELLER, "₹180/kg"));
    await handled(h, text(SELLER, "skip"));
    const posted = await handled(h, pin(SELLER, NEARBY));

    expect(posted.replies).toEqual(["✅ Posted! 1 nearby buyers will hear about your Sardine."]);
    const [event] = [...h.repo.events.values()];
    expect(event).toMatchObject({ type_id: "sardine", source_id: "seller-1", source_user_id: seller.id, price: 180 });

    expect(h.messenger.sent).toHaveLength(1);
    expect(h.messenger.sent[0]?.phone).toBe(BUYER);
    const [alert] = [...h.repo.alerts.values()];
    expect(alert?.status).toBe("sent");

    const reply = await handled(h, text(BUYER, `coming ${alert?.id}`));
    expect(reply.replies).toEqual(["👍 Great! Jetty Fresh knows you're on the way."]);
    expect(h.repo.alerts.get(alert?.id ?? "")).toMatchObject({ was_clicked: true, click_action: "coming" });

    const twice = await handled(h, text(BUYER, `coming ${alert?.id}`));
    expect(twice.replies).toEqual([t("en", "alert_already")]);
  });

  it("does not let a buyer react to someone else's alert", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    h.users.add(BUYER);

    const out = await handled(h, text(BUYER, "dismiss alert-99"));
    expect(out.replies).toEqual([t("en", "alert_unavailable")]);
  });

  it("switches the reply language from settings", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "4"));

    const saved = await handled(h, text(BUYER, "2"));
    expect(saved.replies).toEqual([t("ml", "language_saved")]);
    expect(saved.session.language).toBe("ml");

    expect((await handled(h, text(BUYER, "help"))).replies).toEqual([t("ml", "help")]);
  });

  it("keeps the language and remembered location when greeted again", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "1"));
    await handled(h, pin(BUYER, JETTY));
    await handled(h, text(BUYER, "menu"));
    await handled(h, text(BUYER, "4"));
    await handled(h, text(BUYER, "2"));

    const again = await handled(h, text(BUYER, "hi"));
    expect(again.replies).toEqual([t("ml", "welcome"), t("ml", "menu")]);
    expect(again.session.language).toBe("ml");

    const subscribe = await handled(h, text(BUYER, "1"));
    expect(subscribe.replies).toEqual([`${t("ml", "subscribe_ask_location")}\n${t("ml", "subscribe_reuse_location")}`]);
  });

  it("clears the language only on RESTART", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "4"));
    await handled(h, text(BUYER, "2"));

    const out = await handled(h, text(BUYER, "restart"));
    expect(out.replies).toEqual([t("en", "welcome"), t("en", "menu")]);
    expect(out.session.language).toBe("en");
  });

  it("rejects object property names as a language", async () => {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    await handled(h, text(BUYER, "4"));

    for (const word of ["constructor", "__proto__", "toString"]) {
      const out = await handled(h, text(BUYER, word));
      expect(out.replies).toEqual([t("en", "language_invalid")]);
      expect(out.session.current_step).toBe("awaiting_language");
      expect(out.session.language).toBe("en");
    }
  });
});

describe("managing a subscription from chat", () => {
  async function subscribedBuyer() {
    const h = appHarness("2026-03-10T04:00:00.000Z");
    const buyer = h.users.add(BUYER);
    const sub = await h.repo.insertSubscription(
      validateNewSubscription(subscriptionInput({ user_id: buyer.id, phone: BUYER }))
    );
    return { h, sub };
  }

  it("shows the latest subscription with its actions", async () => {
    const { h } = await subscribedBuyer();
    const out = await handled(h, text(BUYER, "2"));

    expect(out.replies).toEqual([
      "🔔 *Home*: Active\n5 km · as soon as it's posted\n\n1. ⏸️ Pause for 7 days\n2. ▶️ Resume\n3. 🛑 Stop alerts\n4. 🔁 Change frequency",
    ]);
    expect(out.session.current_step).toBe("awaiting_action");
  });

  it("pauses matching for later catches and leaves an alert already queued alone", async () => {
    const { h, sub } = await subscribedBuyer();
    const first = await h.repo.insertEvent(eventInput());
    expect((await processEvent(h.deps, first)).queued).toBe(1);
    const [queued] = [...h.repo.alerts.values()];

    await handled(h, text(BUYER, "2"));
    const paused = await handled(h, text(BUYER, "1"));
    expect(paused.replies).toEqual(["⏸️ Alerts paused until 17 Mar."]);
    expect(h.repo.subscriptions.get(sub.id)).toMatchObject({
      is_paused: true,
      paused_until: "2026-03-17T04:00:00.000Z",
    });

    const second = await h.repo.insertEvent(eventInput({ title: "Mackerel" }));
    const summary = await processEvent(h.deps, second);
    expect(summary).toEqual({ matched: 0, queued: 0, batched: 0, duplicates: 0, errors: 0 });

    expect(h.repo.alerts.size).toBe(1);
    expect(h.repo.alerts.get(queued?.id ?? "")).toMatchObject({ status: "queued", event_id: first.id });
  });

  it("resumes a paused subscription", async () => {
    const { h, sub } = await subscribedBuyer();
    await handled(h, text(BUYER, "2"));
    await handled(h, text(BUYER, "1"));

    await handled(h, text(BUYER, "2"));
    const resumed = await handled(h, text(BUYER, "2"));
    expect(resumed.replies).toEqual([t("en", "manage_resumed")]);

    const event = await h.repo.insertEvent(eventInput());
    expect((await processEvent(h.deps, event)).queued).toBe(1);
    expect(h.repo.subscriptions.get(sub.id)).toMatchObject({ is_paused: false, paused_until: null });
  });

  it("stops a subscription", async () => {
    const { h, sub } = await subscribedBuyer();
    await handled(h, text(BUYER, "2"));

    const stopped = await handled(h, text(BUYER, "3"));
    expect(stopped.replies).toEqual([t("en", "manage_stopped")]);
    expect(h.repo.subscriptions.get(sub.id)?.is_active).toBe(false);

    expect((await handled(h, text(BUYER, "2"))).replies).toEqual([t("en", "manage_none")]);
  });

  it("routes the next catch into a batch after a frequency change", async () => {
    const { h, sub } = await subscribedBuyer();
    await handled(h, text(BUYER, "2"));
    expect((await handled(h, text(BUYER, "4"))).replies).toEqual([t("en", "subscribe_ask_frequency")]);

    const changed = await handled(h, text(BUYER, "2"));
    expect(changed.replies).toEqual(["🔁 Done. You'll now hear from us every morning at 6 AM."]);
    expect(h.repo.subscriptions.get(sub.id)?.alert_frequency).toBe("morning_only");

    const event = await h.repo.insertEvent(eventInput());
    const summary = await processEvent(h.deps, event);
    expect(summary).toMatchObject({ matched: 1, queued: 0, batched: 1 });

    const [alert] = [...h.repo.alerts.values()];
    const [batch] = [...h.repo.batches.values()];
    expect(batch).toMatchObject({ subscription_id: sub.id, frequency: "morning_only", status: "pending" });
    expect(alert).toMatchObject({ status: "pending", is_batched: true, batch_id: batch?.id });
  });
});
