import { dispatchQueuedAlerts, processEvent, recordAlertClick } from "@/src/alerts/alertService";
import { SubscriptionValidationError, validateNewSubscription } from "@/src/alerts/subscription";
import type { AppServices } from "@/src/platform/services";
import { maskPhone } from "@/src/platform/phone";
import type { Language } from "@/src/session/scratch";
import type { UserAggregate } from "@/src/users/types";
import { frequencyLabel, t } from "./messages";
import type { FlowEffect } from "./types";

export type EffectActor = {
  phone: string;
  user: UserAggregate | null;
  language: Language;
};

/** Lower-case, dash-separated fish name used as the event's type id. */
export function fishTypeId(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
}

async function createSubscription(
  deps: AppServices,
  effect: Extract<FlowEffect, { kind: "create_subscription" }>,
  actor: EffectActor
): Promise<string[]> {
  const user = actor.user ?? (await deps.users.ensureCustomer(actor.phone));
  try {
    const input = validateNewSubscription({
      user_id: user.id,
      phone: actor.phone,
      name: null,
      latitude: effect.location.latitude,
      longitude: effect.location.longitude,
      radius_km: effect.radiusKm,
      alert_frequency: effect.frequency,
    });
    const sub = await deps.repo.insertSubscription(input);
    console.info("subscription_created", {
      subscription_id: sub.id,
      phone: maskPhone(actor.phone),
      radius_km: sub.radius_km,
      frequency: sub.alert_frequency,
    });
    return [
      t(actor.language, "subscribe_done", {
        radius: sub.radius_km,
        frequency: frequencyLabel(actor.language, sub.alert_frequency),
      }),
    ];
  } catch (error) {
    if (!(error instanceof SubscriptionValidationError)) throw error;
    console.warn("subscription_rejected", { phone: maskPhone(actor.phone), issues: error.issues });
    return [t(actor.language, "subscribe_failed")];
  }
}

async function updateSubscription(
  deps: AppServices,
  effect: Extract<FlowEffect, { kind: "update_subscription" }>,
  actor: EffectActor
): Promise<string[]> {
  const current = await deps.repo.getSubscription(effect.subscriptionId);
  if (!current || current.user_id !== actor.user?.id) return [t(actor.language, "manage_failed")];

  const updated = await deps.repo.updateSubscription(effect.subscriptionId, effect.patch);
  if (!updated) return [t(actor.language, "manage_failed")];

  console.info("subscription_updated", { subscription_id: updated.id, patch: effect.patch });
  return [effect.confirm];
}

async function publishCatch(
  deps: AppServices,
  effect: Extract<FlowEffect, { kind: "publish_catch" }>,
  actor: EffectActor
): Promise<string[]> {
  const event = await deps.repo.insertEvent({
    kind: "new_catch",
    type_id: fishTypeId(effect.fishType),
    source_id: effect.fishSellerId,
    source_user_id: actor.user?.id ?? null,
    source_name: effect.sellerName,
    latitude: effect.location.latitude,
    longitude: effect.location.longitude,
    title: effect.fishType,
    details: null,
    price: effect.price,
    media_id: effect.photoMediaId,
  });

  const summary = await processEvent(deps, event);
  // Immediate subscribers hear about it now rather than on the next cron tick.
  await dispatchQueuedAlerts(deps, deps.config.dispatchLimit);

  return [t(actor.language, "catch_posted", { count: summary.queued + summary.batched, fish: effect.fishType })];
}

async function registerFishSeller(
  deps: AppServices,
  effect: Extract<FlowEffect, { kind: "register_fish_seller" }>,
  actor: EffectActor
): Promise<string[]> {
  const customer = actor.user ?? (await deps.users.ensureCustomer(actor.phone));
  const { user, created } = await deps.users.registerFishSeller(customer.id, {
    businessName: effect.businessName,
    latitude: effect.location.latitude,
    longitude: effect.location.longitude,
  });
  const name = user.profiles.fishSeller?.businessName ?? effect.businessName;
  if (!created) return [t(actor.language, "seller_already_registered", { name })];

  console.info("fish_seller_registered", { user_id: user.id, phone: maskPhone(actor.phone) });
  return [t(actor.language, "seller_registered", { name })];
}

async function alertClick(
  deps: AppServices,
  effect: Extract<FlowEffect, { kind: "alert_click" }>,
  actor: EffectActor
): Promise<string[]> {
  if (!actor.user) return [t(actor.language, "alert_unavailable")];

  const result = await recordAlertClick(deps, {
    alertId: effect.alertId,
    userId: actor.user.id,
    action: effect.action,
  });
  if (!result.ok) {
    return [t(actor.language, result.reason === "not_found" ? "alert_unavailable" : "alert_already")];
  }

  const event = result.event;
  if (!event) return [t(actor.language, "alert_unavailable")];

  const vars = { seller: event.source_name, title: event.title, lat: event.latitude, lng: event.longitude };
  switch (effect.action) {
    case "coming":
      return [t(actor.language, "alert_coming", vars)];
    case "message":
      return [t(actor.language, "alert_message", vars)];
    case "location":
      return [t(actor.language, "alert_location", vars)];
    case "dismiss":
      return [t(actor.language, "alert_dismiss")];
  }
}

export async function runEffect(deps: AppServices, effect: FlowEffect, actor: EffectActor): Promise<string[]> {
  switch (effect.kind) {
    case "create_subscription":
      return createSubscription(deps, effect, actor);
    case "update_subscription":
      return updateSubscription(deps, effect, actor);
    case "publish_catch":
      return publishCatch(deps, effect, actor);
    case "register_fish_seller":
      return registerFishSeller(deps, effect, actor);
    case "alert_click":
      return alertClick(deps, effect, actor);
  }
}
