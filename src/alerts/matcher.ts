import { haversineKm } from "@/src/geo/distance";
import { canReceiveAlertsNow } from "./subscription";
import type { AlertEvent, Subscription } from "./types";

export type Match = {
  subscription: Subscription;
  distanceKm: number;
  preferred: boolean;
};

export type MatchOptions = {
  now: Date;
  zone: string;
};

export type Rejection = "type" | "blocked" | "distance" | "inactive_or_quiet" | "own_event";

/**
 * Why a subscription does not match the event, or null when it does.
 * Distance is only computed once the cheap filters pass.
 */
export function rejectionReason(
  event: AlertEvent,
  sub: Subscription,
  opts: MatchOptions
): { reason: Rejection } | { reason: null; distanceKm: number } {
  if (!canReceiveAlertsNow(sub, opts.now, opts.zone)) return { reason: "inactive_or_quiet" };
  if (event.source_user_id !== null && sub.user_id === event.source_user_id) return { reason: "own_event" };
  if (!sub.all_types && (event.type_id === null || !sub.type_ids.includes(event.type_id))) {
    return { reason: "type" };
  }
  if (sub.blocked_source_ids.includes(event.source_id)) return { reason: "blocked" };

  const distanceKm = haversineKm(
    { latitude: sub.latitude, longitude: sub.longitude },
    { latitude: event.latitude, longitude: event.longitude }
  );
  if (distanceKm > sub.radius_km) return { reason: "distance" };
  return { reason: null, distanceKm };
}

/**
 * Subscriptions that should hear about `event`, preferred sources first,
 * then nearest first. One entry per subscription.
 */
export function findMatching(event: AlertEvent, subscriptions: Subscription[], opts: MatchOptions): Match[] {
  const seen = new Set<string>();
  const matches: Match[] = [];

  for (const sub of subscriptions) {
    if (seen.has(sub.id)) continue;
    seen.add(sub.id);

    const verdict = rejectionReason(event, sub, opts);
    if (verdict.reason !== null) continue;

    matches.push({
      subscription: sub,
      distanceKm: verdict.distanceKm,
      preferred: sub.preferred_source_ids.includes(event.source_id),
    });
  }

  return matches.sort((a, b) => {
    if (a.preferred !== b.preferred) return a.preferred ? -1 : 1;
    return a.distanceKm - b.distanceKm;
  });
}
