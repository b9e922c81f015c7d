import { DateTime } from "luxon";
import { z } from "zod";
import { ALERT_FREQUENCIES, ALLOWED_RADII, type Subscription } from "./types";

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

/**
 * Input for a new subscription. Radius is restricted to the published
 * options here, so nothing downstream has to re-check it.
 */
export const NewSubscriptionSchema = z
  .object({
    user_id: z.string().min(1),
    phone: z.string().min(1),
    name: z.string().trim().min(1).nullable().default(null),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    radius_km: z
      .number()
      .refine((r) => ALLOWED_RADII.some((allowed) => allowed === r), {
        message: `radius must be one of ${ALLOWED_RADII.join(", ")} km`,
      }),
    all_types: z.boolean().default(true),
    type_ids: z.array(z.string()).default([]),
    blocked_source_ids: z.array(z.string()).default([]),
    preferred_source_ids: z.array(z.string()).default([]),
    alert_frequency: z.enum(ALERT_FREQUENCIES).default("immediate"),
    quiet_hours_start: z.string().regex(HHMM).nullable().default(null),
    quiet_hours_end: z.string().regex(HHMM).nullable().default(null),
    active_days: z.array(z.number().int().min(0).max(6)).nonempty().nullable().default(null),
  })
  .refine((s) => s.all_types || s.type_ids.length > 0, {
    message: "type_ids required when all_types is false",
    path: ["type_ids"],
  })
  .refine((s) => (s.quiet_hours_start === null) === (s.quiet_hours_end === null), {
    message: "quiet hours need both a start and an end",
    path: ["quiet_hours_end"],
  });

export type NewSubscriptionInput = z.input<typeof NewSubscriptionSchema>;
export type NewSubscription = z.output<typeof NewSubscriptionSchema>;

export class SubscriptionValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid subscription: ${issues.join("; ")}`);
    this.name = "SubscriptionValidationError";
  }
}

export function validateNewSubscription(input: unknown): NewSubscription {
  const parsed = NewSubscriptionSchema.safeParse(input);
  if (!parsed.success) {
    throw new SubscriptionValidationError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`)
    );
  }
  return parsed.data;
}

/**
 * Active and not paused. A pause whose `paused_until` has passed no longer
 * counts; a pause without an end date holds until resumed.
 */
export function isEffectivelyActive(sub: Subscription, now: Date): boolean {
  if (!sub.is_active) return false;
  if (!sub.is_paused) return true;
  if (sub.paused_until === null) return false;
  return Date.parse(sub.paused_until) < now.getTime();
}

/** Inclusive at both ends; a window with start > end wraps past midnight. */
export function inQuietHours(sub: Subscription, now: Date, zone: string): boolean {
  const { quiet_hours_start: start, quiet_hours_end: end } = sub;
  if (!start || !end) return false;

  const time = DateTime.fromJSDate(now, { zone }).toFormat("HH:mm");
  if (start <= end) return time >= start && time <= end;
  return time >= start || time <= end;
}

export function isActiveDay(sub: Subscription, now: Date, zone: string): boolean {
  if (!sub.active_days || sub.active_days.length === 0) return true;
  const dayOfWeek = DateTime.fromJSDate(now, { zone }).weekday % 7; // Sunday = 0
  return sub.active_days.includes(dayOfWeek);
}

export function canReceiveAlertsNow(sub: Subscription, now: Date, zone: string): boolean {
  return isEffectivelyActive(sub, now) && !inQuietHours(sub, now, zone) && isActiveDay(sub, now, zone);
}

export type SubscriptionPatch = Partial<
  Pick<Subscription, "is_active" | "is_paused" | "paused_until" | "alert_frequency">
>;

export function pausePatch(until: Date | null): SubscriptionPatch {
  return { is_paused: true, paused_until: until ? until.toISOString() : null };
}

export function resumePatch(): SubscriptionPatch {
  return { is_paused: false, paused_until: null };
}

export function deactivatePatch(): SubscriptionPatch {
  return { is_active: false };
}

export function describeStatus(sub: Subscription, now: Date, zone: string): string {
  if (!sub.is_active) return "Stopped";
  if (sub.is_paused && !isEffectivelyActive(sub, now)) {
    if (sub.paused_until) {
      return `Paused until ${DateTime.fromISO(sub.paused_until, { zone, locale: "en" }).toFormat("d LLL")}`;
    }
    return "Paused";
  }
  return "Active";
}
