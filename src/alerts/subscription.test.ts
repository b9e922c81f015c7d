import { describe, expect, it } from "vitest";
import { makeSubscription, subscriptionInput } from "@/src/testing/fixtures";
import {
  describeStatus,
  inQuietHours,
  isEffectivelyActive,
  pausePatch,
  SubscriptionValidationError,
  validateNewSubscription,
} from "./subscription";

const ZONE = "Asia/Kolkata";

describe("validateNewSubscription", () => {
  it("fills defaults", () => {
    const sub = validateNewSubscription(subscriptionInput());
    expect(sub.all_types).toBe(true);
    expect(sub.type_ids).toEqual([]);
    expect(sub.active_days).toBeNull();
    expect(sub.quiet_hours_start).toBeNull();
  });

  it("rejects radii outside the published options", () => {
    expect(() => validateNewSubscription(subscriptionInput({ radius_km: 3 }))).toThrow(SubscriptionValidationError);
    expect(() => validateNewSubscription(subscriptionInput({ radius_km: 10 }))).not.toThrow();
  });

  it("requires type ids when not subscribed to everything", () => {
    expect(() => validateNewSubscription(subscriptionInput({ all_types: false }))).toThrow(/type_ids/);
  });

  it("requires both ends of a quiet-hours window", () => {
    expect(() => validateNewSubscription(subscriptionInput({ quiet_hours_start: "22:00" }))).toThrow(
      /quiet hours/
    );
  });
});

describe("isEffectivelyActive", () => {
  const now = new Date("2026-03-10T00:00:00.000Z");

  it("holds an open-ended pause until resumed", () => {
    expect(isEffectivelyActive(makeSubscription({ is_paused: true, paused_until: null }), now)).toBe(false);
  });

  it("lapses a pause whose end has passed", () => {
    const sub = makeSubscription(pausePatch(new Date("2026-03-09T23:59:00.000Z")));
    expect(isEffectivelyActive(sub, now)).toBe(true);
  });

  it("never revives a stopped subscription", () => {
    expect(isEffectivelyActive(makeSubscription({ is_active: false }), now)).toBe(false);
  });
});

describe("inQuietHours", () => {
  const at = (hhmm: string) => new Date(`2026-03-10T${hhmm}:00+05:30`);
  const overnight = makeSubscription({ quiet_hours_start: "22:00", quiet_hours_end: "06:00" });

  it("wraps windows past midnight", () => {
    expect(inQuietHours(overnight, at("23:30"), ZONE)).toBe(true);
    expect(inQuietHours(overnight, at("05:59"), ZONE)).toBe(true);
    expect(inQuietHours(overnight, at("06:01"), ZONE)).toBe(false);
    expect(inQuietHours(overnight, at("12:00"), ZONE)).toBe(false);
  });

  it("is inclusive at both ends", () => {
    expect(inQuietHours(overnight, at("22:00"), ZONE)).toBe(true);
    expect(inQuietHours(overnight, at("06:00"), ZONE)).toBe(true);
  });
});

describe("describeStatus", () => {
  it("shows the pause end in the local zone", () => {
    const sub = makeSubscription({ is_paused: true, paused_until: "2026-03-17T00:00:00.000Z" });
    expect(describeStatus(sub, new Date("2026-03-10T00:00:00.000Z"), ZONE)).toBe("Paused until 17 Mar");
  });
});
