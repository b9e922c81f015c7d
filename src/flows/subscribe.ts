import { ALLOWED_RADII, type AlertFrequency } from "@/src/alerts/types";
import {
  advance,
  getScratch,
  reset,
  setScratch,
  startFlow,
  updateContext,
} from "@/src/session/sessionStore";
import { t } from "./messages";
import { hasRememberedLocation, readChoice, readLocation } from "./input";
import type { FlowContext, FlowHandler, FlowResult } from "./types";

const FREQUENCY_CHOICES: readonly AlertFrequency[] = ["immediate", "morning_only", "twice_daily", "weekly_digest"];

function askLocation(ctx: FlowContext): string[] {
  const lang = ctx.session.language;
  const ask = t(lang, "subscribe_ask_location");
  return hasRememberedLocation(ctx) ? [`${ask}\n${t(lang, "subscribe_reuse_location")}`] : [ask];
}

export function startSubscribe(ctx: FlowContext): FlowResult {
  return {
    session: startFlow(ctx.session, "fish_subscribe", ctx.now),
    replies: askLocation(ctx),
    effects: [],
  };
}

export function readFrequency(ctx: FlowContext): AlertFrequency | null {
  const choice = readChoice(ctx.message, FREQUENCY_CHOICES.length);
  return choice === null ? null : FREQUENCY_CHOICES[choice - 1] ?? null;
}

/** location → radius → frequency, then the subscription is written as an effect. */
export const handleSubscribe: FlowHandler = (ctx) => {
  const { session, now } = ctx;
  const lang = session.language;

  switch (session.current_step) {
    case "awaiting_location": {
      const location = readLocation(ctx);
      if (!location) return { session, replies: [t(lang, "location_invalid")], effects: [] };

      let next = setScratch(session, "fish_subscribe", location, now);
      next = updateContext(next, { last_location: location }, now);
      next = advance(next, "fish_subscribe", "awaiting_radius", now);
      return { session: next, replies: [t(lang, "subscribe_ask_radius")], effects: [] };
    }

    case "awaiting_radius": {
      const choice = readChoice(ctx.message, ALLOWED_RADII.length);
      const radius = choice === null ? undefined : ALLOWED_RADII[choice - 1];
      if (radius === undefined) return { session, replies: [t(lang, "radius_invalid")], effects: [] };

      const withRadius = setScratch(session, "fish_subscribe", { radius_km: radius }, now);
      const next = advance(withRadius, "fish_subscribe", "awaiting_frequency", now);
      return { session: next, replies: [t(lang, "subscribe_ask_frequency")], effects: [] };
    }

    case "awaiting_frequency": {
      const frequency = readFrequency(ctx);
      if (!frequency) return { session, replies: [t(lang, "frequency_invalid")], effects: [] };

      const { latitude, longitude, radius_km } = getScratch(session, "fish_subscribe");
      if (latitude === undefined || longitude === undefined || radius_km === undefined) {
        // Scratch was lost (corrupt or expired); ask again from the top.
        return startSubscribe(ctx);
      }

      return {
        session: reset(session, now),
        replies: [],
        effects: [{ kind: "create_subscription", location: { latitude, longitude }, radiusKm: radius_km, frequency }],
      };
    }

    default:
      return startSubscribe(ctx);
  }
};
