import { DateTime } from "luxon";
import {
  deactivatePatch,
  describeStatus,
  pausePatch,
  resumePatch,
  type SubscriptionPatch,
} from "@/src/alerts/subscription";
import type { Subscription } from "@/src/alerts/types";
import { advance, getScratch, reset, setScratch, startFlow } from "@/src/session/sessionStore";
import { readChoice } from "./input";
import { frequencyLabel, t } from "./messages";
import { readFrequency } from "./subscribe";
import type { FlowContext, FlowHandler, FlowResult } from "./types";

const PAUSE_DAYS = 7;

function latestActive(subscriptions: Subscription[]): Subscription | null {
  const active = subscriptions.filter((s) => s.is_active);
  active.sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at));
  return active[0] ?? null;
}

export function startManage(ctx: FlowContext): FlowResult {
  const lang = ctx.session.language;
  const sub = latestActive(ctx.subscriptions);
  if (!sub) {
    return {
      session: advance(ctx.session, "main_menu", "main_menu", ctx.now),
      replies: [t(lang, "manage_none")],
      effects: [],
    };
  }

  let session = startFlow(ctx.session, "fish_manage_subscription", ctx.now);
  session = setScratch(session, "fish_manage_subscription", { subscription_id: sub.id }, ctx.now);
  const status = t(lang, "manage_status", {
    name: sub.name ?? "Alerts",
    status: describeStatus(sub, ctx.now, ctx.timeZone),
    radius: sub.radius_km,
    frequency: frequencyLabel(lang, sub.alert_frequency),
  });
  return { session, replies: [status], effects: [] };
}

/** Pause, resume, stop, or change the frequency of the latest subscription. */
export const handleManageSubscription: FlowHandler = (ctx) => {
  const { session, now } = ctx;
  const lang = session.language;
  const { subscription_id: subscriptionId } = getScratch(session, "fish_manage_subscription");
  if (!subscriptionId) return startManage(ctx);

  switch (session.current_step) {
    case "awaiting_action": {
      const choice = readChoice(ctx.message, 4);
      const update = (patch: SubscriptionPatch, confirm: string): FlowResult => ({
        session: reset(session, now),
        replies: [],
        effects: [{ kind: "update_subscription", subscriptionId, patch, confirm }],
      });

      if (choice === 1) {
        const until = DateTime.fromJSDate(now, { zone: ctx.timeZone }).plus({ days: PAUSE_DAYS });
        const date = until.setLocale("en").toFormat("d LLL");
        return update(pausePatch(until.toJSDate()), t(lang, "manage_paused", { date }));
      }
      if (choice === 2) return update(resumePatch(), t(lang, "manage_resumed"));
      if (choice === 3) return update(deactivatePatch(), t(lang, "manage_stopped"));
      if (choice === 4) {
        return {
          session: advance(session, "fish_manage_subscription", "awaiting_frequency", now),
          replies: [t(lang, "subscribe_ask_frequency")],
          effects: [],
        };
      }
      return { session, replies: [t(lang, "manage_invalid")], effects: [] };
    }

    case "awaiting_frequency": {
      const frequency = readFrequency(ctx);
      if (!frequency) return { session, replies: [t(lang, "frequency_invalid")], effects: [] };
      const confirm = t(lang, "manage_frequency_changed", { frequency: frequencyLabel(lang, frequency) });
      return {
        session: reset(session, now),
        replies: [],
        effects: [{ kind: "update_subscription", subscriptionId, patch: { alert_frequency: frequency }, confirm }],
      };
    }

    default:
      return startManage(ctx);
  }
};
