import type { Subscription } from "@/src/alerts/types";
import type { AppServices } from "@/src/platform/services";
import { maskPhone } from "@/src/platform/phone";
import type { FlowType } from "@/src/session/flows";
import { detectIntent, isGreeting } from "@/src/session/intents";
import { isIdle, recordMessage, refreshForInbound, reset, restart, withSession } from "@/src/session/sessionStore";
import type { ConversationSession } from "@/src/session/types";
import type { UserAggregate } from "@/src/users/types";
import { parseAlertReply } from "./alertReplies";
import { runEffect } from "./effects";
import { handleMainMenu, showMenu } from "./mainMenu";
import { handleManageSubscription } from "./manageSubscription";
import { t } from "./messages";
import { handlePostCatch } from "./postCatch";
import { handleRegisterSeller } from "./registerSeller";
import { handleSettings } from "./settings";
import { handleSubscribe } from "./subscribe";
import type { FlowContext, FlowEffect, FlowHandler, FlowResult, InboundMessage } from "./types";

const HANDLERS: Record<FlowType, FlowHandler> = {
  main_menu: handleMainMenu,
  fish_subscribe: handleSubscribe,
  fish_manage_subscription: handleManageSubscription,
  fish_post_catch: handlePostCatch,
  settings: handleSettings,
  fish_seller_register: handleRegisterSeller,
};

export type InboundOutcome =
  | { status: "duplicate" }
  | { status: "handled"; replies: string[]; session: ConversationSession };

type Decision = { replies: string[]; effects: FlowEffect[]; replay: boolean };

/**
 * Global commands first, then alert reactions, then whatever flow the
 * session is in. Pure: it runs again if the session write loses a race.
 */
function decide(ctx: FlowContext): FlowResult {
  const { session, message, now } = ctx;
  const lang = session.language;
  const intent = detectIntent(message.text);

  switch (intent) {
    case "menu":
      return showMenu({ ...ctx, session: reset(session, now) }, isGreeting(message.text) ? [t(lang, "welcome")] : []);
    case "restart": {
      const fresh = restart(session, now);
      return showMenu({ ...ctx, session: fresh }, [t(fresh.language, "welcome")]);
    }
    case "cancel":
      if (!isIdle(session)) return showMenu({ ...ctx, session: reset(session, now) }, [t(lang, "cancelled")]);
      break;
    case "help":
      return { session, replies: [t(lang, "help")], effects: [] };
    case "none":
      break;
  }

  const reaction = parseAlertReply(message);
  if (reaction) return { session, replies: [], effects: [{ kind: "alert_click", ...reaction }] };

  return HANDLERS[session.current_flow](ctx);
}

async function transitionSession(deps: AppServices, message: InboundMessage) {
  const user: UserAggregate | null = await deps.users.findByPhone(message.phone);
  const subscriptions: Subscription[] = user ? await deps.repo.listSubscriptionsForUser(user.id) : [];

  const { session, result } = await withSession<Decision>(deps, message.phone, (current) => {
    if (current.last_message_id === message.messageId) {
      return { session: current, result: { replies: [], effects: [], replay: true } };
    }

    const now = deps.now();
    const refreshed = refreshForInbound(current, now, deps.config.sessionTimeoutMinutes);
    const lead = refreshed.timedOut ? [t(refreshed.session.language, "session_expired")] : [];
    const ctx: FlowContext = {
      session: recordMessage(refreshed.session, message.messageId, message.type, now),
      message,
      user,
      subscriptions,
      now,
      timeZone: deps.config.timeZone,
    };

    const outcome = decide(ctx);
    return {
      session: outcome.session,
      result: { replies: [...lead, ...outcome.replies], effects: outcome.effects, replay: false },
    };
  });
  return { user, session, result };
}

/**
 * One inbound message end to end: dedupe by provider message id, run the
 * session transition, then the effects it asked for. Effects only run once
 * the transition is stored; a failed transition gives the message id back.
 */
export async function handleInboundMessage(deps: AppServices, message: InboundMessage): Promise<InboundOutcome> {
  const phone = message.phone;
  const claimed = await deps.sessions.claimMessage(message.messageId, phone, deps.now().toISOString());
  if (!claimed) {
    console.info("inbound_duplicate", { phone: maskPhone(phone), message_id: message.messageId });
    return { status: "duplicate" };
  }

  let transition: Awaited<ReturnType<typeof transitionSession>>;
  try {
    transition = await transitionSession(deps, message);
  } catch (error) {
    // Nothing was committed, so the provider's retry has to get through.
    await deps.sessions.releaseMessage(message.messageId);
    console.error("inbound_transition_failed", {
      phone: maskPhone(phone),
      message_id: message.messageId,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  const { user, session, result } = transition;
  if (result.replay) return { status: "duplicate" };

  const replies = [...result.replies];
  const actor = { phone, user, language: session.language };
  for (const effect of result.effects) {
    try {
      replies.push(...(await runEffect(deps, effect, actor)));
    } catch (error) {
      console.error("flow_effect_failed", {
        phone: maskPhone(phone),
        effect: effect.kind,
        error: error instanceof Error ? error.message : String(error),
      });
      replies.push(t(session.language, effect.kind === "publish_catch" ? "catch_failed" : "error_generic"));
    }
  }

  console.info("inbound_handled", {
    phone: maskPhone(phone),
    flow: session.current_flow,
    step: session.current_step,
    effects: result.effects.length,
  });
  return { status: "handled", replies, session };
}
