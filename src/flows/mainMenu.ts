import { advance } from "@/src/session/sessionStore";
import { readChoice, textOf } from "./input";
import { startManage } from "./manageSubscription";
import { t } from "./messages";
import { startPostCatch } from "./postCatch";
import { startSettings } from "./settings";
import { startSubscribe } from "./subscribe";
import type { FlowContext, FlowHandler, FlowResult } from "./types";

const MENU_ENTRIES = [startSubscribe, startManage, startPostCatch, startSettings] as const;

const KEYWORDS = new Map<string, number>([
  ["fish", 1],
  ["alerts", 2],
  ["sell", 3],
  ["settings", 4],
]);

export function showMenu(ctx: FlowContext, lead: string[] = []): FlowResult {
  return {
    session: ctx.session,
    replies: [...lead, t(ctx.session.language, "menu")],
    effects: [],
  };
}

/**
 * A valid number or keyword picks an entry from any idle position; anything
 * else shows the menu, with a nudge if the menu was already on screen.
 */
export const handleMainMenu: FlowHandler = (ctx) => {
  const choice = readChoice(ctx.message, MENU_ENTRIES.length) ?? KEYWORDS.get(textOf(ctx.message).toLowerCase()) ?? null;
  const start = choice === null ? undefined : MENU_ENTRIES[choice - 1];
  if (start) return start(ctx);

  const lang = ctx.session.language;
  if (ctx.session.current_step === "main_menu") return showMenu(ctx, [t(lang, "menu_invalid")]);

  return showMenu({ ...ctx, session: advance(ctx.session, "main_menu", "main_menu", ctx.now) });
};
