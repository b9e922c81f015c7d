import type { Language } from "@/src/session/scratch";
import { reset, setLanguage, startFlow } from "@/src/session/sessionStore";
import { readChoice, textOf } from "./input";
import { t } from "./messages";
import type { FlowContext, FlowHandler, FlowResult } from "./types";

const LANGUAGE_WORDS = new Map<string, Language>([
  ["en", "en"],
  ["english", "en"],
  ["ml", "ml"],
  ["malayalam", "ml"],
  ["മലയാളം", "ml"],
]);

export function startSettings(ctx: FlowContext): FlowResult {
  return {
    session: startFlow(ctx.session, "settings", ctx.now),
    replies: [t(ctx.session.language, "settings_ask_language")],
    effects: [],
  };
}

export const handleSettings: FlowHandler = (ctx) => {
  const { session, now } = ctx;
  if (session.current_step !== "awaiting_language") return startSettings(ctx);

  const choice = readChoice(ctx.message, 2);
  const language: Language | undefined =
    choice === 1 ? "en" : choice === 2 ? "ml" : LANGUAGE_WORDS.get(textOf(ctx.message).toLowerCase());
  if (!language) return { session, replies: [t(session.language, "language_invalid")], effects: [] };

  return {
    session: reset(setLanguage(session, language, now), now),
    replies: [t(language, "language_saved")],
    effects: [],
  };
};
