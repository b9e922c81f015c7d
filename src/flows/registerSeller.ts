import { advance, getScratch, reset, setScratch, startFlow, updateContext } from "@/src/session/sessionStore";
import { hasProfile } from "@/src/users/types";
import { hasRememberedLocation, readLocation, textOf } from "./input";
import { t } from "./messages";
import { startPostCatch } from "./postCatch";
import type { FlowContext, FlowHandler, FlowResult } from "./types";

const MAX_BUSINESS_NAME = 80;

export function startRegisterSeller(ctx: FlowContext, lead: string[] = []): FlowResult {
  return {
    session: startFlow(ctx.session, "fish_seller_register", ctx.now),
    replies: [...lead, t(ctx.session.language, "seller_ask_business_name")],
    effects: [],
  };
}

/** Stall name, then where the stall is; the profile is written afterwards. */
export const handleRegisterSeller: FlowHandler = (ctx) => {
  const { session, now, message } = ctx;
  const lang = session.language;
  if (hasProfile(ctx.user, "fishSeller")) return startPostCatch(ctx);

  switch (session.current_step) {
    case "awaiting_business_name": {
      const name = textOf(message);
      if (name.length < 2 || name.length > MAX_BUSINESS_NAME || /^\d+$/.test(name)) {
        return { session, replies: [t(lang, "seller_name_invalid")], effects: [] };
      }
      const next = advance(
        setScratch(session, "fish_seller_register", { business_name: name }, now),
        "fish_seller_register",
        "awaiting_location",
        now
      );
      const ask = t(lang, "seller_ask_location");
      const reuse = hasRememberedLocation(ctx) ? `\n${t(lang, "subscribe_reuse_location")}` : "";
      return { session: next, replies: [ask + reuse], effects: [] };
    }

    case "awaiting_location": {
      const location = readLocation(ctx);
      if (!location) return { session, replies: [t(lang, "location_invalid")], effects: [] };

      const draft = getScratch(session, "fish_seller_register");
      if (!draft.business_name) return startRegisterSeller(ctx);

      return {
        session: updateContext(reset(session, now), { last_location: location }, now),
        replies: [],
        effects: [{ kind: "register_fish_seller", businessName: draft.business_name, location }],
      };
    }

    default:
      return startRegisterSeller(ctx);
  }
};
