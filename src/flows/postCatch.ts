import { advance, getScratch, reset, setScratch, startFlow, updateContext } from "@/src/session/sessionStore";
import { hasProfile } from "@/src/users/types";
import { hasRememberedLocation, isWord, readLocation, textOf } from "./input";
import { t } from "./messages";
import { startRegisterSeller } from "./registerSeller";
import type { FlowContext, FlowHandler, FlowResult } from "./types";

const MAX_FISH_NAME = 60;
const PRICE = /^(?:₹|rs\.?)?\s*(\d+(?:\.\d{1,2})?)\s*(?:\/\s*kg)?$/i;

export function parsePrice(text: string): number | null {
  const match = text.trim().match(PRICE);
  if (!match) return null;
  const price = Number(match[1]);
  return price > 0 ? price : null;
}

function notSeller(ctx: FlowContext): FlowResult {
  return startRegisterSeller(ctx, [t(ctx.session.language, "catch_not_seller")]);
}

export function startPostCatch(ctx: FlowContext): FlowResult {
  if (!hasProfile(ctx.user, "fishSeller")) return notSeller(ctx);
  return {
    session: startFlow(ctx.session, "fish_post_catch", ctx.now),
    replies: [t(ctx.session.language, "catch_ask_type")],
    effects: [],
  };
}

/** fish → price → photo (or SKIP) → location, then the catch is published. */
export const handlePostCatch: FlowHandler = (ctx) => {
  const { session, now, message } = ctx;
  const lang = session.language;
  const seller = ctx.user?.profiles.fishSeller;
  if (!seller) return notSeller(ctx);

  switch (session.current_step) {
    case "awaiting_fish_type": {
      const name = textOf(message);
      if (!name || name.length > MAX_FISH_NAME || /^\d+$/.test(name)) {
        return { session, replies: [t(lang, "catch_type_invalid")], effects: [] };
      }
      const withName = setScratch(session, "fish_post_catch", { fish_type: name }, now);
      const next = advance(withName, "fish_post_catch", "awaiting_price", now);
      return { session: next, replies: [t(lang, "catch_ask_price")], effects: [] };
    }

    case "awaiting_price": {
      const price = parsePrice(textOf(message));
      if (price === null) return { session, replies: [t(lang, "catch_price_invalid")], effects: [] };
      const withPrice = setScratch(session, "fish_post_catch", { price }, now);
      const next = advance(withPrice, "fish_post_catch", "awaiting_photo", now);
      return { session: next, replies: [t(lang, "catch_ask_photo")], effects: [] };
    }

    case "awaiting_photo": {
      let photo: string | null;
      if (message.type === "image" && message.mediaId) photo = message.mediaId;
      else if (isWord(message, "skip")) photo = null;
      else return { session, replies: [t(lang, "catch_photo_invalid")], effects: [] };

      const next = advance(
        setScratch(session, "fish_post_catch", { photo_media_id: photo }, now),
        "fish_post_catch",
        "awaiting_location",
        now
      );
      const ask = t(lang, "catch_ask_location");
      const reuse = hasRememberedLocation(ctx) ? `\n${t(lang, "subscribe_reuse_location")}` : "";
      return { session: next, replies: [ask + reuse], effects: [] };
    }

    case "awaiting_location": {
      const location = readLocation(ctx);
      if (!location) return { session, replies: [t(lang, "location_invalid")], effects: [] };

      const draft = getScratch(session, "fish_post_catch");
      if (!draft.fish_type || draft.price === undefined) return startPostCatch(ctx);

      return {
        session: updateContext(reset(session, now), { last_location: location }, now),
        replies: [],
        effects: [
          {
            kind: "publish_catch",
            fishSellerId: seller.id,
            sellerName: seller.businessName,
            fishType: draft.fish_type,
            price: draft.price,
            photoMediaId: draft.photo_media_id ?? null,
            location,
          },
        ],
      };
    }

    default:
      return startPostCatch(ctx);
  }
};
