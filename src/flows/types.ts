import type { SubscriptionPatch } from "@/src/alerts/subscription";
import type { AlertFrequency, ClickAction, RadiusKm, Subscription } from "@/src/alerts/types";
import type { Coordinates } from "@/src/geo/distance";
import type { ConversationSession } from "@/src/session/types";
import type { UserAggregate } from "@/src/users/types";

export type InboundMessageType = "text" | "location" | "image" | "interactive" | "other";

/** One inbound chat message, normalised from whichever transport delivered it. */
export type InboundMessage = {
  messageId: string;
  phone: string;
  type: InboundMessageType;
  text: string | null;
  /** Reply-button or list-row id for interactive messages. */
  selectionId: string | null;
  location: Coordinates | null;
  mediaId: string | null;
  receivedAt: string;
};

/**
 * Writes a flow wants done once its session transition has committed. They
 * return the replies that depend on their outcome.
 */
export type FlowEffect =
  | {
      kind: "create_subscription";
      location: Coordinates;
      radiusKm: RadiusKm;
      frequency: AlertFrequency;
    }
  | { kind: "update_subscription"; subscriptionId: string; patch: SubscriptionPatch; confirm: string }
  | {
      kind: "publish_catch";
      fishSellerId: string;
      sellerName: string;
      fishType: string;
      price: number;
      photoMediaId: string | null;
      location: Coordinates;
    }
  | { kind: "register_fish_seller"; businessName: string; location: Coordinates }
  | { kind: "alert_click"; alertId: string; action: ClickAction };

export type FlowResult = {
  session: ConversationSession;
  replies: string[];
  effects: FlowEffect[];
};

/** Read-only view a handler decides from. */
export type FlowContext = {
  session: ConversationSession;
  message: InboundMessage;
  user: UserAggregate | null;
  subscriptions: Subscription[];
  now: Date;
  timeZone: string;
};

export type FlowHandler = (ctx: FlowContext) => FlowResult;
