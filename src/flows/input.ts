import { isValidCoordinates, parseCoordinates, type Coordinates } from "@/src/geo/distance";
import { getContext } from "@/src/session/sessionStore";
import type { FlowContext, InboundMessage } from "./types";

export function textOf(message: InboundMessage): string {
  return (message.text ?? "").trim();
}

/**
 * A numbered menu choice in 1..max, from a typed number or a selection id
 * ending in `_<n>` (e.g. "menu_2").
 */
export function readChoice(message: InboundMessage, max: number): number | null {
  const raw = message.selectionId?.match(/_(\d+)$/)?.[1] ?? textOf(message).replace(/[.)]$/, "");
  if (!/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n >= 1 && n <= max ? n : null;
}

export function isWord(message: InboundMessage, ...words: string[]): boolean {
  const text = textOf(message).toLowerCase();
  return words.includes(text);
}

/**
 * A location pin, a typed "lat, lng" pair, or SAME for the last location the
 * session remembers.
 */
export function readLocation(ctx: FlowContext): Coordinates | null {
  const { message } = ctx;
  if (message.location) return isValidCoordinates(message.location) ? message.location : null;
  if (isWord(message, "same")) return getContext(ctx.session).last_location ?? null;
  return parseCoordinates(textOf(message));
}

export function hasRememberedLocation(ctx: FlowContext): boolean {
  return getContext(ctx.session).last_location !== undefined;
}
