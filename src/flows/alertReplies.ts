import type { ClickAction } from "@/src/alerts/types";
import { textOf } from "./input";
import type { InboundMessage } from "./types";

const TEXT_ACTIONS = new Map<string, ClickAction>([
  ["coming", "coming"],
  ["msg", "message"],
  ["message", "message"],
  ["loc", "location"],
  ["location", "location"],
  ["dismiss", "dismiss"],
]);

const BUTTON = /^alert:(coming|message|location|dismiss):([\w-]+)$/;
const TEXT = /^(\w+)\s+([\w-]+)$/;

/**
 * A reaction to an alert: a button id "alert:<action>:<alertId>" or a typed
 * reply such as "coming <alertId>".
 */
export function parseAlertReply(message: InboundMessage): { alertId: string; action: ClickAction } | null {
  const button = message.selectionId?.match(BUTTON);
  if (button) {
    const action = TEXT_ACTIONS.get(button[1]);
    return action ? { alertId: button[2], action } : null;
  }

  const typed = textOf(message).match(TEXT);
  if (!typed) return null;
  const action = TEXT_ACTIONS.get(typed[1].toLowerCase());
  return action ? { alertId: typed[2], action } : null;
}
