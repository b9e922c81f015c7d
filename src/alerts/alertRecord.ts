import type { Alert, AlertStatus, ClickAction } from "./types";

export const FAILURE_REASON_MAX = 255;

const TRANSITIONS: Record<AlertStatus, readonly AlertStatus[]> = {
  pending: ["queued", "sent", "failed"],
  queued: ["sent", "failed"],
  sent: ["delivered", "failed"],
  delivered: [],
  failed: [],
};

export function canTransition(from: AlertStatus, to: AlertStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: AlertStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function truncateReason(reason: string): string {
  return reason.length > FAILURE_REASON_MAX ? reason.slice(0, FAILURE_REASON_MAX) : reason;
}

export type AlertPatch = Partial<
  Pick<
    Alert,
    | "status"
    | "queued_at"
    | "scheduled_for"
    | "sent_at"
    | "delivered_at"
    | "failed_at"
    | "failure_reason"
    | "provider_message_id"
    | "was_clicked"
    | "clicked_at"
    | "click_action"
  >
>;

export type Transition =
  | { kind: "queue"; scheduledFor: Date }
  | { kind: "sent"; providerMessageId: string | null }
  | { kind: "delivered" }
  | { kind: "failed"; reason: string };

function targetOf(t: Transition): AlertStatus {
  switch (t.kind) {
    case "queue":
      return "queued";
    case "sent":
      return "sent";
    case "delivered":
      return "delivered";
    case "failed":
      return "failed";
  }
}

/**
 * Patch for moving `alert` along its lifecycle, or null when the move is not
 * allowed from its current status. Callers treat null as "nothing to do".
 */
export function transition(alert: Pick<Alert, "status">, t: Transition, now: Date): AlertPatch | null {
  const to = targetOf(t);
  if (!canTransition(alert.status, to)) return null;

  const at = now.toISOString();
  switch (t.kind) {
    case "queue":
      return { status: to, queued_at: at, scheduled_for: t.scheduledFor.toISOString() };
    case "sent":
      return { status: to, sent_at: at, provider_message_id: t.providerMessageId };
    case "delivered":
      return { status: to, delivered_at: at };
    case "failed":
      return { status: to, failed_at: at, failure_reason: truncateReason(t.reason) };
  }
}

export type ClickPatch = Required<Pick<Alert, "was_clicked" | "clicked_at" | "click_action">>;

/**
 * First click wins; later clicks and clicks on undelivered alerts are no-ops.
 */
export function recordClick(
  alert: Pick<Alert, "status" | "was_clicked">,
  action: ClickAction,
  now: Date
): ClickPatch | null {
  if (alert.status !== "sent" && alert.status !== "delivered") return null;
  if (alert.was_clicked) return null;
  return { was_clicked: true, clicked_at: now.toISOString(), click_action: action };
}

/** The text before the first ":" of a failure reason, for grouping. */
export function errorType(reason: string | null): string {
  if (!reason) return "unknown";
  const head = reason.split(":")[0]?.trim();
  return head ? head : "unknown";
}
