import type { NotificationRepository } from "./repository";
import type { ClickAction } from "./types";

/**
 * Counter side effects are published as events by whoever changed an alert,
 * then applied here. Nothing else touches the running counters.
 */
export type AlertDomainEvent =
  | { type: "alert_sent"; subscriptionId: string; eventIds: string[]; at: string }
  | { type: "alert_clicked"; subscriptionId: string; eventId: string; action: ClickAction };

export async function applyCounterEvent(
  repo: Pick<NotificationRepository, "incrementSubscriptionCounters" | "incrementEventCounters">,
  event: AlertDomainEvent
): Promise<void> {
  switch (event.type) {
    case "alert_sent": {
      if (event.eventIds.length === 0) return;
      await repo.incrementSubscriptionCounters(event.subscriptionId, {
        received: event.eventIds.length,
        lastAlertAt: event.at,
      });
      for (const eventId of event.eventIds) {
        await repo.incrementEventCounters(eventId, { alertsSent: 1 });
      }
      return;
    }
    case "alert_clicked": {
      await repo.incrementSubscriptionCounters(event.subscriptionId, { clicked: 1 });
      if (event.action === "coming") await repo.incrementEventCounters(event.eventId, { coming: 1 });
      if (event.action === "message") await repo.incrementEventCounters(event.eventId, { messages: 1 });
      return;
    }
  }
}

/**
 * Counter updates never undo the status change that triggered them; a
 * failure is logged and left for the numbers to drift.
 */
export async function publishCounterEvents(
  repo: Pick<NotificationRepository, "incrementSubscriptionCounters" | "incrementEventCounters">,
  events: AlertDomainEvent[]
): Promise<void> {
  for (const event of events) {
    try {
      await applyCounterEvent(repo, event);
    } catch (error) {
      console.error("alert_counter_failed", {
        type: event.type,
        subscription_id: event.subscriptionId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
