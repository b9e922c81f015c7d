import type { ClickPatch } from "./alertRecord";
import type { NewSubscription } from "./subscription";
import type {
  Alert,
  AlertBatch,
  AlertEvent,
  AlertStatus,
  BatchedFrequency,
  BatchStatus,
  NewAlert,
  Subscription,
} from "./types";

export type NewAlertEvent = Pick<
  AlertEvent,
  | "kind"
  | "type_id"
  | "source_id"
  | "source_user_id"
  | "source_name"
  | "latitude"
  | "longitude"
  | "title"
  | "details"
  | "price"
  | "media_id"
>;

export type SubscriptionCounterDelta = {
  received?: number;
  clicked?: number;
  lastAlertAt?: string;
};

export type EventCounterDelta = {
  alertsSent?: number;
  coming?: number;
  messages?: number;
};

export type BatchPatch = Partial<
  Pick<
    AlertBatch,
    | "status"
    | "scheduled_for"
    | "sent_count"
    | "failed_count"
    | "sent_at"
    | "failed_at"
    | "failure_reason"
    | "provider_message_id"
    | "processing_started_at"
  >
>;

export type AlertUpdate = Partial<Omit<Alert, "id" | "event_id" | "subscription_id" | "user_id" | "created_at">>;

export type AlertOutcomeRow = Pick<Alert, "status" | "failure_reason" | "was_clicked" | "created_at">;
export type BatchOutcomeRow = Pick<AlertBatch, "status" | "item_count" | "failure_reason" | "created_at">;

/**
 * Storage for subscriptions, events, alerts and batches.
 *
 * The two guarantees the scheduler leans on live here: at most one pending
 * batch per (subscription, frequency), and compare-and-set status updates.
 */
export interface NotificationRepository {
  // subscriptions
  insertSubscription(input: NewSubscription): Promise<Subscription>;
  getSubscription(id: string): Promise<Subscription | null>;
  listSubscriptionsForUser(userId: string): Promise<Subscription[]>;
  /** Every subscription with is_active set; pause, quiet hours and distance are left to the matcher. */
  listActiveSubscriptions(): Promise<Subscription[]>;
  updateSubscription(
    id: string,
    patch: Partial<Pick<Subscription, "is_active" | "is_paused" | "paused_until" | "alert_frequency">>
  ): Promise<Subscription | null>;
  incrementSubscriptionCounters(id: string, delta: SubscriptionCounterDelta): Promise<void>;

  // events
  insertEvent(input: NewAlertEvent): Promise<AlertEvent>;
  getEvent(id: string): Promise<AlertEvent | null>;
  getEvents(ids: string[]): Promise<AlertEvent[]>;
  incrementEventCounters(id: string, delta: EventCounterDelta): Promise<void>;

  // alerts
  /** Null when an alert for (event_id, user_id) already exists. */
  insertAlert(input: NewAlert): Promise<Alert | null>;
  getAlert(id: string): Promise<Alert | null>;
  findAlertsByProviderMessageId(providerMessageId: string): Promise<Alert[]>;
  listAlertsFor(subscriptionId: string, eventIds: string[]): Promise<Alert[]>;
  /** Applies the patch only while the alert is in one of `from`. */
  updateAlertIf(id: string, from: readonly AlertStatus[], patch: AlertUpdate): Promise<Alert | null>;
  /** Sets the click fields once, and only on a sent or delivered alert. */
  markAlertClicked(
    id: string,
    patch: ClickPatch
  ): Promise<Alert | null>;
  /** Queued alerts due by `now` that no dispatcher holds yet, nearest first. */
  listDueQueuedAlerts(now: string, limit: number): Promise<Alert[]>;
  /** Stamps dispatch_claimed_at if nobody else did; false when another dispatcher won. */
  claimAlertForDispatch(id: string, at: string): Promise<boolean>;
  /** Clears dispatch_claimed_at on queued alerts claimed before `cutoff`. */
  releaseStaleDispatchClaims(cutoff: string): Promise<number>;
  updateBatchAlerts(
    subscriptionId: string,
    eventIds: string[],
    from: AlertStatus,
    patch: AlertUpdate
  ): Promise<number>;
  listAlertOutcomesSince(since: string): Promise<AlertOutcomeRow[]>;

  // batches
  findPendingBatch(subscriptionId: string, frequency: BatchedFrequency): Promise<AlertBatch | null>;
  /** Null when a pending batch for the pair already exists. */
  insertPendingBatch(input: {
    subscription_id: string;
    user_id: string;
    frequency: BatchedFrequency;
    scheduled_for: string;
  }): Promise<AlertBatch | null>;
  getBatch(id: string): Promise<AlertBatch | null>;
  /** Set-union append; null when the batch is no longer pending. */
  appendBatchItem(batchId: string, eventId: string): Promise<AlertBatch | null>;
  listDueBatches(now: string, limit: number): Promise<AlertBatch[]>;
  listProcessingStartedBefore(cutoff: string): Promise<AlertBatch[]>;
  updateBatchIf(id: string, from: BatchStatus, patch: BatchPatch): Promise<AlertBatch | null>;
  listBatchOutcomesSince(since: string): Promise<BatchOutcomeRow[]>;
}
