export const ALERT_FREQUENCIES = ["immediate", "morning_only", "twice_daily", "weekly_digest"] as const;
export type AlertFrequency = (typeof ALERT_FREQUENCIES)[number];
export type BatchedFrequency = Exclude<AlertFrequency, "immediate">;

export const ALLOWED_RADII = [2, 5, 10] as const;
export type RadiusKm = (typeof ALLOWED_RADII)[number];

export type EventKind = "new_catch" | "new_offer" | "job_match";

export type Subscription = {
  id: string;
  user_id: string;
  phone: string;
  name: string | null;
  latitude: number;
  longitude: number;
  radius_km: number;
  all_types: boolean;
  type_ids: string[];
  blocked_source_ids: string[];
  preferred_source_ids: string[];
  alert_frequency: AlertFrequency;
  quiet_hours_start: string | null; // "HH:MM" local
  quiet_hours_end: string | null;
  active_days: number[] | null; // 0 = Sunday
  is_active: boolean;
  is_paused: boolean;
  paused_until: string | null;
  alerts_received: number;
  alerts_clicked: number;
  last_alert_at: string | null;
  created_at: string;
};

/** Something worth telling nearby subscribers about: a fresh catch, an offer, a job. */
export type AlertEvent = {
  id: string;
  kind: EventKind;
  type_id: string | null;
  source_id: string;
  source_user_id: string | null; // the poster, never alerted about their own event
  source_name: string;
  latitude: number;
  longitude: number;
  title: string;
  details: string | null;
  price: number | null;
  media_id: string | null;
  is_active: boolean;
  alerts_sent: number;
  coming_count: number;
  message_count: number;
  created_at: string;
};

export type AlertStatus = "pending" | "queued" | "sent" | "delivered" | "failed";

export type ClickAction = "coming" | "message" | "location" | "dismiss";

export type Alert = {
  id: string;
  event_id: string;
  subscription_id: string;
  user_id: string;
  alert_type: EventKind;
  status: AlertStatus;
  is_batched: boolean;
  batch_id: string | null;
  distance_km: number;
  scheduled_for: string | null;
  queued_at: string | null;
  sent_at: string | null;
  delivered_at: string | null;
  failed_at: string | null;
  failure_reason: string | null;
  provider_message_id: string | null;
  dispatch_claimed_at: string | null;
  was_clicked: boolean;
  clicked_at: string | null;
  click_action: ClickAction | null;
  created_at: string;
};

export type NewAlert = Pick<
  Alert,
  | "event_id"
  | "subscription_id"
  | "user_id"
  | "alert_type"
  | "status"
  | "is_batched"
  | "batch_id"
  | "distance_km"
  | "scheduled_for"
  | "queued_at"
>;

export type BatchStatus = "pending" | "processing" | "sent" | "failed";

export type AlertBatch = {
  id: string;
  subscription_id: string;
  user_id: string;
  frequency: BatchedFrequency;
  status: BatchStatus;
  scheduled_for: string;
  event_ids: string[];
  item_count: number;
  sent_count: number;
  failed_count: number;
  sent_at: string | null;
  failed_at: string | null;
  failure_reason: string | null;
  provider_message_id: string | null;
  processing_started_at: string | null;
  created_at: string;
};
