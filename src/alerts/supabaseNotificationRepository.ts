import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { isUniqueViolation } from "@/src/platform/db";
import type { NotificationRepository } from "./repository";
import { ALERT_FREQUENCIES, type Alert, type AlertBatch, type AlertEvent, type Subscription } from "./types";

const SUBSCRIPTIONS = "alert_subscriptions";
const EVENTS = "alert_events";
const ALERTS = "alerts";
const BATCHES = "alert_batches";

const num = z.coerce.number();
const ids = z.array(z.string()).nullable().transform((v) => v ?? []);

const SubscriptionRow = z.object({
  id: z.string(),
  user_id: z.string(),
  phone: z.string(),
  name: z.string().nullable(),
  latitude: num,
  longitude: num,
  radius_km: num,
  all_types: z.boolean(),
  type_ids: ids,
  blocked_source_ids: ids,
  preferred_source_ids: ids,
  alert_frequency: z.enum(ALERT_FREQUENCIES),
  quiet_hours_start: z.string().nullable(),
  quiet_hours_end: z.string().nullable(),
  active_days: z.array(z.number().int()).nullable(),
  is_active: z.boolean(),
  is_paused: z.boolean(),
  paused_until: z.string().nullable(),
  alerts_received: z.number().int(),
  alerts_clicked: z.number().int(),
  last_alert_at: z.string().nullable(),
  created_at: z.string(),
});

const EventRow = z.object({
  id: z.string(),
  kind: z.enum(["new_catch", "new_offer", "job_match"]),
  type_id: z.string().nullable(),
  source_id: z.string(),
  source_user_id: z.string().nullable(),
  source_name: z.string(),
  latitude: num,
  longitude: num,
  title: z.string(),
  details: z.string().nullable(),
  price: num.nullable(),
  media_id: z.string().nullable(),
  is_active: z.boolean(),
  alerts_sent: z.number().int(),
  coming_count: z.number().int(),
  message_count: z.number().int(),
  created_at: z.string(),
});

const AlertRow = z.object({
  id: z.string(),
  event_id: z.string(),
  subscription_id: z.string(),
  user_id: z.string(),
  alert_type: z.enum(["new_catch", "new_offer", "job_match"]),
  status: z.enum(["pending", "queued", "sent", "delivered", "failed"]),
  is_batched: z.boolean(),
  batch_id: z.string().nullable(),
  distance_km: num,
  scheduled_for: z.string().nullable(),
  queued_at: z.string().nullable(),
  sent_at: z.string().nullable(),
  delivered_at: z.string().nullable(),
  failed_at: z.string().nullable(),
  failure_reason: z.string().nullable(),
  provider_message_id: z.string().nullable(),
  dispatch_claimed_at: z.string().nullable(),
  was_clicked: z.boolean(),
  clicked_at: z.string().nullable(),
  click_action: z.enum(["coming", "message", "location", "dismiss"]).nullable(),
  created_at: z.string(),
});

const BatchRow = z.object({
  id: z.string(),
  subscription_id: z.string(),
  user_id: z.string(),
  frequency: z.enum(["morning_only", "twice_daily", "weekly_digest"]),
  status: z.enum(["pending", "processing", "sent", "failed"]),
  scheduled_for: z.string(),
  event_ids: ids,
  item_count: z.number().int(),
  sent_count: z.number().int(),
  failed_count: z.number().int(),
  sent_at: z.string().nullable(),
  failed_at: z.string().nullable(),
  failure_reason: z.string().nullable(),
  provider_message_id: z.string().nullable(),
  processing_started_at: z.string().nullable(),
  created_at: z.string(),
});

const toSubscription = (raw: unknown): Subscription => SubscriptionRow.parse(raw);
const toEvent = (raw: unknown): AlertEvent => EventRow.parse(raw);
const toAlert = (raw: unknown): Alert => AlertRow.parse(raw);
const toBatch = (raw: unknown): AlertBatch => BatchRow.parse(raw);

function first<T>(rows: unknown[] | null, parse: (raw: unknown) => T): T | null {
  const row = (rows ?? [])[0];
  return row === undefined ? null : parse(row);
}

export function createSupabaseNotificationRepository(sb: SupabaseClient): NotificationRepository {
  return {
    // -- subscriptions ------------------------------------------------------

    async insertSubscription(input) {
      const { data, error } = await sb.from(SUBSCRIPTIONS).insert(input).select("*").single();
      if (error) throw error;
      return toSubscription(data);
    },

    async getSubscription(id) {
      const { data, error } = await sb.from(SUBSCRIPTIONS).select("*").eq("id", id).maybeSingle();
      if (error) throw error;
      return data ? toSubscription(data) : null;
    },

    async listSubscriptionsForUser(userId) {
      const { data, error } = await sb
        .from(SUBSCRIPTIONS)
        .select("*")
        .eq("user_id", userId)
        .order("created_at", { ascending: true });
      if (error) throw error;
      return (data ?? []).map(toSubscription);
    },

    async listActiveSubscriptions() {
      const { data, error } = await sb.from(SUBSCRIPTIONS).select("*").eq("is_active", true);
      if (error) throw error;
      return (data ?? []).map(toSubscription);
    },

    async updateSubscription(id, patch) {
      const { data, error } = await sb.from(SUBSCRIPTIONS).update(patch).eq("id", id).select("*");
      if (error) throw error;
      return first(data, toSubscription);
    },

    async incrementSubscriptionCounters(id, delta) {
      const { error } = await sb.rpc("increment_subscription_counters", {
        p_id: id,
        p_received: delta.received ?? 0,
        p_clicked: delta.clicked ?? 0,
        p_last_alert_at: delta.lastAlertAt ?? null,
      });
      if (error) throw error;
    },

    // -- events -------------------------------------------------------------

    async insertEvent(input) {
      const { data, error } = await sb.from(EVENTS).insert(input).select("*").single();
      if (error) throw error;
      return toEvent(data);
    },

    async getEvent(id) {
      const { data, error } = await sb.from(EVENTS).select("*").eq("id", id).maybeSingle();
      if (error) throw error;
      return data ? toEvent(data) : null;
    },

    async getEvents(eventIds) {
      if (eventIds.length === 0) return [];
      const { data, error } = await sb.from(EVENTS).select("*").in("id", eventIds);
      if (error) throw error;
      return (data ?? []).map(toEvent);
    },

    async incrementEventCounters(id, delta) {
      const { error } = await sb.rpc("increment_event_counters", {
        p_id: id,
        p_alerts_sent: delta.alertsSent ?? 0,
        p_coming: delta.coming ?? 0,
        p_messages: delta.messages ?? 0,
      });
      if (error) throw error;
    },

    // -- alerts -------------------------------------------------------------

    async insertAlert(input) {
      // unique(event_id, user_id)
      const { data, error } = await sb.from(ALERTS).insert(input).select("*").single();
      if (isUniqueViolation(error)) return null;
      if (error) throw error;
      return toAlert(data);
    },

    async getAlert(id) {
      const { data, error } = await sb.from(ALERTS).select("*").eq("id", id).maybeSingle();
      if (error) throw error;
      return data ? toAlert(data) : null;
    },

    async findAlertsByProviderMessageId(providerMessageId) {
      const { data, error } = await sb.from(ALERTS).select("*").eq("provider_message_id", providerMessageId);
      if (error) throw error;
      return (data ?? []).map(toAlert);
    },

    async listAlertsFor(subscriptionId, eventIds) {
      if (eventIds.length === 0) return [];
      const { data, error } = await sb
        .from(ALERTS)
        .select("*")
        .eq("subscription_id", subscriptionId)
        .in("event_id", eventIds);
      if (error) throw error;
      return (data ?? []).map(toAlert);
    },

    async updateAlertIf(id, from, patch) {
      const { data, error } = await sb.from(ALERTS).update(patch).eq("id", id).in("status", [...from]).select("*");
      if (error) throw error;
      return first(data, toAlert);
    },

    async markAlertClicked(id, patch) {
      const { data, error } = await sb
        .from(ALERTS)
        .update(patch)
        .eq("id", id)
        .eq("was_clicked", false)
        .in("status", ["sent", "delivered"])
        .select("*");
      if (error) throw error;
      return first(data, toAlert);
    },

    async listDueQueuedAlerts(now, limit) {
      const { data, error } = await sb
        .from(ALERTS)
        .select("*")
        .eq("status", "queued")
        .is("dispatch_claimed_at", null)
        .lte("scheduled_for", now)
        .order("distance_km", { ascending: true })
        .limit(limit);
      if (error) throw error;
      return (data ?? []).map(toAlert);
    },

    async claimAlertForDispatch(id, at) {
      const { data, error } = await sb
        .from(ALERTS)
        .update({ dispatch_claimed_at: at })
        .eq("id", id)
        .eq("status", "queued")
        .is("dispatch_claimed_at", null)
        .select("id");
      if (error) throw error;
      return (data ?? []).length > 0;
    },

    async releaseStaleDispatchClaims(cutoff) {
      const { count, error } = await sb
        .from(ALERTS)
        .update({ dispatch_claimed_at: null }, { count: "exact" })
        .eq("status", "queued")
        .lt("dispatch_claimed_at", cutoff);
      if (error) throw error;
      return count ?? 0;
    },

    async updateBatchAlerts(subscriptionId, eventIds, from, patch) {
      if (eventIds.length === 0) return 0;
      const { count, error } = await sb
        .from(ALERTS)
        .update(patch, { count: "exact" })
        .eq("subscription_id", subscriptionId)
        .in("event_id", eventIds)
        .eq("status", from);
      if (error) throw error;
      return count ?? 0;
    },

    async listAlertOutcomesSince(since) {
      const { data, error } = await sb
        .from(ALERTS)
        .select("status,failure_reason,was_clicked,created_at")
        .gte("created_at", since);
      if (error) throw error;
      return (data ?? []).map((row) =>
        AlertRow.pick({ status: true, failure_reason: true, was_clicked: true, created_at: true }).parse(row)
      );
    },

    // -- batches ------------------------------------------------------------

    async findPendingBatch(subscriptionId, frequency) {
      const { data, error } = await sb
        .from(BATCHES)
        .select("*")
        .eq("subscription_id", subscriptionId)
        .eq("frequency", frequency)
        .eq("status", "pending")
        .maybeSingle();
      if (error) throw error;
      return data ? toBatch(data) : null;
    },

    async insertPendingBatch(input) {
      // Partial unique index on (subscription_id, frequency) where status = 'pending'.
      const { data, error } = await sb
        .from(BATCHES)
        .insert({ ...input, status: "pending", event_ids: [], item_count: 0 })
        .select("*")
        .single();
      if (isUniqueViolation(error)) return null;
      if (error) throw error;
      return toBatch(data);
    },

    async getBatch(id) {
      const { data, error } = await sb.from(BATCHES).select("*").eq("id", id).maybeSingle();
      if (error) throw error;
      return data ? toBatch(data) : null;
    },

    async appendBatchItem(batchId, eventId) {
      // Single-statement union + count inside the database; no rows when not pending.
      const { data, error } = await sb.rpc("append_batch_item", { p_batch_id: batchId, p_event_id: eventId });
      if (error) throw error;
      return first(Array.isArray(data) ? data : [], toBatch);
    },

    async listDueBatches(now, limit) {
      const { data, error } = await sb
        .from(BATCHES)
        .select("*")
        .eq("status", "pending")
        .lte("scheduled_for", now)
        .order("scheduled_for", { ascending: true })
        .limit(limit);
      if (error) throw error;
      return (data ?? []).map(toBatch);
    },

    async listProcessingStartedBefore(cutoff) {
      const { data, error } = await sb
        .from(BATCHES)
        .select("*")
        .eq("status", "processing")
        .lt("processing_started_at", cutoff);
      if (error) throw error;
      return (data ?? []).map(toBatch);
    },

    async updateBatchIf(id, from, patch) {
      const { data, error } = await sb.from(BATCHES).update(patch).eq("id", id).eq("status", from).select("*");
      if (error) throw error;
      return first(data, toBatch);
    },

    async listBatchOutcomesSince(since) {
      const { data, error } = await sb
        .from(BATCHES)
        .select("status,item_count,failure_reason,created_at")
        .gte("created_at", since);
      if (error) throw error;
      return (data ?? []).map((row) =>
        BatchRow.pick({ status: true, item_count: true, failure_reason: true, created_at: true }).parse(row)
      );
    },
  };
}
