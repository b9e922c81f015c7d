// src/platform/db.ts

import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { requireEnv } from "./config";
import type { EventEnvelope } from "./types";

// Server-only client (service role)
let _client: SupabaseClient | null = null;

export function supabaseAdmin(): SupabaseClient {
  if (_client) return _client;

  const url = requireEnv("SUPABASE_URL");
  const key = requireEnv("SUPABASE_SERVICE_ROLE_KEY"); // server only
  _client = createClient(url, key, {
    auth: { persistSession: false },
  });
  return _client;
}

/** Postgres unique_violation, surfaced by PostgREST as error.code. */
export function isUniqueViolation(error: { code?: string } | null): boolean {
  return error?.code === "23505";
}

/**
 * Idempotent event log: inserts once per event_id.
 * If the event already exists, it does nothing.
 */
export async function logEvent(envelope: EventEnvelope): Promise<void> {
  const sb = supabaseAdmin();

  const row = {
    event_id: envelope.event_id,
    source: envelope.source,
    type: envelope.type,
    correlation_id: envelope.correlation_id,
    payload: envelope,
  };

  // Upsert on unique(event_id)
  const { error } = await sb
    .from("event_log")
    .upsert(row, { onConflict: "event_id", ignoreDuplicates: true });

  if (error) throw error;
}

export async function logError(args: {
  correlation_id: string;
  event_id?: string | null;
  service: string;
  error_code?: string | null;
  message: string;
  details?: unknown;
}): Promise<void> {
  const sb = supabaseAdmin();

  const { error } = await sb.from("ops_errors").insert({
    correlation_id: args.correlation_id,
    event_id: args.event_id ?? null,
    service: args.service,
    error_code: args.error_code ?? null,
    message: args.message,
    details: args.details ?? null,
  });

  if (error) throw error;
}
