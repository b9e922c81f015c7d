import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { isUniqueViolation } from "@/src/platform/db";
import { isFlowType } from "./flows";
import { LanguageSchema } from "./scratch";
import type { ConversationSession, SessionRepository, SessionState } from "./types";

const SessionRowSchema = z.object({
  phone: z.string(),
  user_id: z.string().nullable(),
  current_flow: z.string(),
  current_step: z.string(),
  temp_data: z.unknown(),
  context_data: z.unknown(),
  last_activity_at: z.string(),
  last_message_id: z.string().nullable(),
  last_message_type: z.string().nullable(),
  language: LanguageSchema.catch("en"),
  version: z.number().int(),
  created_at: z.string(),
});

function toSession(raw: unknown): ConversationSession {
  const row = SessionRowSchema.parse(raw);
  // Unknown flow tags (renamed or removed flows) land on the main menu.
  if (!isFlowType(row.current_flow)) {
    return { ...row, current_flow: "main_menu", current_step: "idle" };
  }
  return { ...row, current_flow: row.current_flow };
}

export function createSupabaseSessionRepository(sb: SupabaseClient): SessionRepository {
  return {
    async findByPhone(phone) {
      const { data, error } = await sb
        .from("conversation_sessions")
        .select("*")
        .eq("phone", phone)
        .maybeSingle();

      if (error) throw error;
      return data ? toSession(data) : null;
    },

    async insertIfAbsent(phone, state) {
      const { data, error } = await sb
        .from("conversation_sessions")
        .insert({ phone, ...state, version: 1 })
        .select("*")
        .single();

      if (isUniqueViolation(error)) {
        const existing = await this.findByPhone(phone);
        if (existing) return existing;
      }
      if (error) throw error;
      return toSession(data);
    },

    async updateIfVersion(phone, version, state: SessionState) {
      const { data, error } = await sb
        .from("conversation_sessions")
        .update({ ...state, version: version + 1 })
        .eq("phone", phone)
        .eq("version", version)
        .select("*");

      if (error) throw error;
      const rows = data ?? [];
      return rows.length > 0 ? toSession(rows[0]) : null;
    },

    async deleteInactiveBefore(cutoff) {
      const { count, error } = await sb
        .from("conversation_sessions")
        .delete({ count: "exact" })
        .lt("last_activity_at", cutoff);

      if (error) throw error;
      return count ?? 0;
    },

    async claimMessage(messageId, phone, at) {
      // Upsert on unique(message_id); an ignored duplicate returns no rows.
      const { data, error } = await sb
        .from("processed_messages")
        .upsert(
          { message_id: messageId, phone, processed_at: at },
          { onConflict: "message_id", ignoreDuplicates: true }
        )
        .select("message_id");

      if (error) throw error;
      return (data ?? []).length > 0;
    },

    async releaseMessage(messageId) {
      const { error } = await sb.from("processed_messages").delete().eq("message_id", messageId);
      if (error) throw error;
    },

    async deleteClaimsBefore(cutoff) {
      const { count, error } = await sb
        .from("processed_messages")
        .delete({ count: "exact" })
        .lt("processed_at", cutoff);

      if (error) throw error;
      return count ?? 0;
    },
  };
}
