// src/platform/types.ts

export type EventSource = "whatsapp" | "gateway" | "scheduler" | "internal";

export type EventEnvelope<TData = unknown> = {
  event_id: string;
  source: EventSource;
  type: string; // e.g. "whatsapp.message_received"
  occurred_at: string; // ISO8601
  correlation_id: string; // phone for conversations, batch id for dispatches
  data: TData;
};

/**
 * Result of asking the messaging transport to deliver one rendered message.
 */
export type SendResult =
  | { ok: true; providerMessageId: string }
  | { ok: false; error: string };

export interface Messenger {
  send(phone: string, content: string): Promise<SendResult>;
}
