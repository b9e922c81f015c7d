import crypto from "crypto";
import { z } from "zod";
import type { ProviderStatus } from "@/src/alerts/alertService";
import type { InboundMessage } from "@/src/flows/types";
import { normalizePhone } from "@/src/platform/phone";

/**
 * Cloud API webhook payloads. Only the fields the chat core reads are
 * modelled; each message and status is parsed on its own so one unexpected
 * shape does not drop the rest of the delivery.
 */

const RawMessageSchema = z.object({
  id: z.string().min(1),
  from: z.string().min(1),
  timestamp: z.string(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
  location: z.object({ latitude: z.coerce.number(), longitude: z.coerce.number() }).optional(),
  image: z.object({ id: z.string(), caption: z.string().optional() }).optional(),
  interactive: z
    .object({
      button_reply: z.object({ id: z.string(), title: z.string() }).optional(),
      list_reply: z.object({ id: z.string(), title: z.string() }).optional(),
    })
    .optional(),
  button: z.object({ payload: z.string().optional(), text: z.string() }).optional(),
});

const RawStatusSchema = z.object({
  id: z.string().min(1),
  status: z.enum(["sent", "delivered", "read", "failed"]),
  timestamp: z.string(),
  recipient_id: z.string().optional(),
  errors: z
    .array(
      z.object({
        code: z.coerce.number().optional(),
        title: z.string().optional(),
        error_data: z.object({ details: z.string() }).optional(),
      })
    )
    .optional(),
});

const ValueSchema = z.object({
  messages: z.array(z.unknown()).optional(),
  statuses: z.array(z.unknown()).optional(),
});

const PayloadSchema = z.object({
  entry: z
    .array(
      z.object({
        changes: z.array(z.object({ field: z.string().optional(), value: z.unknown() })).default([]),
      })
    )
    .default([]),
});

export type StatusUpdate = {
  providerMessageId: string;
  status: ProviderStatus;
  error: string | null;
};

export type WebhookBatch = {
  messages: InboundMessage[];
  statuses: StatusUpdate[];
  /** Entries that were present but did not parse. */
  skipped: number;
};

function toIsoFromSeconds(seconds: string, fallback: Date): string {
  const parsed = Number.parseInt(seconds, 10);
  if (!Number.isFinite(parsed)) return fallback.toISOString();
  return new Date(parsed * 1000).toISOString();
}

function toInbound(raw: z.infer<typeof RawMessageSchema>, receivedAt: Date): InboundMessage {
  const base: InboundMessage = {
    messageId: raw.id,
    phone: normalizePhone(raw.from),
    type: "other",
    text: null,
    selectionId: null,
    location: null,
    mediaId: null,
    receivedAt: toIsoFromSeconds(raw.timestamp, receivedAt),
  };

  switch (raw.type) {
    case "text":
      return { ...base, type: "text", text: raw.text?.body ?? null };
    case "location":
      return raw.location ? { ...base, type: "location", location: raw.location } : base;
    case "image":
      return { ...base, type: "image", mediaId: raw.image?.id ?? null, text: raw.image?.caption ?? null };
    case "interactive": {
      const reply = raw.interactive?.button_reply ?? raw.interactive?.list_reply;
      return reply ? { ...base, type: "interactive", selectionId: reply.id, text: reply.title } : base;
    }
    case "button":
      return raw.button
        ? { ...base, type: "interactive", selectionId: raw.button.payload ?? null, text: raw.button.text }
        : base;
    default:
      return base;
  }
}

function statusError(raw: z.infer<typeof RawStatusSchema>): string | null {
  const first = raw.errors?.[0];
  if (!first) return null;
  const title = first.title ?? first.error_data?.details ?? "unknown";
  return first.code === undefined ? `provider_error: ${title}` : `provider_error: ${first.code} ${title}`;
}

export function parseWebhookPayload(payload: unknown, receivedAt: Date = new Date()): WebhookBatch {
  const batch: WebhookBatch = { messages: [], statuses: [], skipped: 0 };
  const parsed = PayloadSchema.safeParse(payload);
  if (!parsed.success) return batch;

  for (const entry of parsed.data.entry) {
    for (const change of entry.changes) {
      const value = ValueSchema.safeParse(change.value);
      if (!value.success) continue;

      for (const rawMessage of value.data.messages ?? []) {
        const message = RawMessageSchema.safeParse(rawMessage);
        if (message.success) batch.messages.push(toInbound(message.data, receivedAt));
        else batch.skipped++;
      }

      for (const rawStatus of value.data.statuses ?? []) {
        const status = RawStatusSchema.safeParse(rawStatus);
        if (status.success) {
          batch.statuses.push({
            providerMessageId: status.data.id,
            status: status.data.status,
            error: statusError(status.data),
          });
        } else {
          batch.skipped++;
        }
      }
    }
  }
  return batch;
}

/** X-Hub-Signature-256: "sha256=<hex>" of the raw body under the app secret. */
export function verifyMetaSignature(rawBody: string, signatureHeader: string, secret: string): boolean {
  const match = signatureHeader.match(/^sha256=([0-9a-f]+)$/i);
  if (!match) return false;
  const expected = crypto.createHmac("sha256", secret).update(rawBody, "utf8").digest("hex");
  const provided = match[1].toLowerCase();
  if (expected.length !== provided.length) return false;
  return crypto.timingSafeEqual(Buffer.from(provided, "utf8"), Buffer.from(expected, "utf8"));
}
