import { NextResponse } from "next/server";
import { z } from "zod";
import type { InboundMessage } from "@/src/flows/types";
import { processInbound, type InboundAudit } from "@/src/integrations/whatsapp/processInbound";
import {
  getAuthFailureDebug,
  getIdempotencyKey,
  loadGatewayAuth,
  verifyBearer,
  verifyHmac,
  type GatewayAuthConfig,
} from "@/src/integrations/whatsapp/inboundAuth";
import { logError } from "@/src/platform/db";
import { normalizePhone } from "@/src/platform/phone";
import { buildServices, type AppServices } from "@/src/platform/services";

export const InboundPayloadSchema = z.object({
  message_id: z.string().min(1),
  from: z.string().min(1),
  text: z.string().optional(),
  selection_id: z.string().optional(),
  location: z
    .object({ latitude: z.number().min(-90).max(90), longitude: z.number().min(-180).max(180) })
    .optional(),
  media: z.array(z.object({ id: z.string().min(1) }).passthrough()).optional().default([]),
  timestamp: z.union([z.number(), z.string()]),
  raw: z.unknown().optional(),
  transport_session_id: z.string().optional(),
});

export type InboundPayload = z.infer<typeof InboundPayloadSchema>;

export type GatewayCommand = { command_id: string; type: "send_text"; text: string };

function toOccurredAt(timestamp: number | string): string {
  if (typeof timestamp === "number") {
    return new Date(timestamp * 1000).toISOString();
  }
  const parsed = Number.parseInt(timestamp, 10);
  if (Number.isFinite(parsed) && String(parsed) === timestamp) {
    return new Date(parsed * 1000).toISOString();
  }
  const d = new Date(timestamp);
  return Number.isFinite(d.getTime()) ? d.toISOString() : new Date().toISOString();
}

/** Gateway payload → the chat core's message shape. */
export function toInboundMessage(payload: InboundPayload, messageId: string): InboundMessage {
  const mediaId = payload.media[0]?.id ?? null;
  const text = payload.text != null && payload.text !== "" ? payload.text : null;
  const type: InboundMessage["type"] = payload.location
    ? "location"
    : payload.selection_id
      ? "interactive"
      : mediaId
        ? "image"
        : text !== null
          ? "text"
          : "other";

  return {
    messageId,
    phone: normalizePhone(payload.from),
    type,
    text,
    selectionId: payload.selection_id ?? null,
    location: payload.location ?? null,
    mediaId,
    receivedAt: toOccurredAt(payload.timestamp),
  };
}

export type HandleInboundPostOptions = {
  /** Log tag for auth failures and errors (e.g. "whatsapp/inbound" or "gateway/inbound") */
  logTag: string;
  services?: AppServices;
  auth?: GatewayAuthConfig;
  audit?: InboundAudit;
};

/**
 * Shared POST handler for gateway inbound messages. The gateway delivers the
 * replies itself, so they come back as send_text commands.
 */
export async function handleInboundPost(request: Request, options: HandleInboundPostOptions): Promise<Response> {
  const { logTag } = options;
  const auth = options.auth ?? loadGatewayAuth();
  const rawBody = await request.text();

  const bearerResult = verifyBearer(request, auth);
  if (!bearerResult.ok) {
    console.warn(`${logTag} auth_fail`, { ...getAuthFailureDebug(request, rawBody, auth), failure_reason: bearerResult.reason });
    return NextResponse.json({ ok: false, error: "Unauthorized" }, { status: 401 });
  }

  const hmacResult = verifyHmac(request, rawBody, auth);
  if (!hmacResult.ok) {
    if (hmacResult.reason === "config_missing_secret") {
      console.error(`${logTag}: NEARBUY_HMAC_SECRET is required when NEARBUY_HMAC_DISABLED is not true`);
      return NextResponse.json(
        { ok: false, error: "Server configuration error: HMAC secret not configured" },
        { status: 500 }
      );
    }
    console.warn(`${logTag} auth_fail`, { ...getAuthFailureDebug(request, rawBody, auth), failure_reason: hmacResult.reason });
    return NextResponse.json({ ok: false, error: "Invalid signature" }, { status: 403 });
  }

  let body: unknown;
  try {
    body = JSON.parse(rawBody);
  } catch {
    return NextResponse.json({ ok: false, error: "Invalid JSON body" }, { status: 400 });
  }

  const parsed = InboundPayloadSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { ok: false, error: "Invalid payload", issues: parsed.error.flatten() },
      { status: 400 }
    );
  }

  const payload = parsed.data;
  const message = toInboundMessage(payload, getIdempotencyKey(request, payload));
  const audit = options.audit;

  try {
    const services = options.services ?? buildServices();
    const result = await processInbound(
      services,
      message,
      { source: "gateway", service: "gateway-inbound", raw: payload.raw, deliver: false },
      audit
    );

    const commands: GatewayCommand[] =
      result.status === "handled"
        ? result.replies.map((text, i) => ({ command_id: `${message.messageId}:reply:${i}`, type: "send_text", text }))
        : [];

    return NextResponse.json({ ok: true, duplicate: result.status === "duplicate", commands });
  } catch (error) {
    const messageText = error instanceof Error ? error.message : "processInbound failed";
    console.error(`${logTag} error`, {
      message_id: message.messageId,
      error: messageText,
      transport_session_id: payload.transport_session_id,
    });
    await (audit?.logError ?? logError)({
      correlation_id: message.phone,
      event_id: message.messageId,
      service: "gateway-inbound",
      error_code: "process_failed",
      message: messageText,
      details: { error: error instanceof Error ? error.stack : error },
    });
    return NextResponse.json({ ok: false, error: "Processing failed" }, { status: 500 });
  }
}
