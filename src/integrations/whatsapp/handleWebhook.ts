import { NextResponse } from "next/server";
import { applyProviderStatus } from "@/src/alerts/alertService";
import { logError } from "@/src/platform/db";
import { maskPhone } from "@/src/platform/phone";
import { buildServices, type AppServices } from "@/src/platform/services";
import { parseWebhookPayload, verifyMetaSignature } from "./metaWebhook";
import { processInbound, type InboundAudit } from "./processInbound";

const SERVICE_TAG = "whatsapp-webhook";

export type WebhookOptions = {
  services?: AppServices;
  audit?: InboundAudit;
};

/** Meta's subscription handshake: echo hub.challenge when the verify token matches. */
export function handleWebhookVerify(request: Request, options: WebhookOptions = {}): Response {
  const params = new URL(request.url).searchParams;
  const verifyToken = (options.services ?? buildServices()).config.whatsapp.verifyToken;

  if (!verifyToken) {
    return new Response("Missing WHATSAPP_VERIFY_TOKEN", { status: 500 });
  }
  if (params.get("hub.mode") === "subscribe" && params.get("hub.verify_token") === verifyToken) {
    return new Response(params.get("hub.challenge") ?? "", { status: 200 });
  }
  return new Response("Forbidden", { status: 403 });
}

/**
 * Messages go through the chat core one by one with replies sent back;
 * statuses move the matching alerts. Meta retries anything that is not a
 * 200, so per-item failures are logged and the delivery is acknowledged.
 */
export async function handleWebhookPost(request: Request, options: WebhookOptions = {}): Promise<Response> {
  const services = options.services ?? buildServices();
  const recordError = options.audit?.logError ?? logError;
  const rawBody = await request.text();

  const secret = services.config.whatsapp.appSecret;
  const signature = request.headers.get("x-hub-signature-256");
  if (secret) {
    if (!signature || !verifyMetaSignature(rawBody, signature, secret)) {
      console.warn("wa_webhook signature_rejected", { signature_present: signature !== null });
      return NextResponse.json({ ok: false, error: "Invalid signature" }, { status: 403 });
    }
  } else {
    console.warn("wa_webhook unsigned", { reason: "META_APP_SECRET not set" });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(rawBody);
  } catch (error) {
    await recordError({
      correlation_id: "unknown",
      service: SERVICE_TAG,
      error_code: "whatsapp_parse_failed",
      message: error instanceof Error ? error.message : "Invalid webhook payload",
      details: { body_snippet: rawBody.slice(0, 500) },
    });
    return NextResponse.json({ ok: true });
  }

  const batch = parseWebhookPayload(payload, services.now());
  console.info("wa_webhook received", {
    messages: batch.messages.length,
    statuses: batch.statuses.length,
    skipped: batch.skipped,
  });

  let handled = 0;
  for (const message of batch.messages) {
    try {
      const result = await processInbound(
        services,
        message,
        { source: "whatsapp", service: SERVICE_TAG, raw: payload, deliver: true },
        options.audit
      );
      if (result.status === "handled") handled++;
    } catch (error) {
      const messageText = error instanceof Error ? error.message : "Failed to process WhatsApp message";
      console.error("wa_webhook process_error", {
        phone: maskPhone(message.phone),
        message_id: message.messageId,
        error: messageText,
      });
      await recordError({
        correlation_id: message.phone,
        event_id: message.messageId,
        service: SERVICE_TAG,
        error_code: "whatsapp_process_failed",
        message: messageText,
        details: { message_id: message.messageId },
      });
    }
  }

  let receipts = 0;
  for (const status of batch.statuses) {
    try {
      receipts += await applyProviderStatus(services, status.providerMessageId, status.status, status.error ?? undefined);
    } catch (error) {
      const messageText = error instanceof Error ? error.message : "Failed to apply status";
      console.error("wa_webhook status_error", { provider_message_id: status.providerMessageId, error: messageText });
      await recordError({
        correlation_id: status.providerMessageId,
        service: SERVICE_TAG,
        error_code: "whatsapp_status_failed",
        message: messageText,
        details: { status: status.status },
      });
    }
  }

  return NextResponse.json({ ok: true, handled, receipts });
}
