import { handleInboundMessage, type InboundOutcome } from "@/src/flows/router";
import type { InboundMessage } from "@/src/flows/types";
import { logError, logEvent } from "@/src/platform/db";
import { maskPhone } from "@/src/platform/phone";
import type { AppServices } from "@/src/platform/services";
import type { EventEnvelope, EventSource } from "@/src/platform/types";

export type ProcessInboundOptions = {
  source: EventSource;
  service: string;
  raw?: unknown;
  /** Send replies through the messenger. Gateways that relay replies themselves turn this off. */
  deliver: boolean;
};

export type ProcessInboundResult = InboundOutcome & { delivered: number };

/** Event log and ops error sinks, swappable in tests. */
export type InboundAudit = {
  logEvent: (envelope: EventEnvelope) => Promise<void>;
  logError: typeof logError;
};

const defaultAudit: InboundAudit = { logEvent, logError };

export async function processInbound(
  deps: AppServices,
  message: InboundMessage,
  options: ProcessInboundOptions,
  audit: InboundAudit = defaultAudit
): Promise<ProcessInboundResult> {
  const envelope: EventEnvelope = {
    event_id: message.messageId,
    source: options.source,
    type: "whatsapp.message_received",
    occurred_at: message.receivedAt,
    correlation_id: message.phone,
    data: { message, raw: options.raw },
  };

  try {
    await audit.logEvent(envelope);
  } catch (error) {
    const messageText = error instanceof Error ? error.message : "logEvent failed";
    console.error("inbound persist_error", {
      stage: "logEvent",
      phone: maskPhone(message.phone),
      message_id: message.messageId,
      error: messageText,
    });
    await audit.logError({
      correlation_id: message.phone,
      event_id: message.messageId,
      service: options.service,
      error_code: "log_event_failed",
      message: messageText,
      details: { error: error instanceof Error ? error.stack : error },
    });
    throw error;
  }

  const outcome = await handleInboundMessage(deps, message);
  if (outcome.status !== "handled" || !options.deliver) return { ...outcome, delivered: 0 };

  let delivered = 0;
  for (const reply of outcome.replies) {
    const result = await deps.messenger.send(message.phone, reply);
    if (result.ok) {
      delivered++;
      continue;
    }
    console.error("inbound reply_failed", {
      phone: maskPhone(message.phone),
      message_id: message.messageId,
      error: result.error,
    });
    // Later replies depend on earlier ones; stop at the first failure.
    break;
  }

  return { ...outcome, delivered };
}
