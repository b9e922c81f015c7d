import { z } from "zod";
import type { AppConfig } from "@/src/platform/config";
import { maskPhone } from "@/src/platform/phone";
import type { Messenger, SendResult } from "@/src/platform/types";

type SendTextMessageArgs = {
  phoneNumberId: string;
  token: string;
  to: string;
  body: string;
  apiVersion?: string;
};

const SendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).min(1),
});

/** Sends one text message through the Cloud API; returns the provider message id. */
export async function sendTextMessage(args: SendTextMessageArgs): Promise<string> {
  const version = args.apiVersion ?? "v24.0";
  const url = `https://graph.facebook.com/${version}/${args.phoneNumberId}/messages`;

  const response = await fetch(url, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${args.token}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify({
      messaging_product: "whatsapp",
      to: args.to,
      type: "text",
      text: { body: args.body, preview_url: true },
    }),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`WhatsApp send failed (${response.status}): ${body}`);
  }

  const parsed = SendResponseSchema.safeParse(await response.json());
  if (!parsed.success) throw new Error("WhatsApp send failed: response carried no message id");
  return parsed.data.messages[0].id;
}

/**
 * Messenger over the Cloud API. Missing credentials are reported as a failed
 * send rather than thrown, so a misconfigured deploy shows up in alert stats.
 */
export function createWhatsAppMessenger(config: AppConfig["whatsapp"]): Messenger {
  return {
    async send(phone, content): Promise<SendResult> {
      if (!config.token || !config.phoneNumberId) {
        return { ok: false, error: "not_configured: WHATSAPP_TOKEN or WHATSAPP_PHONE_NUMBER_ID missing" };
      }
      try {
        const providerMessageId = await sendTextMessage({
          phoneNumberId: config.phoneNumberId,
          token: config.token,
          to: phone,
          body: content,
          apiVersion: config.apiVersion,
        });
        return { ok: true, providerMessageId };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error("whatsapp_send_error", { to: maskPhone(phone), error: message });
        return { ok: false, error: `send_failed: ${message}` };
      }
    },
  };
}
