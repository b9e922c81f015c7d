import { handleInboundPost } from "@/src/integrations/whatsapp/handleInboundPost";

export const runtime = "nodejs";

/**
 * Gateway inbound endpoint for a self-hosted WhatsApp bridge.
 * Same contract as /api/integrations/whatsapp/inbound:
 * - Auth: Bearer token (NEARBUY_BEARER_TOKEN) + optional HMAC (X-Nearbuy-Signature)
 * - Body: { message_id, from, text?, selection_id?, location?, media?, timestamp, ... }
 * - Response: { ok: true, duplicate, commands: [{ command_id, type: "send_text", text }] }
 */
export async function POST(request: Request) {
  return handleInboundPost(request, { logTag: "gateway/inbound" });
}
