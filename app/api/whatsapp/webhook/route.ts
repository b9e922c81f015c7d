import { handleWebhookPost, handleWebhookVerify } from "@/src/integrations/whatsapp/handleWebhook";

export const runtime = "nodejs";

export async function GET(request: Request) {
  return handleWebhookVerify(request);
}

export async function POST(request: Request) {
  return handleWebhookPost(request);
}
