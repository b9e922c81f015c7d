import crypto from "crypto";
import { z } from "zod";

/**
 * Gateway auth env vars:
 * - NEARBUY_BEARER_TOKEN: required. Gateway sends Authorization: Bearer <token>.
 * - NEARBUY_HMAC_SECRET: required when HMAC is on. HMAC over the raw body, UTF-8.
 * - NEARBUY_HMAC_DISABLED: true/false/1/0. Default true (Bearer only); "false" or "0" requires HMAC.
 */
const GatewayEnvSchema = z.object({
  NEARBUY_BEARER_TOKEN: z.string().trim().optional(),
  NEARBUY_HMAC_SECRET: z.string().trim().optional(),
  NEARBUY_HMAC_DISABLED: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((v) => v !== "false" && v !== "0"),
});

export type GatewayAuthConfig = {
  bearerToken: string | null;
  hmacSecret: string | null;
  hmacRequired: boolean;
};

export type VerifyResult = { ok: boolean; reason: string };

export const SIGNATURE_HEADER = "x-nearbuy-signature";

export function loadGatewayAuth(env: Record<string, string | undefined> = process.env): GatewayAuthConfig {
  const e = GatewayEnvSchema.parse(env);
  return {
    bearerToken: e.NEARBUY_BEARER_TOKEN || null,
    hmacSecret: e.NEARBUY_HMAC_SECRET || null,
    hmacRequired: !e.NEARBUY_HMAC_DISABLED,
  };
}

export function computeHmac(rawBody: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(rawBody, "utf8").digest("hex");
}

function verifyHmacSignature(rawBody: string, signatureHeader: string, secret: string): boolean {
  const match = signatureHeader.match(/^sha256=(.+)$/);
  if (!match) return false;
  const expected = computeHmac(rawBody, secret);
  const provided = match[1].trim();
  if (expected.length !== provided.length) return false;
  return crypto.timingSafeEqual(Buffer.from(expected, "utf8"), Buffer.from(provided, "utf8"));
}

function bearerOf(request: Request): string | undefined {
  const auth = request.headers.get("authorization");
  return auth?.startsWith("Bearer ") ? auth.slice(7).trim() || undefined : undefined;
}

/** Authorization: Bearer <token> against NEARBUY_BEARER_TOKEN. */
export function verifyBearer(request: Request, config: GatewayAuthConfig): VerifyResult {
  if (!config.bearerToken) return { ok: false, reason: "config_missing_secret" };

  const provided = bearerOf(request);
  if (!provided) return { ok: false, reason: "bearer_missing" };
  if (provided !== config.bearerToken) return { ok: false, reason: "bearer_mismatch" };

  return { ok: true, reason: "ok" };
}

/**
 * X-Nearbuy-Signature: sha256=<hex> of the raw body. Only enforced when
 * NEARBUY_HMAC_DISABLED is "false" or "0".
 */
export function verifyHmac(request: Request, rawBody: string, config: GatewayAuthConfig): VerifyResult {
  if (!config.hmacRequired) return { ok: true, reason: "disabled" };
  if (!config.hmacSecret) return { ok: false, reason: "config_missing_secret" };

  const sig = request.headers.get(SIGNATURE_HEADER);
  if (!sig) return { ok: false, reason: "signature_missing" };
  if (!verifyHmacSignature(rawBody, sig, config.hmacSecret)) return { ok: false, reason: "signature_mismatch" };

  return { ok: true, reason: "ok" };
}

/**
 * X-Idempotency-Key or Idempotency-Key header, falling back to the
 * payload's message id.
 */
export function getIdempotencyKey(request: Request, payload: { message_id: string }): string {
  return (
    request.headers.get("x-idempotency-key")?.trim() ||
    request.headers.get("idempotency-key")?.trim() ||
    payload.message_id
  );
}

/** Debug info for auth failures (no secrets). */
export function getAuthFailureDebug(
  request: Request,
  rawBody: string,
  config: GatewayAuthConfig
): Record<string, string | number | boolean> {
  const sig = request.headers.get(SIGNATURE_HEADER);
  return {
    bearer_present: request.headers.has("authorization"),
    bearer_length: bearerOf(request)?.length ?? 0,
    bearer_expected_length: config.bearerToken?.length ?? 0,
    signature_present: sig !== null,
    signature_has_sha256_prefix: sig?.startsWith("sha256=") ?? false,
    hmac_required: config.hmacRequired,
    hmac_secret_set: config.hmacSecret !== null,
    body_length: rawBody.length,
  };
}
