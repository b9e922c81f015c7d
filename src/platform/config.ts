import { IANAZone } from "luxon";
import { z } from "zod";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
  NEARBUY_TIMEZONE: z
    .string()
    .default("Asia/Kolkata")
    .refine((zone) => IANAZone.isValidZone(zone), { message: "must be an IANA time zone" }),
  NEARBUY_SESSION_TIMEOUT_MINUTES: positiveInt(30),
  NEARBUY_SESSION_RETENTION_DAYS: positiveInt(7),
  NEARBUY_BATCH_STALE_MINUTES: positiveInt(15),
  NEARBUY_DISPATCH_LIMIT: positiveInt(100),
  WHATSAPP_TOKEN: z.string().trim().min(1).optional(),
  WHATSAPP_PHONE_NUMBER_ID: z.string().trim().min(1).optional(),
  WHATSAPP_API_VERSION: z.string().default("v24.0"),
  WHATSAPP_VERIFY_TOKEN: z.string().trim().min(1).optional(),
  META_APP_SECRET: z.string().trim().min(1).optional(),
  CRON_SECRET: z.string().trim().min(1).optional(),
});

export type AppConfig = {
  timeZone: string;
  sessionTimeoutMinutes: number;
  sessionRetentionDays: number;
  batchStaleMinutes: number;
  dispatchLimit: number;
  whatsapp: {
    token: string | null;
    phoneNumberId: string | null;
    apiVersion: string;
    verifyToken: string | null;
    appSecret: string | null;
  };
  cronSecret: string | null;
};

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing env var: ${name}`);
  return v;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid env var ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "invalid"}`);
  }

  const e = parsed.data;
  return {
    timeZone: e.NEARBUY_TIMEZONE,
    sessionTimeoutMinutes: e.NEARBUY_SESSION_TIMEOUT_MINUTES,
    sessionRetentionDays: e.NEARBUY_SESSION_RETENTION_DAYS,
    batchStaleMinutes: e.NEARBUY_BATCH_STALE_MINUTES,
    dispatchLimit: e.NEARBUY_DISPATCH_LIMIT,
    whatsapp: {
      token: e.WHATSAPP_TOKEN ?? null,
      phoneNumberId: e.WHATSAPP_PHONE_NUMBER_ID ?? null,
      apiVersion: e.WHATSAPP_API_VERSION,
      verifyToken: e.WHATSAPP_VERIFY_TOKEN ?? null,
      appSecret: e.META_APP_SECRET ?? null,
    },
    cronSecret: e.CRON_SECRET ?? null,
  };
}
