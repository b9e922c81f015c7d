import { z } from "zod";
import type { FlowType } from "./flows";

/**
 * Typed scratch space for sessions.
 *
 * temp_data is stored as { v, flow, data } and only readable by the flow that
 * wrote it. Anything that does not validate (older version, other flow,
 * hand-edited json) reads as empty.
 */

export const SCRATCH_VERSION = 1;

const CoordinatesSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const RadiusSchema = z.union([z.literal(2), z.literal(5), z.literal(10)]);

export const LanguageSchema = z.enum(["en", "ml"]);
export type Language = z.infer<typeof LanguageSchema>;

type EmptyScratch = Record<never, never>;

export type SubscribeScratch = {
  latitude?: number;
  longitude?: number;
  radius_km?: 2 | 5 | 10;
};

export type ManageSubscriptionScratch = {
  subscription_id?: string;
};

export type PostCatchScratch = {
  fish_type?: string;
  price?: number;
  photo_media_id?: string | null;
};

export type SellerRegisterScratch = {
  business_name?: string;
};

export type ScratchByFlow = {
  main_menu: EmptyScratch;
  fish_subscribe: SubscribeScratch;
  fish_manage_subscription: ManageSubscriptionScratch;
  fish_post_catch: PostCatchScratch;
  settings: EmptyScratch;
  fish_seller_register: SellerRegisterScratch;
};

const SCRATCH_SCHEMAS: { [F in FlowType]: z.ZodType<ScratchByFlow[F]> } = {
  main_menu: z.object({}),
  fish_subscribe: z.object({
    latitude: z.number().min(-90).max(90).optional(),
    longitude: z.number().min(-180).max(180).optional(),
    radius_km: RadiusSchema.optional(),
  }),
  fish_manage_subscription: z.object({
    subscription_id: z.string().min(1).optional(),
  }),
  fish_post_catch: z.object({
    fish_type: z.string().min(1).optional(),
    price: z.number().positive().optional(),
    photo_media_id: z.string().nullable().optional(),
  }),
  settings: z.object({}),
  fish_seller_register: z.object({
    business_name: z.string().min(1).optional(),
  }),
};

const EnvelopeSchema = z.object({
  v: z.literal(SCRATCH_VERSION),
  flow: z.string(),
  data: z.unknown(),
});

export type ScratchEnvelope = z.infer<typeof EnvelopeSchema>;

export function readScratch<F extends FlowType>(raw: unknown, flow: F): ScratchByFlow[F] {
  const schema: z.ZodType<ScratchByFlow[F]> = SCRATCH_SCHEMAS[flow];
  const envelope = EnvelopeSchema.safeParse(raw);
  if (envelope.success && envelope.data.flow === flow) {
    const parsed = schema.safeParse(envelope.data.data);
    if (parsed.success) return parsed.data;
  }
  return schema.parse({});
}

export function writeScratch<F extends FlowType>(flow: F, data: ScratchByFlow[F]): ScratchEnvelope {
  return { v: SCRATCH_VERSION, flow, data };
}

/**
 * context_data survives flow resets; only a restart clears it.
 */
export const SessionContextSchema = z.object({
  last_location: CoordinatesSchema.optional(),
  language: LanguageSchema.optional(),
});

export type SessionContext = z.infer<typeof SessionContextSchema>;

export function readContext(raw: unknown): SessionContext {
  const parsed = SessionContextSchema.safeParse(raw ?? {});
  return parsed.success ? parsed.data : {};
}
