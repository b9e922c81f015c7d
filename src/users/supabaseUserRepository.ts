import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { isUniqueViolation } from "@/src/platform/db";
import type { FishSellerInput, UserAggregate, UserRepository } from "./types";

const USER_COLUMNS =
  "id,phone,name,shop:shops(id,name),fish_seller:fish_sellers(id,business_name),job_worker:job_workers(id)";

// Embedded one-to-one relations come back as an object, or as a one-element
// array depending on how PostgREST detects the relationship.
function embedded<T extends z.ZodTypeAny>(schema: T) {
  return z
    .union([schema, z.array(schema)])
    .nullable()
    .optional()
    .transform((value) => (Array.isArray(value) ? value[0] ?? null : value ?? null));
}

const UserRowSchema = z.object({
  id: z.string(),
  phone: z.string(),
  name: z.string().nullable(),
  shop: embedded(z.object({ id: z.string(), name: z.string() })),
  fish_seller: embedded(z.object({ id: z.string(), business_name: z.string() })),
  job_worker: embedded(z.object({ id: z.string() })),
});

function toAggregate(raw: unknown): UserAggregate {
  const row = UserRowSchema.parse(raw);
  return {
    id: row.id,
    phone: row.phone,
    name: row.name,
    profiles: {
      ...(row.shop ? { shop: { id: row.shop.id, name: row.shop.name } } : {}),
      ...(row.fish_seller
        ? { fishSeller: { id: row.fish_seller.id, businessName: row.fish_seller.business_name } }
        : {}),
      ...(row.job_worker ? { jobWorker: { id: row.job_worker.id } } : {}),
    },
  };
}

export function createSupabaseUserRepository(sb: SupabaseClient): UserRepository {
  async function findOne(column: "id" | "phone", value: string): Promise<UserAggregate | null> {
    const { data, error } = await sb.from("users").select(USER_COLUMNS).eq(column, value).maybeSingle();
    if (error) throw error;
    return data ? toAggregate(data) : null;
  }

  return {
    findById: (id) => findOne("id", id),
    findByPhone: (phone) => findOne("phone", phone),

    async ensureCustomer(phone) {
      const existing = await findOne("phone", phone);
      if (existing) return existing;

      const { data, error } = await sb.from("users").insert({ phone }).select(USER_COLUMNS).single();
      if (isUniqueViolation(error)) {
        const raced = await findOne("phone", phone);
        if (raced) return raced;
      }
      if (error) throw error;
      return toAggregate(data);
    },

    async registerFishSeller(userId: string, input: FishSellerInput) {
      const { error } = await sb.from("fish_sellers").insert({
        user_id: userId,
        business_name: input.businessName,
        latitude: input.latitude,
        longitude: input.longitude,
      });
      if (error && !isUniqueViolation(error)) throw error;

      const user = await findOne("id", userId);
      if (!user) throw new Error(`User ${userId} not found`);
      return { user, created: !error };
    },
  };
}
