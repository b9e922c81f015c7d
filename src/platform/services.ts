import { createSupabaseNotificationRepository } from "@/src/alerts/supabaseNotificationRepository";
import type { NotificationRepository } from "@/src/alerts/repository";
import { createSupabaseSessionRepository } from "@/src/session/supabaseSessionRepository";
import type { SessionRepository } from "@/src/session/types";
import { createSupabaseUserRepository } from "@/src/users/supabaseUserRepository";
import type { UserRepository } from "@/src/users/types";
import { createWhatsAppMessenger } from "@/src/whatsapp/client";
import { loadConfig, type AppConfig } from "./config";
import { supabaseAdmin } from "./db";
import type { Messenger } from "./types";

/** Everything a request handler needs, wired once per process. */
export type AppServices = {
  sessions: SessionRepository;
  users: UserRepository;
  repo: NotificationRepository;
  messenger: Messenger;
  now: () => Date;
  config: AppConfig;
};

let _services: AppServices | null = null;

export function buildServices(): AppServices {
  if (_services) return _services;

  const config = loadConfig();
  const sb = supabaseAdmin();
  _services = {
    sessions: createSupabaseSessionRepository(sb),
    users: createSupabaseUserRepository(sb),
    repo: createSupabaseNotificationRepository(sb),
    messenger: createWhatsAppMessenger(config.whatsapp),
    now: () => new Date(),
    config,
  };
  return _services;
}
