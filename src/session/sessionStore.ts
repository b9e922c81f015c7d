import type { AppConfig } from "@/src/platform/config";
import { maskPhone } from "@/src/platform/phone";
import type { UserRepository } from "@/src/users/types";
import { flowTimeoutMinutes, IDLE_STEPS, initialStep, type FlowType } from "./flows";
import {
  readContext,
  readScratch,
  writeScratch,
  type Language,
  type ScratchByFlow,
  type SessionContext,
} from "./scratch";
import type { ConversationSession, SessionRepository, SessionState } from "./types";

export type SessionDeps = {
  sessions: SessionRepository;
  users: UserRepository;
  now: () => Date;
  config: Pick<AppConfig, "sessionTimeoutMinutes" | "sessionRetentionDays">;
};

const MAX_WRITE_ATTEMPTS = 5;

export class SessionConflictError extends Error {
  constructor(phone: string) {
    super(`Session for ${maskPhone(phone)} kept changing underneath the writer`);
    this.name = "SessionConflictError";
  }
}

function freshState(now: Date): SessionState {
  return {
    user_id: null,
    current_flow: "main_menu",
    current_step: "idle",
    temp_data: null,
    context_data: {},
    last_activity_at: now.toISOString(),
    last_message_id: null,
    last_message_type: null,
    language: "en",
  };
}

function stateOf(session: ConversationSession): SessionState {
  const { phone: _phone, version: _version, created_at: _createdAt, ...state } = session;
  return state;
}

// ---------------------------------------------------------------------------
// Pure transitions on a session record
// ---------------------------------------------------------------------------

export function isIdle(session: ConversationSession): boolean {
  return IDLE_STEPS.includes(session.current_step);
}

export function timeoutMinutes(session: ConversationSession, fallbackMinutes: number): number {
  return flowTimeoutMinutes(session.current_flow, fallbackMinutes);
}

export function isActive(session: ConversationSession, now: Date, fallbackMinutes: number): boolean {
  const idleMs = now.getTime() - Date.parse(session.last_activity_at);
  return idleMs < timeoutMinutes(session, fallbackMinutes) * 60_000;
}

export function touch(session: ConversationSession, now: Date): ConversationSession {
  return { ...session, last_activity_at: now.toISOString() };
}

/**
 * Moves to (flow, step). Entering a different flow drops the previous flow's
 * scratch data.
 */
export function advance(
  session: ConversationSession,
  flow: FlowType,
  step: string,
  now: Date
): ConversationSession {
  return {
    ...session,
    current_flow: flow,
    current_step: step,
    temp_data: flow === session.current_flow ? session.temp_data : null,
    last_activity_at: now.toISOString(),
  };
}

export function startFlow(session: ConversationSession, flow: FlowType, now: Date): ConversationSession {
  return { ...advance(session, flow, initialStep(flow), now), temp_data: null };
}

export function getScratch<F extends FlowType>(session: ConversationSession, flow: F): ScratchByFlow[F] {
  return readScratch(session.temp_data, flow);
}

export function setScratch<F extends FlowType>(
  session: ConversationSession,
  flow: F,
  patch: Partial<ScratchByFlow[F]>,
  now: Date
): ConversationSession {
  const data: ScratchByFlow[F] = { ...readScratch(session.temp_data, flow), ...patch };
  return {
    ...session,
    temp_data: writeScratch(flow, data),
    last_activity_at: now.toISOString(),
  };
}

export function reset(session: ConversationSession, now: Date): ConversationSession {
  return {
    ...session,
    current_flow: "main_menu",
    current_step: "idle",
    temp_data: null,
    last_activity_at: now.toISOString(),
  };
}

/** Reset plus context wipe. The user link survives; it is derived from the phone. */
export function restart(session: ConversationSession, now: Date): ConversationSession {
  return { ...reset(session, now), context_data: {}, language: "en" };
}

export function getContext(session: ConversationSession): SessionContext {
  return readContext(session.context_data);
}

export function updateContext(
  session: ConversationSession,
  patch: Partial<SessionContext>,
  now: Date
): ConversationSession {
  return {
    ...session,
    context_data: { ...getContext(session), ...patch },
    last_activity_at: now.toISOString(),
  };
}

export function setLanguage(session: ConversationSession, language: Language, now: Date): ConversationSession {
  return { ...updateContext(session, { language }, now), language };
}

export function recordMessage(
  session: ConversationSession,
  messageId: string,
  messageType: string,
  now: Date
): ConversationSession {
  return {
    ...session,
    last_message_id: messageId,
    last_message_type: messageType,
    last_activity_at: now.toISOString(),
  };
}

export type InboundRefresh = {
  session: ConversationSession;
  timedOut: boolean;
};

/**
 * Applied before any input is interpreted: a half-finished flow that went
 * quiet past its timeout is dropped back to the main menu, anything else is
 * just touched.
 */
export function refreshForInbound(
  session: ConversationSession,
  now: Date,
  fallbackMinutes: number
): InboundRefresh {
  if (!isActive(session, now, fallbackMinutes) && !isIdle(session)) {
    return { session: reset(session, now), timedOut: true };
  }
  return { session: touch(session, now), timedOut: false };
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

export async function getOrCreate(deps: SessionDeps, phone: string): Promise<ConversationSession> {
  const existing = await deps.sessions.findByPhone(phone);
  const session = existing ?? (await deps.sessions.insertIfAbsent(phone, freshState(deps.now())));

  if (session.user_id) return session;

  const user = await deps.users.findByPhone(phone);
  if (!user) return session;

  const linked = await deps.sessions.updateIfVersion(phone, session.version, {
    ...stateOf(session),
    user_id: user.id,
  });
  if (linked) {
    console.info("session_user_linked", { phone: maskPhone(phone), user_id: user.id });
  }
  return linked ?? (await deps.sessions.findByPhone(phone)) ?? session;
}

/**
 * Persists `next` if the stored row is still at `base.version`.
 * Returns null on a lost race.
 */
export async function save(
  deps: Pick<SessionDeps, "sessions">,
  base: ConversationSession,
  next: ConversationSession
): Promise<ConversationSession | null> {
  return deps.sessions.updateIfVersion(base.phone, base.version, stateOf(next));
}

export type SessionDecision<T> = {
  session: ConversationSession;
  result: T;
};

/**
 * Read-decide-write for one phone. `decide` must not have side effects: it
 * runs again on a fresh read whenever another writer committed first.
 */
export async function withSession<T>(
  deps: SessionDeps,
  phone: string,
  decide: (session: ConversationSession) => Promise<SessionDecision<T>> | SessionDecision<T>
): Promise<SessionDecision<T>> {
  for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
    const current = await getOrCreate(deps, phone);
    const decision = await decide(current);
    const saved = await save(deps, current, decision.session);
    if (saved) return { session: saved, result: decision.result };

    console.warn("session_write_conflict", { phone: maskPhone(phone), attempt });
  }
  throw new SessionConflictError(phone);
}

/**
 * Session for an inbound message, reset first when it timed out mid-flow.
 */
export async function getActiveOrReset(deps: SessionDeps, phone: string): Promise<ConversationSession> {
  const { session } = await withSession(deps, phone, (current) => {
    const refreshed = refreshForInbound(current, deps.now(), deps.config.sessionTimeoutMinutes);
    if (refreshed.timedOut) {
      console.info("session_timeout_reset", {
        phone: maskPhone(phone),
        flow: current.current_flow,
        step: current.current_step,
      });
    }
    return { session: refreshed.session, result: refreshed.timedOut };
  });
  return session;
}

export async function pruneSessions(deps: SessionDeps): Promise<{ sessions: number; claims: number }> {
  const cutoff = new Date(deps.now().getTime() - deps.config.sessionRetentionDays * 86_400_000).toISOString();
  const sessions = await deps.sessions.deleteInactiveBefore(cutoff);
  const claims = await deps.sessions.deleteClaimsBefore(cutoff);
  console.info("session_prune", { sessions, claims, cutoff });
  return { sessions, claims };
}
