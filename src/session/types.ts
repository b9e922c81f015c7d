import type { Language } from "./scratch";
import type { FlowType } from "./flows";

export type ConversationSession = {
  phone: string;
  user_id: string | null;
  current_flow: FlowType;
  current_step: string;
  temp_data: unknown; // ScratchEnvelope once written, read through readScratch()
  context_data: unknown; // read through readContext()
  last_activity_at: string; // ISO
  last_message_id: string | null;
  last_message_type: string | null;
  language: Language;
  version: number;
  created_at: string;
};

/** Fields a transition may change; phone, version and created_at are owned by the store. */
export type SessionState = Omit<ConversationSession, "phone" | "version" | "created_at">;

export interface SessionRepository {
  findByPhone(phone: string): Promise<ConversationSession | null>;
  /** Inserts the row unless one exists for the phone; returns the stored row either way. */
  insertIfAbsent(phone: string, state: SessionState): Promise<ConversationSession>;
  /** Compare-and-set on version. Returns null when another writer got there first. */
  updateIfVersion(phone: string, version: number, state: SessionState): Promise<ConversationSession | null>;
  deleteInactiveBefore(cutoff: string): Promise<number>;
  /** Records an inbound message id once. False when it was already claimed. */
  claimMessage(messageId: string, phone: string, at: string): Promise<boolean>;
  /** Gives a claim back so a redelivery of a message that failed is processed again. */
  releaseMessage(messageId: string): Promise<void>;
  deleteClaimsBefore(cutoff: string): Promise<number>;
}
