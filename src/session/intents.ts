/**
 * Global commands recognised at any step, before the active flow sees the
 * input.
 */
export type GlobalIntent = "menu" | "cancel" | "help" | "restart" | "none";

const KEYWORDS: Record<Exclude<GlobalIntent, "none">, readonly string[]> = {
  menu: ["menu", "home", "main", "0", "hi", "hello", "start", "reset"],
  cancel: ["cancel", "exit", "quit", "stop", "end"],
  help: ["help", "?", "support"],
  restart: ["restart"],
};

const GREETINGS: readonly string[] = ["hi", "hello", "start"];

export function detectIntent(text: string | null | undefined): GlobalIntent {
  const normalized = (text ?? "").trim().toLowerCase();
  if (!normalized) return "none";

  for (const intent of ["menu", "cancel", "help", "restart"] as const) {
    if (KEYWORDS[intent].includes(normalized)) return intent;
  }
  return "none";
}

/** Menu words that also open a conversation, answered with the welcome. */
export function isGreeting(text: string | null | undefined): boolean {
  return GREETINGS.includes((text ?? "").trim().toLowerCase());
}
