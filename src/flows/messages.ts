import type { AlertFrequency } from "@/src/alerts/types";
import type { Language } from "@/src/session/scratch";
import catalogue from "./messages.json";

export type MessageKey = keyof (typeof catalogue)["en"];

/**
 * Localised reply text. `{name}` placeholders are filled from `vars`; a
 * placeholder without a value is left as written.
 */
export function t(language: Language, key: MessageKey, vars: Record<string, string | number> = {}): string {
  const template = catalogue[language][key];
  return template.replace(/\{(\w+)\}/g, (whole, name: string) => {
    const value = vars[name];
    return value === undefined ? whole : String(value);
  });
}

const FREQUENCY_KEYS: Record<AlertFrequency, MessageKey> = {
  immediate: "freq_immediate",
  morning_only: "freq_morning_only",
  twice_daily: "freq_twice_daily",
  weekly_digest: "freq_weekly_digest",
};

export function frequencyLabel(language: Language, frequency: AlertFrequency): string {
  return t(language, FREQUENCY_KEYS[frequency]);
}
