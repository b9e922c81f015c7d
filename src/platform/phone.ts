export function maskPhone(phone: string): string {
  if (phone.length < 6) return phone;
  return `${phone.slice(0, 3)}****${phone.slice(-3)}`;
}

/** WhatsApp ids are digits only; strips "+", spaces and dashes. */
export function normalizePhone(raw: string): string {
  return raw.replace(/[^\d]/g, "");
}
