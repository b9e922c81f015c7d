import { DateTime } from "luxon";
import { formatDistance } from "@/src/geo/distance";
import type { Alert, AlertBatch, AlertEvent } from "./types";

const KIND_HEADLINE: Record<AlertEvent["kind"], string> = {
  new_catch: "🐟 Fresh catch nearby",
  new_offer: "🏷️ New offer nearby",
  job_match: "🧰 New job nearby",
};

function priceLine(event: AlertEvent): string | null {
  if (event.price === null) return null;
  return event.kind === "new_catch" ? `₹${event.price}/kg` : `₹${event.price}`;
}

export function renderAlertText(event: AlertEvent, alert: Pick<Alert, "id" | "distance_km">): string {
  const lines = [
    `${KIND_HEADLINE[event.kind]}!`,
    `*${event.title}* from ${event.source_name}`,
    [priceLine(event), `${formatDistance(alert.distance_km)} away`].filter(Boolean).join(" · "),
  ];
  if (event.details) lines.push(event.details);
  lines.push("", `Reply "coming ${alert.id}" to let them know, or "msg ${alert.id}" to ask a question.`);
  return lines.join("\n");
}

export type DigestItem = {
  event: AlertEvent;
  distanceKm: number;
};

const DIGEST_TITLE: Record<AlertBatch["frequency"], string> = {
  morning_only: "☀️ Your morning catch digest",
  twice_daily: "🐟 Your catch update",
  weekly_digest: "📅 Your weekly catch digest",
};

export function renderDigestText(
  batch: Pick<AlertBatch, "frequency">,
  items: DigestItem[],
  zone: string
): string {
  const lines = [`${DIGEST_TITLE[batch.frequency]} (${items.length})`, ""];
  items.forEach(({ event, distanceKm }, index) => {
    const posted = DateTime.fromISO(event.created_at, { zone }).toFormat("HH:mm");
    const detail = [priceLine(event), formatDistance(distanceKm), posted].filter(Boolean).join(" · ");
    lines.push(`${index + 1}. *${event.title}* from ${event.source_name}`, `   ${detail}`);
  });
  lines.push("", "Reply MENU to manage your alerts.");
  return lines.join("\n");
}
