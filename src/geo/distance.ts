export type Coordinates = {
  latitude: number;
  longitude: number;
};

export const EARTH_RADIUS_KM = 6371;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Great-circle distance in kilometres (Haversine).
 */
export function haversineKm(a: Coordinates, b: Coordinates): number {
  const latDiff = toRadians(b.latitude - a.latitude);
  const lngDiff = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(latDiff / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(lngDiff / 2) ** 2;

  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

export function isValidCoordinates(value: Coordinates): boolean {
  return (
    Number.isFinite(value.latitude) &&
    Number.isFinite(value.longitude) &&
    Math.abs(value.latitude) <= 90 &&
    Math.abs(value.longitude) <= 180
  );
}

/** "9.9312, 76.2673" -> coordinates, or null when the text is not a lat,lng pair. */
export function parseCoordinates(text: string): Coordinates | null {
  const match = text.trim().match(/^(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)$/);
  if (!match) return null;
  const coords = { latitude: Number.parseFloat(match[1]), longitude: Number.parseFloat(match[2]) };
  return isValidCoordinates(coords) ? coords : null;
}

export function formatDistance(km: number): string {
  if (km < 1) return `${Math.round(km * 1000)}m`;
  return `${(Math.round(km * 10) / 10).toFixed(1)} km`;
}
