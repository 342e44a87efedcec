import type { Feature, FingerprintMode, SeismicEvent } from "@quakewatch/types";

export function createEvent(fields: SeismicEvent): SeismicEvent {
  return Object.freeze({ ...fields });
}

export function eventFromFeature(feature: Feature): SeismicEvent {
  const [longitude, latitude, depth] = feature.geometry.coordinates;
  return createEvent({
    magnitude: feature.properties.mag,
    place: feature.properties.place,
    occurredAt: feature.properties.time,
    latitude,
    longitude,
    depth,
    feedId: feature.id ?? null,
  });
}

/**
 * Display line for an event, e.g.
 * `2026-10-18T04:12:09.120Z: Magnitude 5.3 at 12 km SW of Ocotillo, CA (32.6001, -116.1022)`.
 * Whole seconds render without a fraction.
 */
export function renderEvent(event: SeismicEvent): string {
  const time = new Date(event.occurredAt).toISOString().replace(".000Z", "Z");
  return `${time}: Magnitude ${toFixedHalfUp(event.magnitude, 1)} at ${event.place} (${toFixedHalfUp(event.latitude, 4)}, ${toFixedHalfUp(event.longitude, 4)})`;
}

/**
 * Rounds the shortest decimal form of `value` half away from zero, so 5.35
 * gives "5.4" where `toFixed` gives "5.3".
 */
export function toFixedHalfUp(value: number, digits: number): string {
  const decimal = String(Math.abs(value));
  if (!Number.isFinite(value) || decimal.includes("e")) {
    return value.toFixed(digits);
  }
  const shifted = Math.round(Number(`${decimal}e${digits}`));
  const rounded = Number(`${shifted}e-${digits}`).toFixed(digits);
  return value < 0 ? `-${rounded}` : rounded;
}

export type Fingerprinter = (event: SeismicEvent, rendered: string) => string;

// Rendered fingerprints collide for distinct events that round to the same
// line; "feed-id" avoids that when the payload carries feature ids.
export function createFingerprinter(mode: FingerprintMode): Fingerprinter {
  if (mode === "feed-id") {
    return (event, rendered) => (event.feedId ? `id:${event.feedId}` : rendered);
  }
  return (_event, rendered) => rendered;
}
