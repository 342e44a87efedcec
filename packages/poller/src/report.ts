import type { SeismicEvent } from "@quakewatch/types";

interface SummaryInput {
  batch: readonly SeismicEvent[];
  regionMatches: readonly string[];
  regionLabel: string;
  placeFilter: string | null;
}

export function renderSummary({
  batch,
  regionMatches,
  regionLabel,
  placeFilter,
}: SummaryInput): string[] {
  const lines: string[] = [];

  if (placeFilter) {
    lines.push("Nearby shaker(s):");
    for (const event of batch) {
      if (event.place.includes(placeFilter)) {
        lines.push(event.place);
      }
    }
  }

  lines.push(`Filter for ${regionLabel}`);
  lines.push(...regionMatches);
  return lines;
}
