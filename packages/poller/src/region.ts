import type { SeismicEvent } from "@quakewatch/types";

export interface BoundingBox {
  label: string;
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
}

// 7°N to 83°N, 52.5°W to 167°W
export const NORTH_AMERICA: BoundingBox = {
  label: "North America",
  minLatitude: 7.0,
  maxLatitude: 83.0,
  minLongitude: -167.0,
  maxLongitude: -52.5,
};

export class RegionFilter {
  constructor(private readonly box: BoundingBox = NORTH_AMERICA) {}

  get label(): string {
    return this.box.label;
  }

  isInRegion(event: Pick<SeismicEvent, "latitude" | "longitude">): boolean {
    const { latitude, longitude } = event;
    return (
      latitude >= this.box.minLatitude &&
      latitude <= this.box.maxLatitude &&
      longitude >= this.box.minLongitude &&
      longitude <= this.box.maxLongitude
    );
  }
}
