/** Vertical limits of an area in feet; a missing bound is open. */
export interface AltitudeBand {
  minAltitude?: number | null;
  maxAltitude?: number | null;
}

/**
 * Whether an altitude falls inside a band, bounds inclusive.
 * Aircraft with no altitude report are treated as inside.
 */
export function withinAltitudeBand(altitude: number | undefined, band: AltitudeBand): boolean {
  if (altitude === undefined) {
    return true;
  }
  if (band.minAltitude != null && altitude < band.minAltitude) {
    return false;
  }
  if (band.maxAltitude != null && altitude > band.maxAltitude) {
    return false;
  }
  return true;
}

/** Human-readable band, e.g. "1000-5000 ft", "below 18000 ft" or "all altitudes". */
export function describeAltitudeBand(band: AltitudeBand): string {
  const { minAltitude, maxAltitude } = band;
  if (minAltitude != null && maxAltitude != null) return `${minAltitude}-${maxAltitude} ft`;
  if (maxAltitude != null) return `below ${maxAltitude} ft`;
  if (minAltitude != null) return `above ${minAltitude} ft`;
  return "all altitudes";
}
