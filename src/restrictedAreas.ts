import fs from "fs";
import { distanceMiles, insidePolygon } from "./geo.js";
import { hasPosition } from "./snapshot.js";
import type { AircraftSnapshot } from "./types.js";
import { withinAltitudeBand } from "./utils/altitudeBand.js";
import type { AltitudeBand } from "./utils/altitudeBand.js";

interface CircleArea extends AltitudeBand {
  kind: "circle";
  name: string;
  lat: number;
  lon: number;
  radiusMiles: number;
}

interface PolygonArea extends AltitudeBand {
  kind: "polygon";
  name: string;
  polygon: [number, number][]; // [lat, lon] pairs
}

export type RestrictedArea = CircleArea | PolygonArea;

function optionalNumber(value: unknown, field: string, name: string): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Restricted area "${name}": ${field} must be a number`);
  }
  return value;
}

function isLatLonPair(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "number" &&
    typeof value[1] === "number"
  );
}

/** Validates one raw entry from the areas file. */
export function parseRestrictedArea(raw: unknown, index: number): RestrictedArea {
  if (typeof raw !== "object" || raw === null) {
    throw new Error(`Restricted area #${index} is not an object`);
  }
  const entry: Record<string, unknown> = { ...raw };
  const name = typeof entry.name === "string" && entry.name.trim() ? entry.name.trim() : `area-${index}`;
  const band: AltitudeBand = {
    minAltitude: optionalNumber(entry.minAltitude, "minAltitude", name),
    maxAltitude: optionalNumber(entry.maxAltitude, "maxAltitude", name),
  };

  if (Array.isArray(entry.polygon)) {
    const polygon = entry.polygon.filter(isLatLonPair);
    if (polygon.length < 3 || polygon.length !== entry.polygon.length) {
      throw new Error(`Restricted area "${name}": polygon needs at least three [lat, lon] pairs`);
    }
    return { kind: "polygon", name, polygon, ...band };
  }

  const { lat, lon, radiusMiles } = entry;
  if (typeof lat === "number" && typeof lon === "number" && typeof radiusMiles === "number" && radiusMiles > 0) {
    return { kind: "circle", name, lat, lon, radiusMiles, ...band };
  }
  throw new Error(`Restricted area "${name}": needs either a polygon or lat, lon and a positive radiusMiles`);
}

/**
 * Loads restricted areas from a JSON array. A missing file means no areas;
 * a malformed one throws so the problem surfaces at startup.
 */
export function loadRestrictedAreas(filePath: string): RestrictedArea[] {
  if (!fs.existsSync(filePath)) {
    console.warn(`[AREAS] ${filePath} not found, restricted-area checks disabled`);
    return [];
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain an array of restricted areas`);
  }
  const areas = parsed.map((raw, i) => parseRestrictedArea(raw, i));
  console.log(`[AREAS] Loaded ${areas.length} restricted areas from ${filePath}`);
  return areas;
}

export function containsPosition(area: RestrictedArea, lat: number, lon: number): boolean {
  if (area.kind === "circle") {
    return distanceMiles(area.lat, area.lon, lat, lon) <= area.radiusMiles;
  }
  return insidePolygon(lat, lon, area.polygon);
}

/** First area the aircraft is inside, horizontally and vertically. */
export function findRestrictedArea(snapshot: AircraftSnapshot, areas: RestrictedArea[]): RestrictedArea | null {
  if (!hasPosition(snapshot)) return null;
  for (const area of areas) {
    if (containsPosition(area, snapshot.lat, snapshot.lon) && withinAltitudeBand(snapshot.altitude, area)) {
      return area;
    }
  }
  return null;
}
