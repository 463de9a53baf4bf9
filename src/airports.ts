import fs from "fs";
import { distanceMiles } from "./geo.js";

export interface Airport {
  icao: string;
  name: string;
  lat: number;
  lon: number;
  type?: string;
}

export interface NearestAirport {
  airport: Airport;
  distanceMiles: number;
}

export interface AirportLookup {
  nearest(lat: number, lon: number): NearestAirport | null;
  isNear(lat: number, lon: number, radiusMiles: number): boolean;
}

function isAirport(value: unknown): value is Airport {
  if (typeof value !== "object" || value === null) return false;
  if (!("icao" in value && "name" in value && "lat" in value && "lon" in value)) return false;
  const { icao, name, lat, lon } = value;
  return (
    typeof icao === "string" &&
    typeof name === "string" &&
    typeof lat === "number" &&
    typeof lon === "number" &&
    Math.abs(lat) <= 90 &&
    Math.abs(lon) <= 180
  );
}

export class AirportDirectory implements AirportLookup {
  constructor(private readonly airports: Airport[]) {}

  /**
   * Reads an airport list from disk. Returns null (and warns) when the file
   * is missing or malformed so callers fall back to the no-airport rule.
   */
  static load(filePath: string): AirportDirectory | null {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (!Array.isArray(parsed)) {
        throw new Error("expected an array of airports");
      }
      const airports = parsed.filter(isAirport);
      if (airports.length < parsed.length) {
        console.warn(`[AIRPORTS] Skipped ${parsed.length - airports.length} malformed entries in ${filePath}`);
      }
      console.log(`[AIRPORTS] Loaded ${airports.length} airports from ${filePath}`);
      return new AirportDirectory(airports);
    } catch (err) {
      console.warn(`[AIRPORTS] Could not load ${filePath}, emergency triage will use the altitude fallback:`, err);
      return null;
    }
  }

  nearest(lat: number, lon: number): NearestAirport | null {
    let best: NearestAirport | null = null;
    for (const airport of this.airports) {
      const d = distanceMiles(lat, lon, airport.lat, airport.lon);
      if (!best || d < best.distanceMiles) {
        best = { airport, distanceMiles: d };
      }
    }
    return best;
  }

  isNear(lat: number, lon: number, radiusMiles: number): boolean {
    return this.airports.some((a) => distanceMiles(lat, lon, a.lat, a.lon) <= radiusMiles);
  }

  get size(): number {
    return this.airports.length;
  }
}
