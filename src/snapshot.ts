import { normalizeHeading } from "./geo.js";
import type { AircraftSnapshot, Dump1090Aircraft, PositionedSnapshot } from "./types.js";

function asFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
}

export function normalizeHex(hex: string): string {
  return hex.trim().toLowerCase();
}

/**
 * Turns one raw feed entry into a snapshot. Fields the feed omitted or sent
 * garbage for are left undefined; nothing is defaulted to zero.
 * Returns null when the entry has no usable hex.
 */
export function toSnapshot(raw: Dump1090Aircraft, timestamp: number): AircraftSnapshot | null {
  const hex = asString(raw.hex);
  if (!hex) return null;

  const snapshot: AircraftSnapshot = { id: normalizeHex(hex), timestamp };

  const lat = asFiniteNumber(raw.lat);
  const lon = asFiniteNumber(raw.lon);
  if (lat !== undefined && lon !== undefined && Math.abs(lat) <= 90 && Math.abs(lon) <= 180) {
    snapshot.lat = lat;
    snapshot.lon = lon;
  }

  if (raw.alt_baro === "ground") {
    snapshot.altitude = 0;
    snapshot.onGround = true;
  } else {
    const altitude = asFiniteNumber(raw.alt_baro) ?? asFiniteNumber(raw.alt_geom);
    if (altitude !== undefined) snapshot.altitude = altitude;
  }

  const gs = asFiniteNumber(raw.gs);
  if (gs !== undefined && gs >= 0) snapshot.groundSpeed = gs;

  const track = asFiniteNumber(raw.track);
  if (track !== undefined) snapshot.track = normalizeHeading(track);

  const verticalRate = asFiniteNumber(raw.baro_rate) ?? asFiniteNumber(raw.geom_rate);
  if (verticalRate !== undefined) snapshot.verticalRate = verticalRate;

  const squawk = asString(raw.squawk);
  if (squawk && /^[0-7]{4}$/.test(squawk)) snapshot.squawk = squawk;

  const callsign = asString(raw.flight);
  if (callsign) snapshot.callsign = callsign;

  return snapshot;
}

/**
 * Normalises a whole poll. Duplicate hexes keep the last entry so every id
 * appears once per cycle.
 */
export function toSnapshots(aircraft: Dump1090Aircraft[], timestamp: number): AircraftSnapshot[] {
  const byId = new Map<string, AircraftSnapshot>();
  for (const raw of aircraft) {
    const snapshot = toSnapshot(raw, timestamp);
    if (snapshot) byId.set(snapshot.id, snapshot);
  }
  return [...byId.values()];
}

export function hasPosition(snapshot: AircraftSnapshot): snapshot is PositionedSnapshot {
  return snapshot.lat !== undefined && snapshot.lon !== undefined;
}
