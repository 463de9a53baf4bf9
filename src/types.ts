/** Raw aircraft object delivered by a dump1090 or readsb feed */
export interface Dump1090Aircraft {
  hex?: unknown; // 24‑bit ICAO identifier, "~" prefix for non-ICAO addresses
  flight?: unknown; // Callsign, space padded
  lat?: unknown;
  lon?: unknown;
  alt_baro?: unknown; // Barometric altitude in feet, or "ground"
  alt_geom?: unknown;
  gs?: unknown; // Ground speed in knots
  track?: unknown; // Track angle in degrees
  baro_rate?: unknown; // ft/min
  geom_rate?: unknown;
  squawk?: unknown;
  category?: unknown;
  seen?: unknown;
  seen_pos?: unknown;
}

/** One poll cycle's reported state for one aircraft. */
export interface AircraftSnapshot {
  id: string; // lower-case hex
  timestamp: number; // epoch ms of the poll
  lat?: number;
  lon?: number;
  altitude?: number; // ft, 0 when reported on the ground
  onGround?: boolean;
  groundSpeed?: number; // kt
  track?: number; // deg, [0, 360)
  verticalRate?: number; // ft/min
  squawk?: string;
  callsign?: string;
}

export type PositionedSnapshot = AircraftSnapshot & { lat: number; lon: number };

export type Severity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export type AnomalyKind =
  | "emergency-squawk"
  | "circling"
  | "search-pattern"
  | "loitering"
  | "formation"
  | "restricted-area";

export type PatternType = "circling_left" | "circling_right" | "search_pattern";

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

export interface FlightPattern {
  type: PatternType;
  confidence: number; // 0..1
  centerLat: number;
  centerLon: number;
  radiusMiles: number;
  durationMinutes: number;
  turnRate: number; // deg/min
  description: string;
  riskLevel: RiskLevel;
}

export type EmergencyCode = "7500" | "7600" | "7700" | "7777";

export interface Anomaly {
  kind: AnomalyKind;
  severity: Severity;
  snapshot: AircraftSnapshot;
  reason: string;
  timestamp: number;
  pattern?: FlightPattern;
  squawk?: EmergencyCode;
  relatedIds?: string[];
  areaName?: string;
}

/** Watch-list entry; everything except the id is free-form metadata. */
export interface WatchEntry {
  id: string;
  tailNumber?: string;
  owner?: string;
  description?: string;
  model?: string;
  [key: string]: unknown;
}

export type FlybyOutcome =
  | "approached_and_departed"
  | "approached"
  | "departed"
  | "single_sighting"
  | "close_approach"
  | "timed_out";

export interface FlybyAlert {
  id: string;
  outcome: FlybyOutcome;
  closestDistance: number; // miles
  closestSnapshot: PositionedSnapshot;
  samples: number;
  firstSeen: number;
  endedAt: number;
  watch: WatchEntry;
}

export type AlertType = "tracked" | "anomaly" | "health";

/** What notification sinks receive. */
export interface AlertPayload {
  type: AlertType;
  key: string;
  message: string;
  severity: Severity;
  aircraft?: {
    hex: string;
    callsign?: string;
    altitude?: number;
    speed?: number;
    track?: number;
    squawk?: string;
    lat?: number;
    lon?: number;
  };
  distance_miles?: number;
  outcome?: FlybyOutcome;
  anomaly?: {
    kind: AnomalyKind;
    reason: string;
    pattern?: FlightPattern;
    squawk?: EmergencyCode;
    related?: string[];
    area?: string;
  };
  watch?: WatchEntry;
  recipients: string[];
  triggered_at: string;
}
