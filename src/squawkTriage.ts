import type { AirportLookup } from "./airports.js";
import { hasPosition } from "./snapshot.js";
import type { AircraftSnapshot, EmergencyCode } from "./types.js";

export const EMERGENCY_CODES: Record<EmergencyCode, string> = {
  "7500": "Hijacking",
  "7600": "Radio failure",
  "7700": "General emergency",
  "7777": "Military intercept",
};

export interface SquawkTriageOptions {
  airportRadiusMiles: number;
  maxApproachAltitudeFt: number;
  minApproachSpeedKt: number;
  maxApproachSpeedKt: number;
  /** Used only when no airport check is possible. */
  fallbackAltitudeFt: number;
  fallbackVerticalRateFpm: number;
}

export const DEFAULT_SQUAWK_TRIAGE_OPTIONS: SquawkTriageOptions = {
  airportRadiusMiles: 10,
  maxApproachAltitudeFt: 10_000,
  minApproachSpeedKt: 80,
  maxApproachSpeedKt: 300,
  fallbackAltitudeFt: 5_000,
  fallbackVerticalRateFpm: -500,
};

export type SquawkVerdict =
  | { verdict: "none" }
  | { verdict: "genuine"; code: EmergencyCode; description: string }
  | { verdict: "suppressed"; code: EmergencyCode; reason: string };

export function isEmergencyCode(squawk: string | undefined): squawk is EmergencyCode {
  return squawk !== undefined && Object.prototype.hasOwnProperty.call(EMERGENCY_CODES, squawk);
}

/**
 * Decides whether an emergency squawk deserves an alert. Only 7600 is ever
 * suppressed: a radio-failure code on a normal-looking approach is usually a
 * crew setting the code for landing, not an emergency.
 */
export function triageSquawk(
  snapshot: AircraftSnapshot,
  airports: AirportLookup | null,
  options: SquawkTriageOptions = DEFAULT_SQUAWK_TRIAGE_OPTIONS
): SquawkVerdict {
  const { squawk } = snapshot;
  if (!isEmergencyCode(squawk)) return { verdict: "none" };

  const genuine: SquawkVerdict = { verdict: "genuine", code: squawk, description: EMERGENCY_CODES[squawk] };
  if (squawk !== "7600") return genuine;

  const { altitude, verticalRate, groundSpeed } = snapshot;
  if (verticalRate === undefined || verticalRate >= 0) return genuine;
  if (altitude === undefined || altitude > options.maxApproachAltitudeFt) return genuine;
  if (
    groundSpeed !== undefined &&
    (groundSpeed < options.minApproachSpeedKt || groundSpeed > options.maxApproachSpeedKt)
  ) {
    return genuine;
  }

  if (hasPosition(snapshot) && airports) {
    const nearest = airports.nearest(snapshot.lat, snapshot.lon);
    if (nearest && nearest.distanceMiles <= options.airportRadiusMiles) {
      return {
        verdict: "suppressed",
        code: squawk,
        reason: `descending at ${altitude} ft, ${nearest.distanceMiles.toFixed(1)} mi from ${nearest.airport.icao}`,
      };
    }
    return genuine;
  }

  if (altitude < options.fallbackAltitudeFt && verticalRate < options.fallbackVerticalRateFpm) {
    return {
      verdict: "suppressed",
      code: squawk,
      reason: `low and descending (${altitude} ft, ${verticalRate} ft/min) with no airport check available`,
    };
  }
  return genuine;
}
