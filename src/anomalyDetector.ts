import type { AirportLookup } from "./airports.js";
import { centroid, distanceMiles } from "./geo.js";
import { classifyCircling, classifySearchPattern, DEFAULT_PATTERN_OPTIONS } from "./patternClassifier.js";
import type { PatternOptions } from "./patternClassifier.js";
import { findRestrictedArea } from "./restrictedAreas.js";
import type { RestrictedArea } from "./restrictedAreas.js";
import { DEFAULT_SQUAWK_TRIAGE_OPTIONS, triageSquawk } from "./squawkTriage.js";
import type { SquawkTriageOptions } from "./squawkTriage.js";
import type { TrackRecord, TrackStore } from "./trackStore.js";
import type { Anomaly, FlightPattern, Severity } from "./types.js";
import { describeAltitudeBand } from "./utils/altitudeBand.js";

export interface DetectorToggles {
  emergency: boolean;
  patterns: boolean;
  loitering: boolean;
  formation: boolean;
  restrictedAreas: boolean;
}

export interface AnomalyDetectorOptions {
  enabled: DetectorToggles;
  /** Positions handed to the pattern classifier. */
  patternWindow: number;
  loiterMs: number;
  loiterRadiusMiles: number;
  formationDistanceMiles: number;
  formationAltitudeFt: number;
  /** Another aircraft's position older than this is not used for formation checks. */
  formationFreshnessMs: number;
  pattern: PatternOptions;
  triage: SquawkTriageOptions;
}

export const DEFAULT_ANOMALY_OPTIONS: AnomalyDetectorOptions = {
  enabled: { emergency: true, patterns: true, loitering: true, formation: true, restrictedAreas: true },
  patternWindow: 50,
  loiterMs: 30 * 60_000,
  loiterRadiusMiles: 5,
  formationDistanceMiles: 2,
  formationAltitudeFt: 1000,
  formationFreshnessMs: 60_000,
  pattern: DEFAULT_PATTERN_OPTIONS,
  triage: DEFAULT_SQUAWK_TRIAGE_OPTIONS,
};

export interface AnomalyDetectorDeps {
  airports: AirportLookup | null;
  restrictedAreas: RestrictedArea[];
}

export class AnomalyDetector {
  readonly options: AnomalyDetectorOptions;

  constructor(private readonly deps: AnomalyDetectorDeps, options: Partial<AnomalyDetectorOptions> = {}) {
    this.options = {
      ...DEFAULT_ANOMALY_OPTIONS,
      ...options,
      enabled: { ...DEFAULT_ANOMALY_OPTIONS.enabled, ...options.enabled },
    };
  }

  /**
   * Runs every enabled detector against one aircraft's current state.
   * `store` supplies the other live tracks for formation checks.
   */
  analyze(track: TrackRecord, store: TrackStore, now: number): Anomaly[] {
    const { enabled } = this.options;
    const found: Anomaly[] = [];

    if (enabled.emergency) this.checkEmergency(track, now, found);
    if (enabled.patterns) this.checkPatterns(track, now, found);
    if (enabled.loitering) this.checkLoitering(track, now, found);
    if (enabled.formation) this.checkFormation(track, store, now, found);
    if (enabled.restrictedAreas) this.checkRestrictedAreas(track, now, found);

    return found;
  }

  private checkEmergency(track: TrackRecord, now: number, found: Anomaly[]): void {
    const snapshot = track.latest;
    const result = triageSquawk(snapshot, this.deps.airports, this.options.triage);
    if (result.verdict === "suppressed") {
      console.log(`[ANOMALY] ${track.id} squawking ${result.code} looks like a routine approach (${result.reason}), not alerting`);
      return;
    }
    if (result.verdict !== "genuine") return;

    found.push({
      kind: "emergency-squawk",
      severity: "CRITICAL",
      snapshot,
      reason: `Squawking ${result.code} (${result.description})`,
      timestamp: now,
      squawk: result.code,
    });
  }

  private checkPatterns(track: TrackRecord, now: number, found: Anomaly[]): void {
    const window = track.positions.lastN(this.options.patternWindow);
    const circling = classifyCircling(window, this.options.pattern);
    if (circling) found.push(this.patternAnomaly("circling", circling, track, now));
    const search = classifySearchPattern(window, this.options.pattern);
    if (search) found.push(this.patternAnomaly("search-pattern", search, track, now));
  }

  private patternAnomaly(
    kind: "circling" | "search-pattern",
    pattern: FlightPattern,
    track: TrackRecord,
    now: number
  ): Anomaly {
    const severity: Severity = kind === "search-pattern" ? "LOW" : pattern.riskLevel;
    return {
      kind,
      severity,
      snapshot: track.latest,
      reason: `${pattern.description} (confidence ${Math.round(pattern.confidence * 100)}%)`,
      timestamp: now,
      pattern,
    };
  }

  private checkLoitering(track: TrackRecord, now: number, found: Anomaly[]): void {
    if (track.latest.onGround) return;
    const positions = track.positions.toArray();
    const first = positions[0];
    const last = positions[positions.length - 1];
    if (!first || !last || last.timestamp - first.timestamp < this.options.loiterMs) return;

    const center = centroid(positions);
    const farthest = Math.max(...positions.map((p) => distanceMiles(center.lat, center.lon, p.lat, p.lon)));
    if (farthest > this.options.loiterRadiusMiles) return;

    const minutes = Math.round((last.timestamp - first.timestamp) / 60_000);
    found.push({
      kind: "loitering",
      severity: "MEDIUM",
      snapshot: track.latest,
      reason: `Loitering for ${minutes} min within ${farthest.toFixed(1)} mi of one spot`,
      timestamp: now,
    });
  }

  private checkFormation(track: TrackRecord, store: TrackStore, now: number, found: Anomaly[]): void {
    const { formationDistanceMiles, formationAltitudeFt, formationFreshnessMs } = this.options;
    const own = track.positions.last();
    if (!own || own.altitude === undefined || track.latest.onGround) return;
    if (now - own.timestamp >= formationFreshnessMs) return;

    const partners: string[] = [];
    let closest = Infinity;

    for (const other of store.tracks()) {
      if (other.id === track.id || other.latest.onGround) continue;
      const theirs = other.positions.last();
      if (!theirs || theirs.altitude === undefined) continue;
      if (now - theirs.timestamp >= formationFreshnessMs) continue;

      const d = distanceMiles(own.lat, own.lon, theirs.lat, theirs.lon);
      if (d < formationDistanceMiles && Math.abs(own.altitude - theirs.altitude) < formationAltitudeFt) {
        partners.push(other.id);
        closest = Math.min(closest, d);
      }
    }

    if (partners.length === 0) return;
    found.push({
      kind: "formation",
      severity: "LOW",
      snapshot: track.latest,
      reason: `Flying with ${partners.join(", ")} (closest ${closest.toFixed(2)} mi)`,
      timestamp: now,
      relatedIds: partners,
    });
  }

  private checkRestrictedAreas(track: TrackRecord, now: number, found: Anomaly[]): void {
    const area = findRestrictedArea(track.latest, this.deps.restrictedAreas);
    if (!area) return;
    found.push({
      kind: "restricted-area",
      severity: "HIGH",
      snapshot: track.latest,
      reason: `Inside restricted area ${area.name} (${describeAltitudeBand(area)})`,
      timestamp: now,
      areaName: area.name,
    });
  }
}
