import { distanceMiles } from "./geo.js";
import type { LatLon } from "./geo.js";
import { hasPosition } from "./snapshot.js";
import type { AircraftSnapshot, FlybyAlert, FlybyOutcome, PositionedSnapshot, WatchEntry } from "./types.js";

export interface ProximityOptions {
  /** Force an alert for aircraft still in range after this long. */
  timeoutMs: number;
  /** How many trailing distances must be strictly increasing to count as departing. */
  trailingWindow: number;
  /** A closest approach at or under this distance always alerts. */
  closeApproachMiles: number;
}

export const DEFAULT_PROXIMITY_OPTIONS: ProximityOptions = {
  timeoutMs: 30 * 60_000,
  trailingWindow: 3,
  closeApproachMiles: 2,
};

export interface FlybyRecord {
  id: string;
  firstSeen: number;
  lastSeen: number;
  distances: number[];
  closestDistance: number;
  closestSnapshot: PositionedSnapshot;
  watch: WatchEntry;
}

export interface WatchLookup {
  get(id: string): WatchEntry | undefined;
}

/**
 * Follows each watched aircraft from first sighting until it leaves the feed
 * or times out, and reports the pass once at its closest approach.
 */
export class ProximityTracker {
  private readonly records = new Map<string, FlybyRecord>();
  private readonly options: ProximityOptions;

  constructor(
    private readonly home: LatLon,
    private readonly watchList: WatchLookup,
    options: Partial<ProximityOptions> = {}
  ) {
    this.options = { ...DEFAULT_PROXIMITY_OPTIONS, ...options };
  }

  /**
   * Feed one poll cycle. `snapshots` must be the complete set for the cycle:
   * any tracked aircraft missing from it is treated as having left.
   */
  observe(snapshots: AircraftSnapshot[], now: number): FlybyAlert[] {
    const alerts: FlybyAlert[] = [];
    const seen = new Set<string>();

    for (const snapshot of snapshots) {
      seen.add(snapshot.id);
      if (!hasPosition(snapshot)) continue;

      const watch = this.watchList.get(snapshot.id);
      if (!watch) continue;

      this.record(snapshot, watch);
    }

    for (const [id, record] of this.records) {
      if (seen.has(id)) {
        if (now - record.firstSeen > this.options.timeoutMs) {
          this.records.delete(id);
          console.log(
            `[FLYBY] ${id} still in range after ${Math.round((now - record.firstSeen) / 60_000)} min, alerting at ${record.closestDistance.toFixed(1)} mi`
          );
          alerts.push(this.toAlert(record, "timed_out", now));
        }
        continue;
      }

      this.records.delete(id);
      const outcome = this.departureOutcome(record);
      if (outcome) {
        console.log(`[FLYBY] ${id} left the feed (${outcome}), closest ${record.closestDistance.toFixed(1)} mi`);
        alerts.push(this.toAlert(record, outcome, now));
      } else {
        console.log(
          `[FLYBY] ${id} left the feed without a clear approach (${record.distances.map((d) => d.toFixed(1)).join(", ")} mi), dropped`
        );
      }
    }

    return alerts;
  }

  flybys(): FlybyRecord[] {
    return [...this.records.values()];
  }

  get(id: string): FlybyRecord | undefined {
    return this.records.get(id);
  }

  reset(): void {
    this.records.clear();
  }

  private record(snapshot: PositionedSnapshot, watch: WatchEntry): void {
    const distance = distanceMiles(this.home.lat, this.home.lon, snapshot.lat, snapshot.lon);
    const existing = this.records.get(snapshot.id);

    if (!existing) {
      this.records.set(snapshot.id, {
        id: snapshot.id,
        firstSeen: snapshot.timestamp,
        lastSeen: snapshot.timestamp,
        distances: [distance],
        closestDistance: distance,
        closestSnapshot: snapshot,
        watch,
      });
      console.log(`[FLYBY] Tracking ${snapshot.id} (${watch.description ?? watch.tailNumber ?? "watched"}) at ${distance.toFixed(1)} mi`);
      return;
    }

    existing.distances.push(distance);
    existing.lastSeen = snapshot.timestamp;
    existing.watch = watch;
    if (distance < existing.closestDistance) {
      existing.closestDistance = distance;
      existing.closestSnapshot = snapshot;
    }
  }

  private departureOutcome(record: FlybyRecord): FlybyOutcome | null {
    const { distances, closestDistance } = record;
    if (distances.length < 2) return "single_sighting";

    const approached = closestDistance < distances[0];
    const departed = isIncreasing(distances.slice(-this.options.trailingWindow));

    if (approached && departed) return "approached_and_departed";
    if (approached) return "approached";
    if (departed) return "departed";
    if (closestDistance <= this.options.closeApproachMiles) return "close_approach";
    return null;
  }

  private toAlert(record: FlybyRecord, outcome: FlybyOutcome, now: number): FlybyAlert {
    return {
      id: record.id,
      outcome,
      closestDistance: record.closestDistance,
      closestSnapshot: record.closestSnapshot,
      samples: record.distances.length,
      firstSeen: record.firstSeen,
      endedAt: now,
      watch: record.watch,
    };
  }
}

function isIncreasing(values: number[]): boolean {
  if (values.length < 2) return false;
  for (let i = 1; i < values.length; i++) {
    if (values[i] <= values[i - 1]) return false;
  }
  return true;
}
