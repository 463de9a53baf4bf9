import { RingBuffer } from "./utils/ringBuffer.js";
import type { AircraftSnapshot } from "./types.js";

export interface TrackPoint {
  lat: number;
  lon: number;
  altitude?: number;
  track?: number;
  groundSpeed?: number;
  timestamp: number;
}

export interface TimedValue {
  value: number;
  timestamp: number;
}

export interface TrackStoreOptions {
  positionCapacity: number;
  sampleCapacity: number;
  labelCapacity: number;
}

export const DEFAULT_TRACK_STORE_OPTIONS: TrackStoreOptions = {
  positionCapacity: 200,
  sampleCapacity: 50,
  labelCapacity: 16,
};

/** Insertion-ordered set that forgets its oldest member past capacity. */
export class BoundedSet {
  private readonly items = new Set<string>();

  constructor(private readonly capacity: number) {}

  add(value: string): void {
    this.items.delete(value);
    this.items.add(value);
    if (this.items.size > this.capacity) {
      const oldest = this.items.values().next();
      if (!oldest.done) this.items.delete(oldest.value);
    }
  }

  has(value: string): boolean {
    return this.items.has(value);
  }

  values(): string[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.size;
  }
}

export class TrackRecord {
  readonly positions: RingBuffer<TrackPoint>;
  readonly altitudes: RingBuffer<TimedValue>;
  readonly speeds: RingBuffer<TimedValue>;
  readonly headings: RingBuffer<TimedValue>;
  readonly verticalRates: RingBuffer<TimedValue>;
  readonly callsigns: BoundedSet;
  readonly squawks: BoundedSet;
  readonly firstSeen: number;
  lastSeen: number;
  latest: AircraftSnapshot;

  constructor(readonly id: string, snapshot: AircraftSnapshot, options: TrackStoreOptions) {
    this.positions = new RingBuffer(options.positionCapacity);
    this.altitudes = new RingBuffer(options.sampleCapacity);
    this.speeds = new RingBuffer(options.sampleCapacity);
    this.headings = new RingBuffer(options.sampleCapacity);
    this.verticalRates = new RingBuffer(options.sampleCapacity);
    this.callsigns = new BoundedSet(options.labelCapacity);
    this.squawks = new BoundedSet(options.labelCapacity);
    this.firstSeen = snapshot.timestamp;
    this.lastSeen = snapshot.timestamp;
    this.latest = snapshot;
  }

  apply(snapshot: AircraftSnapshot): void {
    const { timestamp } = snapshot;

    if (snapshot.lat !== undefined && snapshot.lon !== undefined) {
      this.positions.push({
        lat: snapshot.lat,
        lon: snapshot.lon,
        altitude: snapshot.altitude,
        track: snapshot.track,
        groundSpeed: snapshot.groundSpeed,
        timestamp,
      });
    }
    if (snapshot.altitude !== undefined) this.altitudes.push({ value: snapshot.altitude, timestamp });
    if (snapshot.groundSpeed !== undefined) this.speeds.push({ value: snapshot.groundSpeed, timestamp });
    if (snapshot.track !== undefined) this.headings.push({ value: snapshot.track, timestamp });
    if (snapshot.verticalRate !== undefined) this.verticalRates.push({ value: snapshot.verticalRate, timestamp });
    if (snapshot.callsign) this.callsigns.add(snapshot.callsign);
    if (snapshot.squawk) this.squawks.add(snapshot.squawk);

    this.lastSeen = Math.max(this.lastSeen, timestamp);
    this.latest = snapshot;
  }
}

/**
 * Rolling per-aircraft history. Memory per aircraft is capped by the ring
 * capacities; aircraft disappear only through evictStale().
 */
export class TrackStore {
  private readonly records = new Map<string, TrackRecord>();
  private readonly options: TrackStoreOptions;

  constructor(options: Partial<TrackStoreOptions> = {}) {
    this.options = { ...DEFAULT_TRACK_STORE_OPTIONS, ...options };
  }

  update(snapshot: AircraftSnapshot): TrackRecord {
    let record = this.records.get(snapshot.id);
    if (!record) {
      record = new TrackRecord(snapshot.id, snapshot, this.options);
      this.records.set(snapshot.id, record);
    }
    record.apply(snapshot);
    return record;
  }

  /** Drops every track last seen before `now - stalenessMs`; returns their ids. */
  evictStale(now: number, stalenessMs: number): string[] {
    const cutoff = now - stalenessMs;
    const evicted: string[] = [];
    for (const [id, record] of this.records) {
      if (record.lastSeen < cutoff) {
        this.records.delete(id);
        evicted.push(id);
      }
    }
    return evicted;
  }

  /** Most recent `n` positions for an aircraft, oldest first. */
  window(id: string, n: number): TrackPoint[] {
    return this.records.get(id)?.positions.lastN(n) ?? [];
  }

  get(id: string): TrackRecord | undefined {
    return this.records.get(id);
  }

  tracks(): TrackRecord[] {
    return [...this.records.values()];
  }

  clear(): void {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }
}
