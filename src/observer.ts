import { buildAnomalyPayload, buildHealthPayload, buildTrackedPayload } from "./alertEngine.js";
import type { AlertEngine, RecipientMap } from "./alertEngine.js";
import type { AlertStore } from "./alertHelpers.js";
import { AlertDeduplicator } from "./alertDeduplicator.js";
import type { DedupOptions } from "./alertDeduplicator.js";
import type { AnomalyDetector } from "./anomalyDetector.js";
import type { AircraftSource } from "./feedClient.js";
import type { LatLon } from "./geo.js";
import { ProximityTracker } from "./proximity.js";
import type { ProximityOptions, WatchLookup } from "./proximity.js";
import { hasPosition, toSnapshots } from "./snapshot.js";
import { TrackStore } from "./trackStore.js";
import type { Dump1090Aircraft } from "./types.js";

export interface ObserverDeps {
  source: AircraftSource;
  engine: AlertEngine;
  watchList: WatchLookup;
  detector: AnomalyDetector;
  store?: AlertStore | null;
  onCycle?: (summary: CycleSummary) => void;
}

export interface ObserverOptions {
  home: LatLon;
  pollMs: number;
  failureBackoffMs: number;
  stalenessMs: number;
  outageAlertAfterFailures: number;
  healthCooldownMs: number;
  housekeepingMs: number;
  historyRetentionMs: number;
  recipients: RecipientMap;
  alertsEnabled: { tracked: boolean; anomaly: boolean };
  /** Send a health notice when polling starts. */
  announceStart: boolean;
  startNoticeCooldownMs: number;
  /** Interval between "still running" notices; 0 turns them off. */
  aliveIntervalMs: number;
  proximity: Partial<ProximityOptions>;
  dedup: Partial<DedupOptions>;
}

export const DEFAULT_OBSERVER_OPTIONS: Omit<ObserverOptions, "home"> = {
  pollMs: 15_000,
  failureBackoffMs: 30_000,
  stalenessMs: 60_000,
  outageAlertAfterFailures: 20,
  healthCooldownMs: 6 * 3600_000,
  housekeepingMs: 5 * 60_000,
  historyRetentionMs: 30 * 24 * 3600_000,
  recipients: { tracked: [], anomaly: [], health: [] },
  alertsEnabled: { tracked: true, anomaly: true },
  announceStart: true,
  startNoticeCooldownMs: 15 * 60_000,
  aliveIntervalMs: 0,
  proximity: {},
  dedup: {},
};

export interface CycleSummary {
  timestamp: number;
  aircraft: number;
  positioned: number;
  evicted: number;
  flybys: number;
  anomalies: number;
  suppressed: number;
  dispatched: number;
}

export interface ObserverStatus {
  running: boolean;
  lastPoll: number | null;
  lastSuccess: number | null;
  consecutiveFailures: number;
  lastError: string | null;
  aircraft: number;
  activeFlybys: number;
  cooldowns: number;
}

/**
 * Owns all per-aircraft state and drives one poll cycle at a time:
 * fetch, update tracks, detect, deduplicate and hand alerts to the engine.
 */
export class Observer {
  readonly tracks = new TrackStore();
  readonly proximity: ProximityTracker;
  readonly dedup: AlertDeduplicator;
  private readonly options: ObserverOptions;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private lastPoll: number | null = null;
  private lastSuccess: number | null = null;
  private lastError: string | null = null;
  private consecutiveFailures = 0;
  private lastHousekeeping = 0;
  private firstCycleAt: number | null = null;

  constructor(private readonly deps: ObserverDeps, options: Partial<ObserverOptions> & { home: LatLon }) {
    this.options = { ...DEFAULT_OBSERVER_OPTIONS, ...options };
    this.proximity = new ProximityTracker(this.options.home, deps.watchList, this.options.proximity);
    this.dedup = new AlertDeduplicator(this.options.dedup);

    if (deps.store) {
      const now = Date.now();
      this.dedup.restore(deps.store.loadCooldowns(), now);
      console.log(`[POLLER] Restored ${this.dedup.size} alert cooldowns`);
    }
  }

  /** Processes one poll's worth of raw aircraft. Alerts are dispatched, not awaited. */
  runCycle(raw: Dump1090Aircraft[], now: number): CycleSummary {
    const { engine, detector } = this.deps;
    const { recipients, alertsEnabled } = this.options;
    if (this.firstCycleAt === null) this.firstCycleAt = now;
    const snapshots = toSnapshots(raw, now);

    // Evict first so an aircraft returning after a gap starts a fresh track.
    const evicted = this.tracks.evictStale(now, this.options.stalenessMs);
    for (const snapshot of snapshots) {
      this.tracks.update(snapshot);
    }

    let suppressed = 0;
    let dispatched = 0;

    const flybys = this.proximity.observe(snapshots, now);
    for (const flyby of alertsEnabled.tracked ? flybys : []) {
      const admit = this.dedup.admitTracked(flyby.id, now);
      if (!admit.admitted) {
        console.log(`[FLYBY] ${flyby.id} pass not alerted: ${admit.reason}`);
        suppressed++;
        continue;
      }
      engine.dispatch(buildTrackedPayload(flyby, recipients.tracked, now), now);
      dispatched++;
    }

    let anomalies = 0;
    for (const snapshot of alertsEnabled.anomaly ? snapshots : []) {
      const track = this.tracks.get(snapshot.id);
      if (!track) continue;

      for (const anomaly of detector.analyze(track, this.tracks, now)) {
        anomalies++;
        const admit = this.dedup.admitAnomaly(snapshot.id, anomaly.kind, anomaly.severity, now);
        if (!admit.admitted) {
          suppressed++;
          continue;
        }
        console.log(`[ANOMALY] ${snapshot.id} ${anomaly.kind} (${anomaly.severity}): ${anomaly.reason}`);
        engine.dispatch(buildAnomalyPayload(anomaly, recipients.anomaly), now);
        dispatched++;
      }
    }

    if (now - this.lastHousekeeping >= this.options.housekeepingMs) {
      this.housekeeping(now);
    }
    if (this.sendAliveNotice(snapshots.length, now)) dispatched++;

    const summary: CycleSummary = {
      timestamp: now,
      aircraft: snapshots.length,
      positioned: snapshots.filter(hasPosition).length,
      evicted: evicted.length,
      flybys: flybys.length,
      anomalies,
      suppressed,
      dispatched,
    };
    this.deps.onCycle?.(summary);
    return summary;
  }

  /** Fetches and processes one cycle. Never rejects; returns whether the fetch succeeded. */
  async pollOnce(now = Date.now()): Promise<boolean> {
    this.lastPoll = now;
    let raw: Dump1090Aircraft[];
    try {
      raw = await this.deps.source.fetchAircraft();
    } catch (err) {
      this.recordFailure(err, now);
      return false;
    }

    if (this.consecutiveFailures > 0) {
      console.log(`[POLLER] Feed recovered after ${this.consecutiveFailures} failed polls`);
    }
    this.consecutiveFailures = 0;
    this.lastError = null;
    this.lastSuccess = now;

    try {
      this.runCycle(raw, now);
    } catch (err) {
      console.error("[POLLER] Cycle processing failed:", err);
    }
    return true;
  }

  /** Polls immediately, then every `pollMs`; failures wait `failureBackoffMs`. */
  start(): void {
    if (this.running) return;
    this.running = true;
    console.log(`[POLLER] Starting, polling every ${this.options.pollMs / 1000}s`);
    if (this.options.announceStart) this.sendStartNotice(Date.now());
    this.schedule(0);
  }

  /** Stops scheduling, waits for the cycle in flight, then persists state and drains alerts. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.persistCooldowns();
    await this.deps.engine.flush();
    console.log("[POLLER] Stopped");
  }

  housekeeping(now: number): void {
    this.lastHousekeeping = now;
    const purged = this.dedup.purge(now);
    if (purged > 0) {
      console.log(`[POLLER] Purged ${purged} expired cooldowns`);
    }
    this.persistCooldowns();

    const { store } = this.deps;
    if (store) {
      try {
        const pruned = store.pruneHistory(now - this.options.historyRetentionMs);
        if (pruned > 0) console.log(`[POLLER] Pruned ${pruned} old alerts`);
      } catch (err) {
        console.error("[POLLER] Failed to prune alert history:", err);
      }
    }
  }

  status(): ObserverStatus {
    return {
      running: this.running,
      lastPoll: this.lastPoll,
      lastSuccess: this.lastSuccess,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError,
      aircraft: this.tracks.size,
      activeFlybys: this.proximity.flybys().length,
      cooldowns: this.dedup.size,
    };
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      const cycle = this.tick();
      this.inFlight = cycle;
      void cycle.finally(() => {
        if (this.inFlight === cycle) this.inFlight = null;
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    const ok = await this.pollOnce();
    if (this.running) {
      this.schedule(ok ? this.options.pollMs : this.options.failureBackoffMs);
    }
  }

  private recordFailure(err: unknown, now: number): void {
    this.consecutiveFailures++;
    this.lastError = err instanceof Error ? err.message : String(err);
    console.error(`[POLLER] Feed poll failed (${this.consecutiveFailures} in a row):`, this.lastError);

    if (this.consecutiveFailures < this.options.outageAlertAfterFailures) return;
    const admit = this.dedup.admitKey("health:feed", this.options.healthCooldownMs, now);
    if (!admit.admitted) return;

    const message = `Aircraft feed unreachable for ${this.consecutiveFailures} consecutive polls (${this.lastError})`;
    this.deps.engine.dispatch(buildHealthPayload(message, this.options.recipients.health, now), now);
  }

  private sendStartNotice(now: number): void {
    const admit = this.dedup.admitKey("health:start", this.options.startNoticeCooldownMs, now);
    if (!admit.admitted) {
      console.log(`[POLLER] Start notice skipped: ${admit.reason}`);
      return;
    }
    const message = `Aircraft monitoring started, polling every ${this.options.pollMs / 1000}s`;
    this.deps.engine.dispatch(buildHealthPayload(message, this.options.recipients.health, now, "health:start", "LOW"), now);
  }

  private sendAliveNotice(aircraft: number, now: number): boolean {
    const { aliveIntervalMs } = this.options;
    if (aliveIntervalMs <= 0 || this.firstCycleAt === null || now - this.firstCycleAt < aliveIntervalMs) return false;
    if (!this.dedup.admitKey("health:alive", aliveIntervalMs, now).admitted) return false;

    const hours = Math.floor((now - this.firstCycleAt) / 3600_000);
    const message = `Aircraft monitoring alive for ${hours} h, ${aircraft} aircraft in view, ${this.proximity.flybys().length} flybys open`;
    this.deps.engine.dispatch(buildHealthPayload(message, this.options.recipients.health, now, "health:alive", "LOW"), now);
    return true;
  }

  private persistCooldowns(): void {
    const { store } = this.deps;
    if (!store) return;
    try {
      store.saveCooldowns(this.dedup.entries());
    } catch (err) {
      console.error("[POLLER] Failed to save cooldowns:", err);
    }
  }
}
