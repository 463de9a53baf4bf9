import type { AnomalyKind, Severity } from "./types.js";

export interface DedupOptions {
  trackedCooldownMs: number;
  anomalyCooldownMs: number;
  maxAnomaliesPerHour: number;
  /** LOW severity anomalies stop once an aircraft has fired this many in the window. */
  lowSeverityHourlyLimit: number;
  rateWindowMs: number;
}

export const DEFAULT_DEDUP_OPTIONS: DedupOptions = {
  trackedCooldownMs: 24 * 3600_000,
  anomalyCooldownMs: 3600_000,
  maxAnomaliesPerHour: 5,
  lowSeverityHourlyLimit: 3,
  rateWindowMs: 3600_000,
};

export interface CooldownEntry {
  key: string;
  lastFired: number;
  cooldownMs: number;
}

export type AdmitResult = { admitted: true } | { admitted: false; reason: string };

const ADMITTED: AdmitResult = { admitted: true };

export function trackedKey(id: string): string {
  return `tracked:${id}`;
}

export function anomalyKey(id: string, kind: AnomalyKind): string {
  return `anomaly:${id}:${kind}`;
}

/**
 * Decides whether a candidate alert may fire. All state lives in memory;
 * entries() and restore() let the caller persist it across restarts.
 */
export class AlertDeduplicator {
  private readonly cooldowns = new Map<string, CooldownEntry>();
  // Per-aircraft anomaly fire times inside the rolling window.
  private readonly fires = new Map<string, number[]>();
  readonly options: DedupOptions;

  constructor(options: Partial<DedupOptions> = {}) {
    this.options = { ...DEFAULT_DEDUP_OPTIONS, ...options };
  }

  admitTracked(id: string, now: number): AdmitResult {
    return this.admitKey(trackedKey(id), this.options.trackedCooldownMs, now);
  }

  admitAnomaly(id: string, kind: AnomalyKind, severity: Severity, now: number): AdmitResult {
    const key = anomalyKey(id, kind);
    const blocked = this.cooldownRemaining(key, now);
    if (blocked > 0) {
      return { admitted: false, reason: `${kind} cooldown, ${Math.ceil(blocked / 60_000)} min left` };
    }

    const recent = this.recentFires(id, now);
    if (recent.length >= this.options.maxAnomaliesPerHour) {
      return { admitted: false, reason: `hourly cap of ${this.options.maxAnomaliesPerHour} reached` };
    }
    if (severity === "LOW" && recent.length >= this.options.lowSeverityHourlyLimit) {
      return { admitted: false, reason: `low severity suppressed after ${recent.length} alerts this hour` };
    }

    this.cooldowns.set(key, { key, lastFired: now, cooldownMs: this.options.anomalyCooldownMs });
    recent.push(now);
    this.fires.set(id, recent);
    return ADMITTED;
  }

  /** Generic single-key cooldown, used for feed health alerts. */
  admitKey(key: string, cooldownMs: number, now: number): AdmitResult {
    const blocked = this.cooldownRemaining(key, now);
    if (blocked > 0) {
      return { admitted: false, reason: `cooldown, ${Math.ceil(blocked / 60_000)} min left` };
    }
    this.cooldowns.set(key, { key, lastFired: now, cooldownMs });
    return ADMITTED;
  }

  /** Drops expired cooldowns and fire times outside the rate window. Returns the number of cooldowns removed. */
  purge(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.cooldowns) {
      if (now - entry.lastFired >= entry.cooldownMs) {
        this.cooldowns.delete(key);
        removed++;
      }
    }
    for (const id of [...this.fires.keys()]) {
      const recent = this.recentFires(id, now);
      if (recent.length === 0) this.fires.delete(id);
      else this.fires.set(id, recent);
    }
    return removed;
  }

  entries(): CooldownEntry[] {
    return [...this.cooldowns.values()].map((e) => ({ ...e }));
  }

  /**
   * Loads persisted cooldowns. The hourly anomaly count is rebuilt from the
   * anomaly cooldowns, so it is exact while each kind fires at most once
   * per window.
   */
  restore(entries: CooldownEntry[], now: number): void {
    for (const entry of entries) {
      if (now - entry.lastFired >= entry.cooldownMs) continue;
      this.cooldowns.set(entry.key, { ...entry });

      const match = /^anomaly:([^:]+):/.exec(entry.key);
      if (match && now - entry.lastFired < this.options.rateWindowMs) {
        const times = this.fires.get(match[1]) ?? [];
        times.push(entry.lastFired);
        this.fires.set(match[1], times.sort((a, b) => a - b));
      }
    }
  }

  get size(): number {
    return this.cooldowns.size;
  }

  private cooldownRemaining(key: string, now: number): number {
    const entry = this.cooldowns.get(key);
    if (!entry) return 0;
    return Math.max(0, entry.lastFired + entry.cooldownMs - now);
  }

  private recentFires(id: string, now: number): number[] {
    return (this.fires.get(id) ?? []).filter((t) => now - t < this.options.rateWindowMs);
  }
}
