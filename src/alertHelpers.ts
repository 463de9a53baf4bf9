import type { CooldownEntry } from "./alertDeduplicator.js";
import type { Db } from "./db.js";
import type { AlertPayload, AlertType, Severity } from "./types.js";

interface AlertHistoryRow {
  id: number;
  alert_type: AlertType;
  alert_key: string;
  aircraft_hex: string | null;
  severity: Severity;
  triggered_at: number;
  payload: string;
  delivered: number;
}

interface CooldownRow {
  key: string;
  last_fired: number;
  cooldown_ms: number;
}

export interface AlertHistoryEntry {
  id: number;
  type: AlertType;
  key: string;
  hex: string | null;
  severity: Severity;
  triggeredAt: number;
  delivered: boolean;
  payload: unknown;
}

export interface AlertHistoryQuery {
  since?: number;
  hex?: string;
  type?: AlertType;
  limit?: number;
}

/** What the alert engine and observer need from storage. */
export interface AlertStore {
  recordAlert(payload: AlertPayload, now: number): number;
  markDelivered(id: number): void;
  getAlertHistory(query?: AlertHistoryQuery): AlertHistoryEntry[];
  saveCooldowns(entries: CooldownEntry[]): void;
  loadCooldowns(): CooldownEntry[];
  pruneHistory(before: number): number;
}

function toEntry(row: AlertHistoryRow): AlertHistoryEntry {
  return {
    id: row.id,
    type: row.alert_type,
    key: row.alert_key,
    hex: row.aircraft_hex,
    severity: row.severity,
    triggeredAt: row.triggered_at,
    delivered: row.delivered === 1,
    payload: JSON.parse(row.payload),
  };
}

export class SqliteAlertStore implements AlertStore {
  private readonly insertAlert;
  private readonly setDelivered;
  private readonly deleteOlderThan;
  private readonly selectCooldowns;
  private readonly replaceCooldowns;

  constructor(private readonly db: Db) {
    this.insertAlert = db.prepare<{
      alert_type: AlertType;
      alert_key: string;
      aircraft_hex: string | null;
      severity: Severity;
      triggered_at: number;
      payload: string;
    }>(
      `INSERT INTO alert_history (alert_type, alert_key, aircraft_hex, severity, triggered_at, payload)
       VALUES (@alert_type, @alert_key, @aircraft_hex, @severity, @triggered_at, @payload)`
    );
    this.setDelivered = db.prepare<[number]>(`UPDATE alert_history SET delivered = 1 WHERE id = ?`);
    this.deleteOlderThan = db.prepare<[number]>(`DELETE FROM alert_history WHERE triggered_at < ?`);
    this.selectCooldowns = db.prepare<[], CooldownRow>(`SELECT key, last_fired, cooldown_ms FROM cooldowns`);

    const clear = db.prepare(`DELETE FROM cooldowns`);
    const insert = db.prepare<[string, number, number]>(
      `INSERT INTO cooldowns (key, last_fired, cooldown_ms) VALUES (?, ?, ?)`
    );
    this.replaceCooldowns = db.transaction((entries: CooldownEntry[]) => {
      clear.run();
      for (const e of entries) insert.run(e.key, e.lastFired, e.cooldownMs);
    });
  }

  recordAlert(payload: AlertPayload, now: number): number {
    const result = this.insertAlert.run({
      alert_type: payload.type,
      alert_key: payload.key,
      aircraft_hex: payload.aircraft?.hex ?? null,
      severity: payload.severity,
      triggered_at: now,
      payload: JSON.stringify(payload),
    });
    return Number(result.lastInsertRowid);
  }

  markDelivered(id: number): void {
    this.setDelivered.run(id);
  }

  getAlertHistory(query: AlertHistoryQuery = {}): AlertHistoryEntry[] {
    const where: string[] = [];
    const params: Record<string, string | number> = { limit: query.limit ?? 100 };

    if (query.since !== undefined) {
      where.push("triggered_at >= @since");
      params.since = query.since;
    }
    if (query.hex) {
      where.push("aircraft_hex = @hex");
      params.hex = query.hex.toLowerCase();
    }
    if (query.type) {
      where.push("alert_type = @type");
      params.type = query.type;
    }

    const sql = `
      SELECT * FROM alert_history
      ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
      ORDER BY triggered_at DESC, id DESC
      LIMIT @limit
    `;
    return this.db.prepare<Record<string, string | number>, AlertHistoryRow>(sql).all(params).map(toEntry);
  }

  saveCooldowns(entries: CooldownEntry[]): void {
    this.replaceCooldowns(entries);
  }

  loadCooldowns(): CooldownEntry[] {
    return this.selectCooldowns.all().map((row) => ({
      key: row.key,
      lastFired: row.last_fired,
      cooldownMs: row.cooldown_ms,
    }));
  }

  pruneHistory(before: number): number {
    return this.deleteOlderThan.run(before).changes;
  }
}
