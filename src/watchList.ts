import fs from "fs";
import type { WatchLookup } from "./proximity.js";
import { normalizeHex } from "./snapshot.js";
import type { WatchEntry } from "./types.js";

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function toWatchEntry(raw: unknown, index: number): WatchEntry {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Watch-list entry #${index} is not an object`);
  }
  const { icao, id, hex, tail_number, tailNumber, owner, description, model, ...rest }: Record<string, unknown> = { ...raw };
  const key = optionalString(icao) ?? optionalString(id) ?? optionalString(hex);
  if (!key) {
    throw new Error(`Watch-list entry #${index} has no icao or id`);
  }
  return {
    ...rest,
    id: normalizeHex(key),
    tailNumber: optionalString(tailNumber) ?? optionalString(tail_number),
    owner: optionalString(owner),
    description: optionalString(description),
    model: optionalString(model),
  };
}

/** Accepts either a bare array or `{ "aircraft_to_detect": [...] }`. */
export function parseWatchList(data: unknown): WatchEntry[] {
  let list: unknown = data;
  if (typeof data === "object" && data !== null && !Array.isArray(data) && "aircraft_to_detect" in data) {
    list = data.aircraft_to_detect;
  }
  if (!Array.isArray(list)) {
    throw new Error("Watch-list must be an array or an object with an aircraft_to_detect array");
  }
  return list.map(toWatchEntry);
}

export class WatchList implements WatchLookup {
  private entries = new Map<string, WatchEntry>();
  private loadedAt = 0;

  constructor(private readonly filePath: string) {}

  /** Reads the file for the first time; throws if it is missing or invalid. */
  static load(filePath: string): WatchList {
    const list = new WatchList(filePath);
    list.reload();
    return list;
  }

  /**
   * Re-reads the file. On failure the current list stays in place and the
   * error is rethrown.
   */
  reload(now = Date.now()): number {
    let parsed: WatchEntry[];
    try {
      parsed = parseWatchList(JSON.parse(fs.readFileSync(this.filePath, "utf8")));
    } catch (err) {
      console.error(`[WATCHLIST] Failed to load ${this.filePath}:`, err);
      throw err;
    }

    this.entries = new Map(parsed.map((e) => [e.id, e]));
    this.loadedAt = now;
    console.log(`[WATCHLIST] Watching ${this.entries.size} aircraft from ${this.filePath}`);
    return this.entries.size;
  }

  get(id: string): WatchEntry | undefined {
    return this.entries.get(normalizeHex(id));
  }

  has(id: string): boolean {
    return this.entries.has(normalizeHex(id));
  }

  list(): WatchEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  get lastLoaded(): number {
    return this.loadedAt;
  }
}
