import type { Dump1090Aircraft } from "./types.js";

export interface AircraftSource {
  fetchAircraft(): Promise<Dump1090Aircraft[]>;
}

/** Reads the receiver's aircraft.json over HTTP. */
export class HttpAircraftSource implements AircraftSource {
  constructor(private readonly url: string, private readonly timeoutMs = 10_000) {}

  async fetchAircraft(): Promise<Dump1090Aircraft[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(this.url, {
        headers: { "Cache-Control": "no-cache" },
        signal: controller.signal,
      });

      if (!res.ok) {
        throw new Error(`Failed to fetch aircraft data: ${res.status}`);
      }

      const data: unknown = await res.json();
      if (typeof data !== "object" || data === null || !("aircraft" in data) || !Array.isArray(data.aircraft)) {
        throw new Error("Feed response has no aircraft array");
      }
      return data.aircraft.filter((a): a is Dump1090Aircraft => typeof a === "object" && a !== null);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
