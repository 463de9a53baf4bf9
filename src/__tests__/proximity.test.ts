import { beforeEach, describe, expect, it, vi } from "vitest";
import { ProximityTracker } from "../proximity.js";
import type { AircraftSnapshot, FlybyAlert, WatchEntry } from "../types.js";

const home = { lat: 35, lon: -80 };
const t0 = 1_700_000_000_000;
const POLL = 15_000;
const MILES_PER_DEGREE = (3959 * Math.PI) / 180;

const watched: WatchEntry = { id: "a6f2b7", tailNumber: "N818TH", description: "Falcon 900" };
const watchList = new Map<string, WatchEntry>([[watched.id, watched]]);

// Due north of home, so the great-circle distance is exactly `miles`.
function at(id: string, miles: number, timestamp: number): AircraftSnapshot {
  return { id, timestamp, lat: home.lat + miles / MILES_PER_DEGREE, lon: home.lon, altitude: 5000 };
}

function pass(tracker: ProximityTracker, distances: number[]): FlybyAlert[] {
  const alerts: FlybyAlert[] = [];
  distances.forEach((d, i) => alerts.push(...tracker.observe([at(watched.id, d, t0 + i * POLL)], t0 + i * POLL)));
  return alerts;
}

describe("ProximityTracker", () => {
  let tracker: ProximityTracker;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    tracker = new ProximityTracker(home, watchList);
  });

  it("alerts once at the closest approach after the aircraft leaves", () => {
    expect(pass(tracker, [50, 30, 10, 25, 40])).toEqual([]);

    const alerts = tracker.observe([], t0 + 5 * POLL);
    expect(alerts).toHaveLength(1);
    expect(alerts[0].outcome).toBe("approached_and_departed");
    expect(alerts[0].closestDistance).toBeCloseTo(10, 6);
    expect(alerts[0].closestSnapshot.timestamp).toBe(t0 + 2 * POLL);
    expect(alerts[0].samples).toBe(5);
    expect(alerts[0].firstSeen).toBe(t0);
    expect(alerts[0].watch).toBe(watched);
    expect(tracker.flybys()).toEqual([]);
  });

  it("keeps closestDistance equal to the minimum distance seen", () => {
    const distances = [40, 35, 37, 12, 12.5, 8, 30];
    distances.forEach((d, i) => {
      tracker.observe([at(watched.id, d, t0 + i * POLL)], t0 + i * POLL);
      const record = tracker.get(watched.id);
      expect(record?.closestDistance).toBe(Math.min(...(record?.distances ?? [])));
    });
  });

  it("alerts a single sighting at its only distance", () => {
    tracker.observe([at(watched.id, 50, t0)], t0);
    const alerts = tracker.observe([], t0 + POLL);
    expect(alerts).toHaveLength(1);
    expect(alerts[0].outcome).toBe("single_sighting");
    expect(alerts[0].closestDistance).toBeCloseTo(50, 6);
  });

  it("tags a pass that only closed in as approached", () => {
    pass(tracker, [30, 20, 15]);
    expect(tracker.observe([], t0 + 3 * POLL)[0].outcome).toBe("approached");
  });

  it("tags an aircraft first seen at its closest and moving away as departed", () => {
    pass(tracker, [5, 6, 7]);
    expect(tracker.observe([], t0 + 3 * POLL)[0].outcome).toBe("departed");
  });

  it("drops a pass with no approach or departure trend", () => {
    pass(tracker, [10, 20, 15]);
    expect(tracker.observe([], t0 + 3 * POLL)).toEqual([]);
    expect(tracker.get(watched.id)).toBeUndefined();
  });

  it("still alerts a trendless pass that came within the close-approach radius", () => {
    pass(tracker, [1.5, 3, 2.5]);
    expect(tracker.observe([], t0 + 3 * POLL)[0].outcome).toBe("close_approach");
  });

  it("does not treat an aircraft that lost its position as departed", () => {
    pass(tracker, [20, 10]);
    const positionless: AircraftSnapshot = { id: watched.id, timestamp: t0 + 2 * POLL, altitude: 4000 };
    expect(tracker.observe([positionless], t0 + 2 * POLL)).toEqual([]);
    expect(tracker.get(watched.id)?.distances).toHaveLength(2);
  });

  it("forces an alert when a visible aircraft outlives the timeout", () => {
    tracker = new ProximityTracker(home, watchList, { timeoutMs: 60_000 });
    tracker.observe([at(watched.id, 8, t0)], t0);
    tracker.observe([at(watched.id, 4, t0 + 30_000)], t0 + 30_000);
    expect(tracker.observe([at(watched.id, 6, t0 + 60_000)], t0 + 60_000)).toEqual([]);

    const alerts = tracker.observe([at(watched.id, 7, t0 + 75_000)], t0 + 75_000);
    expect(alerts).toHaveLength(1);
    expect(alerts[0].outcome).toBe("timed_out");
    expect(alerts[0].closestDistance).toBeCloseTo(4, 6);
    expect(tracker.get(watched.id)).toBeUndefined();
  });

  it("ignores aircraft that are not on the watch-list", () => {
    tracker.observe([at("ffffff", 1, t0)], t0);
    expect(tracker.flybys()).toEqual([]);
    expect(tracker.observe([], t0 + POLL)).toEqual([]);
  });
});
