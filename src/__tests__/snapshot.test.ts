import { describe, expect, it } from "vitest";
import { hasPosition, toSnapshot, toSnapshots } from "../snapshot.js";

const ts = 1_700_000_000_000;

describe("toSnapshot()", () => {
  it("maps a full dump1090 entry", () => {
    const snapshot = toSnapshot(
      {
        hex: "A6F2B7",
        flight: "N818TH  ",
        lat: 34.5,
        lon: -80.5,
        alt_baro: 35000,
        gs: 450.5,
        track: 270,
        baro_rate: -64,
        squawk: "1234",
      },
      ts
    );
    expect(snapshot).toEqual({
      id: "a6f2b7",
      timestamp: ts,
      lat: 34.5,
      lon: -80.5,
      altitude: 35000,
      groundSpeed: 450.5,
      track: 270,
      verticalRate: -64,
      squawk: "1234",
      callsign: "N818TH",
    });
  });

  it("leaves missing fields undefined instead of zero", () => {
    const snapshot = toSnapshot({ hex: "abc123" }, ts);
    expect(snapshot).toEqual({ id: "abc123", timestamp: ts });
    expect(snapshot && hasPosition(snapshot)).toBe(false);
  });

  it("drops entries without a hex", () => {
    expect(toSnapshot({ lat: 1, lon: 2 }, ts)).toBeNull();
    expect(toSnapshot({ hex: "   " }, ts)).toBeNull();
  });

  it("treats a half position or out-of-range coordinates as no position", () => {
    expect(toSnapshot({ hex: "abc123", lat: 10 }, ts)?.lat).toBeUndefined();
    expect(toSnapshot({ hex: "abc123", lat: 95, lon: 10 }, ts)?.lat).toBeUndefined();
  });

  it("maps ground altitude to 0 and flags it", () => {
    const snapshot = toSnapshot({ hex: "abc123", alt_baro: "ground" }, ts);
    expect(snapshot?.altitude).toBe(0);
    expect(snapshot?.onGround).toBe(true);
  });

  it("falls back to geometric rate and altitude", () => {
    const snapshot = toSnapshot({ hex: "abc123", alt_geom: 1200, geom_rate: -700 }, ts);
    expect(snapshot?.altitude).toBe(1200);
    expect(snapshot?.verticalRate).toBe(-700);
  });

  it("rejects malformed squawks and normalises track", () => {
    const snapshot = toSnapshot({ hex: "abc123", squawk: "78A0", track: -90 }, ts);
    expect(snapshot?.squawk).toBeUndefined();
    expect(snapshot?.track).toBe(270);
  });
});

describe("toSnapshots()", () => {
  it("keeps one snapshot per id", () => {
    const snapshots = toSnapshots([{ hex: "ABC123", gs: 100 }, { hex: "abc123", gs: 120 }, { hex: "def456" }], ts);
    expect(snapshots.map((s) => s.id)).toEqual(["abc123", "def456"]);
    expect(snapshots[0].groundSpeed).toBe(120);
  });
});
