import { describe, expect, it } from "vitest";
import { describeAltitudeBand, withinAltitudeBand } from "../altitudeBand.js";

describe("withinAltitudeBand", () => {
  it("treats an unknown altitude as inside", () => {
    expect(withinAltitudeBand(undefined, { minAltitude: 1000, maxAltitude: 3000 })).toBe(true);
  });

  it("accepts any altitude when the band is open", () => {
    expect(withinAltitudeBand(0, {})).toBe(true);
    expect(withinAltitudeBand(45_000, { minAltitude: null, maxAltitude: null })).toBe(true);
  });

  describe("with both bounds", () => {
    const band = { minAltitude: 1000, maxAltitude: 5000 };

    it("includes both bounds", () => {
      expect(withinAltitudeBand(1000, band)).toBe(true);
      expect(withinAltitudeBand(5000, band)).toBe(true);
    });

    it("rejects altitudes outside", () => {
      expect(withinAltitudeBand(999, band)).toBe(false);
      expect(withinAltitudeBand(5001, band)).toBe(false);
    });
  });

  it("handles a ceiling only", () => {
    expect(withinAltitudeBand(0, { maxAltitude: 2500 })).toBe(true);
    expect(withinAltitudeBand(2501, { maxAltitude: 2500 })).toBe(false);
  });

  it("handles a floor of zero", () => {
    expect(withinAltitudeBand(0, { minAltitude: 0 })).toBe(true);
    expect(withinAltitudeBand(-100, { minAltitude: 0 })).toBe(false);
  });
});

describe("describeAltitudeBand", () => {
  it("formats each shape of band", () => {
    expect(describeAltitudeBand({ minAltitude: 1000, maxAltitude: 5000 })).toBe("1000-5000 ft");
    expect(describeAltitudeBand({ maxAltitude: 18_000 })).toBe("below 18000 ft");
    expect(describeAltitudeBand({ minAltitude: 500 })).toBe("above 500 ft");
    expect(describeAltitudeBand({})).toBe("all altitudes");
  });
});
