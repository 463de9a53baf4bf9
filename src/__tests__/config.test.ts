import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";

const base = { HOME_LAT: "35.2", HOME_LON: "-80.8" };

describe("loadConfig()", () => {
  it("applies defaults around the required home position", () => {
    const config = loadConfig(base);
    expect(config.home).toEqual({ lat: 35.2, lon: -80.8 });
    expect(config.pollMs).toBe(15_000);
    expect(config.failureBackoffMs).toBe(30_000);
    expect(config.fetchTimeoutMs).toBe(10_000);
    expect(config.stalenessMs).toBe(60_000);
    expect(config.dbPath).toBe("data/tracker.db");
    expect(config.dedup.trackedCooldownMs).toBe(86_400_000);
    expect(config.proximity).toEqual({ timeoutMs: 1_800_000, trailingWindow: 3, closeApproachMiles: 2 });
    expect(config.webhookUrls).toEqual([]);
    expect(Object.values(config.detectors).every(Boolean)).toBe(true);
    expect(config.alertsEnabled).toEqual({ tracked: true, anomaly: true });
    expect(config.announceStart).toBe(true);
    expect(config.aliveIntervalMs).toBe(0);
  });

  it("requires the home position", () => {
    expect(() => loadConfig({ HOME_LAT: "35.2" })).toThrow("Missing required environment variable HOME_LON");
  });

  it("rejects coordinates out of range", () => {
    expect(() => loadConfig({ HOME_LAT: "95", HOME_LON: "0" })).toThrow("HOME_LAT/HOME_LON out of range: 95, 0");
  });

  it("rejects numbers that do not parse", () => {
    expect(() => loadConfig({ ...base, POLL_MS: "fast" })).toThrow("Environment variable POLL_MS must be a valid number");
    expect(() => loadConfig({ ...base, POLL_MS: "-5" })).toThrow("Environment variable POLL_MS must be greater than zero");
    expect(() => loadConfig({ ...base, PORT: "70000" })).toThrow(/PORT must be a port number/);
  });

  it("splits recipient and webhook lists", () => {
    const config = loadConfig({
      ...base,
      WEBHOOK_URLS: "https://a.example.com/hook, https://b.example.com/hook",
      TRACKED_RECIPIENTS: "home@example.com",
      ANOMALY_RECIPIENTS: "ops@example.com,,watch@example.com",
    });
    expect(config.webhookUrls).toEqual(["https://a.example.com/hook", "https://b.example.com/hook"]);
    expect(config.recipients).toEqual({
      tracked: ["home@example.com"],
      anomaly: ["ops@example.com", "watch@example.com"],
      health: [],
    });
  });

  it("reads detector toggles", () => {
    const config = loadConfig({ ...base, DETECT_FORMATION: "off", DETECT_LOITERING: "no" });
    expect(config.detectors.formation).toBe(false);
    expect(config.detectors.loitering).toBe(false);
    expect(config.detectors.emergency).toBe(true);
    expect(() => loadConfig({ ...base, DETECT_PATTERNS: "maybe" })).toThrow("DETECT_PATTERNS must be true or false");
  });

  it("reads alert switches and the alive interval", () => {
    const config = loadConfig({
      ...base,
      TRACKED_ALERTS_ENABLED: "false",
      START_NOTICE_ENABLED: "0",
      ALIVE_INTERVAL_MS: "43200000",
    });
    expect(config.alertsEnabled).toEqual({ tracked: false, anomaly: true });
    expect(config.announceStart).toBe(false);
    expect(config.aliveIntervalMs).toBe(43_200_000);
    expect(() => loadConfig({ ...base, ALIVE_INTERVAL_MS: "-1" })).toThrow(
      "Environment variable ALIVE_INTERVAL_MS must not be negative"
    );
  });
});
