import express from "express";
import bodyParser from "body-parser";
import fs from "fs";
import os from "os";
import path from "path";
import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AlertEngine, buildHealthPayload } from "../alertEngine.js";
import { SqliteAlertStore } from "../alertHelpers.js";
import { AnomalyDetector } from "../anomalyDetector.js";
import { createApiRouter } from "../api.js";
import { openDatabase } from "../db.js";
import type { Db } from "../db.js";
import { Observer } from "../observer.js";
import { WatchList } from "../watchList.js";

describe("status API", () => {
  let dir: string;
  let watchFile: string;
  let db: Db;
  let store: SqliteAlertStore;
  let observer: Observer;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    dir = fs.mkdtempSync(path.join(os.tmpdir(), "api-"));
    watchFile = path.join(dir, "watchlist.json");
    fs.writeFileSync(watchFile, JSON.stringify([{ icao: "a6f2b7", tail_number: "N818TH" }]));
    const watchList = WatchList.load(watchFile);

    db = openDatabase(":memory:");
    store = new SqliteAlertStore(db);
    observer = new Observer(
      {
        source: { fetchAircraft: async () => [] },
        engine: new AlertEngine([], store),
        watchList,
        detector: new AnomalyDetector({ airports: null, restrictedAreas: [] }),
      },
      { home: { lat: 35, lon: -80 } }
    );

    const app = express();
    app.use(bodyParser.json());
    app.use(createApiRouter({ observer, watchList, store }));
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("test server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", running: false, aircraft: 0, watchList: 1 });
  });

  it("lists live aircraft", async () => {
    observer.runCycle([{ hex: "A6F2B7", lat: 35.1, lon: -80, alt_baro: 4000, flight: "N818TH " }], Date.now());
    const body = await (await fetch(`${baseUrl}/aircraft`)).json();
    expect(body).toEqual([
      expect.objectContaining({ hex: "a6f2b7", callsign: "N818TH", altitude: 4000, watched: true, positions: 1 }),
    ]);
  });

  it("filters alert history", async () => {
    const now = Date.now();
    store.recordAlert(buildHealthPayload("old outage", [], now - 5 * 3600_000), now - 5 * 3600_000);
    store.recordAlert(buildHealthPayload("new outage", [], now - 60_000), now - 60_000);

    const recent = await (await fetch(`${baseUrl}/alerts?since=1h&type=health`)).json();
    expect(recent).toEqual([expect.objectContaining({ payload: expect.objectContaining({ message: "new outage" }) })]);

    expect((await fetch(`${baseUrl}/alerts`)).status).toBe(200);
    expect((await fetch(`${baseUrl}/alerts?since=yesterday`)).status).toBe(400);
    expect((await fetch(`${baseUrl}/alerts?type=weather`)).status).toBe(400);
    expect((await fetch(`${baseUrl}/alerts?limit=0`)).status).toBe(400);
  });

  it("reloads the watch-list on request", async () => {
    fs.writeFileSync(watchFile, JSON.stringify([{ icao: "ae4e10" }, { icao: "ae1234" }]));
    const res = await fetch(`${baseUrl}/watchlist/reload`, { method: "POST" });
    expect(await res.json()).toEqual({ count: 2 });

    const list = await (await fetch(`${baseUrl}/watchlist`)).json();
    expect(list).toMatchObject({ aircraft: [{ id: "ae4e10" }, { id: "ae1234" }] });
  });

  it("keeps the old watch-list when a reload fails", async () => {
    fs.writeFileSync(watchFile, "not json");
    const res = await fetch(`${baseUrl}/watchlist/reload`, { method: "POST" });
    expect(res.status).toBe(500);

    const list = await (await fetch(`${baseUrl}/watchlist`)).json();
    expect(list).toMatchObject({ aircraft: [{ id: "a6f2b7", tailNumber: "N818TH" }] });
  });
});
