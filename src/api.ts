import { Router } from "express";
import type { Request, Response } from "express";
import type { AlertStore } from "./alertHelpers.js";
import type { Observer } from "./observer.js";
import type { AlertType } from "./types.js";
import { parseSince } from "./utils/parseSince.js";
import type { WatchList } from "./watchList.js";

const ALERT_TYPES: AlertType[] = ["tracked", "anomaly", "health"];

function isAlertType(value: string): value is AlertType {
  return ALERT_TYPES.some((t) => t === value);
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export interface ApiDeps {
  observer: Observer;
  watchList: WatchList;
  store: AlertStore;
  startedAt?: number;
}

export function createApiRouter({ observer, watchList, store, startedAt = Date.now() }: ApiDeps): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    const status = observer.status();
    res.json({
      status: status.consecutiveFailures === 0 ? "ok" : "degraded",
      uptimeSeconds: Math.round((Date.now() - startedAt) / 1000),
      watchList: watchList.size,
      ...status,
    });
  });

  // ---------- live state ----------
  router.get("/aircraft", (_req, res) => {
    const aircraft = observer.tracks.tracks().map((t) => ({
      hex: t.id,
      callsign: t.latest.callsign,
      lat: t.latest.lat,
      lon: t.latest.lon,
      altitude: t.latest.altitude,
      speed: t.latest.groundSpeed,
      track: t.latest.track,
      squawk: t.latest.squawk,
      watched: watchList.has(t.id),
      firstSeen: t.firstSeen,
      lastSeen: t.lastSeen,
      positions: t.positions.length,
    }));
    res.json(aircraft);
  });

  router.get("/flybys", (_req, res) => {
    res.json(
      observer.proximity.flybys().map((f) => ({
        hex: f.id,
        firstSeen: f.firstSeen,
        lastSeen: f.lastSeen,
        samples: f.distances.length,
        currentDistance: f.distances[f.distances.length - 1],
        closestDistance: f.closestDistance,
        watch: f.watch,
      }))
    );
  });

  // ---------- alert history ----------
  router.get("/alerts", (req: Request, res: Response) => {
    const sinceRaw = queryString(req, "since");
    const since = sinceRaw ? parseSince(sinceRaw) : undefined;
    if (since === null) {
      return res.status(400).json({ error: `Invalid since value: ${sinceRaw}` });
    }

    const type = queryString(req, "type");
    if (type !== undefined && !isAlertType(type)) {
      return res.status(400).json({ error: `type must be one of ${ALERT_TYPES.join(", ")}` });
    }

    const limitRaw = queryString(req, "limit");
    const limit = limitRaw ? Number(limitRaw) : 100;
    if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
      return res.status(400).json({ error: "limit must be an integer between 1 and 1000" });
    }

    res.json(store.getAlertHistory({ since, hex: queryString(req, "hex"), type, limit }));
  });

  // ---------- watch-list ----------
  router.get("/watchlist", (_req, res) => {
    res.json({ loadedAt: watchList.lastLoaded, aircraft: watchList.list() });
  });

  router.post("/watchlist/reload", (_req, res) => {
    try {
      const count = watchList.reload();
      res.json({ count });
    } catch (err) {
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  return router;
}
