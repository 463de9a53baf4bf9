import express from "express";
import bodyParser from "body-parser";
import { createServer } from "http";
import dotenv from "dotenv";
import { AlertEngine } from "./alertEngine.js";
import { SqliteAlertStore } from "./alertHelpers.js";
import { AirportDirectory } from "./airports.js";
import { AnomalyDetector } from "./anomalyDetector.js";
import { createApiRouter } from "./api.js";
import { loadConfig } from "./config.js";
import { openDatabase } from "./db.js";
import { HttpAircraftSource } from "./feedClient.js";
import { ConsoleSink, WebhookSink, WebSocketSink } from "./notifiers.js";
import type { NotificationSink } from "./notifiers.js";
import { Observer } from "./observer.js";
import { loadRestrictedAreas } from "./restrictedAreas.js";
import { WatchList } from "./watchList.js";
import { createDocsRouter } from "./web/docsRouter.js";
import { initializeWebSocketServer } from "./web/websocketServer.js";

dotenv.config();

const config = loadConfig();
const db = openDatabase(config.dbPath);
const store = new SqliteAlertStore(db);
const watchList = WatchList.load(config.watchListPath);

const app = express();
const server = createServer(app);
const sockets = initializeWebSocketServer(server);

const sinks: NotificationSink[] = [
  new ConsoleSink(),
  new WebSocketSink(sockets),
  ...config.webhookUrls.map((url) => new WebhookSink(url)),
];
const engine = new AlertEngine(sinks, store);

const observer = new Observer(
  {
    source: new HttpAircraftSource(config.feedUrl, config.fetchTimeoutMs),
    engine,
    watchList,
    store,
    detector: new AnomalyDetector(
      {
        airports: AirportDirectory.load(config.airportsPath),
        restrictedAreas: loadRestrictedAreas(config.restrictedAreasPath),
      },
      { enabled: config.detectors }
    ),
    onCycle: (summary) => sockets.broadcastCycle(summary),
  },
  {
    home: config.home,
    pollMs: config.pollMs,
    failureBackoffMs: config.failureBackoffMs,
    stalenessMs: config.stalenessMs,
    outageAlertAfterFailures: config.outageAlertAfterFailures,
    healthCooldownMs: config.healthCooldownMs,
    historyRetentionMs: config.historyRetentionDays * 24 * 3600_000,
    recipients: config.recipients,
    alertsEnabled: config.alertsEnabled,
    announceStart: config.announceStart,
    aliveIntervalMs: config.aliveIntervalMs,
    proximity: config.proximity,
    dedup: config.dedup,
  }
);

app.use(bodyParser.json());
app.use(createApiRouter({ observer, watchList, store }));
app.use(createDocsRouter());

observer.start();
server.listen(config.port, () =>
  console.log(`Server listening on :${config.port}, watching ${watchList.size} aircraft around ${config.home.lat}, ${config.home.lon}`)
);

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`Received ${signal}, shutting down`);

  await observer.stop();
  await sockets.close();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  db.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
  });
}
