import { createServer } from "http";
import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocket } from "ws";
import { buildHealthPayload } from "../../alertEngine.js";
import { initializeWebSocketServer } from "../websocketServer.js";
import type { AlertSocketServer } from "../websocketServer.js";

function nextMessage(ws: WebSocket): Promise<unknown> {
  return new Promise((resolve) => ws.once("message", (data) => resolve(JSON.parse(data.toString()))));
}

describe("alert websocket", () => {
  let server: Server;
  let sockets: AlertSocketServer;
  let url: string;
  const clients: WebSocket[] = [];

  async function connect(): Promise<WebSocket> {
    const ws = new WebSocket(url);
    clients.push(ws);
    await nextMessage(ws);
    return ws;
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    server = createServer();
    sockets = initializeWebSocketServer(server);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("test server has no port");
    url = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    clients.splice(0).forEach((ws) => ws.close());
    await sockets.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  it("pushes alerts to every connected client", async () => {
    const ws = await connect();
    const payload = buildHealthPayload("feed down", [], 1_700_000_000_000);

    const received = nextMessage(ws);
    expect(sockets.broadcastAlert(payload)).toBe(1);
    expect(await received).toEqual({ type: "ALERT", alert: payload });
  });

  it("sends cycle summaries only to subscribers", async () => {
    const ws = await connect();
    const summary = { timestamp: 1, aircraft: 3, positioned: 2, evicted: 0, flybys: 0, anomalies: 0, suppressed: 0, dispatched: 0 };
    expect(sockets.broadcastCycle(summary)).toBe(0);

    const ack = nextMessage(ws);
    ws.send(JSON.stringify({ type: "SUBSCRIBE_CYCLES" }));
    expect(await ack).toEqual({ type: "subscribed", channels: ["alerts", "cycles"] });

    const received = nextMessage(ws);
    expect(sockets.broadcastCycle(summary)).toBe(1);
    expect(await received).toEqual({ type: "CYCLE", summary });
  });
});
