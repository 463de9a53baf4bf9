import { WebSocketServer, WebSocket } from "ws";
import type { RawData } from "ws";
import type { Server } from "http";
import type { AlertBroadcaster } from "../notifiers.js";
import type { CycleSummary } from "../observer.js";
import type { AlertPayload } from "../types.js";

interface ClientState {
  isAlive: boolean;
  /** Cycle summaries are opt-in; alerts go to every client. */
  cycles: boolean;
}

export interface AlertSocketServer extends AlertBroadcaster {
  broadcastCycle(summary: CycleSummary): number;
  clientCount(): number;
  close(): Promise<void>;
}

function parseMessage(message: RawData): unknown {
  try {
    return JSON.parse(message.toString());
  } catch {
    return null;
  }
}

export function initializeWebSocketServer(server: Server, heartbeatMs = 30_000): AlertSocketServer {
  const wss = new WebSocketServer({ server });
  const clients = new Map<WebSocket, ClientState>();

  const heartbeat = setInterval(() => {
    for (const [ws, state] of clients) {
      if (!state.isAlive) {
        ws.terminate();
        clients.delete(ws);
        continue;
      }
      state.isAlive = false;
      ws.ping();
    }
  }, heartbeatMs);

  wss.on("connection", (ws: WebSocket) => {
    const state: ClientState = { isAlive: true, cycles: false };
    clients.set(ws, state);
    ws.send(JSON.stringify({ type: "welcome", channels: ["alerts"] }));

    ws.on("pong", () => {
      state.isAlive = true;
    });

    ws.on("message", (message: RawData) => {
      const data = parseMessage(message);
      if (typeof data !== "object" || data === null || !("type" in data)) {
        console.warn("[WS] Ignoring malformed message");
        return;
      }
      if (data.type === "SUBSCRIBE_CYCLES") {
        state.cycles = true;
        ws.send(JSON.stringify({ type: "subscribed", channels: ["alerts", "cycles"] }));
      } else if (data.type === "UNSUBSCRIBE_CYCLES") {
        state.cycles = false;
        ws.send(JSON.stringify({ type: "subscribed", channels: ["alerts"] }));
      }
    });

    ws.on("close", (code) => {
      clients.delete(ws);
      console.log(`[WS] Client disconnected, code: ${code}`);
    });

    ws.on("error", (error) => {
      console.error("[WS] Client error:", error);
    });
  });

  wss.on("close", () => {
    clearInterval(heartbeat);
  });

  function send(message: unknown, filter: (state: ClientState) => boolean): number {
    const text = JSON.stringify(message);
    let sent = 0;
    for (const [ws, state] of clients) {
      if (ws.readyState === WebSocket.OPEN && filter(state)) {
        ws.send(text);
        sent++;
      }
    }
    return sent;
  }

  return {
    broadcastAlert: (payload: AlertPayload) => send({ type: "ALERT", alert: payload }, () => true),
    broadcastCycle: (summary: CycleSummary) => send({ type: "CYCLE", summary }, (s) => s.cycles),
    clientCount: () => clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(heartbeat);
        for (const ws of clients.keys()) ws.terminate();
        clients.clear();
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
