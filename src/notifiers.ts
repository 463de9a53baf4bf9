import type { AlertPayload } from "./types.js";

export interface NotificationSink {
  readonly name: string;
  send(payload: AlertPayload): Promise<void>;
}

export class ConsoleSink implements NotificationSink {
  readonly name = "console";

  async send(payload: AlertPayload): Promise<void> {
    const recipients = payload.recipients.length ? ` -> ${payload.recipients.join(", ")}` : "";
    console.log(`[ALERT] ${payload.severity} ${payload.type}: ${payload.message}${recipients}`);
  }
}

/** POSTs the payload as JSON. Non-2xx responses and timeouts reject. */
export class WebhookSink implements NotificationSink {
  readonly name: string;

  constructor(private readonly url: string, private readonly timeoutMs = 5000) {
    this.name = `webhook ${url}`;
  }

  async send(payload: AlertPayload): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "User-Agent": "Squawkwatch-Alerts/1.0",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Webhook failed: ${response.status} ${response.statusText}`);
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}

export interface AlertBroadcaster {
  /** Returns how many clients the alert was sent to. */
  broadcastAlert(payload: AlertPayload): number;
}

export class WebSocketSink implements NotificationSink {
  readonly name = "websocket";

  constructor(private readonly broadcaster: AlertBroadcaster) {}

  async send(payload: AlertPayload): Promise<void> {
    this.broadcaster.broadcastAlert(payload);
  }
}
