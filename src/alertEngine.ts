import type { AlertStore } from "./alertHelpers.js";
import type { NotificationSink } from "./notifiers.js";
import type { AlertPayload, AlertType, Anomaly, AircraftSnapshot, FlybyAlert, Severity } from "./types.js";

export type RecipientMap = Record<AlertType, string[]>;

function aircraftBlock(snapshot: AircraftSnapshot): NonNullable<AlertPayload["aircraft"]> {
  return {
    hex: snapshot.id,
    callsign: snapshot.callsign,
    altitude: snapshot.altitude,
    speed: snapshot.groundSpeed,
    track: snapshot.track,
    squawk: snapshot.squawk,
    lat: snapshot.lat,
    lon: snapshot.lon,
  };
}

export function buildTrackedPayload(alert: FlybyAlert, recipients: string[], now: number): AlertPayload {
  const { watch, closestSnapshot } = alert;
  const label = [watch.tailNumber, watch.description].filter(Boolean).join(", ") || alert.id;
  return {
    type: "tracked",
    key: `tracked:${alert.id}`,
    message: `${label} passed ${alert.closestDistance.toFixed(1)} mi from home (${alert.outcome.replace(/_/g, " ")})`,
    severity: "MEDIUM",
    aircraft: aircraftBlock(closestSnapshot),
    distance_miles: Number(alert.closestDistance.toFixed(2)),
    outcome: alert.outcome,
    watch,
    recipients,
    triggered_at: new Date(now).toISOString(),
  };
}

export function buildAnomalyPayload(anomaly: Anomaly, recipients: string[]): AlertPayload {
  const { snapshot } = anomaly;
  const who = snapshot.callsign ? `${snapshot.callsign} (${snapshot.id})` : snapshot.id;
  return {
    type: "anomaly",
    key: `anomaly:${snapshot.id}:${anomaly.kind}`,
    message: `${who}: ${anomaly.reason}`,
    severity: anomaly.severity,
    aircraft: aircraftBlock(snapshot),
    anomaly: {
      kind: anomaly.kind,
      reason: anomaly.reason,
      pattern: anomaly.pattern,
      squawk: anomaly.squawk,
      related: anomaly.relatedIds,
      area: anomaly.areaName,
    },
    recipients,
    triggered_at: new Date(anomaly.timestamp).toISOString(),
  };
}

export function buildHealthPayload(
  message: string,
  recipients: string[],
  now: number,
  key = "health:feed",
  severity: Severity = "HIGH"
): AlertPayload {
  return {
    type: "health",
    key,
    message,
    severity,
    recipients,
    triggered_at: new Date(now).toISOString(),
  };
}

/**
 * Records each alert and hands it to every sink without waiting for
 * delivery. Failed sends are logged and not retried.
 */
export class AlertEngine {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly sinks: NotificationSink[],
    private readonly store: AlertStore | null = null
  ) {}

  /** Returns the history row id, or null when the alert could not be recorded. */
  dispatch(payload: AlertPayload, now = Date.now()): number | null {
    let historyId: number | null = null;
    if (this.store) {
      try {
        historyId = this.store.recordAlert(payload, now);
      } catch (error) {
        console.error(`Failed to record alert ${payload.key}:`, error);
      }
    }

    for (const sink of this.sinks) {
      const delivery = this.deliver(sink, payload, historyId);
      this.pending.add(delivery);
      void delivery.finally(() => this.pending.delete(delivery));
    }
    return historyId;
  }

  /** Waits for every in-flight delivery to settle. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private async deliver(sink: NotificationSink, payload: AlertPayload, historyId: number | null): Promise<void> {
    try {
      await sink.send(payload);
    } catch (error) {
      console.error(`Failed to send ${payload.key} via ${sink.name}:`, error);
      return;
    }

    if (historyId !== null && this.store) {
      try {
        this.store.markDelivered(historyId);
      } catch (error) {
        console.error(`Failed to mark alert ${historyId} delivered:`, error);
      }
    }
  }
}
