import path from "node:path";
import pino from "pino";
import { loadMetricCatalog, type MetricCatalog } from "../catalog";
import { IngestionPipeline } from "../ingestion";
import { SelectionManager } from "../selection";
import { TelemetryStore } from "../state/telemetryStore";
import type { Transport } from "../types";

export const TEST_PREFIX = "lab";
export const TEST_PERIOD_S = 0.25;

export const silentLogger = pino({ level: "silent" });

export function createCatalog(): MetricCatalog {
    return loadMetricCatalog(path.resolve(__dirname, "../../config/sensor-types.json"), TEST_PERIOD_S);
}

export type TransportCall = { action: "subscribe" | "unsubscribe"; topic: string };

// in-process stand-in for the MQTT data client
export class RecordingTransport implements Transport {
    calls: TransportCall[] = [];
    failOn = new Set<string>();

    subscribe(topic: string): void {
        if (this.failOn.has(topic)) throw new Error(`broker refused ${topic}`);
        this.calls.push({ action: "subscribe", topic });
    }

    unsubscribe(topic: string): void {
        this.calls.push({ action: "unsubscribe", topic });
    }
}

export function createEngine(capacity = 250) {
    const catalog = createCatalog();
    const store = new TelemetryStore({ capacity, logger: silentLogger });
    const transport = new RecordingTransport();
    const selection = new SelectionManager({
        store,
        catalog,
        transport,
        topicPrefix: TEST_PREFIX,
        logger: silentLogger,
    });
    const ingestion = new IngestionPipeline({
        store,
        catalog,
        topicPrefix: TEST_PREFIX,
        logger: silentLogger,
    });
    return { catalog, store, transport, selection, ingestion };
}

export function movSample(cm: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return { t_ms: 1000, cm, v_cm_s: 10, a_cm_s2: 0, ...extra };
}

export function luxSample(lux: number): Record<string, unknown> {
    return { t_ms: 1000, Lux: lux };
}
