import type { Logger } from "pino";
import type { MetricCatalog } from "./catalog";
import { parseDataTopic } from "./discovery";
import { hasField, isRecord, qualify, toInt, toNumber } from "./helpers";
import type { TelemetryStore } from "./state/telemetryStore";
import type { QualifiedMetricId, SensorId } from "./types";

export type DropReason =
    | "unknown-topic"
    | "not-selected"
    | "invalid-payload"
    | "missing-field"
    | "invalid-timestamp";

export type SampleOutcome =
    | { accepted: true; recorded: boolean }
    | { accepted: false; reason: DropReason };

export interface IngestionPipelineOptions {
    store: TelemetryStore;
    catalog: MetricCatalog;
    topicPrefix: string;
    logger: Logger;
}

function dropped(reason: DropReason): SampleOutcome {
    return { accepted: false, reason };
}

/**
 * Message handler for the data client. Malformed telemetry is routine, so
 * every failure is a dropped outcome rather than an error.
 */
export class IngestionPipeline {
    private readonly store: TelemetryStore;
    private readonly catalog: MetricCatalog;
    private readonly topicPrefix: string;
    private readonly log: Logger;

    constructor(options: IngestionPipelineOptions) {
        this.store = options.store;
        this.catalog = options.catalog;
        this.topicPrefix = options.topicPrefix;
        this.log = options.logger;
    }

    onMessage(topic: string, payload: Buffer, now: number = Date.now()): SampleOutcome {
        const sensorId = parseDataTopic(topic, this.topicPrefix);
        if (sensorId === null) return dropped("unknown-topic");
        if (!this.store.isSelected(sensorId)) return dropped("not-selected");

        let fields: unknown;
        try {
            fields = JSON.parse(payload.toString("utf-8"));
        } catch (err) {
            this.log.debug({ err, topic }, "undecodable payload dropped");
            return dropped("invalid-payload");
        }

        return this.onSample(sensorId, fields, now);
    }

    onSample(sensorId: SensorId, fields: unknown, now: number = Date.now()): SampleOutcome {
        if (!this.store.isSelected(sensorId)) return dropped("not-selected");
        if (!isRecord(fields)) return dropped("invalid-payload");

        const profile = this.catalog.profileFor(sensorId);

        for (const key of profile.requiredFields) {
            if (!hasField(fields, key)) {
                this.log.debug({ sensorId, field: key }, "sample missing required field");
                return dropped("missing-field");
            }
        }
        if (toInt(fields[profile.timestampField]) === null) {
            return dropped("invalid-timestamp");
        }

        const values = new Map<QualifiedMetricId, number | null>();
        for (const metric of profile.metrics) {
            const id = qualify(sensorId, metric.id);
            if (!this.store.isActive(id)) continue;
            const raw = toNumber(fields[metric.sourceKey]);
            values.set(id, raw === null ? null : raw * metric.scale);
        }

        const droppedCount = profile.droppedCountField ? toInt(fields[profile.droppedCountField]) : null;

        const recorded = this.store.recordSample(values, droppedCount, profile.samplePeriodS, now);
        return { accepted: true, recorded };
    }
}
