// Shared types between MQTT, state store, HTTP and WS

export type SensorId = string;
export type MetricId = string;

// `${sensorId}:${metricId}`, the only key used by buffers, caches and exports
export type QualifiedMetricId = string;

export interface MetricDef {
    id: MetricId;
    sourceKey: string;
    scale: number;
    label: string;
    unit: string;
    color: string;
    defaultEnabled: boolean;
}

export interface SensorProfile {
    type: string;
    displayName: string;
    requiredFields: readonly string[];
    timestampField: string;
    metrics: readonly MetricDef[];
    droppedCountField: string | null;
    samplePeriodS: number;
}

export interface ActiveSelection {
    readonly selectedSensors: readonly SensorId[];
    // absence of an entry means every metric of that sensor is active
    readonly channelMap: ReadonlyMap<SensorId, ReadonlySet<MetricId>>;
    readonly activeQualifiedIds: readonly QualifiedMetricId[];
}

export type SessionState = "idle" | "running" | "stopped";

export type DurationUnit = "seconds" | "minutes";

export interface SessionStatus {
    state: SessionState;
    sampleIndex: number;
    elapsedSeconds: number;
    durationLimitSeconds: number | null;
}

export type ValueSeries = Record<QualifiedMetricId, (number | null)[]>;

export interface SeriesSnapshot {
    readonly name: string;
    readonly times: readonly number[];
    readonly values: Readonly<Record<QualifiedMetricId, readonly (number | null)[]>>;
    readonly metricIds: readonly QualifiedMetricId[];
}

export interface CurrentView {
    isLive: boolean;
    seriesName: string | null;
    metricIds: QualifiedMetricId[];
    times: number[];
    values: ValueSeries;
    lastTime: number | null;
    lastValues: Record<QualifiedMetricId, number | null>;
    droppedCount: number | null;
    lastSampleAt: number | null;
    session: SessionStatus;
}

export interface SelectionChange {
    reset: boolean;
    subscribed: string[];
    unsubscribed: string[];
}

// Subset of the MQTT client the selection manager drives
export interface Transport {
    subscribe(topic: string): void;
    unsubscribe(topic: string): void;
}
