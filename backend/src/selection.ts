import type { Logger } from "pino";
import type { MetricCatalog } from "./catalog";
import { dataTopic } from "./discovery";
import { InvalidSelectionError, SubscriptionError } from "./errors";
import { qualify, sameMembers, uniqueInOrder } from "./helpers";
import type { TelemetryStore } from "./state/telemetryStore";
import type {
    ActiveSelection,
    MetricId,
    QualifiedMetricId,
    SelectionChange,
    SensorId,
    Transport,
} from "./types";

export interface SelectionManagerOptions {
    store: TelemetryStore;
    catalog: MetricCatalog;
    transport: Transport;
    topicPrefix: string;
    logger: Logger;
}

export function buildSelection(
    sensors: readonly SensorId[],
    channelMap: ReadonlyMap<SensorId, ReadonlySet<MetricId>>,
    catalog: MetricCatalog,
): ActiveSelection {
    const activeQualifiedIds: QualifiedMetricId[] = [];
    for (const sensorId of sensors) {
        const channels = channelMap.get(sensorId);
        for (const metric of catalog.profileFor(sensorId).metrics) {
            if (channels && !channels.has(metric.id)) continue;
            activeQualifiedIds.push(qualify(sensorId, metric.id));
        }
    }
    return {
        selectedSensors: [...sensors],
        channelMap: new Map(channelMap),
        activeQualifiedIds,
    };
}

/**
 * Owns which sensors and metrics are active and keeps the data client's
 * subscriptions in line with them. State is updated first; transport calls
 * follow and their failures are only logged.
 */
export class SelectionManager {
    private readonly store: TelemetryStore;
    private readonly catalog: MetricCatalog;
    private readonly transport: Transport;
    private readonly topicPrefix: string;
    private readonly log: Logger;
    private topics = new Map<SensorId, string>();

    constructor(options: SelectionManagerOptions) {
        this.store = options.store;
        this.catalog = options.catalog;
        this.transport = options.transport;
        this.topicPrefix = options.topicPrefix;
        this.log = options.logger;
    }

    setSensors(sensorIds: readonly SensorId[]): SelectionChange {
        const sensors = uniqueInOrder(sensorIds);

        const withoutMetrics = sensors.filter((id) => this.catalog.metricIds(id).length === 0);
        if (withoutMetrics.length > 0) {
            throw new InvalidSelectionError(`No metrics configured for: ${withoutMetrics.join(", ")}`);
        }

        const previous = this.store.selection;
        const reset = !sameMembers(previous.selectedSensors, sensors);

        const channelMap = new Map<SensorId, ReadonlySet<MetricId>>();
        for (const [sensorId, channels] of previous.channelMap) {
            if (sensors.includes(sensorId)) channelMap.set(sensorId, channels);
        }

        if (reset) this.store.resetMeasurement();
        this.store.applySelection(buildSelection(sensors, channelMap, this.catalog));

        const nextTopics = new Map(sensors.map((id): [SensorId, string] => [id, dataTopic(this.topicPrefix, id)]));
        const before = new Set(this.topics.values());
        const after = new Set(nextTopics.values());
        this.topics = nextTopics;

        const unsubscribed = [...before].filter((t) => !after.has(t));
        const subscribed = [...after].filter((t) => !before.has(t));

        for (const topic of unsubscribed) this.call("unsubscribe", topic);
        for (const topic of subscribed) this.call("subscribe", topic);

        if (reset || subscribed.length > 0 || unsubscribed.length > 0) {
            this.log.info({ sensors, subscribed, unsubscribed, reset }, "sensor selection changed");
        }

        return { reset, subscribed, unsubscribed };
    }

    setChannels(sensorId: SensorId, metricIds: Iterable<MetricId>): ActiveSelection {
        const previous = this.store.selection;
        if (!previous.selectedSensors.includes(sensorId)) {
            throw new InvalidSelectionError(`Sensor ${sensorId} is not selected`);
        }

        const requested = new Set(metricIds);
        if (requested.size === 0) {
            throw new InvalidSelectionError(`Select at least one channel for ${sensorId}`);
        }

        const known = new Set(this.catalog.metricIds(sensorId));
        const unknown = [...requested].filter((id) => !known.has(id));
        if (unknown.length > 0) {
            throw new InvalidSelectionError(`Unknown channels for ${sensorId}: ${unknown.join(", ")}`);
        }

        const channelMap = new Map(previous.channelMap);
        channelMap.set(sensorId, requested);

        const next = buildSelection(previous.selectedSensors, channelMap, this.catalog);
        this.store.applySelection(next);
        this.log.info({ sensorId, channels: [...requested] }, "channels changed");
        return next;
    }

    // drop sensors that went stale; selected ones leave the selection
    dropSensors(sensorIds: readonly SensorId[]): SelectionChange | null {
        const gone = new Set(sensorIds);
        const current = this.store.selection.selectedSensors;
        if (!current.some((id) => gone.has(id))) return null;

        this.log.warn({ sensors: current.filter((id) => gone.has(id)) }, "selected sensors went stale");
        return this.setSensors(current.filter((id) => !gone.has(id)));
    }

    activeTopics(): string[] {
        return [...this.topics.values()];
    }

    // after a (re)connect the broker has no session for us; subscribe everything again
    resubscribeAll(): void {
        for (const topic of this.topics.values()) this.call("subscribe", topic);
    }

    private call(action: "subscribe" | "unsubscribe", topic: string): void {
        try {
            if (action === "subscribe") {
                this.transport.subscribe(topic);
            } else {
                this.transport.unsubscribe(topic);
            }
        } catch (err) {
            this.log.error({ err: new SubscriptionError(action, topic, err) }, "[MQTT] subscription call failed");
        }
    }
}
