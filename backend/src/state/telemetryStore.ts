import type { Logger } from "pino";
import { EmptyRecordingError } from "../errors";
import type {
    ActiveSelection,
    CurrentView,
    DurationUnit,
    QualifiedMetricId,
    SensorId,
    SeriesSnapshot,
    SessionStatus,
    ValueSeries,
} from "../types";
import { LastValueCache } from "./lastValueCache";
import { MeasurementSession } from "./session";
import { SnapshotStore } from "./snapshots";
import { TimeSeries } from "./timeSeries";

export interface TelemetryStoreOptions {
    capacity: number;
    logger: Logger;
}

export const EMPTY_SELECTION: ActiveSelection = Object.freeze({
    selectedSensors: Object.freeze([]),
    channelMap: new Map(),
    activeQualifiedIds: Object.freeze([]),
});

/**
 * Process-wide telemetry state: active selection, live buffers, last values,
 * the measurement session and saved series.
 *
 * All methods are synchronous. MQTT callbacks, the refresh timer and HTTP
 * handlers share one event loop, so every call observes and leaves a
 * consistent state.
 */
export class TelemetryStore {
    private active: ActiveSelection = EMPTY_SELECTION;
    private activeIds = new Set<QualifiedMetricId>();
    private readonly series: TimeSeries;
    private readonly cache = new LastValueCache();
    private readonly session = new MeasurementSession();
    private readonly snapshots = new SnapshotStore();
    private readonly log: Logger;

    constructor(options: TelemetryStoreOptions) {
        this.series = new TimeSeries(options.capacity);
        this.log = options.logger;
    }

    get selection(): ActiveSelection {
        return this.active;
    }

    isSelected(sensorId: SensorId): boolean {
        return this.active.selectedSensors.includes(sensorId);
    }

    isActive(id: QualifiedMetricId): boolean {
        return this.activeIds.has(id);
    }

    // install a new selection; buffers are added or dropped, never reset here
    applySelection(selection: ActiveSelection): void {
        this.active = selection;
        this.activeIds = new Set(selection.activeQualifiedIds);
        this.series.reconcile(selection.activeQualifiedIds);
        this.cache.reconcile(selection.activeQualifiedIds);
    }

    // sensor set changed: buffers, last values and session start over; saved series stay
    resetMeasurement(): void {
        this.series.clear();
        this.cache.clear();
        this.session.reset();
        this.log.info("measurement state reset");
    }

    /**
     * Store one accepted message. Last values are always updated; while
     * running, the message also claims the next slot on the shared time axis
     * and every active metric gets either this message's value or its last
     * known one.
     */
    recordSample(
        values: ReadonlyMap<QualifiedMetricId, number | null>,
        droppedCount: number | null,
        samplePeriodS: number,
        now: number,
    ): boolean {
        for (const [id, value] of values) {
            this.cache.set(id, value);
        }
        this.cache.lastDroppedCount = droppedCount;
        this.cache.lastSampleAt = now;

        if (!this.session.isRunning) return false;

        const t = this.session.advance(samplePeriodS);
        this.cache.lastElapsedSeconds = t;
        this.series.append(t, (id) => {
            const fresh = values.get(id);
            return fresh !== undefined ? fresh : this.cache.get(id);
        });
        return true;
    }

    start(): void {
        this.session.start();
        this.series.clear();
        this.cache.clearValues();
        this.snapshots.showLive();
        this.log.info("measurement started");
    }

    stop(): boolean {
        const stopped = this.session.stop();
        if (stopped) {
            this.log.info({ elapsedSeconds: this.session.elapsedSeconds }, "measurement stopped");
        }
        return stopped;
    }

    configureDuration(value: number, unit: DurationUnit): number | null {
        const limit = this.session.configureDuration(value, unit);
        this.log.info({ durationLimitSeconds: limit }, "measurement duration configured");
        return limit;
    }

    // periodic check; a running session past its limit stops here
    tick(): boolean {
        if (!this.session.durationExceeded()) return false;
        this.session.stop();
        this.log.info(
            { elapsedSeconds: this.session.elapsedSeconds, limit: this.session.durationLimitSeconds },
            "measurement auto-stopped",
        );
        return true;
    }

    save(): SeriesSnapshot {
        if (this.session.state === "idle" || this.series.length === 0) {
            throw new EmptyRecordingError();
        }

        const metricIds = [...this.active.activeQualifiedIds];
        const snapshot = this.snapshots.create(this.series.timesArray(), this.series.valuesFor(metricIds), metricIds);

        this.series.clear();
        this.cache.clearValues();
        this.session.finish();
        this.snapshots.showLive();
        this.log.info({ name: snapshot.name, samples: snapshot.times.length }, "series saved");
        return snapshot;
    }

    // drop every saved series and start over; discovery and selection are untouched
    clearAll(): void {
        this.snapshots.clearAll();
        this.series.clear();
        this.cache.clearValues();
        this.session.finish();
        this.log.info("saved series cleared");
    }

    /**
     * Point the read side at a saved series, or back at live data with null.
     * Reviewing a saved series ends a running recording.
     */
    selectForDisplay(name: string | null): boolean {
        const found = this.snapshots.selectForDisplay(name);
        if (found && name !== null) this.stop();
        return found;
    }

    snapshotList(): readonly SeriesSnapshot[] {
        return this.snapshots.list();
    }

    snapshotNames(): string[] {
        return this.snapshots.names();
    }

    sessionStatus(): SessionStatus {
        return this.session.status();
    }

    currentView(): CurrentView {
        const session = this.session.status();
        const displayed = this.snapshots.displayed();

        if (displayed === null) {
            const metricIds = [...this.active.activeQualifiedIds];
            return {
                isLive: true,
                seriesName: null,
                metricIds,
                times: this.series.timesArray(),
                values: this.series.valuesFor(metricIds),
                lastTime: this.cache.lastElapsedSeconds,
                lastValues: this.cache.toRecord(metricIds),
                droppedCount: this.cache.lastDroppedCount,
                lastSampleAt: this.cache.lastSampleAt,
                session,
            };
        }

        const metricIds = [...displayed.metricIds];
        const values: ValueSeries = {};
        const lastValues: Record<QualifiedMetricId, number | null> = {};
        for (const id of metricIds) {
            const column = [...(displayed.values[id] ?? [])];
            values[id] = column;
            lastValues[id] = column.length > 0 ? column[column.length - 1] : null;
        }
        const times = [...displayed.times];

        return {
            isLive: false,
            seriesName: displayed.name,
            metricIds,
            times,
            values,
            lastTime: times.length > 0 ? times[times.length - 1] : null,
            lastValues,
            droppedCount: null,
            lastSampleAt: null,
            session,
        };
    }
}
