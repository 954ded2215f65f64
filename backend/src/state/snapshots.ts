import type { QualifiedMetricId, SeriesSnapshot, ValueSeries } from "../types";

const SERIES_NAME_PREFIX = "Series";

function freezeSnapshot(
    name: string,
    times: readonly number[],
    values: ValueSeries,
    metricIds: readonly QualifiedMetricId[],
): SeriesSnapshot {
    const frozenValues: Record<QualifiedMetricId, readonly (number | null)[]> = {};
    for (const id of metricIds) {
        frozenValues[id] = Object.freeze([...(values[id] ?? [])]);
    }
    return Object.freeze({
        name,
        times: Object.freeze([...times]),
        values: Object.freeze(frozenValues),
        metricIds: Object.freeze([...metricIds]),
    });
}

/**
 * Saved series plus the display pointer (null = live view).
 * Snapshots are frozen on creation and only removed by clearAll().
 */
export class SnapshotStore {
    private snapshots: SeriesSnapshot[] = [];
    private counter = 0;
    private displayIndex: number | null = null;

    get length(): number {
        return this.snapshots.length;
    }

    create(times: readonly number[], values: ValueSeries, metricIds: readonly QualifiedMetricId[]): SeriesSnapshot {
        this.counter += 1;
        const snapshot = freezeSnapshot(`${SERIES_NAME_PREFIX} ${this.counter}`, times, values, metricIds);
        this.append(snapshot);
        return snapshot;
    }

    append(snapshot: SeriesSnapshot): void {
        this.snapshots.push(snapshot);
    }

    list(): readonly SeriesSnapshot[] {
        return this.snapshots;
    }

    names(): string[] {
        return this.snapshots.map((s) => s.name);
    }

    // first match wins; an unknown name falls back to the live view
    selectForDisplay(name: string | null): boolean {
        if (name === null) {
            this.displayIndex = null;
            return true;
        }
        const index = this.snapshots.findIndex((s) => s.name === name);
        this.displayIndex = index >= 0 ? index : null;
        return index >= 0;
    }

    showLive(): void {
        this.displayIndex = null;
    }

    displayed(): SeriesSnapshot | null {
        if (this.displayIndex === null) return null;
        return this.snapshots[this.displayIndex] ?? null;
    }

    clearAll(): void {
        this.snapshots = [];
        this.counter = 0;
        this.displayIndex = null;
    }
}
