import type { QualifiedMetricId } from "../types";

// Most recent scaled value per metric, kept whether or not a session is recording
export class LastValueCache {
    private readonly values = new Map<QualifiedMetricId, number | null>();
    lastElapsedSeconds: number | null = null;
    lastDroppedCount: number | null = null;
    lastSampleAt: number | null = null;

    reconcile(metricIds: readonly QualifiedMetricId[]): void {
        const wanted = new Set(metricIds);
        for (const id of [...this.values.keys()]) {
            if (!wanted.has(id)) this.values.delete(id);
        }
        for (const id of metricIds) {
            if (!this.values.has(id)) this.values.set(id, null);
        }
    }

    set(id: QualifiedMetricId, value: number | null): void {
        this.values.set(id, value);
    }

    get(id: QualifiedMetricId): number | null {
        return this.values.get(id) ?? null;
    }

    // forget metric values and the time label, keep keys and the dropped counter
    clearValues(): void {
        for (const id of this.values.keys()) this.values.set(id, null);
        this.lastElapsedSeconds = null;
    }

    clear(): void {
        this.clearValues();
        this.lastDroppedCount = null;
        this.lastSampleAt = null;
    }

    toRecord(metricIds: readonly QualifiedMetricId[]): Record<QualifiedMetricId, number | null> {
        const out: Record<QualifiedMetricId, number | null> = {};
        for (const id of metricIds) out[id] = this.get(id);
        return out;
    }
}
