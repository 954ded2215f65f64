import type { QualifiedMetricId, ValueSeries } from "../types";
import { RingBuffer } from "./ringBuffer";

/**
 * Shared time axis plus one value buffer per active metric.
 *
 * Every append writes one entry to the time buffer and one to each value
 * buffer, so all buffers keep the same length. A buffer created while the
 * series already holds samples is padded with nulls to that length.
 */
export class TimeSeries {
    private readonly times: RingBuffer<number>;
    private readonly values = new Map<QualifiedMetricId, RingBuffer<number | null>>();

    constructor(readonly capacity: number) {
        this.times = new RingBuffer<number>(capacity);
    }

    get length(): number {
        return this.times.length;
    }

    metricIds(): QualifiedMetricId[] {
        return [...this.values.keys()];
    }

    reconcile(metricIds: readonly QualifiedMetricId[]): void {
        const wanted = new Set(metricIds);
        for (const id of [...this.values.keys()]) {
            if (!wanted.has(id)) this.values.delete(id);
        }
        for (const id of metricIds) {
            if (this.values.has(id)) continue;
            const buffer = new RingBuffer<number | null>(this.capacity);
            for (let i = 0; i < this.times.length; i++) buffer.push(null);
            this.values.set(id, buffer);
        }
    }

    append(t: number, valueFor: (id: QualifiedMetricId) => number | null): void {
        this.times.push(t);
        for (const [id, buffer] of this.values) {
            buffer.push(valueFor(id));
        }
    }

    clear(): void {
        this.times.clear();
        for (const buffer of this.values.values()) buffer.clear();
    }

    timesArray(): number[] {
        return this.times.toArray();
    }

    valuesFor(metricIds: readonly QualifiedMetricId[]): ValueSeries {
        const out: ValueSeries = {};
        for (const id of metricIds) {
            out[id] = this.values.get(id)?.toArray() ?? [];
        }
        return out;
    }
}
