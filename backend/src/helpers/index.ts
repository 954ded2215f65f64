import type { MetricId, QualifiedMetricId, SensorId } from "../types";

const SENSOR_NAME_PREFIX = "Sensor";

// normalize to number | null
export function toNumber(value: unknown): number | null {
    if (typeof value !== "number" && typeof value !== "string") return null;
    if (typeof value === "string" && value.trim() === "") return null;
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
}

// integers and integer-valued floats only, e.g. 1000, "1000", 1000.0
export function toInt(value: unknown): number | null {
    const num = toNumber(value);
    if (num === null || !Number.isInteger(num)) return null;
    return num;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function hasField(fields: Record<string, unknown>, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(fields, key);
}

export function qualify(sensorId: SensorId, metricId: MetricId): QualifiedMetricId {
    return `${sensorId}:${metricId}`;
}

/**
 * Type key of a sensor from its `Sensor<Type>` naming convention.
 * `SensorMov` -> `Mov`; ids without the prefix are their own type.
 */
export function sensorType(sensorId: SensorId): string {
    if (sensorId.startsWith(SENSOR_NAME_PREFIX) && sensorId.length > SENSOR_NAME_PREFIX.length) {
        return sensorId.slice(SENSOR_NAME_PREFIX.length);
    }
    return sensorId;
}

// drop empty and repeated entries, keep first-seen order
export function uniqueInOrder(items: readonly string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const item of items) {
        if (!item || seen.has(item)) continue;
        seen.add(item);
        result.push(item);
    }
    return result;
}

export function sameMembers(a: readonly string[], b: readonly string[]): boolean {
    const left = new Set(a);
    const right = new Set(b);
    if (left.size !== right.size) return false;
    for (const item of left) {
        if (!right.has(item)) return false;
    }
    return true;
}
