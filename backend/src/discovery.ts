import type { SensorId } from "./types";

const DATA_SEGMENT = "data";

export interface DiscoveredSensor {
    id: SensorId;
    lastSeen: number; // unix ms
}

export interface DiscoverySweep {
    active: DiscoveredSensor[];
    evicted: SensorId[];
}

export function dataTopic(prefix: string, sensorId: SensorId): string {
    return `${prefix}/${sensorId}/${DATA_SEGMENT}`;
}

export function discoveryTopic(prefix: string): string {
    return `${prefix}/#`;
}

// `<prefix>/<sensorId>/data[/...]` -> sensorId
export function parseDataTopic(topic: string, prefix: string): SensorId | null {
    const parts = topic.split("/");
    if (parts.length < 3) return null;
    if (parts[0] !== prefix || parts[2] !== DATA_SEGMENT) return null;
    return parts[1] || null;
}

/**
 * Sensors currently announcing themselves on the discovery wildcard.
 * Kept apart from the telemetry store: discovery never waits on measurement.
 */
export class DiscoveryTracker {
    private readonly lastSeen = new Map<SensorId, number>();

    onAnnouncement(sensorId: SensorId, timestamp: number): void {
        if (!sensorId) return;
        const previous = this.lastSeen.get(sensorId);
        if (previous === undefined || timestamp > previous) {
            this.lastSeen.set(sensorId, timestamp);
        }
    }

    // sensors seen within the window; stale ones are evicted and reported
    activeSensors(now: number, staleAfterSeconds: number): DiscoverySweep {
        const cutoff = now - staleAfterSeconds * 1000;
        const active: DiscoveredSensor[] = [];
        const evicted: SensorId[] = [];

        for (const [id, lastSeen] of this.lastSeen) {
            if (lastSeen >= cutoff) {
                active.push({ id, lastSeen });
            } else {
                evicted.push(id);
            }
        }
        for (const id of evicted) this.lastSeen.delete(id);

        active.sort((a, b) => a.id.localeCompare(b.id));
        return { active, evicted };
    }

    lastSeenAt(sensorId: SensorId): number | null {
        return this.lastSeen.get(sensorId) ?? null;
    }

    get size(): number {
        return this.lastSeen.size;
    }
}
