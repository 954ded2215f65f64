import fs from "node:fs";
import { z } from "zod";
import { sensorType } from "./helpers";
import type { MetricDef, MetricId, SensorId, SensorProfile } from "./types";

const DEFAULT_TIMESTAMP_FIELD = "t_ms";

const metricDefSchema = z.object({
    id: z.string().min(1),
    sourceKey: z.string().min(1),
    scale: z.number().finite().default(1),
    label: z.string().optional(),
    unit: z.string().default(""),
    color: z.string().default("#1f77b4"),
    defaultEnabled: z.boolean().default(true),
});

const profileSchema = z.object({
    displayName: z.string().optional(),
    requiredFields: z.array(z.string()).default([DEFAULT_TIMESTAMP_FIELD]),
    timestampField: z.string().default(DEFAULT_TIMESTAMP_FIELD),
    metrics: z.array(metricDefSchema).default([]),
    droppedCountField: z.string().nullable().default(null),
    samplePeriodS: z.number().positive().optional(),
});

export const catalogFileSchema = z.object({
    defaultProfile: profileSchema.default({}),
    types: z.record(profileSchema).default({}),
});

export type CatalogFile = z.input<typeof catalogFileSchema>;
type ProfileEntry = z.output<typeof profileSchema>;

function toProfile(type: string, entry: ProfileEntry, defaultSamplePeriodS: number): SensorProfile {
    const metrics: MetricDef[] = entry.metrics.map((m) => ({
        id: m.id,
        sourceKey: m.sourceKey,
        scale: m.scale,
        label: m.label ?? m.id,
        unit: m.unit,
        color: m.color,
        defaultEnabled: m.defaultEnabled,
    }));

    const ids = new Set<MetricId>();
    for (const m of metrics) {
        if (ids.has(m.id)) {
            throw new Error(`Duplicate metric id "${m.id}" in sensor type "${type}"`);
        }
        ids.add(m.id);
    }

    return Object.freeze({
        type,
        displayName: entry.displayName ?? type,
        requiredFields: Object.freeze([...entry.requiredFields]),
        timestampField: entry.timestampField,
        metrics: Object.freeze(metrics),
        droppedCountField: entry.droppedCountField,
        samplePeriodS: entry.samplePeriodS ?? defaultSamplePeriodS,
    });
}

/**
 * Read-only lookup from sensor id to its type profile.
 * Unknown types resolve to the default profile, so lookups never fail.
 */
export class MetricCatalog {
    private readonly profiles = new Map<string, SensorProfile>();
    private readonly fallback: SensorProfile;

    constructor(file: CatalogFile, defaultSamplePeriodS: number) {
        const parsed = catalogFileSchema.parse(file);
        for (const [type, entry] of Object.entries(parsed.types)) {
            this.profiles.set(type, toProfile(type, entry, defaultSamplePeriodS));
        }
        this.fallback = toProfile("default", parsed.defaultProfile, defaultSamplePeriodS);
    }

    profileFor(sensorId: SensorId): SensorProfile {
        return this.profiles.get(sensorType(sensorId)) ?? this.fallback;
    }

    isKnownType(sensorId: SensorId): boolean {
        return this.profiles.has(sensorType(sensorId));
    }

    metricIds(sensorId: SensorId): MetricId[] {
        return this.profileFor(sensorId).metrics.map((m) => m.id);
    }

    displayName(sensorId: SensorId): string {
        return this.isKnownType(sensorId) ? this.profileFor(sensorId).displayName : sensorId;
    }
}

export function loadMetricCatalog(filePath: string, defaultSamplePeriodS: number): MetricCatalog {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    return new MetricCatalog(catalogFileSchema.parse(raw), defaultSamplePeriodS);
}
