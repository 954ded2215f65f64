import { describe, it, expect } from "vitest";
import { MetricCatalog } from "./catalog";
import { createCatalog } from "./test-utils";

describe("MetricCatalog", () => {
    const catalog = createCatalog();

    it("resolves profiles through the sensor type", () => {
        const profile = catalog.profileFor("SensorMov");
        expect(profile.type).toBe("Mov");
        expect(profile.requiredFields).toEqual(["t_ms", "cm", "v_cm_s", "a_cm_s2"]);
        expect(profile.metrics.map((m) => m.id)).toEqual(["dist_m", "vel_m_s", "acc_m_s2"]);
        expect(profile.metrics[0]).toMatchObject({ sourceKey: "cm", scale: 0.01, unit: "m" });
    });

    it("falls back to the default profile for unknown types", () => {
        const profile = catalog.profileFor("SensorPressure");
        expect(profile.type).toBe("default");
        expect(profile.requiredFields).toEqual(["t_ms"]);
        expect(profile.metrics).toEqual([]);
        expect(profile.droppedCountField).toBe("avg_dropped");
        expect(catalog.isKnownType("SensorPressure")).toBe(false);
    });

    it("uses the global sample period unless the type sets one", () => {
        expect(catalog.profileFor("SensorLux").samplePeriodS).toBe(0.25);

        const custom = new MetricCatalog(
            { types: { Fast: { samplePeriodS: 0.1, metrics: [{ id: "v", sourceKey: "v" }] } } },
            0.25,
        );
        expect(custom.profileFor("SensorFast").samplePeriodS).toBe(0.1);
    });

    it("keeps catalog order and default flags", () => {
        const metrics = catalog.profileFor("SensorGyro").metrics;
        expect(metrics.filter((m) => m.defaultEnabled).map((m) => m.id)).toEqual(["temp_c", "ax"]);
        expect(catalog.metricIds("SensorGyro")).toHaveLength(7);
    });

    it("uses the sensor id as display name for unknown types", () => {
        expect(catalog.displayName("SensorMov")).toBe("Motion sensor");
        expect(catalog.displayName("probe-7")).toBe("probe-7");
    });

    it("fills metric defaults", () => {
        const minimal = new MetricCatalog({ types: { T: { metrics: [{ id: "t", sourceKey: "temp" }] } } }, 1);
        expect(minimal.profileFor("T").metrics[0]).toEqual({
            id: "t",
            sourceKey: "temp",
            scale: 1,
            label: "t",
            unit: "",
            color: "#1f77b4",
            defaultEnabled: true,
        });
        expect(minimal.profileFor("T").timestampField).toBe("t_ms");
    });

    it("rejects duplicate metric ids within a type", () => {
        expect(
            () =>
                new MetricCatalog(
                    {
                        types: {
                            T: {
                                metrics: [
                                    { id: "x", sourceKey: "a" },
                                    { id: "x", sourceKey: "b" },
                                ],
                            },
                        },
                    },
                    1,
                ),
        ).toThrow('Duplicate metric id "x" in sensor type "T"');
    });
});
