import { describe, it, expect } from "vitest";
import { InvalidSelectionError } from "./errors";
import { createEngine, movSample } from "./test-utils";

describe("SelectionManager.setSensors", () => {
    it("subscribes one data topic per sensor and derives qualified ids", () => {
        const { selection, store, transport } = createEngine();

        const change = selection.setSensors(["SensorMov", "SensorLux", "SensorMov"]);

        expect(change).toEqual({
            reset: true,
            subscribed: ["lab/SensorMov/data", "lab/SensorLux/data"],
            unsubscribed: [],
        });
        expect(store.selection.selectedSensors).toEqual(["SensorMov", "SensorLux"]);
        expect(store.selection.activeQualifiedIds).toEqual([
            "SensorMov:dist_m",
            "SensorMov:vel_m_s",
            "SensorMov:acc_m_s2",
            "SensorLux:Lux",
        ]);
        expect(transport.calls).toEqual([
            { action: "subscribe", topic: "lab/SensorMov/data" },
            { action: "subscribe", topic: "lab/SensorLux/data" },
        ]);
    });

    it("issues no transport calls when the same set is selected again", () => {
        const { selection, transport } = createEngine();
        selection.setSensors(["SensorMov", "SensorLux"]);
        transport.calls = [];

        const change = selection.setSensors(["SensorLux", "SensorMov"]);

        expect(change).toEqual({ reset: false, subscribed: [], unsubscribed: [] });
        expect(transport.calls).toEqual([]);
    });

    it("only touches topics that changed", () => {
        const { selection, transport } = createEngine();
        selection.setSensors(["SensorMov", "SensorLux"]);
        transport.calls = [];

        selection.setSensors(["SensorLux", "SensorGyro"]);

        expect(transport.calls).toEqual([
            { action: "unsubscribe", topic: "lab/SensorMov/data" },
            { action: "subscribe", topic: "lab/SensorGyro/data" },
        ]);
        expect(selection.activeTopics()).toEqual(["lab/SensorLux/data", "lab/SensorGyro/data"]);
    });

    it("resets buffers, last values and the session when the sensor set changes", () => {
        const { selection, store, ingestion } = createEngine();
        selection.setSensors(["SensorMov"]);
        store.configureDuration(30, "seconds");
        store.start();
        ingestion.onSample("SensorMov", movSample(250));
        ingestion.onSample("SensorMov", movSample(300));

        selection.setSensors(["SensorMov", "SensorLux"]);

        const view = store.currentView();
        expect(view.session).toEqual({
            state: "idle",
            sampleIndex: 0,
            elapsedSeconds: 0,
            durationLimitSeconds: null,
        });
        expect(view.times).toEqual([]);
        expect(view.values["SensorMov:dist_m"]).toEqual([]);
        expect(view.lastValues["SensorMov:dist_m"]).toBeNull();
        expect(view.lastTime).toBeNull();
    });

    it("keeps saved series across a sensor change", () => {
        const { selection, store, ingestion } = createEngine();
        selection.setSensors(["SensorMov"]);
        store.start();
        ingestion.onSample("SensorMov", movSample(250));
        store.save();

        selection.setSensors(["SensorLux"]);

        expect(store.snapshotNames()).toEqual(["Series 1"]);
    });

    it("rejects sensors without configured metrics and keeps the previous selection", () => {
        const { selection, store, transport } = createEngine();
        selection.setSensors(["SensorMov"]);
        transport.calls = [];

        expect(() => selection.setSensors(["SensorMov", "SensorPressure"])).toThrow(InvalidSelectionError);
        expect(store.selection.selectedSensors).toEqual(["SensorMov"]);
        expect(transport.calls).toEqual([]);
    });

    it("deselects everything for an empty list", () => {
        const { selection, store, transport } = createEngine();
        selection.setSensors(["SensorMov"]);
        transport.calls = [];

        const change = selection.setSensors([]);

        expect(change.unsubscribed).toEqual(["lab/SensorMov/data"]);
        expect(store.selection.selectedSensors).toEqual([]);
        expect(store.selection.activeQualifiedIds).toEqual([]);
    });

    it("keeps the selection when the transport throws", () => {
        const { selection, store, transport } = createEngine();
        transport.failOn.add("lab/SensorLux/data");

        const change = selection.setSensors(["SensorLux"]);

        expect(change.subscribed).toEqual(["lab/SensorLux/data"]);
        expect(store.selection.selectedSensors).toEqual(["SensorLux"]);
        expect(transport.calls).toEqual([]);
    });

    it("keeps channel restrictions for sensors that stay selected", () => {
        const { selection, store } = createEngine();
        selection.setSensors(["SensorMov", "SensorGyro"]);
        selection.setChannels("SensorMov", ["dist_m"]);
        selection.setChannels("SensorGyro", ["ax"]);

        selection.setSensors(["SensorMov", "SensorLux"]);

        expect(store.selection.activeQualifiedIds).toEqual(["SensorMov:dist_m", "SensorLux:Lux"]);
        expect([...store.selection.channelMap.keys()]).toEqual(["SensorMov"]);
    });
});

describe("SelectionManager.setChannels", () => {
    it("narrows active metrics without resetting a running session", () => {
        const { selection, store, ingestion } = createEngine();
        selection.setSensors(["SensorMov"]);
        store.start();
        ingestion.onSample("SensorMov", movSample(250));
        ingestion.onSample("SensorMov", movSample(260));

        selection.setChannels("SensorMov", ["dist_m"]);

        const view = store.currentView();
        expect(view.metricIds).toEqual(["SensorMov:dist_m"]);
        expect(view.session.state).toBe("running");
        expect(view.session.sampleIndex).toBe(2);
        expect(view.values["SensorMov:dist_m"]).toEqual([2.5, 2.6]);
    });

    it("back-fills a re-enabled metric so buffers stay aligned", () => {
        const { selection, store, ingestion } = createEngine();
        selection.setSensors(["SensorMov"]);
        selection.setChannels("SensorMov", ["dist_m"]);
        store.start();
        ingestion.onSample("SensorMov", movSample(250));

        selection.setChannels("SensorMov", ["dist_m", "vel_m_s"]);
        ingestion.onSample("SensorMov", movSample(260, { v_cm_s: 50 }));

        const view = store.currentView();
        expect(view.times).toEqual([0, 0.25]);
        expect(view.values["SensorMov:vel_m_s"]).toEqual([null, 0.5]);
        expect(view.values["SensorMov:dist_m"]).toHaveLength(2);
    });

    it("fails with InvalidSelection for an empty set and keeps the channel map", () => {
        const { selection, store } = createEngine();
        selection.setSensors(["SensorMov"]);
        selection.setChannels("SensorMov", ["dist_m", "vel_m_s"]);
        const before = store.selection;

        expect(() => selection.setChannels("SensorMov", [])).toThrow(InvalidSelectionError);
        expect(store.selection).toBe(before);
        expect([...(store.selection.channelMap.get("SensorMov") ?? [])]).toEqual(["dist_m", "vel_m_s"]);
    });

    it("rejects unknown channels and sensors that are not selected", () => {
        const { selection } = createEngine();
        selection.setSensors(["SensorMov"]);

        expect(() => selection.setChannels("SensorMov", ["dist_m", "Lux"])).toThrow(
            "Unknown channels for SensorMov: Lux",
        );
        expect(() => selection.setChannels("SensorLux", ["Lux"])).toThrow("Sensor SensorLux is not selected");
    });
});

describe("SelectionManager.dropSensors", () => {
    it("removes stale selected sensors", () => {
        const { selection, store, transport } = createEngine();
        selection.setSensors(["SensorMov", "SensorLux"]);
        transport.calls = [];

        const change = selection.dropSensors(["SensorLux", "SensorGyro"]);

        expect(change).toEqual({ reset: true, subscribed: [], unsubscribed: ["lab/SensorLux/data"] });
        expect(store.selection.selectedSensors).toEqual(["SensorMov"]);
    });

    it("does nothing when no selected sensor went stale", () => {
        const { selection, transport } = createEngine();
        selection.setSensors(["SensorMov"]);
        transport.calls = [];

        expect(selection.dropSensors(["SensorGyro"])).toBeNull();
        expect(transport.calls).toEqual([]);
    });
});

describe("SelectionManager.resubscribeAll", () => {
    it("subscribes every active topic again", () => {
        const { selection, transport } = createEngine();
        selection.setSensors(["SensorMov", "SensorLux"]);
        transport.calls = [];

        selection.resubscribeAll();

        expect(transport.calls).toEqual([
            { action: "subscribe", topic: "lab/SensorMov/data" },
            { action: "subscribe", topic: "lab/SensorLux/data" },
        ]);
    });
});
