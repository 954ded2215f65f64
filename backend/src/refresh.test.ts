import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DiscoveryTracker } from "./discovery";
import { refreshOnce, startRefreshLoop, type RefreshDeps } from "./refresh";
import { createEngine, movSample, silentLogger } from "./test-utils";
import type { CurrentView } from "./types";

function setup() {
    const engine = createEngine();
    const discovery = new DiscoveryTracker();
    const deps: RefreshDeps = {
        store: engine.store,
        discovery,
        selection: engine.selection,
        sensorStaleSeconds: 5,
        logger: silentLogger,
    };
    return { ...engine, discovery, deps };
}

describe("refreshOnce", () => {
    it("runs the auto-stop check before building the view", () => {
        const { deps, selection, store, ingestion } = setup();
        selection.setSensors(["SensorMov"]);
        store.configureDuration(0.5, "seconds");
        store.start();
        ingestion.onSample("SensorMov", movSample(100));
        ingestion.onSample("SensorMov", movSample(110));

        const view = refreshOnce(deps, 0);

        expect(view.session.state).toBe("stopped");
        expect(view.times).toEqual([0, 0.25]);
    });

    it("removes selected sensors that went stale", () => {
        const { deps, discovery, selection, store, transport } = setup();
        discovery.onAnnouncement("SensorMov", 1_000);
        discovery.onAnnouncement("SensorLux", 9_000);
        selection.setSensors(["SensorMov", "SensorLux"]);
        transport.calls = [];

        refreshOnce(deps, 10_000);

        expect(store.selection.selectedSensors).toEqual(["SensorLux"]);
        expect(transport.calls).toEqual([{ action: "unsubscribe", topic: "lab/SensorMov/data" }]);
    });
});

describe("startRefreshLoop", () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it("publishes the view every interval until stopped", () => {
        const { deps } = setup();
        const views: CurrentView[] = [];

        const stop = startRefreshLoop(deps, 250, (view) => views.push(view));
        vi.advanceTimersByTime(1_000);
        expect(views).toHaveLength(4);

        stop();
        vi.advanceTimersByTime(1_000);
        expect(views).toHaveLength(4);
        expect(views[0].isLive).toBe(true);
    });

    it("keeps running when a consumer throws", () => {
        const { deps } = setup();
        const onView = vi.fn(() => {
            throw new Error("socket gone");
        });

        const stop = startRefreshLoop(deps, 100, onView);
        vi.advanceTimersByTime(300);
        stop();

        expect(onView).toHaveBeenCalledTimes(3);
    });
});
