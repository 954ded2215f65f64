import type { Logger } from "pino";
import type { DiscoveredSensor, DiscoveryTracker } from "./discovery";
import type { SelectionManager } from "./selection";
import type { TelemetryStore } from "./state/telemetryStore";
import type { CurrentView } from "./types";

export interface RefreshDeps {
    store: TelemetryStore;
    discovery: DiscoveryTracker;
    selection: SelectionManager;
    sensorStaleSeconds: number;
    logger: Logger;
}

// sweep discovery and pull stale sensors out of the selection
export function pruneSensors(deps: RefreshDeps, now: number): DiscoveredSensor[] {
    const { active, evicted } = deps.discovery.activeSensors(now, deps.sensorStaleSeconds);
    if (evicted.length > 0) {
        deps.logger.info({ sensors: evicted }, "stale sensors evicted");
        deps.selection.dropSensors(evicted);
    }
    return active;
}

export function refreshOnce(deps: RefreshDeps, now: number = Date.now()): CurrentView {
    deps.store.tick();
    pruneSensors(deps, now);
    return deps.store.currentView();
}

/**
 * Read side of the store: every `intervalMs` run the auto-stop check, evict
 * stale sensors and hand the current view to `onView`.
 * Returns a function that stops the loop.
 */
export function startRefreshLoop(
    deps: RefreshDeps,
    intervalMs: number,
    onView: (view: CurrentView) => void,
): () => void {
    const timer = setInterval(() => {
        try {
            onView(refreshOnce(deps));
        } catch (err) {
            deps.logger.error({ err }, "refresh tick failed");
        }
    }, intervalMs);

    return () => clearInterval(timer);
}
