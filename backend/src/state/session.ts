import type { DurationUnit, SessionState, SessionStatus } from "../types";

/**
 * Measurement session state machine.
 *
 *   idle -> start -> running -> stop | duration exceeded -> stopped -> start -> running
 *
 * Archiving (running | stopped -> idle) is driven by the store, which owns the buffers.
 */
export class MeasurementSession {
    state: SessionState = "idle";
    sampleIndex = 0;
    elapsedSeconds = 0;
    durationLimitSeconds: number | null = null;

    get isRunning(): boolean {
        return this.state === "running";
    }

    start(): void {
        this.state = "running";
        this.rewind();
    }

    // returns false when there was nothing to stop
    stop(): boolean {
        if (this.state !== "running") return false;
        this.state = "stopped";
        return true;
    }

    finish(): void {
        this.state = "idle";
        this.rewind();
    }

    // full reset, used when the sensor set changes
    reset(): void {
        this.finish();
        this.durationLimitSeconds = null;
    }

    /**
     * Claim the next slot on the time axis: returns its time and moves the
     * index forward, so elapsedSeconds is always sampleIndex * period.
     */
    advance(samplePeriodS: number): number {
        const t = this.sampleIndex * samplePeriodS;
        this.sampleIndex += 1;
        this.elapsedSeconds = this.sampleIndex * samplePeriodS;
        return t;
    }

    configureDuration(value: number, unit: DurationUnit): number | null {
        if (!Number.isFinite(value) || value <= 0) {
            this.durationLimitSeconds = null;
        } else {
            this.durationLimitSeconds = unit === "minutes" ? value * 60 : value;
        }
        return this.durationLimitSeconds;
    }

    durationExceeded(): boolean {
        return (
            this.state === "running" &&
            this.durationLimitSeconds !== null &&
            this.elapsedSeconds >= this.durationLimitSeconds
        );
    }

    status(): SessionStatus {
        return {
            state: this.state,
            sampleIndex: this.sampleIndex,
            elapsedSeconds: this.elapsedSeconds,
            durationLimitSeconds: this.durationLimitSeconds,
        };
    }

    private rewind(): void {
        this.sampleIndex = 0;
        this.elapsedSeconds = 0;
    }
}
