export type TelemetryErrorCode =
    | "INVALID_SELECTION"
    | "EMPTY_RECORDING"
    | "NOTHING_TO_EXPORT"
    | "SUBSCRIPTION_FAILED";

export class TelemetryError extends Error {
    constructor(
        message: string,
        readonly code: TelemetryErrorCode,
        readonly statusCode: number,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

// empty or unknown channel set, or a sensor that cannot be selected
export class InvalidSelectionError extends TelemetryError {
    constructor(message: string) {
        super(message, "INVALID_SELECTION", 400);
    }
}

export class EmptyRecordingError extends TelemetryError {
    constructor(message = "No recorded samples to save") {
        super(message, "EMPTY_RECORDING", 409);
    }
}

export class NothingToExportError extends TelemetryError {
    constructor(message = "No saved series to export") {
        super(message, "NOTHING_TO_EXPORT", 409);
    }
}

// logged only; the selection keeps the topic as subscribed
export class SubscriptionError extends TelemetryError {
    constructor(
        readonly action: "subscribe" | "unsubscribe",
        readonly topic: string,
        readonly reason: unknown,
    ) {
        super(`${action} failed for ${topic}`, "SUBSCRIPTION_FAILED", 502);
    }
}
