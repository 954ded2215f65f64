import path from "node:path";
import { toNumber } from "./helpers";

export interface MqttSettings {
    url: string;
    username?: string;
    password?: string;
}

export interface AppConfig {
    port: number;
    host: string;
    corsOrigins: string[];
    logLevel: string;
    // data client follows the selection, supervisor client watches `<prefix>/#`
    mqtt: MqttSettings;
    supervisor: MqttSettings;
    topicPrefix: string;
    sampleHz: number;
    windowSeconds: number;
    bufferMargin: number;
    refreshMs: number;
    sensorStaleSeconds: number;
    catalogPath: string;
}

const DEFAULT_CATALOG_PATH = path.resolve(__dirname, "../config/sensor-types.json");

function positive(value: string | undefined, fallback: number): number {
    const num = toNumber(value);
    return num !== null && num > 0 ? num : fallback;
}

function nonNegativeInt(value: string | undefined, fallback: number): number {
    const num = toNumber(value);
    return num !== null && num >= 0 ? Math.floor(num) : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const url = env.MQTT_URL ?? "mqtt://mosquitto:1883";

    return {
        port: nonNegativeInt(env.BACKEND_PORT, 4000),
        host: env.BACKEND_HOST ?? "0.0.0.0",
        // CORS only development
        corsOrigins: (env.CORS_ORIGINS ?? "http://localhost:5173")
            .split(",")
            .map((o) => o.trim())
            .filter(Boolean),
        logLevel: env.LOG_LEVEL ?? "info",
        mqtt: {
            url,
            username: env.MQTT_USERNAME || undefined,
            password: env.MQTT_PASSWORD || undefined,
        },
        supervisor: {
            url,
            username: env.MQTT_SUPERVISOR_USERNAME || env.MQTT_USERNAME || undefined,
            password: env.MQTT_SUPERVISOR_PASSWORD || env.MQTT_PASSWORD || undefined,
        },
        topicPrefix: env.TOPIC_PREFIX || "lab",
        sampleHz: positive(env.SAMPLE_HZ, 4),
        windowSeconds: positive(env.WINDOW_SECONDS, 60),
        bufferMargin: nonNegativeInt(env.BUFFER_MARGIN, 10),
        refreshMs: positive(env.REFRESH_MS, 250),
        sensorStaleSeconds: positive(env.SENSOR_STALE_SECONDS, 5),
        catalogPath: env.SENSOR_CATALOG_PATH ?? DEFAULT_CATALOG_PATH,
    };
}

export function bufferCapacity(config: Pick<AppConfig, "sampleHz" | "windowSeconds" | "bufferMargin">): number {
    return Math.ceil(config.windowSeconds * config.sampleHz) + config.bufferMargin;
}
