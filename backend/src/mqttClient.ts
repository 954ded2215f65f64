import mqtt, { MqttClient } from "mqtt";
import type { Logger } from "pino";
import type { MqttSettings } from "./config";
import { SubscriptionError } from "./errors";
import type { Transport } from "./types";

export interface MqttClientHandlers {
    onMessage: (topic: string, payload: Buffer) => void;
    // called on every (re)connect, after the broker accepted the session
    onConnected?: (client: MqttClient) => void;
}

export function createMqttClient(
    settings: MqttSettings,
    role: "supervisor" | "data",
    handlers: MqttClientHandlers,
    logger: Logger,
): MqttClient {
    const log = logger.child({ module: "mqtt", role });
    const clientId = `telemetry-${role}-${Math.random().toString(16).slice(2)}`;

    const client = mqtt.connect(settings.url, {
        clientId,
        username: settings.username,
        password: settings.password,
    });

    client.on("connect", (connack) => {
        log.info({ url: settings.url, returnCode: connack.returnCode ?? connack.reasonCode ?? 0 }, "[MQTT] connected");
        handlers.onConnected?.(client);
    });

    client.on("message", (topic: string, payload: Buffer) => {
        handlers.onMessage(topic, payload);
    });

    client.on("error", (err) => {
        log.error({ err }, "[MQTT] error");
    });

    client.on("close", () => {
        log.info("[MQTT] connection closed");
    });

    return client;
}

// Fire-and-forget subscribe/unsubscribe; broker-side failures are logged
export class MqttTransport implements Transport {
    private readonly log: Logger;

    constructor(
        private readonly client: MqttClient,
        logger: Logger,
    ) {
        this.log = logger.child({ module: "mqtt", role: "data" });
    }

    subscribe(topic: string): void {
        this.client.subscribe(topic, (err) => {
            if (err) {
                this.log.error({ err: new SubscriptionError("subscribe", topic, err) }, "[MQTT] subscribe error");
            } else {
                this.log.info({ topic }, "[MQTT] subscribed");
            }
        });
    }

    unsubscribe(topic: string): void {
        this.client.unsubscribe(topic, (err) => {
            if (err) {
                this.log.error({ err: new SubscriptionError("unsubscribe", topic, err) }, "[MQTT] unsubscribe error");
            } else {
                this.log.info({ topic }, "[MQTT] unsubscribed");
            }
        });
    }
}
