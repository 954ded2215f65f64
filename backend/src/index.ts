import "dotenv/config";
import { loadMetricCatalog } from "./catalog";
import { bufferCapacity, loadConfig } from "./config";
import { DiscoveryTracker, discoveryTopic, parseDataTopic } from "./discovery";
import { IngestionPipeline } from "./ingestion";
import { logger } from "./logger";
import { createMqttClient, MqttTransport } from "./mqttClient";
import { startRefreshLoop } from "./refresh";
import { SelectionManager } from "./selection";
import { buildServer } from "./server";
import { TelemetryStore } from "./state/telemetryStore";

async function main(): Promise<void> {
    const config = loadConfig();
    logger.level = config.logLevel;

    const catalog = loadMetricCatalog(config.catalogPath, 1 / config.sampleHz);
    const store = new TelemetryStore({
        capacity: bufferCapacity(config),
        logger: logger.child({ module: "store" }),
    });
    const discovery = new DiscoveryTracker();

    const ingestion = new IngestionPipeline({
        store,
        catalog,
        topicPrefix: config.topicPrefix,
        logger: logger.child({ module: "ingestion" }),
    });

    // data client: follows the selection, resubscribes after every reconnect
    const dataClient = createMqttClient(
        config.mqtt,
        "data",
        {
            onMessage: (topic, payload) => {
                ingestion.onMessage(topic, payload);
            },
            onConnected: () => selection.resubscribeAll(),
        },
        logger,
    );

    const selection = new SelectionManager({
        store,
        catalog,
        transport: new MqttTransport(dataClient, logger),
        topicPrefix: config.topicPrefix,
        logger: logger.child({ module: "selection" }),
    });

    // supervisor client: discovery only
    const supervisorClient = createMqttClient(
        config.supervisor,
        "supervisor",
        {
            onMessage: (topic) => {
                const sensorId = parseDataTopic(topic, config.topicPrefix);
                if (sensorId) discovery.onAnnouncement(sensorId, Date.now());
            },
            onConnected: (client) => {
                const topic = discoveryTopic(config.topicPrefix);
                client.subscribe(topic, (err) => {
                    if (err) {
                        logger.error({ err, topic }, "[MQTT] discovery subscribe error");
                    }
                });
            },
        },
        logger,
    );

    const refreshDeps = {
        store,
        discovery,
        selection,
        sensorStaleSeconds: config.sensorStaleSeconds,
        logger: logger.child({ module: "refresh" }),
    };

    const { fastify, broadcast } = await buildServer({
        ...refreshDeps,
        catalog,
        corsOrigins: config.corsOrigins,
    });

    const stopRefresh = startRefreshLoop(refreshDeps, config.refreshMs, broadcast);

    fastify.addHook("onClose", async () => {
        stopRefresh();
        await Promise.all([dataClient.endAsync(), supervisorClient.endAsync()]);
    });

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            fastify.log.info({ signal }, "shutting down");
            fastify.close().then(
                () => process.exit(0),
                (err: unknown) => {
                    fastify.log.error({ err }, "shutdown failed");
                    process.exit(1);
                },
            );
        });
    }

    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Server listening on ${config.port}`);
}

main().catch((err) => {
    logger.error({ err }, "startup failed");
    process.exit(1);
});
