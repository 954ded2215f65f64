import pino from "pino";

// one root logger, handed to Fastify as well so request logs share the stream
export const logger = pino({
    name: "telemetry-backend",
    level: process.env.LOG_LEVEL ?? "info",
});
