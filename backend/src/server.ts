import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import type { WebSocket } from "ws";
import { z } from "zod";
import type { MetricCatalog } from "./catalog";
import { TelemetryError } from "./errors";
import { buildExportTable, toCsv } from "./exportCsv";
import { qualify, sensorType } from "./helpers";
import { pruneSensors, type RefreshDeps } from "./refresh";
import type { ActiveSelection, CurrentView } from "./types";

export interface ServerDeps extends RefreshDeps {
    catalog: MetricCatalog;
    corsOrigins: string[];
}

const sensorsBodySchema = z.object({
    sensors: z.array(z.string()),
});

const channelsBodySchema = z.object({
    metrics: z.array(z.string()),
});

const durationBodySchema = z.object({
    value: z.coerce.number(),
    unit: z.enum(["seconds", "minutes"]).default("seconds"),
});

const displayBodySchema = z.object({
    name: z.string().nullable(),
});

function describeIssues(error: z.ZodError): string {
    return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

function serializeSelection(selection: ActiveSelection) {
    const channels: Record<string, string[]> = {};
    for (const [sensorId, metricIds] of selection.channelMap) {
        channels[sensorId] = [...metricIds];
    }
    return {
        sensors: [...selection.selectedSensors],
        channels,
        metricIds: [...selection.activeQualifiedIds],
    };
}

export async function buildServer(deps: ServerDeps) {
    const { store, selection, catalog } = deps;

    const fastify = Fastify({
        logger: deps.logger,
    });

    const wsClients = new Set<WebSocket>();

    function broadcast(view: CurrentView): void {
        const payload = JSON.stringify({ type: "view", view });
        for (const client of wsClients) {
            try {
                if (client.readyState === client.OPEN) {
                    client.send(payload);
                }
            } catch (err) {
                fastify.log.error({ err }, "WS broadcast error");
            }
        }
    }

    await fastify.register(websocket);
    // CORS only development
    await fastify.register(cors, {
        origin: deps.corsOrigins,
    });

    fastify.setErrorHandler((error, request, reply) => {
        if (error instanceof TelemetryError) {
            reply.status(error.statusCode).send({ error: error.message, code: error.code });
            return;
        }
        const statusCode = error.statusCode ?? 500;
        if (statusCode >= 500) {
            request.log.error({ err: error }, "request failed");
        }
        reply.status(statusCode).send({ error: error.message });
    });

    fastify.get("/ws", { websocket: true }, (socket) => {
        wsClients.add(socket);
        socket.send(JSON.stringify({ type: "view", view: store.currentView() }));

        socket.on("close", () => {
            wsClients.delete(socket);
        });
    });

    fastify.get("/health", async () => ({ status: "ok" }));

    fastify.get("/api/sensors", async () => {
        const active = pruneSensors(deps, Date.now());
        return {
            sensors: active.map((s) => ({
                id: s.id,
                type: sensorType(s.id),
                displayName: catalog.displayName(s.id),
                lastSeen: s.lastSeen,
                selected: store.isSelected(s.id),
                metrics: catalog.profileFor(s.id).metrics.map((m) => ({
                    ...m,
                    active: store.isActive(qualify(s.id, m.id)),
                })),
            })),
        };
    });

    fastify.get("/api/selection", async () => ({
        ...serializeSelection(store.selection),
        topics: selection.activeTopics(),
    }));

    fastify.put("/api/selection", async (request, reply) => {
        const parsed = sensorsBodySchema.safeParse(request.body);
        if (!parsed.success) {
            reply.status(400);
            return { error: describeIssues(parsed.error) };
        }
        const change = selection.setSensors(parsed.data.sensors);
        return { ...change, selection: serializeSelection(store.selection) };
    });

    fastify.put<{ Params: { sensorId: string } }>("/api/selection/:sensorId/channels", async (request, reply) => {
        const { sensorId } = request.params;
        const parsed = channelsBodySchema.safeParse(request.body);
        if (!parsed.success) {
            reply.status(400);
            return { error: describeIssues(parsed.error) };
        }
        return serializeSelection(selection.setChannels(sensorId, parsed.data.metrics));
    });

    fastify.get("/api/session", async () => store.sessionStatus());

    fastify.post("/api/session/start", async () => {
        store.start();
        return store.sessionStatus();
    });

    fastify.post("/api/session/stop", async () => {
        const stopped = store.stop();
        return { stopped, session: store.sessionStatus() };
    });

    fastify.post("/api/session/save", async () => {
        const snapshot = store.save();
        return { name: snapshot.name, samples: snapshot.times.length, session: store.sessionStatus() };
    });

    fastify.put("/api/session/duration", async (request, reply) => {
        const parsed = durationBodySchema.safeParse(request.body);
        if (!parsed.success) {
            reply.status(400);
            return { error: describeIssues(parsed.error) };
        }
        const durationLimitSeconds = store.configureDuration(parsed.data.value, parsed.data.unit);
        return { durationLimitSeconds };
    });

    fastify.get("/api/snapshots", async () => {
        const view = store.currentView();
        return { names: store.snapshotNames(), displayed: view.seriesName };
    });

    fastify.delete("/api/snapshots", async () => {
        store.clearAll();
        return { names: store.snapshotNames() };
    });

    fastify.put("/api/display", async (request, reply) => {
        const parsed = displayBodySchema.safeParse(request.body);
        if (!parsed.success) {
            reply.status(400);
            return { error: describeIssues(parsed.error) };
        }
        const found = store.selectForDisplay(parsed.data.name);
        const view = store.currentView();
        return { found, isLive: view.isLive, seriesName: view.seriesName };
    });

    fastify.get("/api/view", async () => store.currentView());

    fastify.get("/api/export.csv", async (_request, reply) => {
        const csv = toCsv(buildExportTable(store.snapshotList()));
        reply
            .header("content-type", "text/csv; charset=utf-8")
            .header("content-disposition", 'attachment; filename="series_export.csv"');
        return csv;
    });

    return { fastify, broadcast };
}
