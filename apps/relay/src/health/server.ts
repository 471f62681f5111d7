import { createServer, IncomingMessage, ServerResponse, type Server } from "http";
import { createChildLogger } from "../log/logger.js";
import type { ConnectionStatus } from "../streaming/connectionState.js";
import type { MetricsCollector, MetricsSnapshot } from "../streaming/metrics.js";

const logger = createChildLogger({ module: "health" });

interface HealthStatus {
    status: "ok" | "degraded" | "unhealthy";
    timestamp: string;
    uptimeMs: number;
    connection: ConnectionStatus;
    activeStreams: number;
    backpressuredStreams: string[];
}

/**
 * ok: broker connected and no stream under backpressure
 * degraded: connecting or reconnecting, or some stream backpressured
 * unhealthy: connection closed for good
 */
export function getHealthStatus(snapshot: MetricsSnapshot): HealthStatus {
    const streams = Object.values(snapshot.streams).filter((stream) => stream.active);
    const backpressuredStreams = streams
        .filter((stream) => stream.backpressured)
        .map((stream) => stream.streamId);
    const connection = snapshot.connection.status;

    let status: HealthStatus["status"] = "ok";
    if (connection === "closed") {
        status = "unhealthy";
    } else if (connection !== "connected" || backpressuredStreams.length > 0) {
        status = "degraded";
    }

    return {
        status,
        timestamp: new Date(snapshot.takenAt).toISOString(),
        uptimeMs: snapshot.uptimeMs,
        connection,
        activeStreams: streams.length,
        backpressuredStreams,
    };
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown) {
    res.writeHead(statusCode, { "Content-Type": "application/json" });
    res.end(JSON.stringify(body));
}

export function createRequestHandler(metrics: MetricsCollector) {
    return (req: IncomingMessage, res: ServerResponse) => {
        if (req.method !== "GET") {
            res.writeHead(405);
            res.end("Method Not Allowed");
            return;
        }

        try {
            if (req.url === "/health") {
                const health = getHealthStatus(metrics.snapshot());
                sendJson(res, health.status === "unhealthy" ? 503 : 200, health);
            } else if (req.url === "/metrics") {
                sendJson(res, 200, metrics.snapshot());
            } else {
                res.writeHead(404);
                res.end("Not Found");
            }
        } catch (err) {
            logger.error({ err }, "Health request failed");
            sendJson(res, 500, { status: "error", error: String(err) });
        }
    };
}

export function startHealthServer(metrics: MetricsCollector, port: number): Server {
    const server = createServer(createRequestHandler(metrics));
    server.listen(port, () => {
        logger.info({ port }, "Health server started");
    });
    return server;
}
