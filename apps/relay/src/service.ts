import type { Server } from "http";
import type { RelayConfig } from "@streamrelay/shared";
import { startHealthServer } from "./health/server.js";
import { createChildLogger } from "./log/logger.js";
import { ClockSyncRegistry } from "./streaming/clockSync.js";
import type { ErrorReporter } from "./streaming/errorReporter.js";
import { MetricsCollector } from "./streaming/metrics.js";
import { ReliabilityController, type ShutdownReport } from "./streaming/reliabilityController.js";
import { StreamRelay } from "./streaming/relay.js";
import {
    createSystemReferenceClock,
    TimestampManager,
    type ReferenceClock,
} from "./streaming/timestampManager.js";
import type { BrokerCredentials, BrokerTransport } from "./transport/types.js";

const logger = createChildLogger({ module: "service" });

export interface RelayServiceOptions {
    config: RelayConfig;
    transport: BrokerTransport;
    credentials: BrokerCredentials;
    clock?: ReferenceClock;
    reporter?: ErrorReporter;
    /** Health/metrics HTTP port; no server when unset */
    healthPort?: number;
}

export interface RelayService {
    relay: StreamRelay;
    controller: ReliabilityController;
    metrics: MetricsCollector;
    /** Write side for the clock-sync collaborator */
    clockSync: ClockSyncRegistry;
    stop(graceMs?: number): Promise<ShutdownReport>;
}

/**
 * Wire the relay together. The clock, controller and timestamp manager
 * share one reference clock so send times and latencies agree.
 */
export function createRelayService(options: RelayServiceOptions): RelayService {
    const clock = options.clock ?? createSystemReferenceClock();
    const metrics = new MetricsCollector(options.config.latencyWindowSize);
    const clockSync = new ClockSyncRegistry();
    const controller = new ReliabilityController({
        transport: options.transport,
        credentials: options.credentials,
        config: options.config,
        metrics,
        clock,
        reporter: options.reporter,
    });
    const relay = new StreamRelay({
        controller,
        metrics,
        timestamps: new TimestampManager(clock),
        clockSync,
        reporter: options.reporter,
    });

    controller.on("state", (state) => {
        logger.info({ state }, "Broker connection state changed");
    });

    let server: Server | null = null;
    if (options.healthPort !== undefined) {
        server = startHealthServer(metrics, options.healthPort);
    }
    relay.start();

    return {
        relay,
        controller,
        metrics,
        clockSync,
        async stop(graceMs) {
            const report = await relay.stop(graceMs);
            if (server) {
                await closeServer(server);
            }
            logger.info(metrics.getSummary());
            return report;
        },
    };
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}

/**
 * Stop on SIGTERM/SIGINT. A second signal exits immediately.
 */
export function installShutdownHandlers(service: RelayService): void {
    let shuttingDown = false;

    const shutdown = () => {
        if (shuttingDown) {
            logger.warn("Second shutdown signal, exiting now");
            process.exit(1);
        }
        shuttingDown = true;
        logger.info("Shutting down...");
        service
            .stop()
            .then(() => process.exit(0))
            .catch((err) => {
                logger.fatal({ err }, "Shutdown failed");
                process.exit(1);
            });
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
}
