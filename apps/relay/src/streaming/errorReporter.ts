import type { Logger } from "pino";
import { createChildLogger } from "../log/logger.js";

/**
 * Failures surfaced to the error-reporting collaborator. Per-message
 * failures are reported individually; a lost broker connection is reported
 * once with its impact on every stream.
 */
export type RelayFailure =
    | {
        kind: "delivery-failed";
        streamId: string;
        sequenceNumber: number;
        topic: string;
        attempts: number;
        error: string;
    }
    | {
        kind: "connection-failed";
        consecutiveFailures: number;
        error: string;
        /** Messages per stream that will not be delivered */
        undelivered: Record<string, number>;
    }
    | {
        kind: "dropped-on-shutdown";
        dropped: Record<string, number>;
    }
    | {
        kind: "source-disconnected";
        streamId: string;
        error: string;
    };

export interface ErrorReporter {
    report(failure: RelayFailure): void;
}

/**
 * Default reporter: structured log lines.
 */
export function createLoggingErrorReporter(
    log: Logger = createChildLogger({ module: "error-reporter" })
): ErrorReporter {
    return {
        report(failure) {
            switch (failure.kind) {
                case "delivery-failed":
                    log.error(failure, "Message delivery failed after retries");
                    break;
                case "connection-failed":
                    log.error(failure, "Broker connection failed permanently");
                    break;
                case "dropped-on-shutdown":
                    log.warn(failure, "Unacknowledged messages dropped on shutdown");
                    break;
                case "source-disconnected":
                    log.warn(failure, "Sample source disconnected");
                    break;
            }
        },
    };
}
