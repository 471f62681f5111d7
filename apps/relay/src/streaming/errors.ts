/**
 * Relay error taxonomy.
 *
 * Each class carries a machine-readable `code` so callers can branch
 * without instanceof chains across module boundaries.
 */

export type RelayErrorCode =
    | "ENCODING"
    | "CONNECT"
    | "DELIVERY_TIMEOUT"
    | "QUEUE_OVERFLOW"
    | "CONFIG";

export class RelayError extends Error {
    constructor(
        message: string,
        public readonly code: RelayErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "RelayError";
    }
}

/** Sample cannot be serialized (non-finite values, empty stream id, bad timestamp). */
export class EncodingError extends RelayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, "ENCODING", options);
        this.name = "EncodingError";
    }
}

/** Broker unreachable or credentials rejected. */
export class ConnectError extends RelayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, "CONNECT", options);
        this.name = "ConnectError";
    }
}

/** No acknowledgment within the configured deadline. */
export class DeliveryTimeoutError extends RelayError {
    constructor(
        public readonly topic: string,
        public readonly timeoutMs: number
    ) {
        super(`No acknowledgment for ${topic} within ${timeoutMs}ms`, "DELIVERY_TIMEOUT");
        this.name = "DeliveryTimeoutError";
    }
}

/** A message was evicted or refused because a buffer was at capacity. */
export class QueueOverflowError extends RelayError {
    constructor(
        public readonly streamId: string,
        public readonly capacity: number
    ) {
        super(`Queue for ${streamId} is at capacity (${capacity})`, "QUEUE_OVERFLOW");
        this.name = "QueueOverflowError";
    }
}

export class ConfigError extends RelayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, "CONFIG", options);
        this.name = "ConfigError";
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
