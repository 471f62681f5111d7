/**
 * Per-stream delivery metrics.
 *
 * Counters are pushed in by the relay and the reliability controller; the
 * collector never derives anything on its own. Every update is a few field
 * writes so it can sit on the publishing path. Readers get an immutable
 * snapshot.
 */

import type { ConnectionStatus, StreamConnectionState } from "./connectionState.js";
import type { DropReason } from "./types.js";

// Acknowledgments counted toward throughput (last 10 seconds)
const THROUGHPUT_WINDOW_MS = 10_000;

const DROP_REASONS: readonly DropReason[] = [
    "overflow",
    "shutdown",
    "discarded",
    "closed",
    "encoding",
    "out-of-order",
];

/**
 * Fixed-size window with a running sum.
 */
export class RollingAverage {
    private values: number[] = [];
    private next = 0;
    private sum = 0;

    constructor(private readonly capacity: number) {}

    push(value: number): void {
        if (this.values.length < this.capacity) {
            this.values.push(value);
        } else {
            this.sum -= this.values[this.next] ?? 0;
            this.values[this.next] = value;
            this.next = (this.next + 1) % this.capacity;
        }
        this.sum += value;
    }

    get count(): number {
        return this.values.length;
    }

    average(): number | null {
        return this.values.length === 0 ? null : this.sum / this.values.length;
    }
}

export interface StreamMetricsSnapshot {
    readonly streamId: string;
    readonly priority: number;
    /** Acknowledged by the broker (or sent, at-most-once) */
    readonly published: number;
    readonly dropped: number;
    readonly droppedByReason: Readonly<Record<DropReason, number>>;
    readonly failed: number;
    readonly retries: number;
    readonly bytesSent: number;
    readonly queueDepth: number;
    /** relay_send_time to acknowledgment, rolling average */
    readonly averageLatencyMs: number | null;
    readonly throughputPerSecond: number;
    readonly connectionState: StreamConnectionState;
    readonly backpressured: boolean;
    /** Wall-clock ms of the last sample pulled from the source */
    readonly lastSeenAt: number | null;
    readonly sourceErrors: number;
    readonly active: boolean;
}

export interface MetricsSnapshot {
    readonly takenAt: number;
    readonly uptimeMs: number;
    readonly connection: {
        readonly status: ConnectionStatus;
        readonly connectionErrors: number;
        readonly publishErrors: number;
        readonly disconnects: number;
    };
    readonly streams: Readonly<Record<string, StreamMetricsSnapshot>>;
}

interface StreamCounters {
    priority: number;
    published: number;
    droppedByReason: Record<DropReason, number>;
    failed: number;
    retries: number;
    bytesSent: number;
    queueDepth: number;
    latency: RollingAverage;
    ackTimes: number[];
    backpressured: boolean;
    lastSeenAt: number | null;
    sourceErrors: number;
    active: boolean;
}

function emptyDropCounts(): Record<DropReason, number> {
    return {
        overflow: 0,
        shutdown: 0,
        discarded: 0,
        closed: 0,
        encoding: 0,
        "out-of-order": 0,
    };
}

export class MetricsCollector {
    private streams: Map<string, StreamCounters> = new Map();
    private connectionStatus: ConnectionStatus = "disconnected";
    private streamConnection: StreamConnectionState = "disconnected";
    private connectionErrors = 0;
    private publishErrors = 0;
    private disconnects = 0;
    private startedAt: number;

    constructor(
        private readonly latencyWindowSize = 1000,
        private readonly now: () => number = Date.now
    ) {
        this.startedAt = now();
    }

    registerStream(streamId: string, priority: number): void {
        const existing = this.streams.get(streamId);
        if (existing) {
            existing.priority = priority;
            existing.active = true;
            return;
        }
        this.streams.set(streamId, this.createCounters(priority));
    }

    markStreamClosed(streamId: string): void {
        const counters = this.streams.get(streamId);
        if (counters) {
            counters.active = false;
            counters.queueDepth = 0;
            counters.backpressured = false;
        }
    }

    recordSampleSeen(streamId: string): void {
        this.counters(streamId).lastSeenAt = this.now();
    }

    recordAcknowledged(streamId: string, bytes: number, latencyMs: number): void {
        const counters = this.counters(streamId);
        const now = this.now();
        counters.published++;
        counters.bytesSent += bytes;
        counters.latency.push(latencyMs);
        counters.ackTimes.push(now);
        pruneBefore(counters.ackTimes, now - THROUGHPUT_WINDOW_MS);
    }

    recordDropped(streamId: string, reason: DropReason, count = 1): void {
        this.counters(streamId).droppedByReason[reason] += count;
    }

    recordFailed(streamId: string): void {
        this.counters(streamId).failed++;
    }

    recordRetry(streamId: string): void {
        this.counters(streamId).retries++;
    }

    recordSourceError(streamId: string): void {
        this.counters(streamId).sourceErrors++;
    }

    setQueueDepth(streamId: string, depth: number): void {
        this.counters(streamId).queueDepth = depth;
    }

    setBackpressure(streamId: string, engaged: boolean): void {
        this.counters(streamId).backpressured = engaged;
    }

    setConnectionStatus(status: ConnectionStatus, streamView: StreamConnectionState): void {
        this.connectionStatus = status;
        this.streamConnection = streamView;
    }

    recordConnectionError(): void {
        this.connectionErrors++;
    }

    recordPublishError(): void {
        this.publishErrors++;
    }

    recordDisconnect(): void {
        this.disconnects++;
    }

    /**
     * Immutable point-in-time view of all counters.
     */
    snapshot(): MetricsSnapshot {
        const now = this.now();
        const streams: Record<string, StreamMetricsSnapshot> = {};

        for (const [streamId, counters] of this.streams) {
            pruneBefore(counters.ackTimes, now - THROUGHPUT_WINDOW_MS);
            const droppedByReason = Object.freeze({ ...counters.droppedByReason });
            streams[streamId] = Object.freeze({
                streamId,
                priority: counters.priority,
                published: counters.published,
                dropped: DROP_REASONS.reduce((sum, reason) => sum + droppedByReason[reason], 0),
                droppedByReason,
                failed: counters.failed,
                retries: counters.retries,
                bytesSent: counters.bytesSent,
                queueDepth: counters.queueDepth,
                averageLatencyMs: counters.latency.average(),
                throughputPerSecond: counters.ackTimes.length / (THROUGHPUT_WINDOW_MS / 1000),
                connectionState: counters.active ? this.streamConnection : "disconnected",
                backpressured: counters.backpressured,
                lastSeenAt: counters.lastSeenAt,
                sourceErrors: counters.sourceErrors,
                active: counters.active,
            });
        }

        return Object.freeze({
            takenAt: now,
            uptimeMs: now - this.startedAt,
            connection: Object.freeze({
                status: this.connectionStatus,
                connectionErrors: this.connectionErrors,
                publishErrors: this.publishErrors,
                disconnects: this.disconnects,
            }),
            streams: Object.freeze(streams),
        });
    }

    /**
     * Human-readable summary for logs and shutdown output.
     */
    getSummary(): string {
        const snapshot = this.snapshot();
        const lines = [
            "Streaming Metrics Summary:",
            "-------------------------",
            `Uptime: ${(snapshot.uptimeMs / 1000).toFixed(1)}s`,
            `Connection: ${snapshot.connection.status} (errors: ${snapshot.connection.connectionErrors}, disconnects: ${snapshot.connection.disconnects})`,
        ];
        for (const stream of Object.values(snapshot.streams)) {
            const latency =
                stream.averageLatencyMs === null ? "n/a" : `${stream.averageLatencyMs.toFixed(2)}ms`;
            lines.push(
                `${stream.streamId}: published ${stream.published}, dropped ${stream.dropped}, failed ${stream.failed}, queued ${stream.queueDepth}, latency ${latency}`
            );
        }
        return lines.join("\n");
    }

    private counters(streamId: string): StreamCounters {
        const existing = this.streams.get(streamId);
        if (existing) return existing;
        // Samples can be counted before the channel is opened (encoding drops)
        const created = this.createCounters(0);
        this.streams.set(streamId, created);
        return created;
    }

    private createCounters(priority: number): StreamCounters {
        return {
            priority,
            published: 0,
            droppedByReason: emptyDropCounts(),
            failed: 0,
            retries: 0,
            bytesSent: 0,
            queueDepth: 0,
            latency: new RollingAverage(this.latencyWindowSize),
            ackTimes: [],
            backpressured: false,
            lastSeenAt: null,
            sourceErrors: 0,
            active: true,
        };
    }
}

function pruneBefore(times: number[], cutoff: number): void {
    while (times.length > 0 && (times[0] ?? cutoff) < cutoff) {
        times.shift();
    }
}
