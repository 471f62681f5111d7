/**
 * Reliability controller: the only owner of the broker connection.
 *
 * Responsibilities:
 * - Connection state machine with backoff, jitter and keep-alive
 * - One bounded FIFO queue per stream, plus a buffer budget shared by all
 *   streams with priority-aware eviction
 * - Delivery: one message in flight per stream (per-stream order is never
 *   violated, across reconnects included), ack timeout, bounded retries
 * - Backpressure signal to the relay when a queue stays full
 * - Shutdown with a grace period; leftovers are reported, not discarded
 *
 * Events:
 * - 'state': connection state changed (state, previous)
 * - 'acknowledged': message acknowledged (message)
 * - 'dropped': message dropped (message, reason)
 * - 'failed': message failed after its last attempt (message, error)
 * - 'backpressure': queue pressure changed (streamId, engaged)
 * - 'channelClosed': stream channel destroyed (streamId)
 */

import { EventEmitter } from "events";
import Bottleneck from "bottleneck";
import { DeliveryGuarantee, type RelayConfig } from "@streamrelay/shared";
import { createChildLogger } from "../log/logger.js";
import { computeBackoffDelay, sleep } from "./backoff.js";
import {
    INITIAL_CONNECTION_STATE,
    streamConnectionState,
    transition,
    type ConnectionEvent,
    type ConnectionState,
    type StreamConnectionState,
} from "./connectionState.js";
import { createLoggingErrorReporter, type ErrorReporter } from "./errorReporter.js";
import { DeliveryTimeoutError, QueueOverflowError, errorMessage, type RelayError } from "./errors.js";
import type { MetricsCollector } from "./metrics.js";
import { PriorityScheduler } from "./scheduler.js";
import type { ReferenceClock } from "./timestampManager.js";
import { topicFor } from "./topics.js";
import { DeliveryState, type DropReason, type OutboundMessage } from "./types.js";
import type { BrokerCredentials, BrokerTransport } from "../transport/types.js";

const logger = createChildLogger({ module: "reliability" });

export interface ReliabilityControllerOptions {
    transport: BrokerTransport;
    credentials: BrokerCredentials;
    config: RelayConfig;
    metrics: MetricsCollector;
    /** Same clock the timestamp manager stamps relay_send_time with */
    clock: ReferenceClock;
    reporter?: ErrorReporter;
    /** Jitter source (default: Math.random) */
    random?: () => number;
}

export interface OpenStreamOptions {
    priority?: number;
    queueCapacity?: number;
}

export interface SubmitInput {
    streamId: string;
    sequenceNumber: number;
    payload: Buffer;
    relaySendTimeNanos: bigint;
}

export type SubmitResult =
    | { status: "queued"; message: OutboundMessage }
    | { status: "dropped"; reason: DropReason; message: OutboundMessage; error?: RelayError };

/** Read-only view of a stream channel. */
export interface ChannelStatus {
    streamId: string;
    topic: string;
    priority: number;
    capacity: number;
    depth: number;
    connectionState: StreamConnectionState;
    retryCount: number;
    lastAckSequence: number | null;
    backpressured: boolean;
    closing: boolean;
}

export interface ShutdownReport {
    /** True when every queue emptied within the grace period */
    drained: boolean;
    /** Unacknowledged messages dropped on shutdown, per stream */
    dropped: Record<string, number>;
}

interface StreamChannel {
    streamId: string;
    topic: string;
    priority: number;
    capacity: number;
    /** FIFO; the head may be in flight */
    queue: OutboundMessage[];
    inFlight: OutboundMessage | null;
    /** Retries of the current head message */
    retryCount: number;
    lastAckSequence: number | null;
    /** Source ended; destroy once drained */
    closing: boolean;
    fullSince: number | null;
    backpressured: boolean;
    writableWaiters: Array<(writable: boolean) => void>;
}

type DeliveryOutcome =
    | { kind: "ack" }
    | { kind: "timeout"; error: DeliveryTimeoutError }
    | { kind: "error"; error: unknown };

type Settled = { ok: true } | { ok: false; timedOut: boolean; error: unknown };

/**
 * Run a task with a deadline. Never rejects.
 */
function settleWithin(task: () => Promise<void>, timeoutMs: number): Promise<Settled> {
    return new Promise((resolve) => {
        let settled = false;
        const settle = (result: Settled) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            resolve(result);
        };
        const timer = setTimeout(() => {
            settle({ ok: false, timedOut: true, error: undefined });
        }, timeoutMs);

        try {
            task().then(
                () => settle({ ok: true }),
                (error: unknown) => settle({ ok: false, timedOut: false, error })
            );
        } catch (error) {
            settle({ ok: false, timedOut: false, error });
        }
    });
}

export class ReliabilityController extends EventEmitter {
    private readonly transport: BrokerTransport;
    private readonly credentials: BrokerCredentials;
    private readonly config: RelayConfig;
    private readonly metrics: MetricsCollector;
    private readonly clock: ReferenceClock;
    private readonly reporter: ErrorReporter;
    private readonly random: () => number;
    private readonly limiter: Bottleneck | null;

    private state: ConnectionState = INITIAL_CONNECTION_STATE;
    private channels: Map<string, StreamChannel> = new Map();
    private scheduler = new PriorityScheduler();
    private bufferedCount = 0;
    private inFlightCount = 0;
    private nextMessageId = 1;

    /** Set once submissions stop; the reason recorded for late arrivals */
    private refusalReason: DropReason | null = null;
    private connectLoopRunning = false;
    private lifecycle = new AbortController();
    private keepAliveTimer: NodeJS.Timeout | null = null;
    private keepAliveInFlight = false;
    private unsubscribeDisconnect: (() => void) | null = null;
    private drainWaiters: Array<() => void> = [];
    private lastConnectError = "";

    constructor(options: ReliabilityControllerOptions) {
        super();
        this.transport = options.transport;
        this.credentials = options.credentials;
        this.config = options.config;
        this.metrics = options.metrics;
        this.clock = options.clock;
        this.reporter = options.reporter ?? createLoggingErrorReporter();
        this.random = options.random ?? Math.random;

        const rate = this.config.maxPublishesPerSecond;
        this.limiter = rate
            ? new Bottleneck({
                maxConcurrent: this.config.maxInFlight,
                reservoir: rate,
                reservoirRefreshAmount: rate,
                reservoirRefreshInterval: 1000,
            })
            : null;
    }

    // ─── Lifecycle ─────────────────────────────────────────────────────────

    /**
     * Begin connecting. Messages submitted before the connection is up are
     * buffered.
     */
    start(): void {
        if (this.state.status !== "disconnected") {
            logger.warn({ status: this.state.status }, "Reliability controller already started");
            return;
        }

        this.unsubscribeDisconnect = this.transport.onDisconnect((reason) => {
            this.handleTransportLost(reason);
        });
        this.apply({ type: "start" });
        this.runConnectLoop(false);
    }

    /**
     * Stop accepting messages, give queued messages `graceMs` to be
     * acknowledged (over a reconnect, if one is under way), then release the
     * connection. Whatever is still
     * unacknowledged is dropped and reported.
     */
    async shutdown(graceMs: number = this.config.shutdownGraceMs): Promise<ShutdownReport> {
        if (this.refusalReason === null) {
            this.refusalReason = "shutdown";
        }
        logger.info(
            { buffered: this.bufferedCount, inFlight: this.inFlightCount, graceMs },
            "Reliability controller shutting down"
        );

        // A reconnect in progress keeps running through the grace period so
        // the queues can still flush once it lands.
        let drained = this.bufferedCount === 0;
        if (!drained && graceMs > 0 && (this.state.status === "connected" || this.isConnecting())) {
            drained = (await this.waitForDrain(graceMs)) && this.state.status !== "closed";
        }

        this.lifecycle.abort();
        this.stopKeepAlive();

        const dropped: Record<string, number> = {};
        for (const channel of [...this.channels.values()]) {
            const leftovers = channel.queue.splice(0);
            this.bufferedCount -= leftovers.length;
            for (const message of leftovers) {
                this.dropMessage(channel.streamId, message, "shutdown");
                dropped[channel.streamId] = (dropped[channel.streamId] ?? 0) + 1;
            }
            this.destroyChannel(channel);
        }
        if (Object.keys(dropped).length > 0) {
            this.reporter.report({ kind: "dropped-on-shutdown", dropped });
        }

        const needsDisconnect = this.state.status === "connected";
        this.apply({ type: "shutdown" });
        this.unsubscribeDisconnect?.();
        this.unsubscribeDisconnect = null;

        if (needsDisconnect) {
            await this.disconnectTransport();
        }
        if (this.limiter) {
            await this.limiter.stop({ dropWaitingJobs: true });
        }

        logger.info({ drained, dropped }, "Reliability controller closed");
        return { drained, dropped };
    }

    getConnectionState(): ConnectionState {
        return this.state;
    }

    // ─── Stream channels ───────────────────────────────────────────────────

    /**
     * Create the channel for a stream (idempotent). Returns its topic.
     *
     * @throws EncodingError when the stream id is not a valid topic segment
     */
    openStream(streamId: string, options: OpenStreamOptions = {}): string {
        const existing = this.channels.get(streamId);
        if (existing) {
            existing.closing = false;
            return existing.topic;
        }

        const policy = this.config.streams[streamId] ?? {};
        const priority = options.priority ?? policy.priority ?? this.config.defaultPriority;
        const capacity = options.queueCapacity ?? policy.queueCapacity ?? this.config.queueCapacity;
        const topic = topicFor(this.config.namespace, streamId);

        this.channels.set(streamId, {
            streamId,
            topic,
            priority,
            capacity,
            queue: [],
            inFlight: null,
            retryCount: 0,
            lastAckSequence: null,
            closing: false,
            fullSince: null,
            backpressured: false,
            writableWaiters: [],
        });
        this.scheduler.register(streamId, priority);
        this.metrics.registerStream(streamId, priority);

        logger.info({ streamId, topic, priority, capacity }, "Stream channel opened");
        return topic;
    }

    /**
     * Source terminated. The channel is destroyed once its queue drains, or
     * right away when `discard` drops the pending messages.
     */
    closeStream(streamId: string, options: { discard?: boolean } = {}): void {
        const channel = this.channels.get(streamId);
        if (!channel) return;

        channel.closing = true;
        if (options.discard) {
            for (const message of channel.queue.filter((m) => m.state === DeliveryState.PENDING)) {
                this.removeFromQueue(channel, message);
                this.dropMessage(channel.streamId, message, "discarded");
            }
        }
        logger.info({ streamId, remaining: channel.queue.length }, "Stream channel closing");
        this.afterQueueChange(channel);
    }

    getChannelStatus(streamId: string): ChannelStatus | undefined {
        const channel = this.channels.get(streamId);
        if (!channel) return undefined;
        return {
            streamId: channel.streamId,
            topic: channel.topic,
            priority: channel.priority,
            capacity: channel.capacity,
            depth: channel.queue.length,
            connectionState: streamConnectionState(this.state),
            retryCount: channel.retryCount,
            lastAckSequence: channel.lastAckSequence,
            backpressured: channel.backpressured,
            closing: channel.closing,
        };
    }

    /**
     * Resolves true when the stream may be fed another sample, false when it
     * never will again (channel gone, relay stopping, or signal aborted).
     */
    whenWritable(streamId: string, signal?: AbortSignal): Promise<boolean> {
        const channel = this.channels.get(streamId);
        if (!channel || this.refusalReason !== null || signal?.aborted) {
            return Promise.resolve(false);
        }
        if (!channel.backpressured) {
            return Promise.resolve(true);
        }

        return new Promise((resolve) => {
            const onAbort = () => {
                channel.writableWaiters = channel.writableWaiters.filter((w) => w !== waiter);
                resolve(false);
            };
            const waiter = (writable: boolean) => {
                signal?.removeEventListener("abort", onAbort);
                resolve(writable);
            };
            channel.writableWaiters.push(waiter);
            signal?.addEventListener("abort", onAbort, { once: true });
        });
    }

    // ─── Enqueue ───────────────────────────────────────────────────────────

    /**
     * Append a formatted message to its stream's queue.
     *
     * At the per-stream capacity the stream's own oldest pending message is
     * evicted. At the shared budget the victim is the oldest pending message
     * of the lowest-priority stream; if that stream outranks the incoming
     * one, the incoming message is refused instead.
     */
    submit(input: SubmitInput): SubmitResult {
        const channel = this.channels.get(input.streamId);
        const message: OutboundMessage = {
            id: this.nextMessageId++,
            streamId: input.streamId,
            sequenceNumber: input.sequenceNumber,
            topic: channel?.topic ?? "",
            payload: input.payload,
            enqueuedAt: Date.now(),
            relaySendTimeNanos: input.relaySendTimeNanos,
            state: DeliveryState.PENDING,
            attempts: 0,
        };

        if (this.refusalReason !== null || !channel) {
            const reason = this.refusalReason ?? "closed";
            this.dropMessage(input.streamId, message, reason);
            return { status: "dropped", reason, message };
        }

        if (channel.queue.length >= channel.capacity) {
            const oldest = oldestPending(channel);
            if (!oldest) {
                return this.refuse(channel, message, channel.capacity);
            }
            this.removeFromQueue(channel, oldest);
            this.dropMessage(channel.streamId, oldest, "overflow");
        }

        if (this.bufferedCount >= this.config.totalBufferCapacity) {
            const victim = this.selectVictim(channel);
            if (!victim || victim.channel.priority < channel.priority) {
                return this.refuse(channel, message, this.config.totalBufferCapacity);
            }
            this.removeFromQueue(victim.channel, victim.message);
            this.dropMessage(victim.channel.streamId, victim.message, "overflow");
            this.afterQueueChange(victim.channel);
        }

        channel.queue.push(message);
        this.bufferedCount++;
        this.metrics.setQueueDepth(channel.streamId, channel.queue.length);
        this.updateBackpressure(channel);
        this.pump();

        return { status: "queued", message };
    }

    private refuse(channel: StreamChannel, message: OutboundMessage, capacity: number): SubmitResult {
        const error = new QueueOverflowError(channel.streamId, capacity);
        this.dropMessage(channel.streamId, message, "overflow");
        this.updateBackpressure(channel);
        return { status: "dropped", reason: "overflow", message, error };
    }

    private selectVictim(
        incoming: StreamChannel
    ): { channel: StreamChannel; message: OutboundMessage } | undefined {
        let victim: { channel: StreamChannel; message: OutboundMessage } | undefined;

        for (const channel of this.channels.values()) {
            const message = oldestPending(channel);
            if (!message) continue;
            if (!victim || channel.priority > victim.channel.priority) {
                victim = { channel, message };
                continue;
            }
            if (channel.priority < victim.channel.priority || victim.channel === incoming) {
                continue;
            }
            // Same priority: prefer the incoming stream, then the oldest message
            if (channel === incoming || message.id < victim.message.id) {
                victim = { channel, message };
            }
        }
        return victim;
    }

    // ─── Delivery ──────────────────────────────────────────────────────────

    /**
     * Dispatch head-of-queue messages while the connection is up and the
     * in-flight window has room.
     */
    private pump(): void {
        if (this.state.status !== "connected") return;

        while (this.inFlightCount < this.config.maxInFlight) {
            const streamId = this.scheduler.next((id) => this.isReady(id));
            if (streamId === undefined) return;
            const channel = this.channels.get(streamId);
            if (!channel) return;
            this.dispatch(channel);
        }
    }

    private isReady(streamId: string): boolean {
        const channel = this.channels.get(streamId);
        return (
            channel !== undefined &&
            channel.inFlight === null &&
            channel.queue[0]?.state === DeliveryState.PENDING
        );
    }

    private dispatch(channel: StreamChannel): void {
        const message = channel.queue[0];
        if (!message) return;

        message.state = DeliveryState.IN_FLIGHT;
        message.attempts++;
        channel.inFlight = message;
        this.inFlightCount++;
        const attempt = message.attempts;

        this.deliver(message)
            .then((outcome) => this.settle(channel, message, attempt, outcome))
            .catch((err) => {
                logger.error({ err, streamId: channel.streamId }, "Delivery settlement failed");
            });
    }

    private deliver(message: OutboundMessage): Promise<DeliveryOutcome> {
        const attempt = async (): Promise<DeliveryOutcome> => {
            const result = await settleWithin(
                () => this.transport.publish(message.topic, message.payload, this.config.deliveryGuarantee),
                this.config.ackTimeoutMs
            );
            if (result.ok) return { kind: "ack" };
            if (result.timedOut) {
                return {
                    kind: "timeout",
                    error: new DeliveryTimeoutError(message.topic, this.config.ackTimeoutMs),
                };
            }
            return { kind: "error", error: result.error };
        };

        if (!this.limiter) return attempt();
        return this.limiter
            .schedule(attempt)
            .catch((error: unknown): DeliveryOutcome => ({ kind: "error", error }));
    }

    private settle(
        channel: StreamChannel,
        message: OutboundMessage,
        attempt: number,
        outcome: DeliveryOutcome
    ): void {
        this.inFlightCount--;
        if (channel.inFlight === message) {
            channel.inFlight = null;
        }
        // Dropped on shutdown while in flight
        if (message.state !== DeliveryState.IN_FLIGHT || message.attempts !== attempt) {
            this.pump();
            return;
        }

        if (outcome.kind === "ack") {
            this.acknowledge(channel, message);
        } else {
            this.handleAttemptFailure(channel, message, outcome.error);
        }

        this.afterQueueChange(channel);
        this.pump();
    }

    private acknowledge(channel: StreamChannel, message: OutboundMessage): void {
        message.state = DeliveryState.ACKNOWLEDGED;
        this.removeFromQueue(channel, message);
        channel.lastAckSequence = message.sequenceNumber;
        channel.retryCount = 0;

        const latencyMs = Number(this.clock.nowNanos() - message.relaySendTimeNanos) / 1_000_000;
        this.metrics.recordAcknowledged(channel.streamId, message.payload.length, latencyMs);
        this.emit("acknowledged", message);
    }

    private handleAttemptFailure(channel: StreamChannel, message: OutboundMessage, error: unknown): void {
        this.metrics.recordPublishError();

        const exhausted =
            this.config.deliveryGuarantee === DeliveryGuarantee.AT_MOST_ONCE ||
            message.attempts >= this.config.maxDeliveryAttempts;

        if (!exhausted) {
            message.state = DeliveryState.PENDING;
            channel.retryCount++;
            this.metrics.recordRetry(channel.streamId);
            logger.debug(
                {
                    streamId: channel.streamId,
                    sequenceNumber: message.sequenceNumber,
                    attempt: message.attempts,
                    err: errorMessage(error),
                },
                "Publish attempt failed, will retry"
            );
            return;
        }

        message.state = DeliveryState.FAILED;
        this.removeFromQueue(channel, message);
        channel.retryCount = 0;
        this.metrics.recordFailed(channel.streamId);
        this.reporter.report({
            kind: "delivery-failed",
            streamId: channel.streamId,
            sequenceNumber: message.sequenceNumber,
            topic: message.topic,
            attempts: message.attempts,
            error: errorMessage(error),
        });
        this.emit("failed", message, error);
    }

    // ─── Queue bookkeeping ─────────────────────────────────────────────────

    private removeFromQueue(channel: StreamChannel, message: OutboundMessage): void {
        const index = channel.queue.indexOf(message);
        if (index === -1) return;
        channel.queue.splice(index, 1);
        this.bufferedCount--;
        this.metrics.setQueueDepth(channel.streamId, channel.queue.length);
    }

    private dropMessage(streamId: string, message: OutboundMessage, reason: DropReason): void {
        message.state = DeliveryState.DROPPED;
        message.dropReason = reason;
        this.metrics.recordDropped(streamId, reason);
        logger.debug(
            { streamId, sequenceNumber: message.sequenceNumber, reason },
            "Message dropped"
        );
        this.emit("dropped", message, reason);
    }

    private afterQueueChange(channel: StreamChannel): void {
        this.updateBackpressure(channel);

        if (channel.closing && channel.queue.length === 0 && this.channels.get(channel.streamId) === channel) {
            this.destroyChannel(channel);
        }

        this.notifyIfDrained();
    }

    private destroyChannel(channel: StreamChannel): void {
        this.channels.delete(channel.streamId);
        this.scheduler.unregister(channel.streamId);
        this.metrics.markStreamClosed(channel.streamId);
        this.releaseWaiters(channel, false);
        logger.info(
            { streamId: channel.streamId, lastAckSequence: channel.lastAckSequence },
            "Stream channel closed"
        );
        this.emit("channelClosed", channel.streamId);
    }

    private waitForDrain(timeoutMs: number): Promise<boolean> {
        const drained = new AbortController();
        this.drainWaiters.push(() => drained.abort());
        // sleep() resolves false when cut short, i.e. when the queues drained
        return sleep(timeoutMs, drained.signal).then((timedOut) => !timedOut);
    }

    // ─── Backpressure ──────────────────────────────────────────────────────

    private updateBackpressure(channel: StreamChannel): void {
        const depth = channel.queue.length;
        const now = Date.now();

        if (depth >= channel.capacity) {
            channel.fullSince ??= now;
            if (!channel.backpressured && now - channel.fullSince >= this.config.backpressureWindowMs) {
                channel.backpressured = true;
                this.metrics.setBackpressure(channel.streamId, true);
                logger.warn({ streamId: channel.streamId, depth }, "Backpressure engaged");
                this.emit("backpressure", channel.streamId, true);
            }
            return;
        }

        channel.fullSince = null;
        const releaseDepth = Math.floor(channel.capacity * this.config.backpressureReleaseRatio);
        if (channel.backpressured && depth <= releaseDepth) {
            channel.backpressured = false;
            this.metrics.setBackpressure(channel.streamId, false);
            logger.info({ streamId: channel.streamId, depth }, "Backpressure released");
            this.emit("backpressure", channel.streamId, false);
            this.releaseWaiters(channel, true);
        }
    }

    private releaseWaiters(channel: StreamChannel, writable: boolean): void {
        const waiters = channel.writableWaiters;
        channel.writableWaiters = [];
        for (const waiter of waiters) waiter(writable);
    }

    // ─── Connection ────────────────────────────────────────────────────────

    private apply(event: ConnectionEvent): void {
        const previous = this.state;
        this.state = transition(previous, event);
        if (this.state === previous) return;

        this.metrics.setConnectionStatus(this.state.status, streamConnectionState(this.state));
        this.emit("state", this.state, previous);
    }

    private isConnecting(): boolean {
        return this.state.status === "connecting" || this.state.status === "reconnecting";
    }

    private runConnectLoop(delayFirst: boolean): void {
        if (this.connectLoopRunning) return;
        this.connectLoopRunning = true;
        this.connectLoop(delayFirst).catch((err) => {
            this.connectLoopRunning = false;
            logger.error({ err }, "Connection loop crashed");
        });
    }

    /**
     * Handshake until connected, closed, or out of attempts. Runs on the
     * shared connection context; stream publishing never waits on it.
     */
    private async connectLoop(delayFirst: boolean): Promise<void> {
        let wait = delayFirst;

        while (this.isConnecting()) {
            if (wait) {
                const delayMs = computeBackoffDelay(this.failuresSoFar(), this.config.backoff, this.random);
                logger.info({ delayMs, state: this.state }, "Scheduling broker reconnect");
                const elapsed = await sleep(delayMs, this.lifecycle.signal);
                if (!elapsed || !this.isConnecting()) break;
            }
            wait = true;

            try {
                await this.transport.connect(this.credentials);
            } catch (err) {
                this.handleHandshakeFailure(err);
                continue;
            }

            if (!this.isConnecting()) {
                // Shutdown arrived during the handshake
                await this.disconnectTransport();
                break;
            }

            this.connectLoopRunning = false;
            this.apply({ type: "handshakeSucceeded", at: Date.now() });
            logger.info({ buffered: this.bufferedCount }, "Broker connected");
            this.startKeepAlive();
            this.pump();
            return;
        }

        this.connectLoopRunning = false;
    }

    private failuresSoFar(): number {
        if (this.state.status === "reconnecting") return this.state.attempt;
        if (this.state.status === "connecting") return this.state.attempt - 1;
        return 1;
    }

    private handleHandshakeFailure(err: unknown): void {
        this.lastConnectError = errorMessage(err);
        this.metrics.recordConnectionError();
        const attempt = this.state.status === "connecting" || this.state.status === "reconnecting"
            ? this.state.attempt
            : 0;

        this.apply({
            type: "handshakeFailed",
            maxConsecutiveFailures: this.config.maxConsecutiveConnectFailures,
        });
        logger.warn({ err: this.lastConnectError, attempt }, "Broker handshake failed");

        if (this.state.status === "closed") {
            this.failConnection(attempt);
        }
    }

    /**
     * Out of connection attempts: every channel closes, and the failure is
     * reported once with the undelivered count per stream.
     */
    private failConnection(consecutiveFailures: number): void {
        this.refusalReason = "closed";
        this.stopKeepAlive();
        this.unsubscribeDisconnect?.();
        this.unsubscribeDisconnect = null;

        const undelivered: Record<string, number> = {};
        for (const channel of [...this.channels.values()]) {
            const leftovers = channel.queue.splice(0);
            this.bufferedCount -= leftovers.length;
            undelivered[channel.streamId] = leftovers.length;
            for (const message of leftovers) {
                this.dropMessage(channel.streamId, message, "closed");
            }
            this.destroyChannel(channel);
        }

        this.reporter.report({
            kind: "connection-failed",
            consecutiveFailures,
            error: this.lastConnectError,
            undelivered,
        });
        this.notifyIfDrained();
    }

    private notifyIfDrained(): void {
        if (this.bufferedCount !== 0) return;
        const waiters = this.drainWaiters;
        this.drainWaiters = [];
        for (const notify of waiters) notify();
    }

    private handleTransportLost(reason: string): void {
        if (this.state.status !== "connected") return;

        logger.warn({ reason, buffered: this.bufferedCount }, "Broker connection lost");
        this.metrics.recordDisconnect();
        this.stopKeepAlive();
        this.apply({ type: "transportLost", reason });
        this.runConnectLoop(true);
    }

    private async disconnectTransport(): Promise<void> {
        try {
            await this.transport.disconnect();
        } catch (err) {
            logger.warn({ err: errorMessage(err) }, "Broker disconnect failed");
        }
    }

    // ─── Keep-alive ────────────────────────────────────────────────────────

    private startKeepAlive(): void {
        this.stopKeepAlive();
        if (!this.transport.ping || this.config.keepAliveIntervalMs === 0) return;

        this.keepAliveTimer = setInterval(() => {
            this.checkKeepAlive();
        }, this.config.keepAliveIntervalMs);

        // Don't block process exit
        this.keepAliveTimer.unref();
    }

    private stopKeepAlive(): void {
        if (this.keepAliveTimer) {
            clearInterval(this.keepAliveTimer);
            this.keepAliveTimer = null;
        }
    }

    private checkKeepAlive(): void {
        const transport = this.transport;
        if (this.keepAliveInFlight || this.state.status !== "connected" || !transport.ping) return;

        this.keepAliveInFlight = true;
        settleWithin(() => transport.ping?.() ?? Promise.resolve(), this.config.keepAliveTimeoutMs)
            .then((result) => {
                this.keepAliveInFlight = false;
                if (result.ok) return;
                const reason = result.timedOut
                    ? "keep-alive timeout"
                    : `keep-alive failed: ${errorMessage(result.error)}`;
                this.handleTransportLost(reason);
            })
            .catch((err) => {
                this.keepAliveInFlight = false;
                logger.error({ err }, "Keep-alive check failed");
            });
    }
}

function oldestPending(channel: StreamChannel): OutboundMessage | undefined {
    return channel.queue.find((message) => message.state === DeliveryState.PENDING);
}
