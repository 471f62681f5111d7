/**
 * Relay core: one publishing loop per attached stream.
 *
 * Each loop pulls a sample, stamps it, formats it and hands it to the
 * reliability controller. Loops run independently; a slow or failing
 * stream never stalls another. Network I/O happens only inside the
 * controller.
 *
 * Events:
 * - 'attached': stream attached (streamId, topic)
 * - 'detached': stream loop finished (streamId, reason)
 */

import { EventEmitter } from "events";
import { createChildLogger } from "../log/logger.js";
import { createLoggingErrorReporter, type ErrorReporter } from "./errorReporter.js";
import { EncodingError, errorMessage } from "./errors.js";
import { formatSample } from "./messageFormatter.js";
import type { MetricsCollector } from "./metrics.js";
import type {
    OpenStreamOptions,
    ReliabilityController,
    ShutdownReport,
} from "./reliabilityController.js";
import type { TimestampManager } from "./timestampManager.js";
import type { ClockSyncProvider, Sample, SampleSource } from "./types.js";

const logger = createChildLogger({ module: "relay" });

export type DetachReason = "end" | "disconnected" | "stopped" | "closed";

export interface StreamRelayOptions {
    controller: ReliabilityController;
    metrics: MetricsCollector;
    timestamps: TimestampManager;
    clockSync: ClockSyncProvider;
    reporter?: ErrorReporter;
}

interface AttachedStream {
    source: SampleSource;
    topic: string;
    abort: AbortController;
    loop: Promise<void>;
    lastSequence: number | null;
}

export class StreamRelay extends EventEmitter {
    private readonly controller: ReliabilityController;
    private readonly metrics: MetricsCollector;
    private readonly timestamps: TimestampManager;
    private readonly clockSync: ClockSyncProvider;
    private readonly reporter: ErrorReporter;

    private streams: Map<string, AttachedStream> = new Map();
    private started = false;
    private stopping = false;

    constructor(options: StreamRelayOptions) {
        super();
        this.controller = options.controller;
        this.metrics = options.metrics;
        this.timestamps = options.timestamps;
        this.clockSync = options.clockSync;
        this.reporter = options.reporter ?? createLoggingErrorReporter();
    }

    /**
     * Start the broker connection. Streams may be attached before or after.
     */
    start(): void {
        if (this.started) return;
        this.started = true;
        this.controller.start();
    }

    /**
     * Attach a source and start its publishing loop. Returns the stream's topic.
     */
    attach(source: SampleSource, options: OpenStreamOptions = {}): string {
        const streamId = source.streamId;
        if (this.stopping) {
            throw new Error(`Relay is stopping; cannot attach ${streamId}`);
        }
        if (this.streams.has(streamId)) {
            throw new Error(`Stream ${streamId} is already attached`);
        }

        const topic = this.controller.openStream(streamId, options);
        const abort = new AbortController();
        const attached: AttachedStream = {
            source,
            topic,
            abort,
            loop: Promise.resolve(),
            lastSequence: null,
        };
        this.streams.set(streamId, attached);

        attached.loop = this.runLoop(attached)
            .catch((err) => {
                logger.error({ err, streamId }, "Publishing loop crashed");
                this.controller.closeStream(streamId);
                return "closed" as const;
            })
            .then((reason) => {
                this.streams.delete(streamId);
                logger.info({ streamId, reason }, "Stream detached");
                this.emit("detached", streamId, reason);
            });

        logger.info({ streamId, topic }, "Stream attached");
        this.emit("attached", streamId, topic);
        return topic;
    }

    /**
     * Stop pulling from a stream. Queued messages are still delivered unless
     * `discard` is set.
     */
    async detach(streamId: string, options: { discard?: boolean } = {}): Promise<void> {
        const attached = this.streams.get(streamId);
        if (!attached) return;
        attached.abort.abort();
        await attached.loop;
        this.controller.closeStream(streamId, options);
    }

    attachedStreams(): string[] {
        return [...this.streams.keys()];
    }

    /**
     * Stop every loop, flush within the grace period, release the broker.
     */
    async stop(graceMs?: number): Promise<ShutdownReport> {
        this.stopping = true;
        const attached = [...this.streams.values()];
        for (const stream of attached) {
            stream.abort.abort();
        }
        await Promise.all(attached.map((stream) => stream.loop));

        const report = await this.controller.shutdown(graceMs);
        logger.info({ drained: report.drained, dropped: report.dropped }, "Relay stopped");
        return report;
    }

    private async runLoop(stream: AttachedStream): Promise<DetachReason> {
        const { source, abort } = stream;
        const streamId = source.streamId;

        while (!abort.signal.aborted) {
            const writable = await this.controller.whenWritable(streamId, abort.signal);
            if (!writable) {
                return abort.signal.aborted ? "stopped" : "closed";
            }

            const event = await source.next(abort.signal);
            switch (event.type) {
                case "end":
                    if (abort.signal.aborted) return "stopped";
                    this.controller.closeStream(streamId);
                    return "end";

                case "disconnected":
                    this.metrics.recordSourceError(streamId);
                    this.reporter.report({
                        kind: "source-disconnected",
                        streamId,
                        error: event.error.message,
                    });
                    this.controller.closeStream(streamId);
                    return "disconnected";

                case "sample":
                    this.forward(stream, event.sample);
                    break;
            }
        }
        return "stopped";
    }

    private forward(stream: AttachedStream, sample: Sample): void {
        const streamId = stream.source.streamId;
        this.metrics.recordSampleSeen(streamId);

        if (stream.lastSequence !== null && sample.sequenceNumber <= stream.lastSequence) {
            this.metrics.recordDropped(streamId, "out-of-order");
            logger.warn(
                { streamId, sequenceNumber: sample.sequenceNumber, lastSequence: stream.lastSequence },
                "Out-of-order sample dropped"
            );
            return;
        }

        // Topic routing follows the attached source, not the sample's own field
        const routed: Sample = sample.streamId === streamId ? sample : { ...sample, streamId };

        let payload: Buffer;
        let relaySendTimeNanos: bigint;
        try {
            const temporal = this.timestamps.createTemporalRecord(
                routed,
                this.clockSync.getLatest(streamId)
            );
            payload = formatSample(routed, temporal);
            relaySendTimeNanos = temporal.relaySendTimeNanos;
        } catch (err) {
            if (!(err instanceof EncodingError)) throw err;
            this.metrics.recordDropped(streamId, "encoding");
            logger.warn(
                { streamId, sequenceNumber: sample.sequenceNumber, err: errorMessage(err) },
                "Sample could not be encoded"
            );
            return;
        }

        stream.lastSequence = sample.sequenceNumber;
        this.controller.submit({
            streamId,
            sequenceNumber: sample.sequenceNumber,
            payload,
            relaySendTimeNanos,
        });
    }
}
