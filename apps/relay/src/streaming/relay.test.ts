import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RelayConfigSchema } from "@streamrelay/shared";
import { FakeBrokerTransport } from "../testing/fakeBroker.js";
import { ClockSyncRegistry } from "./clockSync.js";
import type { RelayFailure } from "./errorReporter.js";
import { EncodingError } from "./errors.js";
import { parsePayload } from "./messageFormatter.js";
import { MetricsCollector } from "./metrics.js";
import { StreamRelay } from "./relay.js";
import { ReliabilityController } from "./reliabilityController.js";
import { BufferedSampleSource } from "./sampleSource.js";
import { TimestampManager, type ReferenceClock } from "./timestampManager.js";

const SEND_TIME = 1_700_000_000_123_456_789n;

function setup() {
    const clock: ReferenceClock = { nowNanos: () => SEND_TIME };
    const transport = new FakeBrokerTransport();
    const metrics = new MetricsCollector();
    const clockSync = new ClockSyncRegistry();
    const reports: RelayFailure[] = [];
    const reporter = { report: (failure: RelayFailure) => reports.push(failure) };
    const controller = new ReliabilityController({
        transport,
        credentials: { url: "redis://localhost:6379" },
        config: RelayConfigSchema.parse({ keepAliveIntervalMs: 0 }),
        metrics,
        clock,
        reporter,
    });
    const relay = new StreamRelay({
        controller,
        metrics,
        timestamps: new TimestampManager(clock),
        clockSync,
        reporter,
    });
    const detached: Array<[string, string]> = [];
    relay.on("detached", (streamId: string, reason: string) => detached.push([streamId, reason]));

    return { transport, metrics, clockSync, reports, controller, relay, detached };
}

const flush = () => vi.advanceTimersByTimeAsync(0);

describe("StreamRelay", () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it("publishes a sample with unavailable clock offsets when no sync record exists", async () => {
        const { transport, relay } = setup();
        relay.start();
        await flush();

        const source = new BufferedSampleSource("EEG_1");
        const topic = relay.attach(source);
        source.push({ acquisitionTimestamp: "12.000000001", payload: [1.5, -2], sequenceNumber: 1 });
        await flush();

        expect(topic).toBe("lsl/EEG_1");
        expect(transport.published).toHaveLength(1);
        const published = transport.published[0];
        expect(published?.topic).toBe("lsl/EEG_1");
        expect(parsePayload(published?.payload ?? "")).toEqual({
            schema_version: 1,
            stream_id: "EEG_1",
            sequence_number: 1,
            source_timestamp: "12.000000001",
            clock_offset: "unavailable",
            clock_offset_uncertainty: "unavailable",
            relay_send_time: "1700000000.123456789",
            payload: [1.5, -2],
        });
    });

    it("carries the latest clock-sync estimate losslessly", async () => {
        const { transport, clockSync, relay } = setup();
        clockSync.update("EEG_1", { offset: "-0.0025", offsetUncertainty: 150_000n, measuredAt: "100" });
        relay.start();
        await flush();

        const source = new BufferedSampleSource("EEG_1");
        relay.attach(source);
        source.push({ acquisitionTimestamp: 5_000_000_001n, payload: [0], sequenceNumber: 1 });
        await flush();

        const doc = parsePayload(transport.published[0]?.payload ?? "");
        expect(doc.source_timestamp).toBe("5.000000001");
        expect(doc.clock_offset).toBe("-0.002500000");
        expect(doc.clock_offset_uncertainty).toBe("0.000150000");
    });

    it("drops out-of-order and unencodable samples without stalling the stream", async () => {
        const { transport, metrics, relay } = setup();
        relay.start();
        await flush();

        const source = new BufferedSampleSource("EEG_1");
        relay.attach(source);
        source.push({ acquisitionTimestamp: "1.0", payload: [1], sequenceNumber: 1 });
        source.push({ acquisitionTimestamp: "1.1", payload: [1], sequenceNumber: 1 });
        source.push({ acquisitionTimestamp: "1.2", payload: [Number.NaN], sequenceNumber: 2 });
        source.push({ acquisitionTimestamp: "1.3", payload: [3], sequenceNumber: 3 });
        await flush();

        expect(transport.sequencesFor("lsl/EEG_1")).toEqual([1, 3]);
        const stream = metrics.snapshot().streams["EEG_1"];
        expect(stream?.droppedByReason["out-of-order"]).toBe(1);
        expect(stream?.droppedByReason.encoding).toBe(1);
        expect(stream?.published).toBe(2);
    });

    it("publishes marker streams as a single string payload", async () => {
        const { transport, relay } = setup();
        relay.start();
        await flush();

        const source = new BufferedSampleSource("Markers");
        relay.attach(source, { priority: 0 });
        source.push({ acquisitionTimestamp: "3.5", payload: "stimulus_onset", sequenceNumber: 1 });
        await flush();

        expect(parsePayload(transport.published[0]?.payload ?? "").payload).toBe("stimulus_onset");
    });

    it("closes the channel after end-of-stream once its queue drains", async () => {
        const { controller, relay, detached } = setup();
        const closed: string[] = [];
        controller.on("channelClosed", (streamId: string) => closed.push(streamId));

        const source = new BufferedSampleSource("EEG_1");
        relay.attach(source);
        source.push({ acquisitionTimestamp: "1.0", payload: [1], sequenceNumber: 1 });
        source.end();
        await flush();

        expect(detached).toEqual([["EEG_1", "end"]]);
        expect(controller.getChannelStatus("EEG_1")?.closing).toBe(true);
        expect(closed).toEqual([]);

        relay.start();
        await flush();

        expect(closed).toEqual(["EEG_1"]);
        expect(controller.getChannelStatus("EEG_1")).toBeUndefined();
    });

    it("reports a source disconnect distinctly from end-of-stream", async () => {
        const { metrics, reports, relay, detached } = setup();
        const source = new BufferedSampleSource("EEG_1");
        relay.attach(source);
        source.disconnect(new Error("outlet lost"));
        await flush();

        expect(detached).toEqual([["EEG_1", "disconnected"]]);
        expect(reports).toEqual([{ kind: "source-disconnected", streamId: "EEG_1", error: "outlet lost" }]);
        expect(metrics.snapshot().streams["EEG_1"]?.sourceErrors).toBe(1);
    });

    it("rejects a second source for the same stream", () => {
        const { relay } = setup();
        relay.attach(new BufferedSampleSource("EEG_1"));

        expect(() => relay.attach(new BufferedSampleSource("EEG_1"))).toThrow(
            "Stream EEG_1 is already attached"
        );
    });

    it("refuses a stream id that cannot be used as a topic segment", () => {
        const { relay } = setup();

        expect(() => relay.attach(new BufferedSampleSource("EEG 1"))).toThrow(EncodingError);
        expect(relay.attachedStreams()).toEqual([]);
    });

    it("leaves samples in the source while the channel is backpressured, up to its capacity", async () => {
        const { controller, relay } = setup();
        const source = new BufferedSampleSource("EEG_1", 3);
        const sample = (seq: number) => ({
            acquisitionTimestamp: `${seq}.000000001`,
            payload: [seq],
            sequenceNumber: seq,
        });
        relay.attach(source, { queueCapacity: 2 });

        source.push(sample(1));
        source.push(sample(2));
        await flush();
        await vi.advanceTimersByTimeAsync(1000);
        source.push(sample(3));
        await flush();
        expect(controller.getChannelStatus("EEG_1")?.backpressured).toBe(true);

        const accepted = [4, 5, 6, 7].map((seq) => source.push(sample(seq)));

        expect(accepted).toEqual([true, true, true, false]);
        expect(source.buffered).toBe(3);
        expect(source.rejected).toBe(1);
        expect(controller.getChannelStatus("EEG_1")?.depth).toBe(2);
    });

    it("stops every loop and releases the broker on stop", async () => {
        const { transport, relay, detached } = setup();
        relay.start();
        await flush();
        relay.attach(new BufferedSampleSource("EEG_1"));
        relay.attach(new BufferedSampleSource("Markers"));

        const report = await relay.stop(1000);

        expect(report).toEqual({ drained: true, dropped: {} });
        expect(detached).toEqual([
            ["EEG_1", "stopped"],
            ["Markers", "stopped"],
        ]);
        expect(relay.attachedStreams()).toEqual([]);
        expect(transport.disconnectCalls).toBe(1);
        expect(() => relay.attach(new BufferedSampleSource("EMG"))).toThrow("Relay is stopping");
    });
});
