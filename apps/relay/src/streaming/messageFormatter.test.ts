import { describe, it, expect } from "vitest";
import { EncodingError } from "./errors.js";
import { buildWirePayload, formatSample, parsePayload } from "./messageFormatter.js";
import { TimestampManager } from "./timestampManager.js";
import type { Sample, TemporalRecord } from "./types.js";

const temporal: TemporalRecord = {
    sourceTimestamp: "4521.000000001",
    clockOffset: "0.001250000",
    clockOffsetUncertainty: "0.000010000",
    relaySendTime: "1700000000.000000042",
    relaySendTimeNanos: 1_700_000_000_000_000_042n,
};

const sample: Sample = {
    streamId: "EEG_1",
    acquisitionTimestamp: "4521.000000001",
    payload: [0.5, -1.25, 3],
    sequenceNumber: 17,
};

describe("formatSample", () => {
    it("writes fields in a fixed order", () => {
        expect(formatSample(sample, temporal).toString("utf8")).toBe(
            '{"schema_version":1,"stream_id":"EEG_1","sequence_number":17,' +
                '"source_timestamp":"4521.000000001","clock_offset":"0.001250000",' +
                '"clock_offset_uncertainty":"0.000010000","relay_send_time":"1700000000.000000042",' +
                '"payload":[0.5,-1.25,3]}'
        );
    });

    it("produces identical bytes for the same input", () => {
        expect(formatSample(sample, temporal).equals(formatSample(sample, temporal))).toBe(true);
    });

    it("encodes negative zero as zero", () => {
        const doc = buildWirePayload({ ...sample, payload: [-0] }, temporal);
        expect(doc.payload).toEqual([0]);
    });

    it("rejects non-finite channel values", () => {
        expect(() => formatSample({ ...sample, payload: [1, Number.NaN] }, temporal)).toThrow(
            "Stream EEG_1 sample 17: channel 1 is not finite (NaN)"
        );
        expect(() =>
            formatSample({ ...sample, payload: [Number.NEGATIVE_INFINITY] }, temporal)
        ).toThrow(EncodingError);
    });

    it("rejects an empty stream id and a negative sequence number", () => {
        expect(() => formatSample({ ...sample, streamId: "  " }, temporal)).toThrow(
            "Stream id is empty"
        );
        expect(() => formatSample({ ...sample, sequenceNumber: -1 }, temporal)).toThrow(
            "Stream EEG_1: invalid sequence number -1"
        );
    });
});

describe("parsePayload", () => {
    it("preserves nine-digit timestamps through encode and decode", () => {
        const timestamps = new TimestampManager({ nowNanos: () => 1_700_000_000_987_654_321n });
        const record = timestamps.createTemporalRecord(
            { ...sample, acquisitionTimestamp: "4521.123456789" },
            { offset: "-0.000000001", offsetUncertainty: "0.000000002", measuredAt: "4520" }
        );

        const doc = parsePayload(formatSample(sample, record));

        expect(doc.source_timestamp).toBe("4521.123456789");
        expect(doc.clock_offset).toBe("-0.000000001");
        expect(doc.clock_offset_uncertainty).toBe("0.000000002");
        expect(doc.relay_send_time).toBe("1700000000.987654321");
    });

    it("rejects malformed JSON", () => {
        expect(() => parsePayload("{not json")).toThrow("Payload is not valid JSON");
    });

    it("rejects documents with float timestamps", () => {
        const doc = JSON.stringify({ ...buildWirePayload(sample, temporal), source_timestamp: 4521.5 });
        expect(() => parsePayload(doc)).toThrow(EncodingError);
    });
});
