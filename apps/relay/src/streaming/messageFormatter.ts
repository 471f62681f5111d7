/**
 * Serializes samples into the wire document.
 *
 * The document is field-tagged JSON with a fixed key order, so the same
 * (sample, temporal record) pair always produces the same bytes. Timestamps
 * are decimal strings; only channel values are JSON numbers.
 */

import { WIRE_SCHEMA_VERSION, WirePayloadSchema, type WirePayload } from "@streamrelay/shared";
import { EncodingError } from "./errors.js";
import type { Sample, TemporalRecord } from "./types.js";

function encodePayload(sample: Sample): number[] | string {
    if (typeof sample.payload === "string") {
        return sample.payload;
    }
    const values: number[] = [];
    for (const [channel, value] of sample.payload.entries()) {
        if (typeof value !== "number" || !Number.isFinite(value)) {
            throw new EncodingError(
                `Stream ${sample.streamId} sample ${sample.sequenceNumber}: channel ${channel} is not finite (${value})`
            );
        }
        // -0 and 0 must encode identically
        values.push(value === 0 ? 0 : value);
    }
    return values;
}

/**
 * Build the wire document for a sample.
 */
export function buildWirePayload(sample: Sample, temporal: TemporalRecord): WirePayload {
    if (sample.streamId.trim().length === 0) {
        throw new EncodingError("Stream id is empty");
    }
    if (!Number.isSafeInteger(sample.sequenceNumber) || sample.sequenceNumber < 0) {
        throw new EncodingError(
            `Stream ${sample.streamId}: invalid sequence number ${sample.sequenceNumber}`
        );
    }

    return {
        schema_version: WIRE_SCHEMA_VERSION,
        stream_id: sample.streamId,
        sequence_number: sample.sequenceNumber,
        source_timestamp: temporal.sourceTimestamp,
        clock_offset: temporal.clockOffset,
        clock_offset_uncertainty: temporal.clockOffsetUncertainty,
        relay_send_time: temporal.relaySendTime,
        payload: encodePayload(sample),
    };
}

/**
 * Serialize a sample to payload bytes.
 * @throws EncodingError on non-finite channel values or an empty stream id
 */
export function formatSample(sample: Sample, temporal: TemporalRecord): Buffer {
    return Buffer.from(JSON.stringify(buildWirePayload(sample, temporal)), "utf8");
}

/**
 * Decode and validate payload bytes produced by {@link formatSample}.
 */
export function parsePayload(bytes: Buffer | string): WirePayload {
    const text = typeof bytes === "string" ? bytes : bytes.toString("utf8");

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new EncodingError("Payload is not valid JSON", { cause: err });
    }

    const result = WirePayloadSchema.safeParse(raw);
    if (!result.success) {
        throw new EncodingError(`Payload does not match the wire schema: ${result.error.message}`, {
            cause: result.error,
        });
    }
    return result.data;
}
