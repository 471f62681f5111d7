import type { CLOCK_OFFSET_UNAVAILABLE } from "@streamrelay/shared";
import type { DecimalInput } from "./decimal.js";

/**
 * One acquired sample. Numeric streams carry one value per channel;
 * irregular marker streams carry a single event string.
 */
export interface Sample {
    streamId: string;
    /** Source-domain monotonic clock, integer nanoseconds or decimal seconds */
    acquisitionTimestamp: DecimalInput;
    payload: readonly number[] | string;
    /** Strictly increasing per stream, assigned at capture */
    sequenceNumber: number;
}

/**
 * Latest clock-sync estimate for a stream, written by the clock-sync
 * collaborator and only read by the relay.
 */
export interface ClockSyncRecord {
    /** Source clock minus reference clock */
    offset: DecimalInput;
    offsetUncertainty: DecimalInput;
    /** Reference-clock time of the measurement */
    measuredAt: DecimalInput;
}

export type ClockOffsetValue = string | typeof CLOCK_OFFSET_UNAVAILABLE;

export interface TemporalRecord {
    sourceTimestamp: string;
    clockOffset: ClockOffsetValue;
    clockOffsetUncertainty: ClockOffsetValue;
    /** Reference-clock time at formatting, decimal seconds */
    relaySendTime: string;
    /** Same instant as relaySendTime, kept for latency arithmetic */
    relaySendTimeNanos: bigint;
}

/**
 * Delivery lifecycle of an outbound message.
 */
export const DeliveryState = {
    PENDING: "pending",
    IN_FLIGHT: "in_flight",
    ACKNOWLEDGED: "acknowledged",
    FAILED: "failed",
    DROPPED: "dropped",
} as const;

export type DeliveryStateType = (typeof DeliveryState)[keyof typeof DeliveryState];

/**
 * Why a message left the queue without being acknowledged.
 * - overflow: evicted or refused at capacity
 * - shutdown: still unacknowledged when the grace period ended
 * - discarded: stream closed with discard requested
 * - closed: channel closed after a fatal connection failure
 * - encoding: sample could not be formatted
 * - out-of-order: sequence number did not advance
 */
export type DropReason =
    | "overflow"
    | "shutdown"
    | "discarded"
    | "closed"
    | "encoding"
    | "out-of-order";

export interface OutboundMessage {
    /** Relay-wide enqueue order */
    id: number;
    streamId: string;
    sequenceNumber: number;
    topic: string;
    payload: Buffer;
    enqueuedAt: number;
    relaySendTimeNanos: bigint;
    state: DeliveryStateType;
    attempts: number;
    dropReason?: DropReason;
}

/**
 * What a sample source yields. End-of-stream and disconnect are distinct.
 */
export type SourceEvent =
    | { type: "sample"; sample: Sample }
    | { type: "end" }
    | { type: "disconnected"; error: Error };

export interface SampleSource {
    readonly streamId: string;
    /** Resolves with the next event; resolves `end` once the signal aborts. */
    next(signal: AbortSignal): Promise<SourceEvent>;
}

/** Read side of the clock-sync collaborator. */
export interface ClockSyncProvider {
    getLatest(streamId: string): ClockSyncRecord | undefined;
}
