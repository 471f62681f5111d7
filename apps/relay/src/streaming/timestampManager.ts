/**
 * Attaches the temporal record to each sample.
 *
 * The source timestamp and clock offset are copied losslessly; the relay
 * send time comes from the reference clock at the moment of formatting so
 * consumers can compute one-way transport latency.
 */

import { CLOCK_OFFSET_UNAVAILABLE } from "@streamrelay/shared";
import { formatNanos, normalizeDecimal } from "./decimal.js";
import type { ClockSyncRecord, Sample, TemporalRecord } from "./types.js";

export interface ReferenceClock {
    /** Reference-clock time in integer nanoseconds */
    nowNanos(): bigint;
}

/**
 * Wall-clock epoch anchored once, advanced by the monotonic hrtime so the
 * reading has nanosecond granularity and never steps backwards.
 */
export function createSystemReferenceClock(): ReferenceClock {
    const anchorEpochNanos = BigInt(Date.now()) * 1_000_000n;
    const anchorHr = process.hrtime.bigint();
    return {
        nowNanos: () => anchorEpochNanos + (process.hrtime.bigint() - anchorHr),
    };
}

export class TimestampManager {
    constructor(private readonly clock: ReferenceClock = createSystemReferenceClock()) {}

    /**
     * Build the temporal record for a sample. A missing sync record yields
     * `"unavailable"` offsets, never a fabricated zero.
     */
    createTemporalRecord(sample: Sample, sync: ClockSyncRecord | undefined): TemporalRecord {
        const relaySendTimeNanos = this.clock.nowNanos();
        return {
            sourceTimestamp: normalizeDecimal(sample.acquisitionTimestamp),
            clockOffset: sync ? normalizeDecimal(sync.offset) : CLOCK_OFFSET_UNAVAILABLE,
            clockOffsetUncertainty: sync
                ? normalizeDecimal(sync.offsetUncertainty)
                : CLOCK_OFFSET_UNAVAILABLE,
            relaySendTime: formatNanos(relaySendTimeNanos),
            relaySendTimeNanos,
        };
    }

    now(): bigint {
        return this.clock.nowNanos();
    }
}
