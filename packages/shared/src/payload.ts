import { z } from "zod";

/** Wire document version written by the formatter. */
export const WIRE_SCHEMA_VERSION = 1;

/** Marker for a clock offset that has not been measured yet. */
export const CLOCK_OFFSET_UNAVAILABLE = "unavailable";

/** Decimal seconds with at least nanosecond resolution, e.g. "1234.000000001". */
export const DECIMAL_STRING_PATTERN = /^-?\d+\.\d{9,}$/;

const DecimalString = z.string().regex(DECIMAL_STRING_PATTERN, "expected a decimal string");

const OptionalDecimal = z.union([z.literal(CLOCK_OFFSET_UNAVAILABLE), DecimalString]);

/**
 * Published document. Fields are tagged by name; consumers must ignore
 * fields they do not know.
 */
export const WirePayloadSchema = z
    .object({
        schema_version: z.number().int().positive(),
        stream_id: z.string().min(1),
        sequence_number: z.number().int().min(0),
        source_timestamp: DecimalString,
        clock_offset: OptionalDecimal,
        clock_offset_uncertainty: OptionalDecimal,
        relay_send_time: DecimalString,
        payload: z.union([z.array(z.number()), z.string()]),
    })
    .passthrough();

export type WirePayload = z.infer<typeof WirePayloadSchema>;
