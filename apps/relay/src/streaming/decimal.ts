/**
 * Lossless decimal timestamps.
 *
 * Acquisition timestamps and clock offsets never pass through a float once
 * they reach the relay. They arrive either as integer nanoseconds (bigint)
 * or as decimal-second strings, and leave as canonical decimal strings with
 * at least nine fractional digits.
 */

import { EncodingError } from "./errors.js";

/** Integer nanoseconds, or decimal seconds as text ("12.5", "-0.000001"). */
export type DecimalInput = bigint | string;

export const NANOS_PER_SECOND = 1_000_000_000n;
const NANO_DIGITS = 9;
const DECIMAL_INPUT = /^(-?)(\d+)(?:\.(\d+))?$/;

/**
 * Render integer nanoseconds as decimal seconds with nine fractional digits.
 */
export function formatNanos(nanos: bigint): string {
    const negative = nanos < 0n;
    const magnitude = negative ? -nanos : nanos;
    const whole = magnitude / NANOS_PER_SECOND;
    const fraction = (magnitude % NANOS_PER_SECOND).toString().padStart(NANO_DIGITS, "0");
    return `${negative ? "-" : ""}${whole}.${fraction}`;
}

/**
 * Canonical form of a decimal value: no leading zeros in the integer part,
 * at least nine fractional digits (extra digits are kept, never rounded),
 * and no sign on zero.
 */
export function normalizeDecimal(value: DecimalInput): string {
    if (typeof value === "bigint") {
        return formatNanos(value);
    }

    const match = DECIMAL_INPUT.exec(value);
    if (!match) {
        throw new EncodingError(`Not a decimal number: "${value}"`);
    }
    const [, sign, integerDigits, fractionDigits = ""] = match;
    const whole = integerDigits.replace(/^0+(?=\d)/, "");
    const fraction = fractionDigits.padEnd(NANO_DIGITS, "0");
    const isZero = /^0+$/.test(whole + fraction);
    return `${isZero ? "" : sign}${whole}.${fraction}`;
}

/**
 * Parse a decimal-seconds string into integer nanoseconds.
 * Digits beyond nanosecond resolution are truncated toward zero.
 */
export function parseDecimalNanos(value: string): bigint {
    const match = DECIMAL_INPUT.exec(value);
    if (!match) {
        throw new EncodingError(`Not a decimal number: "${value}"`);
    }
    const [, sign, integerDigits, fractionDigits = ""] = match;
    const fraction = fractionDigits.slice(0, NANO_DIGITS).padEnd(NANO_DIGITS, "0");
    const magnitude = BigInt(integerDigits) * NANOS_PER_SECOND + BigInt(fraction);
    return sign === "-" ? -magnitude : magnitude;
}

/**
 * For sources whose clock API only yields double-precision seconds.
 * The value is rendered with nine fractional digits; whatever precision the
 * double carried is preserved from here on.
 */
export function decimalFromSeconds(seconds: number): string {
    if (!Number.isFinite(seconds)) {
        throw new EncodingError(`Timestamp is not finite: ${seconds}`);
    }
    return normalizeDecimal(seconds.toFixed(NANO_DIGITS));
}
