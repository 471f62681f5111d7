import { describe, it, expect } from "vitest";
import {
    decimalFromSeconds,
    formatNanos,
    normalizeDecimal,
    parseDecimalNanos,
} from "./decimal.js";
import { EncodingError } from "./errors.js";

describe("formatNanos", () => {
    it("renders nine fractional digits", () => {
        expect(formatNanos(1_234_000_000_001n)).toBe("1234.000000001");
        expect(formatNanos(0n)).toBe("0.000000000");
        expect(formatNanos(5n)).toBe("0.000000005");
    });

    it("keeps the sign for negative offsets below one second", () => {
        expect(formatNanos(-2_500_000n)).toBe("-0.002500000");
        expect(formatNanos(-1_000_000_001n)).toBe("-1.000000001");
    });
});

describe("normalizeDecimal", () => {
    it("pads to nanosecond resolution", () => {
        expect(normalizeDecimal("12.5")).toBe("12.500000000");
        expect(normalizeDecimal("7")).toBe("7.000000000");
    });

    it("keeps digits beyond nanoseconds instead of rounding", () => {
        expect(normalizeDecimal("1.0000000019")).toBe("1.0000000019");
    });

    it("strips leading zeros and the sign of zero", () => {
        expect(normalizeDecimal("007.25")).toBe("7.250000000");
        expect(normalizeDecimal("-0.0")).toBe("0.000000000");
    });

    it("is stable on its own output", () => {
        const once = normalizeDecimal("98765.432101234");
        expect(normalizeDecimal(once)).toBe(once);
    });

    it("rejects anything that is not a plain decimal", () => {
        expect(() => normalizeDecimal("1e-9")).toThrow(EncodingError);
        expect(() => normalizeDecimal("NaN")).toThrow(EncodingError);
        expect(() => normalizeDecimal("")).toThrow('Not a decimal number: ""');
    });
});

describe("parseDecimalNanos", () => {
    it("round-trips nine fractional digits exactly", () => {
        const text = "1700000000.123456789";
        const nanos = parseDecimalNanos(text);

        expect(nanos).toBe(1_700_000_000_123_456_789n);
        expect(formatNanos(nanos)).toBe(text);
    });

    it("truncates digits below a nanosecond", () => {
        expect(parseDecimalNanos("0.0000000019")).toBe(1n);
        expect(parseDecimalNanos("-2.5")).toBe(-2_500_000_000n);
    });
});

describe("decimalFromSeconds", () => {
    it("renders a double with nine fractional digits", () => {
        expect(decimalFromSeconds(12.5)).toBe("12.500000000");
        expect(decimalFromSeconds(-0.25)).toBe("-0.250000000");
    });

    it("rejects non-finite seconds", () => {
        expect(() => decimalFromSeconds(Number.POSITIVE_INFINITY)).toThrow(EncodingError);
    });
});
