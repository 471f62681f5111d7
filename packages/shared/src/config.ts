import { z } from "zod";

/**
 * Broker delivery guarantee.
 * - atMostOnce: one publish attempt, confirmed by the local "sent" signal
 * - atLeastOnce: publish until the broker acknowledges, up to maxDeliveryAttempts
 */
export const DeliveryGuarantee = {
    AT_MOST_ONCE: "at-most-once",
    AT_LEAST_ONCE: "at-least-once",
} as const;

export type DeliveryGuaranteeType =
    (typeof DeliveryGuarantee)[keyof typeof DeliveryGuarantee];

/**
 * Shape of the delay curve between connection attempts.
 */
export const RetryStrategy = {
    NONE: "none",
    LINEAR: "linear",
    EXPONENTIAL: "exponential",
} as const;

export type RetryStrategyType = (typeof RetryStrategy)[keyof typeof RetryStrategy];

/**
 * Topic namespace grammar: slash-separated ASCII segments.
 */
export const NAMESPACE_PATTERN = /^[A-Za-z0-9_.-]+(\/[A-Za-z0-9_.-]+)*$/;

/**
 * Stream id grammar: one topic segment. Ids are used verbatim as the last
 * topic segment, so two streams can never share a topic.
 */
export const STREAM_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

export const BackoffSchema = z
    .object({
        /** Delay curve (default: exponential) */
        strategy: z
            .enum([RetryStrategy.NONE, RetryStrategy.LINEAR, RetryStrategy.EXPONENTIAL])
            .default(RetryStrategy.EXPONENTIAL),
        /** First delay in ms (default: 1000) */
        initialDelayMs: z.number().int().min(0).default(1000),
        /** Upper bound for any delay, jitter included (default: 60000) */
        maxDelayMs: z.number().int().min(0).default(60_000),
        /** Growth factor for exponential curves (default: 2) */
        multiplier: z.number().min(1).default(2),
        /** Total jitter width as a fraction of the delay (default: 0.2 = ±10%) */
        jitterRatio: z.number().min(0).max(1).default(0.2),
    })
    .superRefine((value, ctx) => {
        if (value.initialDelayMs > value.maxDelayMs) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "initialDelayMs must not exceed maxDelayMs",
                path: ["initialDelayMs"],
            });
        }
    });

export type Backoff = z.infer<typeof BackoffSchema>;

export const StreamPolicySchema = z.object({
    /** Lower values consume bandwidth first (default: 5) */
    priority: z.number().int().min(0).optional(),
    /** Per-stream queue capacity override */
    queueCapacity: z.number().int().positive().optional(),
});

export type StreamPolicy = z.infer<typeof StreamPolicySchema>;

/**
 * Relay configuration. Every field is defaulted so an empty object parses.
 */
export const RelayConfigSchema = z.object({
    /** Topic prefix: topic = namespace + "/" + stream id (default: "lsl") */
    namespace: z
        .string()
        .regex(NAMESPACE_PATTERN, "namespace must be slash-separated [A-Za-z0-9_.-] segments")
        .default("lsl"),
    deliveryGuarantee: z
        .enum([DeliveryGuarantee.AT_MOST_ONCE, DeliveryGuarantee.AT_LEAST_ONCE])
        .default(DeliveryGuarantee.AT_LEAST_ONCE),

    // ─── Buffering ─────────────────────────────────────────────────────────

    /** Default per-stream queue capacity (default: 1000) */
    queueCapacity: z.number().int().positive().default(1000),
    /** Buffer budget shared by all streams (default: 10000) */
    totalBufferCapacity: z.number().int().positive().default(10_000),
    /** Priority for streams without a policy (default: 5) */
    defaultPriority: z.number().int().min(0).default(5),
    /** Per-stream overrides keyed by stream id */
    streams: z.record(z.string(), StreamPolicySchema).default({}),

    // ─── Delivery ──────────────────────────────────────────────────────────

    /** Messages awaiting acknowledgment across all streams (default: 8) */
    maxInFlight: z.number().int().positive().default(8),
    /** Publish attempts per message before it is marked failed (default: 3) */
    maxDeliveryAttempts: z.number().int().positive().default(3),
    /** Wait for a broker acknowledgment per attempt (default: 5000) */
    ackTimeoutMs: z.number().int().positive().default(5000),
    /** Optional publish rate cap across all streams */
    maxPublishesPerSecond: z.number().int().positive().optional(),

    // ─── Connection ────────────────────────────────────────────────────────

    backoff: BackoffSchema.default({}),
    /** Consecutive failed handshakes before the connection is closed (default: 10) */
    maxConsecutiveConnectFailures: z.number().int().positive().default(10),
    /** Broker ping interval, 0 disables (default: 10000) */
    keepAliveIntervalMs: z.number().int().min(0).default(10_000),
    /** Ping reply deadline (default: 5000) */
    keepAliveTimeoutMs: z.number().int().positive().default(5000),

    // ─── Backpressure & shutdown ───────────────────────────────────────────

    /** How long a queue must stay full before upstream is paused (default: 1000) */
    backpressureWindowMs: z.number().int().min(0).default(1000),
    /** Fraction of capacity the queue must drain below to resume (default: 0.5) */
    backpressureReleaseRatio: z.number().gt(0).max(1).default(0.5),
    /** Time given to pending messages on shutdown (default: 5000) */
    shutdownGraceMs: z.number().int().min(0).default(5000),

    // ─── Metrics ───────────────────────────────────────────────────────────

    /** Latency samples kept per stream for the rolling average (default: 1000) */
    latencyWindowSize: z.number().int().positive().default(1000),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type RelayConfigInput = z.input<typeof RelayConfigSchema>;
