import {
    RelayConfigSchema,
    type RelayConfig,
    type RelayConfigInput,
    type StreamPolicy,
} from "@streamrelay/shared";
import { ConfigError } from "../streaming/errors.js";
import type { BrokerCredentials } from "../transport/types.js";
import type { Env } from "./env.js";

/**
 * Parse "EEG_1=0,Markers=2" into per-stream priority policies.
 */
export function parseStreamPriorities(raw: string): Record<string, StreamPolicy> {
    const streams: Record<string, StreamPolicy> = {};

    for (const entry of raw.split(",")) {
        const trimmed = entry.trim();
        if (trimmed.length === 0) continue;

        const separator = trimmed.lastIndexOf("=");
        const streamId = trimmed.slice(0, separator).trim();
        const value = trimmed.slice(separator + 1).trim();
        if (separator <= 0 || streamId.length === 0 || !/^\d+$/.test(value)) {
            throw new ConfigError(`Invalid stream priority "${trimmed}" (expected stream=priority)`);
        }
        streams[streamId] = { priority: Number(value) };
    }
    return streams;
}

/**
 * Merge environment-derived settings with programmatic overrides and
 * validate the result. Override stream policies are merged per stream.
 */
export function buildRelayConfig(
    env: Pick<Env, "RELAY_NAMESPACE" | "DELIVERY_GUARANTEE" | "RELAY_STREAM_PRIORITIES">,
    overrides: RelayConfigInput = {}
): RelayConfig {
    const fromEnv = parseStreamPriorities(env.RELAY_STREAM_PRIORITIES);
    const streams: Record<string, StreamPolicy> = { ...fromEnv };
    for (const [streamId, policy] of Object.entries(overrides.streams ?? {})) {
        streams[streamId] = { ...fromEnv[streamId], ...policy };
    }

    const result = RelayConfigSchema.safeParse({
        namespace: env.RELAY_NAMESPACE,
        deliveryGuarantee: env.DELIVERY_GUARANTEE,
        ...overrides,
        streams,
    });
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new ConfigError(`Invalid relay configuration: ${issues}`, { cause: result.error });
    }
    return result.data;
}

export function brokerCredentials(
    env: Pick<Env, "REDIS_URL" | "BROKER_USERNAME" | "BROKER_PASSWORD">
): BrokerCredentials {
    return {
        url: env.REDIS_URL,
        username: env.BROKER_USERNAME,
        password: env.BROKER_PASSWORD,
    };
}
