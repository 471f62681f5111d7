import Redis from "ioredis";
import { DeliveryGuarantee, type DeliveryGuaranteeType } from "@streamrelay/shared";
import { createChildLogger } from "../log/logger.js";
import { ConnectError, errorMessage } from "../streaming/errors.js";
import type { BrokerCredentials, BrokerTransport } from "./types.js";

const logger = createChildLogger({ module: "redis-transport" });

// Stream entry field holding the payload bytes
export const PAYLOAD_FIELD = "payload";

export interface RedisTransportOptions {
    /** Approximate per-topic stream length cap (XADD MAXLEN ~). Unbounded when unset. */
    maxStreamLength?: number;
    connectTimeoutMs?: number;
}

/**
 * Broker transport over Redis.
 *
 * - at-least-once: XADD to a stream named by the topic; the returned entry
 *   id is the broker acknowledgment
 * - at-most-once: PUBLISH on a channel named by the topic; resolves once
 *   the command is written
 *
 * ioredis reconnection and its offline queue are disabled: reconnecting is
 * the reliability controller's job, and a command issued while the socket
 * is down must fail rather than wait.
 */
export class RedisTransport implements BrokerTransport {
    private client: Redis | null = null;
    private listeners: Set<(reason: string) => void> = new Set();

    constructor(private readonly options: RedisTransportOptions = {}) {}

    async connect(credentials: BrokerCredentials): Promise<void> {
        await this.release();

        const client = new Redis(credentials.url, {
            username: credentials.username,
            password: credentials.password,
            lazyConnect: true,
            enableOfflineQueue: false,
            maxRetriesPerRequest: 0,
            retryStrategy: () => null,
            connectTimeout: this.options.connectTimeoutMs ?? 10_000,
        });

        let lastError: Error | null = null;
        client.on("error", (err: Error) => {
            lastError = err;
            logger.warn({ err: err.message }, "Redis connection error");
        });

        try {
            await client.connect();
        } catch (err) {
            client.disconnect();
            throw new ConnectError(`Redis handshake failed: ${errorMessage(err)}`, { cause: err });
        }

        client.once("end", () => {
            if (this.client !== client) return;
            this.client = null;
            const reason = lastError ? `connection ended: ${lastError.message}` : "connection ended";
            logger.warn({ reason }, "Redis connection lost");
            for (const listener of [...this.listeners]) {
                listener(reason);
            }
        });

        this.client = client;
        logger.info({ host: client.options.host, port: client.options.port }, "Redis connected");
    }

    async publish(topic: string, payload: Buffer, qos: DeliveryGuaranteeType): Promise<void> {
        const client = this.client;
        if (!client) {
            throw new Error("Redis transport is not connected");
        }

        if (qos === DeliveryGuarantee.AT_MOST_ONCE) {
            await client.publish(topic, payload);
            return;
        }

        const entryId = this.options.maxStreamLength
            ? await client.xadd(topic, "MAXLEN", "~", this.options.maxStreamLength, "*", PAYLOAD_FIELD, payload)
            : await client.xadd(topic, "*", PAYLOAD_FIELD, payload);
        if (!entryId) {
            throw new Error(`Redis did not acknowledge entry on ${topic}`);
        }
    }

    async ping(): Promise<void> {
        const client = this.client;
        if (!client) {
            throw new Error("Redis transport is not connected");
        }
        await client.ping();
    }

    async disconnect(): Promise<void> {
        await this.release();
    }

    onDisconnect(listener: (reason: string) => void): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private async release(): Promise<void> {
        const client = this.client;
        if (!client) return;

        this.client = null;
        try {
            await client.quit();
        } catch (err) {
            logger.debug({ err: errorMessage(err) }, "Redis quit failed, forcing disconnect");
            client.disconnect();
        }
    }
}
