import type { DeliveryGuaranteeType } from "@streamrelay/shared";
import { ConnectError } from "../streaming/errors.js";
import type { BrokerCredentials, BrokerTransport } from "../transport/types.js";

export type PublishMode = "ack" | "reject" | "hang" | "manual";

export interface PublishedRecord {
    topic: string;
    payload: Buffer;
    qos: DeliveryGuaranteeType;
    /** Publish calls made before this one, across all topics */
    index: number;
}

interface PendingPublish {
    record: PublishedRecord;
    resolve: () => void;
    reject: (err: Error) => void;
}

/**
 * In-process broker for tests. Records every publish and lets the test
 * decide how each one settles.
 */
export class FakeBrokerTransport implements BrokerTransport {
    readonly published: PublishedRecord[] = [];
    readonly pending: PendingPublish[] = [];
    connectAttempts = 0;
    connected = false;
    disconnectCalls = 0;
    lastCredentials: BrokerCredentials | null = null;
    publishMode: PublishMode = "ack";
    /** Ping replies while true; hangs while false */
    pingResponds = true;

    private connectFailuresLeft = 0;
    private rejectNext = 0;
    private listeners: Set<(reason: string) => void> = new Set();

    /** Make the next `count` handshakes fail (Infinity: all of them). */
    failConnects(count: number): void {
        this.connectFailuresLeft = count;
    }

    /** Make the next `count` publishes reject regardless of mode. */
    rejectPublishes(count: number): void {
        this.rejectNext = count;
    }

    async connect(credentials: BrokerCredentials): Promise<void> {
        this.connectAttempts++;
        this.lastCredentials = credentials;
        if (this.connectFailuresLeft > 0) {
            this.connectFailuresLeft--;
            throw new ConnectError("connection refused");
        }
        this.connected = true;
    }

    publish(topic: string, payload: Buffer, qos: DeliveryGuaranteeType): Promise<void> {
        const record: PublishedRecord = { topic, payload, qos, index: this.published.length };
        this.published.push(record);

        if (!this.connected) {
            return Promise.reject(new Error("not connected"));
        }
        if (this.rejectNext > 0) {
            this.rejectNext--;
            return Promise.reject(new Error("publish rejected"));
        }

        switch (this.publishMode) {
            case "ack":
                return Promise.resolve();
            case "reject":
                return Promise.reject(new Error("publish rejected"));
            case "hang":
                return new Promise<void>(() => undefined);
            case "manual":
                return new Promise<void>((resolve, reject) => {
                    this.pending.push({ record, resolve, reject });
                });
        }
    }

    async disconnect(): Promise<void> {
        this.disconnectCalls++;
        this.connected = false;
    }

    ping(): Promise<void> {
        return this.pingResponds ? Promise.resolve() : new Promise<void>(() => undefined);
    }

    onDisconnect(listener: (reason: string) => void): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Drop the connection as if the broker went away. */
    simulateDisconnect(reason = "socket closed"): void {
        this.connected = false;
        for (const listener of [...this.listeners]) {
            listener(reason);
        }
    }

    /** Settle the oldest manual publish. */
    ackNext(): PublishedRecord {
        const next = this.pending.shift();
        if (!next) throw new Error("no pending publish");
        next.resolve();
        return next.record;
    }

    rejectNextPending(message = "publish rejected"): PublishedRecord {
        const next = this.pending.shift();
        if (!next) throw new Error("no pending publish");
        next.reject(new Error(message));
        return next.record;
    }

    /** Sequence numbers published to a topic, in publish order. */
    sequencesFor(topic: string): number[] {
        return this.published
            .filter((record) => record.topic === topic)
            .map((record) => sequenceOf(record.payload));
    }

    get listenerCount(): number {
        return this.listeners.size;
    }
}

function sequenceOf(payload: Buffer): number {
    const parsed: unknown = JSON.parse(payload.toString("utf8"));
    if (
        typeof parsed === "object" &&
        parsed !== null &&
        "sequence_number" in parsed &&
        typeof parsed.sequence_number === "number"
    ) {
        return parsed.sequence_number;
    }
    return -1;
}
