import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConnectError } from "../streaming/errors.js";
import { RedisTransport } from "./redisTransport.js";

const { FakeRedis } = vi.hoisted(() => {
    type Handler = (...args: unknown[]) => void;

    class FakeRedis {
        static instances: FakeRedis[] = [];
        static connectError: Error | null = null;

        readonly options = { host: "localhost", port: 6379 };
        readonly calls: unknown[][] = [];
        private handlers: Map<string, Handler[]> = new Map();

        constructor(
            readonly url: string,
            readonly config: Record<string, unknown>
        ) {
            FakeRedis.instances.push(this);
        }

        on(event: string, handler: Handler) {
            this.handlers.set(event, [...(this.handlers.get(event) ?? []), handler]);
            return this;
        }

        once(event: string, handler: Handler) {
            const wrapped: Handler = (...args) => {
                this.handlers.set(
                    event,
                    (this.handlers.get(event) ?? []).filter((h) => h !== wrapped)
                );
                handler(...args);
            };
            return this.on(event, wrapped);
        }

        emit(event: string, ...args: unknown[]) {
            for (const handler of this.handlers.get(event) ?? []) handler(...args);
        }

        async connect() {
            if (FakeRedis.connectError) throw FakeRedis.connectError;
        }

        async xadd(...args: unknown[]) {
            this.calls.push(["xadd", ...args]);
            return "1700000000000-0";
        }

        async publish(...args: unknown[]) {
            this.calls.push(["publish", ...args]);
            return 1;
        }

        async ping() {
            this.calls.push(["ping"]);
            return "PONG";
        }

        async quit() {
            this.calls.push(["quit"]);
            return "OK";
        }

        disconnect() {
            this.calls.push(["disconnect"]);
        }
    }

    return { FakeRedis };
});

vi.mock("ioredis", () => ({ default: FakeRedis }));

const credentials = { url: "redis://localhost:6379", username: "relay", password: "test-secret" };

function lastClient() {
    const client = FakeRedis.instances[FakeRedis.instances.length - 1];
    if (!client) throw new Error("no client created");
    return client;
}

describe("RedisTransport", () => {
    beforeEach(() => {
        FakeRedis.instances = [];
        FakeRedis.connectError = null;
    });

    it("opens a connection with client-side reconnection disabled", async () => {
        const transport = new RedisTransport();
        await transport.connect(credentials);

        const client = lastClient();
        expect(client.url).toBe("redis://localhost:6379");
        expect(client.config).toMatchObject({
            username: "relay",
            password: "test-secret",
            lazyConnect: true,
            enableOfflineQueue: false,
        });
        const retryStrategy = client.config["retryStrategy"];
        expect(typeof retryStrategy === "function" ? retryStrategy() : "missing").toBeNull();
    });

    it("appends to a stream for at-least-once delivery", async () => {
        const transport = new RedisTransport();
        await transport.connect(credentials);
        const payload = Buffer.from("{}");

        await transport.publish("lsl/EEG_1", payload, "at-least-once");

        expect(lastClient().calls).toEqual([["xadd", "lsl/EEG_1", "*", "payload", payload]]);
    });

    it("caps stream length when configured", async () => {
        const transport = new RedisTransport({ maxStreamLength: 1000 });
        await transport.connect(credentials);
        const payload = Buffer.from("{}");

        await transport.publish("lsl/EEG_1", payload, "at-least-once");

        expect(lastClient().calls).toEqual([
            ["xadd", "lsl/EEG_1", "MAXLEN", "~", 1000, "*", "payload", payload],
        ]);
    });

    it("publishes on a channel for at-most-once delivery", async () => {
        const transport = new RedisTransport();
        await transport.connect(credentials);
        const payload = Buffer.from("{}");

        await transport.publish("lsl/Markers", payload, "at-most-once");

        expect(lastClient().calls).toEqual([["publish", "lsl/Markers", payload]]);
    });

    it("wraps handshake failures in ConnectError", async () => {
        FakeRedis.connectError = new Error("WRONGPASS invalid username-password pair");
        const transport = new RedisTransport();

        await expect(transport.connect(credentials)).rejects.toThrow(ConnectError);
        expect(lastClient().calls).toEqual([["disconnect"]]);
    });

    it("notifies listeners when the connection ends unexpectedly", async () => {
        const transport = new RedisTransport();
        const reasons: string[] = [];
        transport.onDisconnect((reason) => reasons.push(reason));
        await transport.connect(credentials);

        const client = lastClient();
        client.emit("error", new Error("read ECONNRESET"));
        client.emit("end");

        expect(reasons).toEqual(["connection ended: read ECONNRESET"]);
        await expect(transport.publish("lsl/EEG_1", Buffer.from("{}"), "at-least-once")).rejects.toThrow(
            "Redis transport is not connected"
        );
    });

    it("stays quiet when the relay closes the connection itself", async () => {
        const transport = new RedisTransport();
        const reasons: string[] = [];
        transport.onDisconnect((reason) => reasons.push(reason));
        await transport.connect(credentials);

        const client = lastClient();
        await transport.disconnect();
        client.emit("end");

        expect(client.calls).toEqual([["quit"]]);
        expect(reasons).toEqual([]);
    });
});
