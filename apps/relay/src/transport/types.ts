import type { DeliveryGuaranteeType } from "@streamrelay/shared";

export interface BrokerCredentials {
    url: string;
    username?: string;
    password?: string;
}

/**
 * Pub/sub client capability consumed by the reliability controller.
 * The controller is the only caller; nothing else issues broker I/O.
 */
export interface BrokerTransport {
    /** Handshake and authenticate. Rejects with ConnectError. */
    connect(credentials: BrokerCredentials): Promise<void>;
    /**
     * Resolves when the message is acknowledged (at-least-once) or handed to
     * the socket (at-most-once).
     */
    publish(topic: string, payload: Buffer, qos: DeliveryGuaranteeType): Promise<void>;
    disconnect(): Promise<void>;
    /** Keep-alive ping; optional for transports with their own heartbeat. */
    ping?(): Promise<void>;
    /** Unsolicited disconnects. Returns an unsubscribe function. */
    onDisconnect(listener: (reason: string) => void): () => void;
}
