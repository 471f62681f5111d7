/**
 * Broker connection state machine.
 *
 *   disconnected ──start──▶ connecting ──ok──▶ connected
 *                              │  ▲                │ lost
 *                       failed └──┘                ▼
 *                                 connected ◀──ok── reconnecting ◀┐
 *                                                      │   failed  │
 *                                                      └───────────┘
 *   any ──shutdown──▶ closed      connecting/reconnecting ──too many failures──▶ closed
 */

export type ConnectionState =
    | { status: "disconnected" }
    /** `attempt` counts handshakes started since the last success */
    | { status: "connecting"; attempt: number }
    | { status: "connected"; since: number }
    | { status: "reconnecting"; attempt: number; reason: string }
    | { status: "closed"; reason: "shutdown" | "connect-failed" };

export type ConnectionStatus = ConnectionState["status"];

export type ConnectionEvent =
    | { type: "start" }
    | { type: "handshakeSucceeded"; at: number }
    | { type: "handshakeFailed"; maxConsecutiveFailures: number }
    | { type: "transportLost"; reason: string }
    | { type: "shutdown" };

export const INITIAL_CONNECTION_STATE: ConnectionState = { status: "disconnected" };

function assertNever(value: never): never {
    throw new Error(`Unhandled connection state: ${JSON.stringify(value)}`);
}

/**
 * Next state for an event. Events that do not apply to the current state
 * leave it unchanged; `closed` is terminal.
 */
export function transition(state: ConnectionState, event: ConnectionEvent): ConnectionState {
    if (event.type === "shutdown") {
        return state.status === "closed" ? state : { status: "closed", reason: "shutdown" };
    }

    switch (state.status) {
        case "disconnected":
            return event.type === "start" ? { status: "connecting", attempt: 1 } : state;

        case "connecting":
        case "reconnecting":
            if (event.type === "handshakeSucceeded") {
                return { status: "connected", since: event.at };
            }
            if (event.type === "handshakeFailed") {
                if (state.attempt >= event.maxConsecutiveFailures) {
                    return { status: "closed", reason: "connect-failed" };
                }
                return { ...state, attempt: state.attempt + 1 };
            }
            return state;

        case "connected":
            return event.type === "transportLost"
                ? { status: "reconnecting", attempt: 1, reason: event.reason }
                : state;

        case "closed":
            return state;

        default:
            return assertNever(state);
    }
}

/** Per-stream view of the shared connection. */
export type StreamConnectionState = "connected" | "reconnecting" | "disconnected";

export function streamConnectionState(state: ConnectionState): StreamConnectionState {
    switch (state.status) {
        case "connected":
            return "connected";
        case "connecting":
        case "reconnecting":
            return "reconnecting";
        case "disconnected":
        case "closed":
            return "disconnected";
        default:
            return assertNever(state);
    }
}
