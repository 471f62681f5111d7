import pino, { type LoggerOptions } from "pino";
import { env, type Env } from "../config/env.js";

/** Broker secrets, wherever they show up in a log call's bindings */
const REDACTED_PATHS = ["password", "*.password"];

export function buildLoggerOptions(settings: Pick<Env, "LOG_LEVEL" | "NODE_ENV">): LoggerOptions {
    return {
        level: settings.LOG_LEVEL,
        transport:
            settings.NODE_ENV === "development"
                ? {
                    target: "pino-pretty",
                    options: {
                        colorize: true,
                        translateTime: "SYS:standard",
                        ignore: "pid,hostname",
                    },
                }
                : undefined,
        base: {
            service: "stream-relay",
        },
        redact: {
            paths: REDACTED_PATHS,
            censor: "[redacted]",
        },
    };
}

export const logger = pino(buildLoggerOptions(env));

export function createChildLogger(bindings: Record<string, unknown>) {
    return logger.child(bindings);
}
