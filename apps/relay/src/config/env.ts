import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { DeliveryGuarantee } from "@streamrelay/shared";

// Load .env from project root (four levels up from apps/relay/src/config)
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../../.env") });

export const envSchema = z.object({
    REDIS_URL: z.string().url().default("redis://localhost:6379"),
    BROKER_USERNAME: z.string().optional(),
    BROKER_PASSWORD: z.string().optional(),
    RELAY_NAMESPACE: z.string().default("lsl"),
    DELIVERY_GUARANTEE: z
        .enum([DeliveryGuarantee.AT_MOST_ONCE, DeliveryGuarantee.AT_LEAST_ONCE])
        .default(DeliveryGuarantee.AT_LEAST_ONCE),
    /** Comma-separated stream=priority pairs, e.g. "EEG_1=0,Markers=2" */
    RELAY_STREAM_PRIORITIES: z.string().default(""),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z
        .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
        .default("info"),
    RELAY_PORT: z.coerce.number().int().min(0).max(65_535).default(8081),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment variables:");
        console.error(result.error.format());
        process.exit(1);
    }
    return result.data;
}

export const env = loadEnv();
