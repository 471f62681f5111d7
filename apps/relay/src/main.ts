import { env } from "./config/env.js";
import { brokerCredentials, buildRelayConfig } from "./config/relay.js";
import { logger } from "./log/logger.js";
import { createRelayService, installShutdownHandlers } from "./service.js";
import { RedisTransport } from "./transport/redisTransport.js";

async function main() {
    logger.info("Relay starting...");

    // Throws ConfigError before anything connects
    const config = buildRelayConfig(env);

    const service = createRelayService({
        config,
        transport: new RedisTransport(),
        credentials: brokerCredentials(env),
        healthPort: env.RELAY_PORT,
    });
    installShutdownHandlers(service);

    logger.info(
        { namespace: config.namespace, deliveryGuarantee: config.deliveryGuarantee },
        "Relay started successfully"
    );
}

main().catch((err) => {
    logger.fatal({ err }, "Relay crashed");
    process.exit(1);
});
