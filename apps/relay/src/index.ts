export * from "./streaming/types.js";
export * from "./streaming/errors.js";
export * from "./streaming/decimal.js";
export * from "./streaming/timestampManager.js";
export * from "./streaming/messageFormatter.js";
export * from "./streaming/clockSync.js";
export * from "./streaming/backoff.js";
export * from "./streaming/connectionState.js";
export * from "./streaming/metrics.js";
export * from "./streaming/errorReporter.js";
export * from "./streaming/reliabilityController.js";
export * from "./streaming/relay.js";
export * from "./streaming/sampleSource.js";
export { topicFor } from "./streaming/topics.js";
export * from "./transport/types.js";
export { RedisTransport, type RedisTransportOptions } from "./transport/redisTransport.js";
export { buildRelayConfig, parseStreamPriorities, brokerCredentials } from "./config/relay.js";
export { createRelayService, installShutdownHandlers, type RelayService, type RelayServiceOptions } from "./service.js";
export { startHealthServer, getHealthStatus } from "./health/server.js";
