export * from "./config.js";
export * from "./payload.js";
