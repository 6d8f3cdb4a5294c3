export * from "./protocol.js";
export * from "./providers.js";
export * from "./streaming.js";
export * from "./languages.js";
