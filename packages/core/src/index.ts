export * from "./config/index.js";
export * from "./schemas/index.js";
export * from "./errors/catalog.js";
export * from "./logger/index.js";
export * from "./fs/index.js";
export * from "./storage/index/index.js";
export * from "./dedup/index.js";
