export * from "./chunk.js";
export * from "./config.js";
export * from "./job.js";
export * from "./pipeline.js";
export * from "./services.js";
export * from "./source.js";
export * from "./task.js";
