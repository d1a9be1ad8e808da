export * from "./tasks.js";
export * from "./source-accounts.js";
