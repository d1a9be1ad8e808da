export { envSchema, parseEnv } from "./env.js";
export { getDefaultPolicy, getConnectorPolicy } from "./connector-policy.js";
