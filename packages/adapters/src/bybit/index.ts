export { BybitGateway, mapRetCode, mapThrownError } from "./bybit-gateway";
export type { BybitRestClient } from "./bybit-gateway";
export { withRetry } from "./retry";
export type { RetryOptions } from "./retry";
export { BybitConfigSchema, classifyRetCode } from "./types";
export type { BybitConfig, RetCodeCategory } from "./types";
