/**
 * @grid-bot/adapters
 *
 * Exchange port and the Bybit implementation.
 */

export * from "./ports";
export * from "./bybit";
