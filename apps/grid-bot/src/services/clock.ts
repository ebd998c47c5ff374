import type { Ms } from "@grid-bot/core";

/**
 * Current time in ms. Injected so tests control the clock.
 */
export type Clock = () => Ms;

export const systemClock: Clock = () => Date.now();
