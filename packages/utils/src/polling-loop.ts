/**
 * Polling loop utilities
 *
 * Sequential, cooperative loops: one iteration at a time, a shared running flag
 * checked before each iteration, and a per-iteration error boundary so a failing
 * loop backs off instead of taking the others down.
 */

import { logger } from "./logger";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms =>
  new Promise<void>(resolve => {
    setTimeout(resolve, ms);
  });

/**
 * A sleep whose pending waits can all be ended early, so stopping loops
 * does not wait out their poll intervals.
 */
export function createInterruptibleSleep(): { sleep: Sleep; wakeAll: () => void } {
  const wakers = new Set<() => void>();

  const interruptible: Sleep = ms =>
    new Promise<void>(resolve => {
      const wake = (): void => {
        clearTimeout(timer);
        wakers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      wakers.add(wake);
    });

  return {
    sleep: interruptible,
    wakeAll: () => {
      for (const wake of [...wakers]) wake();
    },
  };
}

/**
 * Shared stop signal for a group of loops
 */
export interface RunningFlag {
  isRunning(): boolean;
}

/**
 * Outcome of a single iteration: how long to wait before the next one.
 */
export type IterationOutcome = { nextDelayMs: number };

export interface PollingLoopOptions {
  /**
   * Name of the loop (for logging)
   */
  name: string;

  running: RunningFlag;

  /**
   * Runs one iteration and returns the delay before the next.
   */
  runOnce: () => Promise<IterationOutcome>;

  /**
   * Delay after an iteration throws.
   */
  errorBackoffMs: number;

  sleep?: Sleep;
}

/**
 * Run a polling loop until the running flag clears.
 *
 * In-flight work is never aborted: the flag is only checked between iterations.
 */
export async function runPollingLoop(options: PollingLoopOptions): Promise<void> {
  const { name, running, runOnce, errorBackoffMs } = options;
  const wait = options.sleep ?? sleep;

  logger.info(`Starting ${name}`);

  while (running.isRunning()) {
    let delayMs: number;
    try {
      const outcome = await runOnce();
      delayMs = outcome.nextDelayMs;
    } catch (error) {
      logger.error(`${name} iteration failed`, { error });
      delayMs = errorBackoffMs;
    }

    if (!running.isRunning()) break;
    await wait(delayMs);
  }

  logger.info(`${name} stopped`);
}
