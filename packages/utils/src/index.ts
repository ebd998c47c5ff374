export { LogLevel, logger, toFields, toMessage } from "./logger";
export type { LogRecord, LogSink } from "./logger";

export { createInterruptibleSleep, runPollingLoop, sleep } from "./polling-loop";
export type { IterationOutcome, PollingLoopOptions, RunningFlag, Sleep } from "./polling-loop";
