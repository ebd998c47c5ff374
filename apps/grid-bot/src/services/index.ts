export { recordEvent } from "./bot-events";
export type { BotEventInput } from "./bot-events";
export { systemClock } from "./clock";
export type { Clock } from "./clock";
export { GridEngine } from "./grid-engine";
export type { GridEngineDeps, GridEngineError, GridEngineStore, GridSetupSummary, GridStats } from "./grid-engine";
export { DEFAULT_MIN_NOTIONAL, InstrumentSpecResolver } from "./instrument-spec-resolver";
export { RiskController } from "./risk-controller";
export type { RiskControllerDeps, RiskControllerError, SafetyStatus } from "./risk-controller";
