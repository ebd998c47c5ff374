export { placeTakeProfit, runFillMonitorIteration, SeenExecutions } from "./fill-monitor";
export type { FillMonitorDeps } from "./fill-monitor";
export { runGridMonitorIteration } from "./grid-monitor";
export type { GridMonitorDeps } from "./grid-monitor";
export { runRiskMonitorIteration } from "./risk-monitor";
export type { RiskMonitorDeps } from "./risk-monitor";
export { runSnapshotIteration } from "./snapshot-loop";
export type { SnapshotDeps } from "./snapshot-loop";
