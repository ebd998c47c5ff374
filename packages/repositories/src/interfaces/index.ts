export type { BotEventRecord, BotEventRepository, EventSeverity } from "./bot-event-repository";
export type { ActiveConfigRecord, ConfigRepository } from "./config-repository";
export type { EquitySnapshotRecord, EquitySnapshotRepository } from "./equity-snapshot-repository";
export type { GridHistoryRepository, GridSnapshotRecord } from "./grid-history-repository";
export type { OrderKind, OrderRecord, OrderRepository } from "./order-repository";
export type { PnlSummaryRecord, PnlSummaryRepository } from "./pnl-summary-repository";
export type { StateStore } from "./state-store";
export type { TradeRecord, TradeRepository } from "./trade-repository";
