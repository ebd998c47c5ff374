export { createPostgresBotEventRepository } from "./bot-event-repository";
export { createPostgresConfigRepository } from "./config-repository";
export { createPostgresEquitySnapshotRepository } from "./equity-snapshot-repository";
export { createPostgresGridHistoryRepository } from "./grid-history-repository";
export { createPostgresOrderRepository } from "./order-repository";
export { createPostgresPnlSummaryRepository } from "./pnl-summary-repository";
export { createPostgresStateStore } from "./state-store";
export { createPostgresTradeRepository } from "./trade-repository";
