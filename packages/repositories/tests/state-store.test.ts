/**
 * Postgres State Store Unit Tests
 *
 * Runs the repositories against a mocked drizzle `db`.
 */

import { describe, expect, it, vi } from "vitest";
import type { Db } from "@grid-bot/db";

import { createPostgresConfigRepository } from "../src/postgres/config-repository";
import { createPostgresEquitySnapshotRepository } from "../src/postgres/equity-snapshot-repository";
import { createPostgresGridHistoryRepository } from "../src/postgres/grid-history-repository";
import { createPostgresOrderRepository } from "../src/postgres/order-repository";
import { createPostgresPnlSummaryRepository } from "../src/postgres/pnl-summary-repository";
import { createPostgresTradeRepository } from "../src/postgres/trade-repository";
import { createPostgresBotEventRepository } from "../src/postgres/bot-event-repository";
import type { TradeRecord } from "../src/interfaces/trade-repository";

// ─────────────────────────────────────────────────────────────────────────────
// Mock DB
// ─────────────────────────────────────────────────────────────────────────────

function selectChain(rows: unknown[]) {
  const limit = vi.fn(() => Promise.resolve(rows));
  const orderBy = vi.fn(() => Object.assign(Promise.resolve(rows), { limit }));
  const where = vi.fn(() => Object.assign(Promise.resolve(rows), { orderBy, limit }));
  const from = vi.fn(() => ({ where }));
  return { select: vi.fn(() => ({ from })), where, limit };
}

const asDb = (mock: object): Db => mock as unknown as Db;

const sampleTrade = (): TradeRecord => ({
  execId: "exec-1",
  orderId: "order-1",
  symbol: "XRPUSDT",
  side: "buy",
  price: 0.5,
  qty: 20,
  fee: 0.001,
  feeCurrency: "USDT",
  isMaker: true,
  gridLevel: -1,
  executedAt: new Date("2026-01-01T00:00:00Z"),
});

// ─────────────────────────────────────────────────────────────────────────────
// Trades
// ─────────────────────────────────────────────────────────────────────────────

describe("TradeRepository.saveTrade", () => {
  function createTradeDb(returned: unknown[]) {
    const returning = vi.fn(() => Promise.resolve(returned));
    const onConflictDoNothing = vi.fn(() => ({ returning }));
    const values = vi.fn(() => ({ onConflictDoNothing }));
    return { db: { insert: vi.fn(() => ({ values })) }, values, onConflictDoNothing };
  }

  it("reports a new execution as inserted", async () => {
    const { db, values } = createTradeDb([{ id: "row-1" }]);
    const repo = createPostgresTradeRepository(asDb(db));

    const result = await repo.saveTrade(sampleTrade());

    expect(result._unsafeUnwrap()).toEqual({ inserted: true });
    expect(values).toHaveBeenCalledWith(
      expect.objectContaining({ execId: "exec-1", price: "0.5", qty: "20", fee: "0.001", isMaker: true }),
    );
  });

  it("reports a duplicate execution as not inserted", async () => {
    const { db } = createTradeDb([]);
    const repo = createPostgresTradeRepository(asDb(db));

    const result = await repo.saveTrade(sampleTrade());

    expect(result._unsafeUnwrap()).toEqual({ inserted: false });
  });

  it("returns DB_ERROR when the insert fails", async () => {
    const returning = vi.fn(() => Promise.reject(new Error("Connection refused")));
    const db = { insert: vi.fn(() => ({ values: () => ({ onConflictDoNothing: () => ({ returning }) }) })) };
    const repo = createPostgresTradeRepository(asDb(db));

    const result = await repo.saveTrade(sampleTrade());

    expect(result._unsafeUnwrapErr()).toEqual({ type: "DB_ERROR", message: "Connection refused" });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Orders
// ─────────────────────────────────────────────────────────────────────────────

describe("OrderRepository", () => {
  it("stamps filled_at when marking an order Filled", async () => {
    const where = vi.fn(() => Promise.resolve());
    const set = vi.fn(() => ({ where }));
    const db = { update: vi.fn(() => ({ set })) };
    const repo = createPostgresOrderRepository(asDb(db));
    const at = new Date("2026-01-01T00:00:05Z");

    const result = await repo.updateOrderStatus("order-1", "Filled", at);

    expect(result.isOk()).toBe(true);
    expect(set).toHaveBeenCalledWith({ status: "Filled", filledAt: at });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Equity / PnL
// ─────────────────────────────────────────────────────────────────────────────

describe("EquitySnapshotRepository.getEquitySnapshotsSince", () => {
  it("maps numeric columns to numbers, oldest first", async () => {
    const chain = selectChain([
      {
        id: "row-1",
        ts: new Date("2026-01-01T00:00:00Z"),
        totalEquity: "1000.50",
        availableBalance: "800",
        unrealizedPnl: "-2.5",
        totalPositionsValue: "300",
      },
    ]);
    const repo = createPostgresEquitySnapshotRepository(asDb({ select: chain.select }));

    const rows = (await repo.getEquitySnapshotsSince(new Date("2025-12-31T00:00:00Z")))._unsafeUnwrap();

    expect(rows).toEqual([
      {
        ts: new Date("2026-01-01T00:00:00Z"),
        totalEquity: 1000.5,
        availableBalance: 800,
        unrealizedPnl: -2.5,
        totalPositionsValue: 300,
      },
    ]);
  });
});

describe("PnlSummaryRepository.savePnlSummary", () => {
  it("stores amounts as numeric strings and keeps a missing equity change null", async () => {
    const values = vi.fn(() => Promise.resolve());
    const repo = createPostgresPnlSummaryRepository(asDb({ insert: vi.fn(() => ({ values })) }));
    const calculatedAt = new Date("2026-01-01T00:00:00Z");

    const result = await repo.savePnlSummary({
      calculatedAt,
      period: "24h",
      symbol: "XRPUSDT",
      totalTrades: 2,
      buyTrades: 1,
      sellTrades: 1,
      makerTrades: 2,
      volume: 100.5,
      totalFees: 0.02,
      equityChange: null,
      maxDrawdown: 0.01,
    });

    expect(result.isOk()).toBe(true);
    expect(values).toHaveBeenCalledWith({
      calculatedAt,
      period: "24h",
      symbol: "XRPUSDT",
      totalTrades: 2,
      buyTrades: 1,
      sellTrades: 1,
      makerTrades: 2,
      volume: "100.5",
      totalFees: "0.02",
      equityChange: null,
      maxDrawdown: "0.01",
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Grid history
// ─────────────────────────────────────────────────────────────────────────────

describe("GridHistoryRepository.getLatestGrid", () => {
  it("returns null when no snapshot exists", async () => {
    const chain = selectChain([]);
    const repo = createPostgresGridHistoryRepository(asDb({ select: chain.select }));

    expect((await repo.getLatestGrid("XRPUSDT"))._unsafeUnwrap()).toBeNull();
    expect(chain.limit).toHaveBeenCalledWith(1);
  });

  it("parses numeric columns", async () => {
    const chain = selectChain([
      {
        id: "row-1",
        ts: new Date("2026-01-01T00:00:00Z"),
        symbol: "XRPUSDT",
        centerPrice: "0.5",
        lowestBuy: "0.48",
        highestSell: null,
        numBuyLevels: 3,
        numSellLevels: 0,
        gridSpacing: "0.01",
        reason: "initial",
      },
    ]);
    const repo = createPostgresGridHistoryRepository(asDb({ select: chain.select }));

    const snapshot = (await repo.getLatestGrid("XRPUSDT"))._unsafeUnwrap();

    expect(snapshot).toEqual({
      ts: new Date("2026-01-01T00:00:00Z"),
      symbol: "XRPUSDT",
      centerPrice: 0.5,
      lowestBuy: 0.48,
      highestSell: null,
      numBuyLevels: 3,
      numSellLevels: 0,
      gridSpacing: 0.01,
      reason: "initial",
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Config
// ─────────────────────────────────────────────────────────────────────────────

describe("ConfigRepository.saveConfig", () => {
  it("deactivates previous rows and inserts the active one in a transaction", async () => {
    const where = vi.fn(() => Promise.resolve());
    const set = vi.fn(() => ({ where }));
    const values = vi.fn(() => Promise.resolve());
    const tx = { update: vi.fn(() => ({ set })), insert: vi.fn(() => ({ values })) };
    const db = { transaction: vi.fn(async (fn: (t: typeof tx) => Promise<void>) => fn(tx)) };
    const repo = createPostgresConfigRepository(asDb(db));

    const result = await repo.saveConfig({
      profileName: "Normal",
      symbol: "XRPUSDT",
      gridSpacing: 0.007,
      targetLevels: 5,
      profitTarget: 0.005,
      maxExposurePct: 0.5,
      leverage: 1,
    });

    expect(result.isOk()).toBe(true);
    expect(set).toHaveBeenCalledWith(expect.objectContaining({ isActive: false }));
    expect(values).toHaveBeenCalledWith(
      expect.objectContaining({ profileName: "Normal", gridSpacing: "0.007", targetLevels: 5, isActive: true }),
    );
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

describe("BotEventRepository.logEvent", () => {
  it("writes the event details as json", async () => {
    const values = vi.fn(() => Promise.resolve());
    const repo = createPostgresBotEventRepository(asDb({ insert: vi.fn(() => ({ values })) }));
    const ts = new Date("2026-01-01T00:00:00Z");

    const result = await repo.logEvent({
      ts,
      eventType: "kill_switch",
      severity: "CRITICAL",
      message: "Kill switch activated",
      details: { drawdownPct: 10 },
    });

    expect(result.isOk()).toBe(true);
    expect(values).toHaveBeenCalledWith({
      ts,
      eventType: "kill_switch",
      severity: "CRITICAL",
      message: "Kill switch activated",
      details: { drawdownPct: 10 },
    });
  });
});
