import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { Execution } from "@grid-bot/adapters";
import type { GridProfile } from "@grid-bot/core";
import { logger } from "@grid-bot/utils";

import type { GridBotConfigInput } from "../../src/config";
import { GridEngine } from "../../src/services/grid-engine";
import { InstrumentSpecResolver } from "../../src/services/instrument-spec-resolver";
import { RiskController } from "../../src/services/risk-controller";
import { runFillMonitorIteration, SeenExecutions, type FillMonitorDeps } from "../../src/usecases/fill-monitor";
import { FakeClock, FakeGateway, InMemoryStateStore, instantSleep, testConfig } from "../helpers/fakes";

const CONSERVATIVE: GridProfile = { gridSpacing: 0.01, targetLevels: 3, profitTarget: 0.008 };

const execution = (overrides: Partial<Execution> = {}): Execution => ({
  execId: "exec-1",
  orderId: "order-1",
  orderLinkId: "grid-b1",
  symbol: "XRPUSDT",
  side: "buy",
  price: 99,
  qty: 0.168,
  fee: 0.001,
  isMaker: true,
  execTime: new Date(Date.UTC(2026, 0, 1, 12, 5)),
  ...overrides,
});

/**
 * Engine with the Conservative ladder around 100 already resting (order-1 is the 99 buy)
 */
async function createFixture(overrides: GridBotConfigInput = {}) {
  const gateway = new FakeGateway();
  const store = new InMemoryStateStore();
  const clock = new FakeClock();
  const config = testConfig({ monitoring: { fillErrorBackoffMs: 15_000 }, ...overrides });
  const engine = new GridEngine({
    gateway,
    store,
    instruments: new InstrumentSpecResolver(gateway),
    config,
    now: clock.now,
    sleep: instantSleep,
  });
  const risk = new RiskController({ gateway, store, config, now: clock.now });
  await engine.initialize();
  await engine.setupGrid(CONSERVATIVE, "initial");

  const deps: FillMonitorDeps = {
    gateway,
    store,
    engine,
    risk,
    config,
    seen: new SeenExecutions(100),
    activeProfile: () => CONSERVATIVE,
    now: clock.now,
  };
  return { gateway, store, clock, engine, risk, deps };
}

describe("SeenExecutions", () => {
  test("forgets the oldest ids past capacity", () => {
    const seen = new SeenExecutions(2);
    seen.add("a");
    seen.add("b");
    seen.add("c");

    expect(seen.has("a")).toBe(false);
    expect(seen.has("b")).toBe(true);
    expect(seen.has("c")).toBe(true);
    expect(seen.size).toBe(2);
  });
});

describe("runFillMonitorIteration", () => {
  beforeEach(() => {
    logger.setSink({ write: () => {} });
  });

  afterEach(() => {
    logger.clearSink();
  });

  test("records a fill once and marks the order filled", async () => {
    const { gateway, store, engine, deps } = await createFixture();
    gateway.executions = [execution()];

    expect(await runFillMonitorIteration(deps)).toEqual({ nextDelayMs: 5_000 });
    await runFillMonitorIteration(deps);

    expect(store.trades).toHaveLength(1);
    expect(store.trades[0]).toMatchObject({
      execId: "exec-1",
      orderId: "order-1",
      feeCurrency: "USDT",
      gridLevel: -1,
      executedAt: new Date(Date.UTC(2026, 0, 1, 12, 5)),
    });
    expect(store.orders.find(o => o.orderId === "order-1")?.status).toBe("Filled");
    expect(engine.getGridStats().totalActiveOrders).toBe(5);
  });

  test("processes executions oldest first", async () => {
    const { gateway, store, deps } = await createFixture();
    // Venue order: newest first
    gateway.executions = [
      execution({ execId: "exec-2", orderId: "order-2", price: 98 }),
      execution({ execId: "exec-1" }),
    ];

    await runFillMonitorIteration(deps);

    expect(store.trades.map(t => t.execId)).toEqual(["exec-1", "exec-2"]);
  });

  test("skips executions the store already holds", async () => {
    const { gateway, store, engine, deps } = await createFixture({ takeProfit: { enabled: true } });
    store.trades.push({
      execId: "exec-1",
      orderId: "order-1",
      symbol: "XRPUSDT",
      side: "buy",
      price: 99,
      qty: 0.168,
      fee: 0.001,
      feeCurrency: "USDT",
      isMaker: true,
      gridLevel: -1,
      executedAt: new Date(Date.UTC(2026, 0, 1, 12, 5)),
    });
    gateway.executions = [execution()];

    await runFillMonitorIteration(deps);

    expect(store.trades).toHaveLength(1);
    expect(gateway.placed).toHaveLength(6);
    expect(engine.getGridStats().totalActiveOrders).toBe(6);
    expect(deps.seen.has("exec-1")).toBe(true);
  });

  test("retries a fill whose trade could not be stored", async () => {
    const { gateway, store, deps } = await createFixture();
    gateway.executions = [execution()];

    store.down = true;
    await runFillMonitorIteration(deps);
    expect(deps.seen.size).toBe(0);

    store.down = false;
    await runFillMonitorIteration(deps);
    expect(store.trades.map(t => t.execId)).toEqual(["exec-1"]);
  });

  test("idles while the kill switch is active", async () => {
    const { gateway, risk, deps } = await createFixture();
    await risk.triggerKillSwitch("test");

    expect(await runFillMonitorIteration(deps)).toEqual({ nextDelayMs: 10_000 });
    expect(gateway.callCount("getRecentExecutions")).toBe(0);
  });

  test("backs off when executions cannot be fetched", async () => {
    const { gateway, deps } = await createFixture();
    gateway.fail("getRecentExecutions");

    expect(await runFillMonitorIteration(deps)).toEqual({ nextDelayMs: 15_000 });
  });

  describe("take profit", () => {
    test("places a resting opposite order profitTarget away", async () => {
      const { gateway, store, clock, deps } = await createFixture({ takeProfit: { enabled: true } });
      gateway.ticker = { ...gateway.ticker, bestBid: 99, bestAsk: 99.02 };
      gateway.executions = [execution()];

      await runFillMonitorIteration(deps);

      expect(gateway.placed).toHaveLength(7);
      expect(gateway.placed[6]).toEqual({
        symbol: "XRPUSDT",
        side: "sell",
        price: "99.79",
        qty: "0.168",
        orderLinkId: `tp-exec-1-${clock.nowMs.toString(36)}`,
      });
      expect(store.orders.at(-1)).toMatchObject({
        orderId: "order-7",
        orderType: "take_profit",
        side: "sell",
        price: 99.79,
        qty: 0.168,
        gridLevel: null,
      });
    });

    test("re-prices behind the touch when the target would cross", async () => {
      const { gateway, deps } = await createFixture({ takeProfit: { enabled: true } });
      // 99.79 sell against a 99.99 bid would take liquidity
      gateway.executions = [execution()];

      await runFillMonitorIteration(deps);

      expect(gateway.placed[6]).toMatchObject({ side: "sell", price: "100.02", qty: "0.168" });
    });

    test("is skipped below the minimum notional", async () => {
      const { gateway, deps } = await createFixture({ takeProfit: { enabled: true } });
      gateway.executions = [execution({ qty: 0.04 })];

      await runFillMonitorIteration(deps);

      expect(gateway.placed).toHaveLength(6);
    });

    test("is skipped when the order size gate fails", async () => {
      const { gateway, deps } = await createFixture({
        takeProfit: { enabled: true },
        risk: { maxPositionSizePct: 0.01 },
      });
      gateway.ticker = { ...gateway.ticker, bestBid: 99, bestAsk: 99.02 };
      gateway.executions = [execution()];

      await runFillMonitorIteration(deps);

      expect(gateway.placed).toHaveLength(6);
    });

    test("is skipped when the kill switch trips during its checks", async () => {
      const { gateway, store, risk, deps } = await createFixture({ takeProfit: { enabled: true } });
      gateway.ticker = { ...gateway.ticker, bestBid: 99, bestAsk: 99.02 };
      gateway.executions = [execution()];
      const validateOrderSize = risk.validateOrderSize.bind(risk);
      risk.validateOrderSize = async (qty, price) => {
        await risk.triggerKillSwitch("drawdown");
        return validateOrderSize(qty, price);
      };

      await runFillMonitorIteration(deps);

      expect(store.trades).toHaveLength(1);
      expect(gateway.placed).toHaveLength(6);
      expect(gateway.openOrders).toHaveLength(0);
    });

    test("stays off unless enabled", async () => {
      const { gateway, store, deps } = await createFixture();
      gateway.executions = [execution()];

      await runFillMonitorIteration(deps);

      expect(store.trades).toHaveLength(1);
      expect(gateway.placed).toHaveLength(6);
    });
  });
});
