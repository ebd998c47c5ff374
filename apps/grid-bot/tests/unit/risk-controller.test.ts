import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { LogLevel, logger, type LogRecord } from "@grid-bot/utils";

import { RiskController } from "../../src/services/risk-controller";
import { FakeClock, FakeGateway, InMemoryStateStore, testConfig } from "../helpers/fakes";

const DAY_MS = 86_400_000;

const position = (size: number, markPrice: number) => ({
  symbol: "XRPUSDT",
  side: "buy" as const,
  size,
  entryPrice: markPrice,
  markPrice,
  unrealizedPnl: 0,
  positionValue: size * markPrice,
});

function createRisk() {
  const gateway = new FakeGateway();
  const store = new InMemoryStateStore();
  const clock = new FakeClock();
  const risk = new RiskController({ gateway, store, config: testConfig(), now: clock.now });
  return { gateway, store, clock, risk };
}

describe("RiskController", () => {
  let records: LogRecord[];

  beforeEach(() => {
    records = [];
    logger.setSink({ write: record => records.push(record) });
  });

  afterEach(() => {
    logger.clearSink();
  });

  describe("kill switch", () => {
    const REASON = "Drawdown 15.00% exceeds threshold 10.00% (Max: $1000.00, Current: $850.00)";

    test("trips on daily drawdown, cancels orders and records a critical event", async () => {
      const { gateway, store, risk } = createRisk();
      gateway.openOrders = [
        {
          orderId: "order-1",
          orderLinkId: "grid-b1",
          symbol: "XRPUSDT",
          side: "buy",
          price: 99,
          qty: 0.1,
          status: "New",
          createdAt: new Date(0),
        },
      ];

      await risk.updateEquityTracking();
      expect(risk.killSwitchActive).toBe(false);

      gateway.wallet = { ...gateway.wallet, totalEquity: 850 };
      const state = (await risk.updateEquityTracking())._unsafeUnwrap();

      expect(state.killSwitchActive).toBe(true);
      expect(state.killSwitchReason).toBe(REASON);
      expect(gateway.callCount("cancelAllOrders")).toBe(1);
      expect(gateway.openOrders).toHaveLength(0);

      expect(store.events).toHaveLength(1);
      expect(store.events[0]).toMatchObject({
        eventType: "kill_switch",
        severity: "CRITICAL",
        message: `Kill-switch activated: ${REASON}`,
      });
      expect(store.events[0].details).toMatchObject({ equity: 850, dailyMax: 1000 });
      expect(store.events[0].details?.drawdownPct).toBeCloseTo(15, 10);

      const critical = records.filter(r => r.level === LogLevel.CRITICAL);
      expect(critical).toHaveLength(1);
      expect(critical[0].message).toBe("KILL SWITCH ACTIVATED");
      expect(critical[0].fields).toEqual({ reason: REASON });
    });

    test("stays latched when equity recovers", async () => {
      const { gateway, risk } = createRisk();
      await risk.updateEquityTracking();
      gateway.wallet = { ...gateway.wallet, totalEquity: 850 };
      await risk.updateEquityTracking();

      gateway.wallet = { ...gateway.wallet, totalEquity: 1000 };
      await risk.updateEquityTracking();

      expect(risk.killSwitchActive).toBe(true);
      expect(risk.getState().killSwitchReason).toBe(REASON);
      expect(gateway.callCount("cancelAllOrders")).toBe(1);
    });

    test("activation is idempotent, even for overlapping calls", async () => {
      const { gateway, store, risk } = createRisk();

      const [first, second] = await Promise.all([risk.triggerKillSwitch("manual"), risk.triggerKillSwitch("again")]);

      expect(first).toBe(true);
      expect(second).toBe(false);
      expect(risk.getState().killSwitchReason).toBe("manual");
      expect(gateway.callCount("cancelAllOrders")).toBe(1);
      expect(store.eventTypes()).toEqual(["kill_switch"]);
    });

    test("latches even when the cancel fails", async () => {
      const { gateway, risk } = createRisk();
      gateway.fail("cancelAllOrders");

      expect(await risk.triggerKillSwitch("manual")).toBe(true);
      expect(risk.killSwitchActive).toBe(true);
    });

    test("manual deactivation restarts the daily max at current equity", async () => {
      const { gateway, store, risk } = createRisk();
      await risk.updateEquityTracking();
      gateway.wallet = { ...gateway.wallet, totalEquity: 850 };
      await risk.updateEquityTracking();

      gateway.wallet = { ...gateway.wallet, totalEquity: 950 };
      const result = await risk.deactivateKillSwitch();

      expect(result._unsafeUnwrap()).toBe(true);
      expect(risk.getState()).toMatchObject({ killSwitchActive: false, killSwitchReason: "", dailyMaxEquity: 950 });
      expect(store.eventTypes()).toEqual(["kill_switch", "kill_switch_reset"]);
      expect(store.events[1].severity).toBe("WARNING");

      await risk.updateEquityTracking();
      expect(risk.killSwitchActive).toBe(false);
    });

    test("deactivating an inactive switch changes nothing", async () => {
      const { gateway, store, risk } = createRisk();

      const result = await risk.deactivateKillSwitch();

      expect(result._unsafeUnwrap()).toBe(false);
      expect(gateway.callCount("getWalletBalance")).toBe(0);
      expect(store.events).toHaveLength(0);
    });

    test("a new UTC day resets the daily max", async () => {
      const { gateway, clock, risk } = createRisk();
      await risk.updateEquityTracking();

      clock.advance(DAY_MS);
      gateway.wallet = { ...gateway.wallet, totalEquity: 850 };
      await risk.updateEquityTracking();

      expect(risk.killSwitchActive).toBe(false);
      expect(risk.getState().dailyMaxEquity).toBe(850);
      expect(records.some(r => r.message === "New day - reset daily max equity")).toBe(true);
    });

    test("propagates wallet failures without touching the state", async () => {
      const { gateway, risk } = createRisk();
      gateway.fail("getWalletBalance");

      const result = await risk.updateEquityTracking();

      expect(result._unsafeUnwrapErr()).toMatchObject({ type: "GATEWAY_ERROR", operation: "getWalletBalance" });
      expect(risk.getState().lastEquityCheckMs).toBeNull();
    });
  });

  describe("checkMaxExposure", () => {
    test("passes while position value stays within the limit", async () => {
      const { gateway, store, risk } = createRisk();
      gateway.positions = [position(10, 30), position(0, 30)];

      const result = await risk.checkMaxExposure();

      expect(result._unsafeUnwrap()).toBe(true);
      expect(risk.getState()).toMatchObject({ currentExposure: 300, totalEquity: 1000 });
      expect(store.events).toHaveLength(0);
    });

    test("reports a breach without tripping the kill switch", async () => {
      const { gateway, store, risk } = createRisk();
      gateway.positions = [position(20, 30)];

      const result = await risk.checkMaxExposure();

      expect(result._unsafeUnwrap()).toBe(false);
      expect(risk.killSwitchActive).toBe(false);
      expect(store.events).toHaveLength(1);
      expect(store.events[0]).toMatchObject({
        eventType: "max_exposure",
        severity: "WARNING",
        message: "Maximum exposure exceeded: 60.0%",
      });
    });

    test("fails closed on zero equity", async () => {
      const { gateway, risk } = createRisk();
      gateway.wallet = { ...gateway.wallet, totalEquity: 0 };

      expect((await risk.checkMaxExposure())._unsafeUnwrap()).toBe(false);
    });
  });

  describe("checkOrderAsMaker", () => {
    test.each([
      ["buy", 100, true],
      ["buy", 100.01, false],
      ["sell", 100, true],
      ["sell", 99.99, false],
    ] as const)("%s at %s rests: %s", async (side, price, expected) => {
      const { risk } = createRisk();

      expect((await risk.checkOrderAsMaker(side, price))._unsafeUnwrap()).toBe(expected);
    });
  });

  describe("validateOrderSize", () => {
    test("compares notional with a share of equity", async () => {
      const { gateway, risk } = createRisk();

      expect((await risk.validateOrderSize(2, 100))._unsafeUnwrap()).toBe(true);
      expect((await risk.validateOrderSize(4, 100))._unsafeUnwrap()).toBe(false);
      // Equity fetched once, then reused
      expect(gateway.callCount("getWalletBalance")).toBe(1);
    });
  });

  describe("reporting", () => {
    test("risk metrics reflect the last equity and exposure checks", async () => {
      const { gateway, risk } = createRisk();
      gateway.positions = [position(10, 30)];
      await risk.updateEquityTracking();
      await risk.checkMaxExposure();

      expect(risk.getRiskMetrics()).toMatchObject({
        killSwitchActive: false,
        totalEquity: 1000,
        dailyMaxEquity: 1000,
        currentExposure: 300,
        exposurePct: 0.3,
        currentDrawdownPct: 0,
        availableForTrading: 200,
        withinLimits: true,
      });
    });

    test("safety status after a trip", async () => {
      const { clock, risk } = createRisk();
      await risk.updateEquityTracking();
      await risk.triggerKillSwitch("manual");

      expect(risk.getSafetyStatus()).toEqual({
        safeToTrade: false,
        killSwitchActive: true,
        killSwitchReason: "manual",
        exposureOk: true,
        lastCheckAt: new Date(clock.nowMs),
      });
    });

    test("funding impact over open positions", async () => {
      const { gateway, risk } = createRisk();
      gateway.positions = [position(10, 30)];

      expect((await risk.calculateFundingImpact())._unsafeUnwrap()).toBeCloseTo(0.09, 10);
    });
  });
});
