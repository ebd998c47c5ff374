import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { GridProfile } from "@grid-bot/core";
import { logger, type Sleep } from "@grid-bot/utils";

import { GridEngine } from "../../src/services/grid-engine";
import { InstrumentSpecResolver } from "../../src/services/instrument-spec-resolver";
import { RiskController } from "../../src/services/risk-controller";
import { runGridMonitorIteration, type GridMonitorDeps } from "../../src/usecases/grid-monitor";
import { FakeClock, FakeGateway, InMemoryStateStore, instantSleep, testConfig } from "../helpers/fakes";

const CONSERVATIVE: GridProfile = { gridSpacing: 0.01, targetLevels: 3, profitTarget: 0.008 };

async function createFixture(engineSleep?: (risk: RiskController) => Sleep) {
  const gateway = new FakeGateway();
  const store = new InMemoryStateStore();
  const clock = new FakeClock();
  const config = testConfig({ monitoring: { gridErrorBackoffMs: 15_000 } });
  const risk = new RiskController({ gateway, store, config, now: clock.now });
  const engine = new GridEngine({
    gateway,
    store,
    instruments: new InstrumentSpecResolver(gateway),
    config,
    now: clock.now,
    sleep: engineSleep ? engineSleep(risk) : instantSleep,
    canPlace: () => !risk.killSwitchActive,
  });
  await engine.initialize();

  let running = true;
  const deps: GridMonitorDeps = {
    engine,
    risk,
    config,
    running: { isRunning: () => running },
    activeProfile: () => CONSERVATIVE,
  };
  const stop = (): void => {
    running = false;
  };
  return { gateway, store, engine, risk, deps, stop };
}

describe("runGridMonitorIteration", () => {
  beforeEach(() => {
    logger.setSink({ write: () => {} });
  });

  afterEach(() => {
    logger.clearSink();
  });

  test("rebuilds the ladder when no orders rest", async () => {
    const { gateway, store, deps } = await createFixture();

    expect(await runGridMonitorIteration(deps)).toEqual({ nextDelayMs: 60_000 });
    expect(gateway.placed).toHaveLength(6);
    expect(store.events[0]).toMatchObject({
      eventType: "recenter",
      message: "Grid recenter triggered: No active orders found",
    });
  });

  test("does nothing while the ladder is healthy", async () => {
    const { gateway, engine, deps } = await createFixture();
    await engine.setupGrid(CONSERVATIVE, "initial");

    expect(await runGridMonitorIteration(deps)).toEqual({ nextDelayMs: 60_000 });
    expect(gateway.placed).toHaveLength(6);
    expect(gateway.callCount("cancelAllOrders")).toBe(1);
  });

  test("skips the rebuild when exposure is over the limit", async () => {
    const { gateway, deps } = await createFixture();
    gateway.positions = [
      {
        symbol: "XRPUSDT",
        side: "buy",
        size: 20,
        entryPrice: 30,
        markPrice: 30,
        unrealizedPnl: 0,
        positionValue: 600,
      },
    ];

    expect(await runGridMonitorIteration(deps)).toEqual({ nextDelayMs: 60_000 });
    expect(gateway.placed).toHaveLength(0);
  });

  test("skips the rebuild once trading has stopped", async () => {
    const { gateway, deps, stop } = await createFixture();
    stop();

    await runGridMonitorIteration(deps);

    expect(gateway.placed).toHaveLength(0);
  });

  test("idles while the kill switch is active", async () => {
    const { gateway, risk, deps } = await createFixture();
    await risk.triggerKillSwitch("test");

    expect(await runGridMonitorIteration(deps)).toEqual({ nextDelayMs: 10_000 });
    expect(gateway.callCount("getOpenOrders")).toBe(0);
  });

  test("skips the rebuild when the kill switch trips during the exposure check", async () => {
    const { gateway, risk, deps } = await createFixture();
    const checkMaxExposure = risk.checkMaxExposure.bind(risk);
    risk.checkMaxExposure = async () => {
      await risk.triggerKillSwitch("drawdown");
      return checkMaxExposure();
    };

    expect(await runGridMonitorIteration(deps)).toEqual({ nextDelayMs: 10_000 });
    expect(gateway.placed).toHaveLength(0);
  });

  test("places nothing once the kill switch trips inside the recenter", async () => {
    const { gateway, store, engine, risk, deps } = await createFixture(r => async () => {
      await r.triggerKillSwitch("drawdown");
    });

    expect(await runGridMonitorIteration(deps)).toEqual({ nextDelayMs: 60_000 });
    expect(risk.killSwitchActive).toBe(true);
    expect(gateway.placed).toHaveLength(0);
    expect(engine.getGridStats().lastRecenterAt).toBeNull();
    expect(store.eventTypes()).toEqual(["recenter", "kill_switch", "recenter_failed"]);
  });

  test("backs off when the recenter check fails", async () => {
    const { gateway, deps } = await createFixture();
    gateway.fail("getOpenOrders");

    expect(await runGridMonitorIteration(deps)).toEqual({ nextDelayMs: 15_000 });
  });
});
