import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { MarketDataService } from "../analysis/market-data.service";
import { createDeferred } from "../common/interruptible";
import type { ConnectionManagerService } from "../integrations/connection-manager.service";
import type { KnowledgeLearnerService } from "../learning/knowledge-learner.service";
import type { TradeStoreService } from "../persistence/trade-store.service";
import { ManualClock, configServiceFor, testConfig } from "../testing/fixtures";
import type { TournamentSchedulerService } from "../tournament/tournament-scheduler.service";
import { BotSessionService } from "./bot-session.service";
import { TaskSupervisorService } from "./task-supervisor.service";
import type { TradeExecutorService } from "./trade-executor.service";

const HOUR = 60 * 60_000;

function setup() {
  const store = { loadTrades: () => [] } as unknown as TradeStoreService;
  const session = new BotSessionService(configServiceFor(testConfig()), store, new ManualClock());

  const connect = vi.fn(async () => true);
  const disconnect = vi.fn(async () => undefined);
  const isConnected = vi.fn(() => true);
  const connection = { connect, disconnect, isConnected } as unknown as ConnectionManagerService;
  const refresh = vi.fn(async () => undefined);
  const marketData = { refresh } as unknown as MarketDataService;
  const joinDailyFreeTournament = vi.fn(async () => false);
  const tournaments = { joinDailyFreeTournament } as unknown as TournamentSchedulerService;
  const tick = vi.fn(async () => undefined);
  const executor = { tick } as unknown as TradeExecutorService;
  const runLearningPass = vi.fn();
  const learner = { runLearningPass } as unknown as KnowledgeLearnerService;

  const supervisor = new TaskSupervisorService(session, connection, marketData, tournaments, executor, learner);
  return { session, supervisor, connect, disconnect, isConnected, refresh, joinDailyFreeTournament, tick, runLearningPass };
}

describe("TaskSupervisorService", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("registers one handle per loop and ignores a second start", async () => {
    const { session, supervisor } = setup();

    expect(supervisor.start()).toBe(true);
    expect(supervisor.start()).toBe(false);
    expect(supervisor.taskNames()).toEqual(["connection", "tournament", "executor", "learner"]);
    expect(supervisor.isRunning()).toBe(true);
    expect(session.state).toMatchObject({ running: true, trading: true, learning: true });

    supervisor.stop();
    await supervisor.drained();
  });

  it("stops promptly without waiting out the intervals", async () => {
    const { session, supervisor, tick } = setup();
    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(supervisor.stop()).toBe(true);
    expect(supervisor.taskNames()).toEqual([]);
    expect(supervisor.isRunning()).toBe(false);
    expect(session.state).toMatchObject({ running: false, trading: false, learning: false });

    await supervisor.drained();
    expect(vi.getTimerCount()).toBe(0);

    const ticks = tick.mock.calls.length;
    await vi.advanceTimersByTimeAsync(10_000);
    expect(tick).toHaveBeenCalledTimes(ticks);
    expect(supervisor.stop()).toBe(false);
  });

  it("shuts every loop down when the connection cannot be established", async () => {
    const { supervisor, connect, tick } = setup();
    connect.mockResolvedValueOnce(false);

    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(supervisor.isRunning()).toBe(false);
    expect(supervisor.taskNames()).toEqual([]);
    await supervisor.drained();

    const ticks = tick.mock.calls.length;
    await vi.advanceTimersByTimeAsync(5_000);
    expect(tick).toHaveBeenCalledTimes(ticks);
  });

  it("shuts every loop down when connecting throws", async () => {
    const { supervisor, connect, tick } = setup();
    connect.mockRejectedValueOnce(new Error("socket hang up"));

    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(supervisor.isRunning()).toBe(false);
    expect(supervisor.taskNames()).toEqual([]);
    await supervisor.drained();

    const ticks = tick.mock.calls.length;
    await vi.advanceTimersByTimeAsync(5_000);
    expect(tick).toHaveBeenCalledTimes(ticks);
  });

  it("ignores a stale connection failure from an earlier run", async () => {
    const { supervisor, connect } = setup();
    const firstAttempt = createDeferred<boolean>();
    connect.mockReturnValueOnce(firstAttempt.promise);

    supervisor.start();
    supervisor.stop();
    supervisor.start();
    firstAttempt.resolve(false);
    await vi.advanceTimersByTimeAsync(0);

    expect(supervisor.isRunning()).toBe(true);
    expect(supervisor.taskNames()).toHaveLength(4);

    supervisor.stop();
    await supervisor.drained();
  });

  it("refreshes market data on every heartbeat", async () => {
    const { session, supervisor, refresh } = setup();
    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(refresh).toHaveBeenCalledWith(session.state.currentAsset, 60);

    refresh.mockRejectedValueOnce(new Error("candles unavailable"));
    await vi.advanceTimersByTimeAsync(10_000);
    expect(refresh).toHaveBeenCalledTimes(3);
    expect(supervisor.isRunning()).toBe(true);

    supervisor.stop();
    await supervisor.drained();
  });

  it("stops the bot when a heartbeat finds the connection lost", async () => {
    const { supervisor, isConnected, refresh } = setup();
    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(refresh).toHaveBeenCalledTimes(1);

    isConnected.mockReturnValue(false);
    await vi.advanceTimersByTimeAsync(5_000);

    expect(supervisor.isRunning()).toBe(false);
    expect(supervisor.taskNames()).toEqual([]);
    expect(refresh).toHaveBeenCalledTimes(1);
    await supervisor.drained();
  });

  it("waits out the grace period before the first tournament join and survives failures", async () => {
    const { supervisor, joinDailyFreeTournament } = setup();
    joinDailyFreeTournament.mockRejectedValueOnce(new Error("lobby offline"));
    supervisor.start();

    await vi.advanceTimersByTimeAsync(29_999);
    expect(joinDailyFreeTournament).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(joinDailyFreeTournament).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(HOUR);
    expect(joinDailyFreeTournament).toHaveBeenCalledTimes(2);
    expect(supervisor.isRunning()).toBe(true);

    supervisor.stop();
    await supervisor.drained();
  });

  it("ticks the executor every second and keeps going after an error", async () => {
    const { supervisor, tick } = setup();
    tick.mockRejectedValueOnce(new Error("placeTrade failed"));
    supervisor.start();

    await vi.advanceTimersByTimeAsync(3_000);
    expect(tick).toHaveBeenCalledTimes(4);

    supervisor.stop();
    await supervisor.drained();
  });

  it("runs a learning pass at start and then hourly", async () => {
    const { session, supervisor, runLearningPass } = setup();
    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(runLearningPass).toHaveBeenCalledWith(session.trades);

    await vi.advanceTimersByTimeAsync(HOUR);
    expect(runLearningPass).toHaveBeenCalledTimes(2);

    supervisor.stop();
    await supervisor.drained();
  });

  it("stops and disconnects on application shutdown", async () => {
    const { supervisor, disconnect } = setup();
    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);

    await supervisor.onApplicationShutdown();
    expect(supervisor.isRunning()).toBe(false);
    expect(disconnect).toHaveBeenCalledTimes(1);
  });
});
