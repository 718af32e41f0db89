import { Injectable, Logger } from "@nestjs/common";
import type { OnApplicationShutdown } from "@nestjs/common";
import type { TaskName } from "@autotrader/shared";

import { MarketDataService } from "../analysis/market-data.service";
import { errorMessage } from "../common/errors";
import { pause, runIteration } from "../common/interruptible";
import { ConnectionManagerService } from "../integrations/connection-manager.service";
import { KnowledgeLearnerService } from "../learning/knowledge-learner.service";
import { TournamentSchedulerService } from "../tournament/tournament-scheduler.service";
import { BotSessionService } from "./bot-session.service";
import { TradeExecutorService } from "./trade-executor.service";

export const HEARTBEAT_MS = 5_000;
export const TOURNAMENT_GRACE_MS = 30_000;
export const TOURNAMENT_INTERVAL_MS = 60 * 60_000;
export const EXECUTOR_INTERVAL_MS = 1_000;
export const LEARNER_INTERVAL_MS = 60 * 60_000;

export type TaskHandle = {
  name: TaskName;
  controller: AbortController;
  done: Promise<void>;
};

type SupervisorState = "stopped" | "running";

@Injectable()
export class TaskSupervisorService implements OnApplicationShutdown {
  private readonly logger = new Logger(TaskSupervisorService.name);
  private readonly tasks = new Map<TaskName, TaskHandle>();
  private readonly inFlight = new Set<Promise<void>>();
  private state: SupervisorState = "stopped";

  constructor(
    private readonly session: BotSessionService,
    private readonly connection: ConnectionManagerService,
    private readonly marketData: MarketDataService,
    private readonly tournaments: TournamentSchedulerService,
    private readonly executor: TradeExecutorService,
    private readonly learner: KnowledgeLearnerService
  ) {}

  start(): boolean {
    if (this.state === "running") {
      this.logger.warn("Bot is already running");
      return false;
    }

    this.state = "running";
    this.setFlags(true);
    this.logger.log("Starting trading bot");

    this.spawn(
      "connection",
      (signal) => this.connectionLoop(signal),
      (err, signal) => this.shutdownOnConnectionLoss(signal, `Connection loop crashed: ${errorMessage(err)}`)
    );
    this.spawn("tournament", (signal) => this.tournamentLoop(signal));
    this.spawn("executor", (signal) => this.every("executor", signal, EXECUTOR_INTERVAL_MS, () => this.executorIteration()));
    this.spawn("learner", (signal) => this.every("learner", signal, LEARNER_INTERVAL_MS, () => this.learnerIteration()));
    return true;
  }

  /** Cancels every loop and returns at once; `drained()` settles when they have unwound. */
  stop(): boolean {
    if (this.state === "stopped") return false;

    this.logger.log("Stopping trading bot");
    for (const handle of this.tasks.values()) {
      handle.controller.abort();
      this.logger.log(`Cancelled ${handle.name} loop`);
    }
    this.tasks.clear();
    this.state = "stopped";
    this.setFlags(false);
    return true;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  taskNames(): TaskName[] {
    return [...this.tasks.keys()];
  }

  async drained(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  async onApplicationShutdown(): Promise<void> {
    this.stop();
    await this.drained();
    await this.connection.disconnect();
  }

  private setFlags(on: boolean): void {
    this.session.state.running = on;
    this.session.state.trading = on;
    this.session.state.learning = on;
  }

  private spawn(
    name: TaskName,
    loop: (signal: AbortSignal) => Promise<void>,
    onCrash: (err: unknown, signal: AbortSignal) => void = (err) => this.logger.error(`${name} loop crashed: ${errorMessage(err)}`)
  ): void {
    const controller = new AbortController();
    const done = loop(controller.signal).catch((err: unknown) => onCrash(err, controller.signal));
    this.inFlight.add(done);
    void done.finally(() => this.inFlight.delete(done));
    this.tasks.set(name, { name, controller, done });
  }

  /** Fails the whole bot: siblings are cancelled and the registry is emptied. */
  private shutdownOnConnectionLoss(signal: AbortSignal, reason: string): void {
    if (signal.aborted) return;
    this.logger.error(`${reason}; stopping all tasks`);
    this.stop();
  }

  private async connectionLoop(signal: AbortSignal): Promise<void> {
    const connected = await this.connection.connect();
    if (!connected) {
      this.shutdownOnConnectionLoss(signal, "Could not connect to the broker");
      return;
    }

    await this.every("connection", signal, HEARTBEAT_MS, async () => {
      if (!this.connection.isConnected()) {
        this.shutdownOnConnectionLoss(signal, "Broker connection lost");
        return;
      }
      const { currentAsset, currentTimeframeSeconds } = this.session.state;
      await this.marketData.refresh(currentAsset, currentTimeframeSeconds);
    });
  }

  private async tournamentLoop(signal: AbortSignal): Promise<void> {
    if (!(await pause(TOURNAMENT_GRACE_MS, signal))) return;
    await this.every("tournament", signal, TOURNAMENT_INTERVAL_MS, async () => {
      await this.tournaments.joinDailyFreeTournament();
    });
  }

  private async executorIteration(): Promise<void> {
    await this.executor.tick();
  }

  private async learnerIteration(): Promise<void> {
    this.learner.runLearningPass(this.session.trades);
  }

  private async every(name: TaskName, signal: AbortSignal, intervalMs: number, body: () => Promise<void>): Promise<void> {
    for (;;) {
      const result = await runIteration(signal, body);
      if (result.kind === "cancelled") return;
      if (result.kind === "recoverable") {
        this.logger.warn(`${name} iteration failed: ${errorMessage(result.error)}`);
      }
      if (!(await pause(intervalMs, signal))) return;
    }
  }
}
