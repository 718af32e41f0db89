import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ControlRequest, Timeframe, Tournament, TradeRecord } from "@autotrader/shared";

import type { DetectedPattern, TrendLabel } from "../analysis/candlestick-analyzer";
import type { IndicatorValues } from "../analysis/indicators";
import type { PriceLevels } from "../analysis/level-analyzer";
import { MarketDataService } from "../analysis/market-data.service";
import type { BrokerGateway } from "../integrations/broker-gateway";
import { BROKER_GATEWAY } from "../integrations/broker-gateway";
import { ConnectionManagerService } from "../integrations/connection-manager.service";
import { KnowledgeLearnerService } from "../learning/knowledge-learner.service";
import type { AgentStats } from "../learning/trading-agent.service";
import { TradingAgentService } from "../learning/trading-agent.service";
import type { LearningStats } from "../persistence/trade-store.service";
import { TournamentSchedulerService } from "../tournament/tournament-scheduler.service";
import { BotSessionService } from "./bot-session.service";
import { TaskSupervisorService } from "./task-supervisor.service";
import { TradeExecutorService } from "./trade-executor.service";

const ANALYSIS_PATTERNS = 10;
const RECENT_TRADES = 10;

export type BotStatusView = {
  running: boolean;
  trading: boolean;
  learning: boolean;
  connected: boolean;
  simulationMode: boolean;
  balance: number;
  currentAsset: string;
  currentTimeframe: Timeframe;
  minConfidence: number;
  patternsDetected: number;
  tradesThisHour: number;
  pendingTrades: number;
  totalTrades: number;
  agentStats: AgentStats;
  knowledgeStats: LearningStats;
};

export type MarketAnalysisView = {
  asset: string;
  timeframe: Timeframe;
  patterns: DetectedPattern[];
  levels: PriceLevels;
  indicators: IndicatorValues | null;
  trend: TrendLabel;
  updatedAt: string | null;
};

export type TradeStatsView = {
  totalTrades: number;
  totalWins: number;
  totalLosses: number;
  recentTrades: TradeRecord[];
  winRate: number;
};

export type ControlResult = { ok: boolean; message: string };

/** Read models and control actions over the running bot; callers reach it through the command bridge. */
@Injectable()
export class BotEngineService {
  private readonly logger = new Logger(BotEngineService.name);

  constructor(
    private readonly session: BotSessionService,
    private readonly supervisor: TaskSupervisorService,
    private readonly connection: ConnectionManagerService,
    private readonly marketData: MarketDataService,
    private readonly tournaments: TournamentSchedulerService,
    private readonly executor: TradeExecutorService,
    private readonly agent: TradingAgentService,
    private readonly learner: KnowledgeLearnerService,
    @Inject(BROKER_GATEWAY) private readonly broker: BrokerGateway
  ) {}

  getStatus(): BotStatusView {
    this.session.rollHourWindow();
    const { state } = this.session;
    return {
      running: state.running,
      trading: state.trading,
      learning: state.learning,
      connected: this.connection.isConnected(),
      simulationMode: this.connection.isSimulation(),
      balance: this.connection.lastKnownBalance,
      currentAsset: state.currentAsset,
      currentTimeframe: state.currentTimeframeSeconds,
      minConfidence: state.minConfidence,
      patternsDetected: this.marketData.patternCount(state.currentAsset),
      tradesThisHour: state.tradesThisHour,
      pendingTrades: this.session.pending.size,
      totalTrades: this.session.trades.length,
      agentStats: this.agent.getStats(),
      knowledgeStats: this.learner.getStats()
    };
  }

  getMarketAnalysis(): MarketAnalysisView {
    const { currentAsset, currentTimeframeSeconds } = this.session.state;
    const snapshot = this.marketData.getSnapshot(currentAsset);
    if (!snapshot) {
      return {
        asset: currentAsset,
        timeframe: currentTimeframeSeconds,
        patterns: [],
        levels: { support: [], resistance: [] },
        indicators: null,
        trend: "unknown",
        updatedAt: null
      };
    }
    return {
      asset: snapshot.asset,
      timeframe: snapshot.timeframe,
      patterns: snapshot.patterns.slice(0, ANALYSIS_PATTERNS),
      levels: snapshot.levels,
      indicators: snapshot.indicators,
      trend: snapshot.trend,
      updatedAt: snapshot.updatedAt
    };
  }

  getTradeStats(): TradeStatsView {
    const trades = this.session.trades;
    const totalWins = trades.filter((t) => t.outcome === "win").length;
    return {
      totalTrades: trades.length,
      totalWins,
      totalLosses: trades.filter((t) => t.outcome === "loss").length,
      recentTrades: trades.slice(-RECENT_TRADES),
      winRate: trades.length > 0 ? totalWins / trades.length : 0
    };
  }

  getFreeTournaments(): Promise<Tournament[]> {
    return this.tournaments.getAllActiveFreeTournaments();
  }

  async control(request: ControlRequest): Promise<ControlResult> {
    switch (request.action) {
      case "start":
        this.supervisor.start();
        return { ok: true, message: "Bot started." };
      case "stop":
        this.supervisor.stop();
        return { ok: true, message: "Bot stopped." };
      case "joinTournament": {
        const joined = await this.tournaments.joinTournamentById(request.id);
        return joined
          ? { ok: true, message: `Successfully joined tournament ID: ${request.id}` }
          : { ok: false, message: `Failed to join tournament ID: ${request.id}` };
      }
      case "setMinConfidence": {
        const applied = this.executor.setMinConfidence(request.value);
        return { ok: true, message: `Minimum confidence set to ${applied}` };
      }
      case "setAsset": {
        if (!this.broker.listAssets().includes(request.asset)) {
          return { ok: false, message: `Unknown asset: ${request.asset}` };
        }
        this.session.state.currentAsset = request.asset;
        this.logger.log(`Switched asset to ${request.asset}`);
        return { ok: true, message: `Asset set to ${request.asset}` };
      }
      case "setTimeframe":
        this.session.state.currentTimeframeSeconds = request.timeframe;
        this.logger.log(`Switched timeframe to ${request.timeframe}s`);
        return { ok: true, message: `Timeframe set to ${request.timeframe}s` };
    }
  }
}
