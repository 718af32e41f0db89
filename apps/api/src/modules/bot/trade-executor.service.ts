import { Inject, Injectable, Logger } from "@nestjs/common";
import type { PendingTrade, TradeRecord } from "@autotrader/shared";
import { clampConfidence } from "@autotrader/shared";

import { MarketDataService } from "../analysis/market-data.service";
import { Clock } from "../common/clock";
import { errorMessage } from "../common/errors";
import { ConfigService } from "../config/config.service";
import type { BrokerGateway, BrokerTradeOutcome } from "../integrations/broker-gateway";
import { BROKER_GATEWAY } from "../integrations/broker-gateway";
import { TradingAgentService } from "../learning/trading-agent.service";
import { TradeStoreService } from "../persistence/trade-store.service";
import { BotSessionService } from "./bot-session.service";

/** How long past expiration an unresolved trade is kept before it is dropped. */
export const OUTCOME_GRACE_SECONDS = 5 * 60;

export type SkipReason = "not_trading" | "rate_limited" | "asset_busy" | "no_signal" | "already_decided" | "below_threshold" | "place_failed";

export type TickReport = {
  resolved: TradeRecord[];
  expired: string[];
  placed: PendingTrade | null;
  skipped: SkipReason | null;
};

@Injectable()
export class TradeExecutorService {
  private readonly logger = new Logger(TradeExecutorService.name);
  /** Last closed candle a decision was taken on, per asset and timeframe. */
  private readonly decided = new Map<string, number>();

  constructor(
    private readonly session: BotSessionService,
    @Inject(BROKER_GATEWAY) private readonly broker: BrokerGateway,
    private readonly marketData: MarketDataService,
    private readonly agent: TradingAgentService,
    private readonly store: TradeStoreService,
    private readonly configService: ConfigService,
    private readonly clock: Clock
  ) {}

  async tick(): Promise<TickReport> {
    this.session.rollHourWindow(this.clock.now());
    const { resolved, expired } = await this.resolveExpired();
    const { placed, skipped } = await this.maybePlace();
    return { resolved, expired, placed, skipped };
  }

  setMinConfidence(value: number): number {
    const clamped = clampConfidence(value);
    this.session.state.minConfidence = clamped;
    this.logger.log(`Minimum confidence set to ${(clamped * 100).toFixed(2)}%`);
    return clamped;
  }

  private async resolveExpired(): Promise<{ resolved: TradeRecord[]; expired: string[] }> {
    const nowSec = Math.floor(this.clock.now() / 1000);
    const resolved: TradeRecord[] = [];
    const expired: string[] = [];

    for (const trade of [...this.session.pending.values()]) {
      if (trade.expirationEpoch > nowSec) continue;

      let outcome: BrokerTradeOutcome;
      try {
        outcome = await this.broker.getTradeOutcome(trade.id);
      } catch (err) {
        this.logger.warn(`Outcome lookup for ${trade.id} failed: ${errorMessage(err)}`);
        outcome = "pending";
      }

      if (outcome === "pending") {
        if (nowSec - trade.expirationEpoch >= OUTCOME_GRACE_SECONDS) {
          trade.status = "expired";
          this.session.pending.delete(trade.id);
          expired.push(trade.id);
          this.logger.warn(`Dropping trade ${trade.id} on ${trade.asset}: no outcome ${OUTCOME_GRACE_SECONDS}s after expiration`);
        }
        continue;
      }

      trade.status = outcome === "win" ? "won" : "lost";
      const record: TradeRecord = {
        id: trade.id,
        asset: trade.asset,
        direction: trade.direction,
        amount: trade.amount,
        confidence: trade.confidence,
        openedAt: trade.openedAt,
        expirationEpoch: trade.expirationEpoch,
        outcome,
        resolvedAt: this.clock.isoNow()
      };
      this.session.pending.delete(trade.id);
      this.session.appendTrade(record);
      this.agent.recordOutcome(record);
      resolved.push(record);
      this.logger.log(`Trade ${trade.id} ${trade.direction} ${trade.asset} resolved: ${outcome}`);

      try {
        this.store.recordTrade(record);
      } catch (err) {
        this.logger.error(`Could not persist trade ${trade.id}: ${errorMessage(err)}`);
      }
    }

    return { resolved, expired };
  }

  private async maybePlace(): Promise<{ placed: PendingTrade | null; skipped: SkipReason | null }> {
    const { state } = this.session;
    const config = this.configService.get();

    if (!state.trading) return { placed: null, skipped: "not_trading" };
    if (state.tradesThisHour >= config.maxTradesPerHour) return { placed: null, skipped: "rate_limited" };
    if (this.session.hasPendingOn(state.currentAsset)) return { placed: null, skipped: "asset_busy" };

    const snapshot = this.marketData.getSnapshot(state.currentAsset);
    if (!snapshot || snapshot.timeframe !== state.currentTimeframeSeconds || snapshot.lastClosedTime === null) {
      return { placed: null, skipped: "no_signal" };
    }

    const decisionKey = `${snapshot.asset}:${snapshot.timeframe}`;
    if (this.decided.get(decisionKey) === snapshot.lastClosedTime) {
      return { placed: null, skipped: "already_decided" };
    }

    const signal = this.agent.evaluate(snapshot);
    if (!signal) return { placed: null, skipped: "no_signal" };
    this.decided.set(decisionKey, snapshot.lastClosedTime);

    if (signal.confidence < state.minConfidence) {
      return { placed: null, skipped: "below_threshold" };
    }

    let tradeId: string;
    try {
      const placed = await this.broker.placeTrade({
        asset: signal.asset,
        amount: config.tradeAmount,
        direction: signal.direction,
        expiration: state.currentTimeframeSeconds
      });
      tradeId = placed.tradeId;
    } catch (err) {
      this.logger.error(`placeTrade(${signal.asset}) failed: ${errorMessage(err)}`);
      return { placed: null, skipped: "place_failed" };
    }

    const trade: PendingTrade = {
      id: tradeId,
      asset: signal.asset,
      direction: signal.direction,
      amount: config.tradeAmount,
      confidence: signal.confidence,
      openedAt: this.clock.isoNow(),
      expirationEpoch: Math.floor(this.clock.now() / 1000) + state.currentTimeframeSeconds,
      status: "pending"
    };
    this.session.pending.set(trade.id, trade);
    state.tradesThisHour += 1;
    this.logger.log(
      `Placed ${trade.direction} on ${trade.asset} (confidence ${(trade.confidence * 100).toFixed(1)}%, ${signal.reasons.join(", ") || "no reasons"})`
    );
    return { placed: trade, skipped: null };
  }
}
