import { Injectable } from "@nestjs/common";
import type { BotState, PendingTrade, TradeRecord } from "@autotrader/shared";
import { defaultBotState } from "@autotrader/shared";

import { Clock } from "../common/clock";
import { ConfigService } from "../config/config.service";
import { TradeStoreService } from "../persistence/trade-store.service";

const HOUR_MS = 60 * 60_000;

/**
 * Mutable state shared by every task loop and the control surface. Only the supervisor's
 * loops and work dispatched through the command bridge touch it.
 */
@Injectable()
export class BotSessionService {
  readonly state: BotState;
  readonly pending = new Map<string, PendingTrade>();
  /** Start of the current rolling hour used for `tradesThisHour`. */
  hourWindowStartedAt: number;

  private readonly history: TradeRecord[];

  constructor(
    configService: ConfigService,
    store: TradeStoreService,
    private readonly clock: Clock
  ) {
    const config = configService.get();
    this.state = defaultBotState({
      currentAsset: config.defaultAsset,
      currentTimeframeSeconds: config.defaultTimeframe,
      minConfidence: config.minConfidence
    });
    this.history = store.loadTrades();
    this.hourWindowStartedAt = clock.now();
  }

  get trades(): readonly TradeRecord[] {
    return this.history;
  }

  appendTrade(record: TradeRecord): void {
    this.history.push(record);
  }

  /** Zeroes `tradesThisHour` once a full hour has passed, whether or not anything is ticking. */
  rollHourWindow(now = this.clock.now()): void {
    const elapsed = now - this.hourWindowStartedAt;
    if (elapsed < HOUR_MS) return;
    this.hourWindowStartedAt += Math.floor(elapsed / HOUR_MS) * HOUR_MS;
    this.state.tradesThisHour = 0;
  }

  hasPendingOn(asset: string): boolean {
    for (const trade of this.pending.values()) {
      if (trade.asset === asset) return true;
    }
    return false;
  }
}
