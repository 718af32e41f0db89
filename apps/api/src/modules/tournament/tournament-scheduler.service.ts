import { Inject, Injectable, Logger } from "@nestjs/common";
import type { Tournament } from "@autotrader/shared";

import { Clock } from "../common/clock";
import { errorMessage } from "../common/errors";
import type { BrokerGateway } from "../integrations/broker-gateway";
import { BROKER_GATEWAY } from "../integrations/broker-gateway";
import type { DailyJoinState } from "../persistence/trade-store.service";
import { TradeStoreService } from "../persistence/trade-store.service";

export const DAILY_FREE_CLASS = "daily_free";
export const DAILY_JOIN_WINDOW_MS = 4 * 60 * 60_000;

@Injectable()
export class TournamentSchedulerService {
  private readonly logger = new Logger(TournamentSchedulerService.name);
  private readonly lastJoinAt: DailyJoinState;

  constructor(
    @Inject(BROKER_GATEWAY) private readonly broker: BrokerGateway,
    private readonly store: TradeStoreService,
    private readonly clock: Clock
  ) {
    this.lastJoinAt = { ...store.loadDailyJoinState() };
  }

  async getAllActiveFreeTournaments(): Promise<Tournament[]> {
    try {
      const list = await this.broker.getTournamentList();
      return list.filter((t) => t.status === "active" && t.entryFee === 0);
    } catch (err) {
      this.logger.warn(`Tournament list unavailable: ${errorMessage(err)}`);
      return [];
    }
  }

  async joinTournamentById(tournamentId: string): Promise<boolean> {
    try {
      const ok = await this.broker.joinTournament(tournamentId);
      if (ok) {
        this.logger.log(`Joined tournament ${tournamentId}`);
      } else {
        this.logger.warn(`Broker refused to join tournament ${tournamentId}`);
      }
      return ok;
    } catch (err) {
      this.logger.error(`Failed to join tournament ${tournamentId}: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Joins the first active free tournament at most once per window. Inside the window the
   * broker is not contacted at all.
   */
  async joinDailyFreeTournament(): Promise<boolean> {
    const now = this.clock.now();
    const last = this.lastJoinAt[DAILY_FREE_CLASS];
    if (last !== undefined && now - last < DAILY_JOIN_WINDOW_MS) {
      this.logger.debug("Daily free tournament already joined in this window");
      return false;
    }

    const [first] = await this.getAllActiveFreeTournaments();
    if (!first) {
      this.logger.log("No active free tournament to join");
      return false;
    }

    if (!(await this.joinTournamentById(first.id))) {
      return false;
    }

    this.lastJoinAt[DAILY_FREE_CLASS] = now;
    try {
      this.store.saveDailyJoinState(this.lastJoinAt);
    } catch (err) {
      this.logger.warn(`Could not persist daily join state: ${errorMessage(err)}`);
    }
    return true;
  }
}
