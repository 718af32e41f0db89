import type { Candle, Timeframe, Tournament, TradeDirection } from "@autotrader/shared";

export const BROKER_GATEWAY = Symbol("BROKER_GATEWAY");

export type BrokerMode = "simulated" | "live";

export type PlacedTrade = {
  tradeId: string;
  status: "pending";
};

export type BrokerTradeOutcome = "win" | "loss" | "pending";

export type PlaceTradeParams = {
  asset: string;
  amount: number;
  direction: TradeDirection;
  /** Seconds until expiration. */
  expiration: number;
};

/**
 * Everything the bot needs from the brokerage. Two implementations exist and one is picked
 * at startup; every call may fail and callers degrade instead of propagating.
 */
export interface BrokerGateway {
  readonly mode: BrokerMode;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  getBalance(): Promise<number>;
  getTournamentList(): Promise<Tournament[]>;
  joinTournament(tournamentId: string): Promise<boolean>;
  placeTrade(params: PlaceTradeParams): Promise<PlacedTrade>;
  getTradeOutcome(tradeId: string): Promise<BrokerTradeOutcome>;
  getCandles(asset: string, timeframe: Timeframe, count: number): Promise<Candle[]>;
  listAssets(): string[];
}
