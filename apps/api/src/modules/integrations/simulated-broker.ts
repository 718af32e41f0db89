import crypto from "node:crypto";

import type { Candle, Timeframe, Tournament } from "@autotrader/shared";

import type { Clock } from "../common/clock";
import type { BrokerGateway, BrokerTradeOutcome, PlaceTradeParams, PlacedTrade } from "./broker-gateway";

const BASE_PRICES: Record<string, number> = {
  EURUSD_otc: 1.085,
  GBPUSD_otc: 1.265,
  USDJPY_otc: 151.2,
  AUDUSD_otc: 0.655,
  EURJPY_otc: 164.1,
  GBPJPY_otc: 191.3,
  EURGBP_otc: 0.857,
  USDCAD_otc: 1.362
};

const SIM_TOURNAMENTS: readonly Tournament[] = [
  {
    id: "sim_tournament_1",
    name: "Daily Free Tournament",
    entryFee: 0,
    prizePool: 100,
    participants: 50,
    status: "active"
  },
  {
    id: "sim_tournament_2",
    name: "Weekend Paid Contest",
    entryFee: 10,
    prizePool: 1000,
    participants: 120,
    status: "active"
  }
];

type SimulatedPosition = {
  asset: string;
  direction: PlaceTradeParams["direction"];
  openPrice: number;
  expirationEpoch: number;
};

function phaseOf(asset: string, salt: string): number {
  const digest = crypto.createHash("sha256").update(`${salt}:${asset}`).digest();
  return (digest.readUInt32BE(0) / 0xffffffff) * Math.PI * 2;
}

/**
 * Deterministic synthetic price for `asset` at epoch second `t`: two slow waves and one fast one
 * around the asset's base price.
 */
export function simulatedPrice(asset: string, t: number): number {
  const base = BASE_PRICES[asset] ?? 1;
  const slow = Math.sin(t / 900 + phaseOf(asset, "slow")) * 0.0025;
  const medium = Math.sin(t / 173 + phaseOf(asset, "medium")) * 0.0012;
  const fast = Math.sin(t / 29 + phaseOf(asset, "fast")) * 0.0004;
  return Number((base * (1 + slow + medium + fast)).toFixed(6));
}

export class SimulatedBroker implements BrokerGateway {
  readonly mode = "simulated" as const;

  private connected = false;
  private readonly positions = new Map<string, SimulatedPosition>();
  private readonly joined = new Set<string>();

  constructor(
    private readonly clock: Clock,
    private readonly startingBalance: number
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async getBalance(): Promise<number> {
    return this.startingBalance;
  }

  async getTournamentList(): Promise<Tournament[]> {
    return SIM_TOURNAMENTS.map((t) => ({ ...t }));
  }

  async joinTournament(tournamentId: string): Promise<boolean> {
    const tournament = SIM_TOURNAMENTS.find((t) => t.id === tournamentId);
    if (!tournament || tournament.status !== "active") return false;
    this.joined.add(tournamentId);
    return true;
  }

  hasJoined(tournamentId: string): boolean {
    return this.joined.has(tournamentId);
  }

  async placeTrade(params: PlaceTradeParams): Promise<PlacedTrade> {
    const nowSec = Math.floor(this.clock.now() / 1000);
    const tradeId = crypto.randomUUID();
    this.positions.set(tradeId, {
      asset: params.asset,
      direction: params.direction,
      openPrice: simulatedPrice(params.asset, nowSec),
      expirationEpoch: nowSec + params.expiration
    });
    return { tradeId, status: "pending" };
  }

  async getTradeOutcome(tradeId: string): Promise<BrokerTradeOutcome> {
    const position = this.positions.get(tradeId);
    if (!position) {
      throw new Error(`Unknown simulated trade ${tradeId}`);
    }

    const nowSec = Math.floor(this.clock.now() / 1000);
    if (nowSec < position.expirationEpoch) return "pending";

    const closePrice = simulatedPrice(position.asset, position.expirationEpoch);
    this.positions.delete(tradeId);
    const won = position.direction === "call" ? closePrice > position.openPrice : closePrice < position.openPrice;
    return won ? "win" : "loss";
  }

  async getCandles(asset: string, timeframe: Timeframe, count: number): Promise<Candle[]> {
    const nowSec = Math.floor(this.clock.now() / 1000);
    const currentStart = Math.floor(nowSec / timeframe) * timeframe;
    const candles: Candle[] = [];

    for (let i = count - 1; i >= 0; i -= 1) {
      const start = currentStart - i * timeframe;
      const end = Math.min(start + timeframe, nowSec);
      const open = simulatedPrice(asset, start);
      const close = simulatedPrice(asset, end);
      const samples: number[] = [open, close];
      const step = Math.max(1, Math.floor((end - start) / 6));
      for (let t = start + step; t < end; t += step) {
        samples.push(simulatedPrice(asset, t));
      }
      candles.push({ time: start, open, high: Math.max(...samples), low: Math.min(...samples), close });
    }

    return candles;
  }

  listAssets(): string[] {
    return Object.keys(BASE_PRICES);
  }
}
