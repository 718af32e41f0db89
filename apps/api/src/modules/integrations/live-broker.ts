import type { Candle, Timeframe, Tournament } from "@autotrader/shared";
import { BrokerTournamentSchema, CandleSchema } from "@autotrader/shared";
import { z } from "zod";

import { ConnectivityError } from "../common/errors";
import type { BrokerGateway, BrokerTradeOutcome, PlaceTradeParams, PlacedTrade } from "./broker-gateway";

export type LiveBrokerOptions = {
  baseUrl: string;
  sessionId: string;
  demo: boolean;
  timeoutMs?: number;
};

type HttpMethod = "GET" | "POST" | "DELETE";

const SessionResponseSchema = z.object({ connected: z.boolean(), balance: z.coerce.number().optional() });
const BalanceResponseSchema = z.object({ balance: z.coerce.number() });
const JoinResponseSchema = z.object({ success: z.boolean() });
const PlaceTradeResponseSchema = z
  .object({ trade_id: z.union([z.string().min(1), z.number()]) })
  .transform((row): PlacedTrade => ({ tradeId: String(row.trade_id), status: "pending" }));
const TradeOutcomeResponseSchema = z.object({ outcome: z.enum(["win", "loss", "pending"]) });

const DEFAULT_ASSETS = ["EURUSD_otc", "GBPUSD_otc", "USDJPY_otc", "AUDUSD_otc", "EURJPY_otc", "GBPJPY_otc", "EURGBP_otc", "USDCAD_otc"];

/** JSON-over-HTTP session against the broker gateway endpoint. */
export class LiveBroker implements BrokerGateway {
  readonly mode = "live" as const;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private connected = false;

  constructor(private readonly options: LiveBrokerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 8000;
  }

  async connect(): Promise<void> {
    let session: z.infer<typeof SessionResponseSchema>;
    try {
      session = SessionResponseSchema.parse(await this.request("/session", { method: "POST", body: { demo: this.options.demo } }));
    } catch (err) {
      this.connected = false;
      throw new ConnectivityError("Broker handshake failed", { cause: err });
    }
    if (!session.connected) {
      this.connected = false;
      throw new ConnectivityError("Broker rejected the session credential");
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.request("/session", { method: "DELETE" });
  }

  isConnected(): boolean {
    return this.connected;
  }

  async getBalance(): Promise<number> {
    return BalanceResponseSchema.parse(await this.request("/balance")).balance;
  }

  async getTournamentList(): Promise<Tournament[]> {
    return z.array(BrokerTournamentSchema).parse(await this.request("/tournaments"));
  }

  async joinTournament(tournamentId: string): Promise<boolean> {
    const res = JoinResponseSchema.parse(await this.request(`/tournaments/${encodeURIComponent(tournamentId)}/join`, { method: "POST" }));
    return res.success;
  }

  async placeTrade(params: PlaceTradeParams): Promise<PlacedTrade> {
    return PlaceTradeResponseSchema.parse(
      await this.request("/trades", {
        method: "POST",
        body: {
          asset: params.asset,
          amount: params.amount,
          direction: params.direction,
          expiration: params.expiration
        }
      })
    );
  }

  async getTradeOutcome(tradeId: string): Promise<BrokerTradeOutcome> {
    return TradeOutcomeResponseSchema.parse(await this.request(`/trades/${encodeURIComponent(tradeId)}`)).outcome;
  }

  async getCandles(asset: string, timeframe: Timeframe, count: number): Promise<Candle[]> {
    return z.array(CandleSchema).parse(await this.request("/candles", { query: { asset, period: timeframe, count } }));
  }

  listAssets(): string[] {
    return [...DEFAULT_ASSETS];
  }

  private async request(
    path: string,
    options?: {
      method?: HttpMethod;
      query?: Record<string, string | number | undefined>;
      body?: Record<string, unknown>;
    }
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const method: HttpMethod = options?.method ?? "GET";
      let res: Response;
      try {
        res = await fetch(url, {
          method,
          headers: {
            "X-Session-Id": this.options.sessionId,
            ...(options?.body ? { "Content-Type": "application/json" } : {})
          },
          body: options?.body ? JSON.stringify(options.body) : undefined,
          signal: controller.signal
        });
      } catch (err) {
        // Network failure or timeout: the session is gone until the next connect().
        this.connected = false;
        throw new ConnectivityError(`Broker unreachable: ${method} ${path}`, { cause: err });
      }

      if (res.status === 401) {
        this.connected = false;
      }

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new Error(`Broker HTTP ${res.status}: ${text.slice(0, 250)}`);
      }

      if (res.status === 204) {
        return undefined;
      }

      return await res.json();
    } finally {
      clearTimeout(t);
    }
  }
}
