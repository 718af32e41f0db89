import { BadRequestException, Body, Controller, Get, HttpCode, HttpException, Post } from "@nestjs/common";
import type { Tournament } from "@autotrader/shared";
import { ControlRequestSchema, isControlAction } from "@autotrader/shared";

import type { BotStatusView, MarketAnalysisView, TradeStatsView } from "./bot-engine.service";
import { BotEngineService } from "./bot-engine.service";
import type { BridgeOutcome } from "./command-bridge.service";
import { CommandBridgeService } from "./command-bridge.service";

function unwrap<T>(outcome: BridgeOutcome<T>): T {
  if (outcome.status === "ok") return outcome.payload;
  throw new HttpException(outcome.payload, outcome.httpStatus);
}

@Controller()
export class BotController {
  constructor(
    private readonly engine: BotEngineService,
    private readonly bridge: CommandBridgeService
  ) {}

  @Get("status")
  async getStatus(): Promise<BotStatusView> {
    return unwrap(await this.bridge.submit("status", () => this.engine.getStatus()));
  }

  @Get("market/analysis")
  async getMarketAnalysis(): Promise<MarketAnalysisView> {
    return unwrap(await this.bridge.submit("market analysis", () => this.engine.getMarketAnalysis()));
  }

  @Get("trades/history")
  async getTradeHistory(): Promise<TradeStatsView> {
    return unwrap(await this.bridge.submit("trade history", () => this.engine.getTradeStats()));
  }

  @Get("tournaments/free")
  async getFreeTournaments(): Promise<Tournament[]> {
    return unwrap(await this.bridge.submit("free tournaments", () => this.engine.getFreeTournaments()));
  }

  @Post("control")
  @HttpCode(200)
  async control(@Body() body: unknown): Promise<{ message: string }> {
    const action = typeof body === "object" && body !== null && "action" in body ? body.action : undefined;
    if (typeof action !== "string" || !isControlAction(action)) {
      throw new BadRequestException(`Unknown action: ${String(action)}`);
    }

    const parsed = ControlRequestSchema.safeParse(body);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
      throw new BadRequestException(`Invalid ${action} request: ${detail}`);
    }

    const request = parsed.data;
    const result = unwrap(await this.bridge.submit(`control ${action}`, () => this.engine.control(request)));
    if (!result.ok) {
      throw new BadRequestException(result.message);
    }
    return { message: result.message };
  }
}
