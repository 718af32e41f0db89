import fs from "node:fs";
import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { TradeRecord } from "@autotrader/shared";
import { TradeRecordSchema } from "@autotrader/shared";
import { z } from "zod";

import { ConfigService } from "../config/config.service";

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

export const AssetLearningStatsSchema = z.object({
  asset: z.string().min(1),
  trades: z.number().int().nonnegative(),
  wins: z.number().int().nonnegative(),
  callWinRate: z.number().min(0).max(1).nullable(),
  putWinRate: z.number().min(0).max(1).nullable()
});
export type AssetLearningStats = z.infer<typeof AssetLearningStatsSchema>;

export const LearningStatsSchema = z.object({
  passes: z.number().int().nonnegative(),
  samples: z.number().int().nonnegative(),
  lastPassAt: z.string().min(1).optional(),
  assets: z.array(AssetLearningStatsSchema)
});
export type LearningStats = z.infer<typeof LearningStatsSchema>;

export const DailyJoinStateSchema = z.record(z.string(), z.number().int());
export type DailyJoinState = z.infer<typeof DailyJoinStateSchema>;

/** Trade outcomes, learning statistics and scheduler bookkeeping as JSON files under DATA_DIR. */
@Injectable()
export class TradeStoreService {
  constructor(private readonly configService: ConfigService) {}

  private get dataDir(): string {
    return this.configService.dataDir;
  }

  private get tradesPath(): string {
    return path.join(this.dataDir, "trades.jsonl");
  }

  private get learningStatsPath(): string {
    return path.join(this.dataDir, "learning-stats.json");
  }

  private get schedulerStatePath(): string {
    return path.join(this.dataDir, "scheduler-state.json");
  }

  recordTrade(record: TradeRecord): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    fs.appendFileSync(this.tradesPath, `${JSON.stringify(record)}\n`, { encoding: "utf-8" });
  }

  loadTrades(maxItems = 1000): TradeRecord[] {
    if (!fs.existsSync(this.tradesPath)) return [];
    const lines = fs
      .readFileSync(this.tradesPath, "utf-8")
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
    const tail = lines.slice(Math.max(0, lines.length - maxItems));
    const parsed: TradeRecord[] = [];
    for (const line of tail) {
      try {
        parsed.push(TradeRecordSchema.parse(JSON.parse(line)));
      } catch {
        // ignore invalid lines
      }
    }
    return parsed;
  }

  saveLearningStats(stats: LearningStats): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.learningStatsPath, JSON.stringify(stats, null, 2));
  }

  loadLearningStats(): LearningStats | null {
    return this.readJson(this.learningStatsPath, LearningStatsSchema);
  }

  saveDailyJoinState(state: DailyJoinState): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.schedulerStatePath, JSON.stringify(state, null, 2));
  }

  loadDailyJoinState(): DailyJoinState {
    return this.readJson(this.schedulerStatePath, DailyJoinStateSchema) ?? {};
  }

  private readJson<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
    if (!fs.existsSync(filePath)) return null;
    try {
      return schema.parse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    } catch {
      return null;
    }
  }
}
