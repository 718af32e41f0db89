import type { RuntimeConfig } from "@autotrader/shared";

import { Clock } from "../common/clock";
import type { ConfigService } from "../config/config.service";

export class ManualClock extends Clock {
  constructor(private current = Date.UTC(2026, 0, 5, 9, 0, 0)) {
    super();
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function testConfig(overrides?: Partial<RuntimeConfig>): RuntimeConfig {
  return {
    demo: true,
    demoForced: true,
    port: 5000,
    logLevel: "silent",
    defaultAsset: "EURUSD_otc",
    defaultTimeframe: 60,
    minConfidence: 0.75,
    tradeAmount: 1,
    maxTradesPerHour: 10,
    ...overrides
  };
}

/** Minimal ConfigService stand-in; services only read through get() and dataDir. */
export function configServiceFor(config: RuntimeConfig, dataDir = "/nonexistent"): ConfigService {
  const stub = {
    get: () => config,
    dataDir,
    logDir: `${dataDir}/logs`
  };
  return stub as unknown as ConfigService;
}
