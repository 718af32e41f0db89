import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { RuntimeConfig } from "@autotrader/shared";
import { loadRuntimeConfig } from "@autotrader/shared";

@Injectable()
export class ConfigService {
  private readonly config: RuntimeConfig = loadRuntimeConfig(process.env);

  get(): RuntimeConfig {
    return this.config;
  }

  get dataDir(): string {
    return this.config.dataDir ?? path.resolve(process.cwd(), "../../data");
  }

  get logDir(): string {
    return this.config.logDir ?? path.join(this.dataDir, "logs");
  }
}
