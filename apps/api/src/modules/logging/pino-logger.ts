import fs from "node:fs";
import path from "node:path";

import pino from "pino";

import type { ConfigService } from "../config/config.service";

export function createLogger(configService: ConfigService): pino.Logger {
  const logDir = configService.logDir;
  fs.mkdirSync(logDir, { recursive: true });

  const destination = pino.destination({
    dest: path.join(logDir, "api.log"),
    sync: false
  });

  return pino(
    {
      level: configService.get().logLevel,
      base: undefined
    },
    pino.multistream([{ stream: process.stdout }, { stream: destination }])
  );
}
