import "reflect-metadata";

import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { json } from "express";
import pinoHttp from "pino-http";

import { AppModule } from "./modules/app.module";
import { ConfigService } from "./modules/config/config.service";
import { createLogger } from "./modules/logging/pino-logger";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true
  });

  const configService = app.get(ConfigService);
  const config = configService.get();
  const logger = createLogger(configService);

  app.use(json({ limit: "100kb" }));
  app.use(pinoHttp({ logger }));

  app.useLogger({
    log: (message, context) => logger.info({ msg: message, context }),
    error: (message, trace, context) => logger.error({ msg: message, trace, context }),
    warn: (message, context) => logger.warn({ msg: message, context }),
    debug: (message, context) => logger.debug({ msg: message, context }),
    verbose: (message, context) => logger.trace({ msg: message, context })
  });

  if (config.demoForced) {
    logger.warn({ msg: "BROKER_SSID is not set; demo mode forced and the simulated broker is used" });
  }

  app.setGlobalPrefix("api", { exclude: ["health"] });
  app.enableShutdownHooks();

  await app.listen(config.port, "0.0.0.0");

  logger.info({ msg: "API listening", port: config.port, dataDir: configService.dataDir });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
