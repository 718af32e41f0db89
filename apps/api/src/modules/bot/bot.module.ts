import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";

import { AnalysisModule } from "../analysis/analysis.module";
import { ConfigModule } from "../config/config.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { LearningModule } from "../learning/learning.module";
import { PersistenceModule } from "../persistence/persistence.module";
import { ApiKeyGuard } from "../security/api-key.guard";
import { TournamentModule } from "../tournament/tournament.module";
import { BotController } from "./bot.controller";
import { BotEngineService } from "./bot-engine.service";
import { BotSessionService } from "./bot-session.service";
import { CommandBridgeService } from "./command-bridge.service";
import { TaskSupervisorService } from "./task-supervisor.service";
import { TradeExecutorService } from "./trade-executor.service";

@Module({
  imports: [ConfigModule, IntegrationsModule, PersistenceModule, AnalysisModule, LearningModule, TournamentModule],
  controllers: [BotController],
  providers: [
    BotSessionService,
    TradeExecutorService,
    TaskSupervisorService,
    CommandBridgeService,
    BotEngineService,
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard
    }
  ],
  exports: [BotEngineService]
})
export class BotModule {}
