import { Module } from "@nestjs/common";

import { IntegrationsModule } from "../integrations/integrations.module";
import { PersistenceModule } from "../persistence/persistence.module";
import { KnowledgeLearnerService } from "./knowledge-learner.service";
import { TradingAgentService } from "./trading-agent.service";

@Module({
  imports: [IntegrationsModule, PersistenceModule],
  providers: [KnowledgeLearnerService, TradingAgentService],
  exports: [KnowledgeLearnerService, TradingAgentService]
})
export class LearningModule {}
