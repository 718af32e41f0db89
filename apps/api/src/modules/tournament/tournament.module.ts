import { Module } from "@nestjs/common";

import { IntegrationsModule } from "../integrations/integrations.module";
import { PersistenceModule } from "../persistence/persistence.module";
import { TournamentSchedulerService } from "./tournament-scheduler.service";

@Module({
  imports: [IntegrationsModule, PersistenceModule],
  providers: [TournamentSchedulerService],
  exports: [TournamentSchedulerService]
})
export class TournamentModule {}
