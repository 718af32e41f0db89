import { Module } from "@nestjs/common";

import { IntegrationsModule } from "../integrations/integrations.module";
import { MarketDataService } from "./market-data.service";

@Module({
  imports: [IntegrationsModule],
  providers: [MarketDataService],
  exports: [MarketDataService]
})
export class AnalysisModule {}
