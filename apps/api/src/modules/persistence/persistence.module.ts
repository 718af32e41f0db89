import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { TradeStoreService } from "./trade-store.service";

@Module({
  imports: [ConfigModule],
  providers: [TradeStoreService],
  exports: [TradeStoreService]
})
export class PersistenceModule {}
