import { Module } from "@nestjs/common";

import { Clock } from "../common/clock";
import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { BROKER_GATEWAY } from "./broker-gateway";
import { ConnectionManagerService } from "./connection-manager.service";
import { selectBrokerGateway } from "./select-broker";

@Module({
  imports: [ConfigModule],
  providers: [
    Clock,
    {
      provide: BROKER_GATEWAY,
      useFactory: (configService: ConfigService, clock: Clock) => selectBrokerGateway(configService.get(), clock),
      inject: [ConfigService, Clock]
    },
    ConnectionManagerService
  ],
  exports: [BROKER_GATEWAY, Clock, ConnectionManagerService]
})
export class IntegrationsModule {}
