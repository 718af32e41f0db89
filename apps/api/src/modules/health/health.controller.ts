import { Controller, Get } from "@nestjs/common";

import { Clock } from "../common/clock";
import { ConnectionManagerService } from "../integrations/connection-manager.service";

@Controller("health")
export class HealthController {
  constructor(
    private readonly clock: Clock,
    private readonly connection: ConnectionManagerService
  ) {}

  @Get()
  getHealth(): { ok: true; ts: string; simulationMode: boolean } {
    return { ok: true, ts: this.clock.isoNow(), simulationMode: this.connection.isSimulation() };
  }
}
