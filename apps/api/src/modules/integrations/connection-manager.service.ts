import { Inject, Injectable, Logger } from "@nestjs/common";

import { errorMessage } from "../common/errors";
import { ConfigService } from "../config/config.service";
import type { BrokerGateway } from "./broker-gateway";
import { BROKER_GATEWAY } from "./broker-gateway";
import { DEMO_BALANCE } from "./select-broker";

@Injectable()
export class ConnectionManagerService {
  private readonly logger = new Logger(ConnectionManagerService.name);
  private connected = false;
  private balance = 0;

  constructor(
    @Inject(BROKER_GATEWAY) private readonly broker: BrokerGateway,
    private readonly configService: ConfigService
  ) {}

  isSimulation(): boolean {
    return this.broker.mode === "simulated";
  }

  async connect(): Promise<boolean> {
    const { demo } = this.configService.get();

    try {
      await this.broker.connect();
      if (this.isSimulation()) {
        this.connected = true;
        this.balance = demo ? DEMO_BALANCE : 0;
        this.logger.log(`Running in simulation mode (demo=${demo}, balance=${this.balance.toFixed(2)})`);
        return true;
      }
      this.balance = await this.broker.getBalance();
      this.connected = true;
      this.logger.log(`Connected live (demo=${demo}, balance=${this.balance.toFixed(2)})`);
      return true;
    } catch (err) {
      this.connected = false;
      this.logger.error(`Failed to connect to the broker: ${errorMessage(err)}`);
      return false;
    }
  }

  isConnected(): boolean {
    return this.connected && (this.isSimulation() || this.broker.isConnected());
  }

  async getBalance(): Promise<number> {
    if (this.isSimulation()) {
      return this.balance;
    }
    this.balance = await this.broker.getBalance();
    return this.balance;
  }

  get lastKnownBalance(): number {
    return this.balance;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    try {
      await this.broker.disconnect();
    } catch (err) {
      this.logger.warn(`Disconnect failed: ${errorMessage(err)}`);
    }
  }
}
