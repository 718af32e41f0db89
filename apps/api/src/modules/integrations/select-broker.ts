import type { RuntimeConfig } from "@autotrader/shared";

import type { Clock } from "../common/clock";
import type { BrokerGateway } from "./broker-gateway";
import { LiveBroker } from "./live-broker";
import { SimulatedBroker } from "./simulated-broker";

export const DEMO_BALANCE = 10_000;

/**
 * Picks the broker implementation once at startup. The live gateway needs both a session
 * credential and a broker endpoint; anything less runs simulated.
 */
export function selectBrokerGateway(config: RuntimeConfig, clock: Clock): BrokerGateway {
  if (!config.sessionId || !config.brokerApiUrl) {
    return new SimulatedBroker(clock, config.demo ? DEMO_BALANCE : 0);
  }

  return new LiveBroker({
    baseUrl: config.brokerApiUrl,
    sessionId: config.sessionId,
    demo: config.demo
  });
}
