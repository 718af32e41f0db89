import { describe, expect, it } from "vitest";

import { loadRuntimeConfig } from "./runtime-config";

describe("loadRuntimeConfig", () => {
  it("forces demo mode when no session credential is set", () => {
    const config = loadRuntimeConfig({ BOT_DEMO: "false" });
    expect(config.sessionId).toBeUndefined();
    expect(config.demo).toBe(true);
    expect(config.demoForced).toBe(true);
  });

  it("honours BOT_DEMO when a credential is present", () => {
    const live = loadRuntimeConfig({ BROKER_SSID: "test-session", BOT_DEMO: "False" });
    expect(live.demo).toBe(false);
    expect(live.demoForced).toBe(false);

    const demo = loadRuntimeConfig({ BROKER_SSID: "test-session", BOT_DEMO: "TRUE" });
    expect(demo.demo).toBe(true);
  });

  it("treats a blank credential as missing", () => {
    expect(loadRuntimeConfig({ BROKER_SSID: "   " }).sessionId).toBeUndefined();
  });

  it("applies defaults", () => {
    const config = loadRuntimeConfig({});
    expect(config.port).toBe(5000);
    expect(config.logLevel).toBe("info");
    expect(config.defaultAsset).toBe("EURUSD_otc");
    expect(config.defaultTimeframe).toBe(60);
    expect(config.minConfidence).toBe(0.75);
    expect(config.tradeAmount).toBe(1);
    expect(config.maxTradesPerHour).toBe(10);
    expect(config.brokerApiUrl).toBeUndefined();
  });

  it("clamps the configured confidence threshold and trims the broker url", () => {
    const config = loadRuntimeConfig({ BOT_MIN_CONFIDENCE: "0.99", BROKER_API_URL: "https://broker.example.test/api/", PORT: "8080" });
    expect(config.minConfidence).toBe(0.95);
    expect(config.brokerApiUrl).toBe("https://broker.example.test/api");
    expect(config.port).toBe(8080);
  });

  it("rejects a timeframe the analyzers do not support", () => {
    expect(() => loadRuntimeConfig({ BOT_TIMEFRAME: "120" })).toThrow();
  });
});
