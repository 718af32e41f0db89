import { afterEach, describe, expect, it, vi } from "vitest";

import { ConnectivityError } from "../common/errors";
import { LiveBroker } from "./live-broker";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function broker(): LiveBroker {
  return new LiveBroker({ baseUrl: "http://broker.test/v1/", sessionId: "test-session", demo: true });
}

describe("LiveBroker", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("opens the session with the credential header", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ connected: true }));
    const live = broker();

    await live.connect();

    expect(live.isConnected()).toBe(true);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe("http://broker.test/v1/session");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "X-Session-Id": "test-session", "Content-Type": "application/json" });
    expect(init?.body).toBe(JSON.stringify({ demo: true }));
  });

  it("raises a connectivity error when the handshake is refused", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("expired", { status: 401 }));
    const live = broker();

    await expect(live.connect()).rejects.toBeInstanceOf(ConnectivityError);
    expect(live.isConnected()).toBe(false);
  });

  it("treats connected=false as a failed handshake", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ connected: false }));
    await expect(broker().connect()).rejects.toThrow("Broker rejected the session credential");
  });

  it("drops the session when a request cannot reach the broker", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(jsonResponse({ connected: true }));
    const live = broker();
    await live.connect();

    fetchSpy.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(live.getBalance()).rejects.toThrow("Broker unreachable: GET /balance");
    expect(live.isConnected()).toBe(false);
  });

  it("drops the session when the broker answers 401", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(jsonResponse({ connected: true }));
    const live = broker();
    await live.connect();

    fetchSpy.mockResolvedValueOnce(new Response("session expired", { status: 401 }));
    await expect(live.getBalance()).rejects.toThrow("Broker HTTP 401: session expired");
    expect(live.isConnected()).toBe(false);
  });

  it("keeps the session through other HTTP errors", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(jsonResponse({ connected: true }));
    const live = broker();
    await live.connect();

    fetchSpy.mockResolvedValueOnce(new Response("busy", { status: 503 }));
    await expect(live.getBalance()).rejects.toThrow("Broker HTTP 503: busy");
    expect(live.isConnected()).toBe(true);
  });

  it("normalizes tournament rows", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      jsonResponse([
        { id: 7, name: "Morning Sprint", entry_fee: "0", prize_pool: 50, participants: 12, status: "active" },
        { id: "x9", name: "Archive", entry_fee: 5, status: "archived" }
      ])
    );

    await expect(broker().getTournamentList()).resolves.toEqual([
      { id: "7", name: "Morning Sprint", entryFee: 0, prizePool: 50, participants: 12, status: "active" },
      { id: "x9", name: "Archive", entryFee: 5, prizePool: 0, participants: 0, status: "ended" }
    ]);
  });

  it("returns the broker trade id as a string", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ trade_id: 981 }));

    const placed = await broker().placeTrade({ asset: "EURUSD_otc", amount: 1, direction: "put", expiration: 60 });

    expect(placed).toEqual({ tradeId: "981", status: "pending" });
    expect(fetchSpy.mock.calls[0][1]?.body).toBe(JSON.stringify({ asset: "EURUSD_otc", amount: 1, direction: "put", expiration: 60 }));
  });

  it("requests candles with asset, period and count", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse([{ time: 60, open: 1, high: 2, low: 0.5, close: 1.5 }]));

    const candles = await broker().getCandles("GBPUSD_otc", 300, 50);

    expect(candles).toEqual([{ time: 60, open: 1, high: 2, low: 0.5, close: 1.5 }]);
    expect(String(fetchSpy.mock.calls[0][0])).toBe("http://broker.test/v1/candles?asset=GBPUSD_otc&period=300&count=50");
  });
});
