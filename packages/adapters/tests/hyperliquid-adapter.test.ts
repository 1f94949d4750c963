import { afterEach, describe, expect, it } from "vitest";

import type { VenueOrder, VenueReceipt } from "@perp-aggregator/core";

import { HyperliquidAdapter, type HyperliquidAdapterOptions } from "../src/hyperliquid/hyperliquid-adapter";
import type { OrderGateway, VenueEvent } from "../src/ports";
import meta from "./fixtures/hyperliquid-meta.json";
import {
  createFakeFetch,
  FakeWsServer,
  jsonResponse,
  waitFor,
  type FakeRoute,
  type FakeWsConnection,
} from "./helpers/fake-ws-connection";

type Level = [px: string, sz: string, n: number];

const l2Frame = (coin: string, bids: Level[], asks: Level[], time = 1_700_000_000_000) => ({
  channel: "l2Book",
  data: {
    coin,
    time,
    levels: [bids.map(([px, sz, n]) => ({ px, sz, n })), asks.map(([px, sz, n]) => ({ px, sz, n }))],
  },
});

const metaRoute: FakeRoute = () => jsonResponse(meta);

const adapters: HyperliquidAdapter[] = [];

const createAdapter = (overrides: Partial<HyperliquidAdapterOptions> = {}) => {
  const server = new FakeWsServer();
  const fake = createFakeFetch(metaRoute);
  const adapter = new HyperliquidAdapter({
    config: { testnet: false, retryAttempts: 1, timeoutMs: 200 },
    connectionFactory: server.factory,
    fetch: fake.fetch,
    backoff: { baseMs: 5, capMs: 20 },
    retryDelayMs: 1,
    ...overrides,
  });
  const events: VenueEvent[] = [];
  adapter.onEvent(e => events.push(e));
  adapters.push(adapter);
  return { adapter, server, events, requests: fake.requests };
};

const streaming = (adapter: HyperliquidAdapter, server: FakeWsServer): Promise<FakeWsConnection> =>
  waitFor(() => (adapter.getSessionState().supervisorState === "STREAMING" ? server.latest() : undefined));

const bookWhere = (adapter: HyperliquidAdapter, symbol: string, bestBid: string) =>
  waitFor(() => {
    const result = adapter.getOrderbook(symbol);
    return result.isOk() && result.value.bids[0]?.price === bestBid ? result.value : undefined;
  });

afterEach(async () => {
  await Promise.all(adapters.splice(0).map(a => a.shutdown()));
});

describe("HyperliquidAdapter market data", () => {
  it("subscribes to the coin's l2Book", async () => {
    const { adapter, server } = createAdapter();

    await adapter.startMarketUpdates("BTC");
    const connection = await streaming(adapter, server);

    expect(connection.url).toBe("wss://api.hyperliquid.xyz/ws");
    expect(connection.sent).toEqual([{ method: "subscribe", subscription: { type: "l2Book", coin: "BTC" } }]);
  });

  it("uses testnet endpoints when configured", async () => {
    const { adapter, server } = createAdapter({ config: { testnet: true, retryAttempts: 1, timeoutMs: 200 } });

    await adapter.startMarketUpdates("BTC");
    const connection = await streaming(adapter, server);

    expect(connection.url).toBe("wss://api.hyperliquid-testnet.xyz/ws");
  });

  it("replaces the whole book on every message", async () => {
    const { adapter, server } = createAdapter();
    await adapter.startMarketUpdates("BTC");
    const connection = await streaming(adapter, server);

    connection.emitMessage({ channel: "subscriptionResponse", data: { method: "subscribe" } });
    connection.emitMessage(
      l2Frame(
        "BTC",
        [
          ["50000", "1.5", 3],
          ["49999", "2", 1],
        ],
        [["50001", "0.5", 2]],
      ),
    );
    await bookWhere(adapter, "BTC", "50000");
    connection.emitMessage(l2Frame("BTC", [["50002", "1", 1]], [["50003", "1", 4]]));
    const book = await bookWhere(adapter, "BTC", "50002");

    expect(book.bids).toEqual([{ price: "50002", size: "1", orders: 1 }]);
    expect(book.asks).toEqual([{ price: "50003", size: "1", orders: 4 }]);
    expect(book.venue).toBe("hyperliquid");
  });

  it("discards messages with an empty side and keeps the previous book", async () => {
    const { adapter, server } = createAdapter();
    await adapter.startMarketUpdates("BTC");
    const connection = await streaming(adapter, server);

    connection.emitMessage(l2Frame("BTC", [["50000", "1", 1]], [["50001", "1", 1]]));
    await bookWhere(adapter, "BTC", "50000");
    connection.emitMessage(l2Frame("BTC", [["49000", "1", 1]], []));
    connection.emitMessage({ channel: "pong" });
    connection.emitMessage(l2Frame("ETH", [["3000", "1", 1]], [["3001", "1", 1]]));
    connection.emitMessage(l2Frame("BTC", [["50000", "3", 1]], [["50001", "1", 1]]));
    const book = await waitFor(() => {
      const result = adapter.getOrderbook("BTC");
      return result.isOk() && result.value.bids[0]?.size === "3" ? result.value : undefined;
    });

    expect(book.bids).toEqual([{ price: "50000", size: "3", orders: 1 }]);
  });

  it("drops a crossed snapshot and resubscribes", async () => {
    const { adapter, server, events } = createAdapter();
    await adapter.startMarketUpdates("BTC");
    const connection = await streaming(adapter, server);

    connection.emitMessage(l2Frame("BTC", [["50001", "1", 1]], [["50000", "1", 1]]));
    await waitFor(() => (connection.sent.length === 3 ? true : undefined));

    expect(connection.sent.slice(1)).toEqual([
      { method: "unsubscribe", subscription: { type: "l2Book", coin: "BTC" } },
      { method: "subscribe", subscription: { type: "l2Book", coin: "BTC" } },
    ]);
    expect(events.find(e => e.type === "book_dropped")).toMatchObject({
      venue: "hyperliquid",
      symbol: "BTC",
      reason: "crossed book for BTC: bid 50001 >= ask 50000",
    });
    expect(adapter.getOrderbook("BTC").isErr()).toBe(true);
  });

  it("keeps the last book while reconnecting", async () => {
    const { adapter, server } = createAdapter();
    await adapter.startMarketUpdates("BTC");
    const first = await streaming(adapter, server);
    first.emitMessage(l2Frame("BTC", [["50000", "1", 1]], [["50001", "1", 1]]));
    await bookWhere(adapter, "BTC", "50000");

    await first.close();
    const second = await waitFor(() =>
      server.connections.length === 2 && adapter.getSessionState().supervisorState === "STREAMING" ?
        server.latest()
      : undefined,
    );

    expect(adapter.getOrderbook("BTC")._unsafeUnwrap().bids[0]?.price).toBe("50000");
    expect(second.sent).toEqual([{ method: "subscribe", subscription: { type: "l2Book", coin: "BTC" } }]);
  });

  it("subscribes with the venue's coin spelling once metadata is loaded", async () => {
    const { adapter, server } = createAdapter();
    await adapter.getAvailableAssets();

    await adapter.startMarketUpdates("kpepe");
    const connection = await streaming(adapter, server);
    connection.emitMessage(l2Frame("kPEPE", [["0.010524", "1000", 2]], [["0.010525", "5000", 1]]));
    const book = await bookWhere(adapter, "KPEPE", "0.010524");

    expect(connection.sent).toEqual([{ method: "subscribe", subscription: { type: "l2Book", coin: "kPEPE" } }]);
    expect(book.symbol).toBe("KPEPE");
  });

  it("rejects frames on unknown channels", async () => {
    const { adapter, server } = createAdapter();
    await adapter.startMarketUpdates("BTC");
    const connection = await streaming(adapter, server);

    connection.emitMessage({ channel: "trades", data: [] });
    connection.emitMessage({ channel: "l2Book", data: { coin: "BTC", time: 1, levels: [[]] } });
    connection.emitMessage(l2Frame("BTC", [["50000", "1", 1]], [["50001", "1", 1]]));
    const book = await bookWhere(adapter, "BTC", "50000");

    expect(book.asks).toEqual([{ price: "50001", size: "1", orders: 1 }]);
  });
});

describe("HyperliquidAdapter metadata", () => {
  it("serves summaries from one metaAndAssetCtxs snapshot inside the refresh window", async () => {
    let now = 1_700_000_000_000;
    const { adapter, requests } = createAdapter({ clock: () => now });

    const first = await adapter.getMarketSummary("btc");
    for (let i = 0; i < 19; i++) {
      await adapter.getMarketSummary("BTC");
    }

    expect(first._unsafeUnwrap()).toEqual({
      symbol: "BTC",
      markPrice: "50012.0",
      volume24h: "1500000000.5",
      openInterest: "9876.54321",
      fundingRate: "0.0000125",
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toEqual({
      url: "https://api.hyperliquid.xyz/info",
      method: "POST",
      body: { type: "metaAndAssetCtxs" },
    });

    now += 9_999;
    await adapter.getMarketSummary("BTC");
    expect(requests).toHaveLength(1);

    now += 1;
    await adapter.getMarketSummary("BTC");
    expect(requests).toHaveLength(2);
  });

  it("honours a custom summary refresh window", async () => {
    let now = 0;
    const { adapter, requests } = createAdapter({ clock: () => now, summaryRefreshMs: 500 });

    await adapter.getMarketSummary("BTC");
    now = 499;
    await adapter.getMarketSummary("ETH");
    now = 500;
    await adapter.getMarketSummary("BTC");

    expect(requests).toHaveLength(2);
  });

  it("makes no REST calls after shutdown", async () => {
    const { adapter, requests } = createAdapter({ config: { testnet: false, retryAttempts: 3, timeoutMs: 200 } });

    await adapter.shutdown();
    const result = await adapter.getMarketSummary("BTC");

    expect(result._unsafeUnwrapErr()).toEqual({ type: "transient", message: "request cancelled: operation aborted" });
    expect(requests).toHaveLength(0);
  });

  it("maps an unknown coin to not_found", async () => {
    const { adapter } = createAdapter();

    expect((await adapter.getMarketSummary("DOGE"))._unsafeUnwrapErr()).toEqual({
      type: "not_found",
      message: "hyperliquid has no perp DOGE",
    });
  });

  it("reports max leverage from the universe and falls back to 50x", async () => {
    const { adapter, requests } = createAdapter();

    expect(await adapter.getLeverageInfo("BTC")).toEqual({
      venue: "hyperliquid",
      symbol: "BTC",
      maxLeverage: 40,
      source: "metadata",
    });
    expect(await adapter.getLeverageInfo("eth")).toMatchObject({ maxLeverage: 25, source: "metadata" });
    expect(requests).toHaveLength(1);
    expect(await adapter.getLeverageInfo("DOGE")).toEqual({
      venue: "hyperliquid",
      symbol: "DOGE",
      maxLeverage: 50,
      source: "policy",
    });
    expect(requests).toHaveLength(1);
  });

  it("falls back when /info is unreachable", async () => {
    const failing = createFakeFetch(() => {
      throw new TypeError("fetch failed");
    });
    const { adapter } = createAdapter({ fetch: failing.fetch });

    expect(await adapter.getLeverageInfo("BTC")).toMatchObject({ maxLeverage: 50, source: "policy" });
  });

  it("lists listed coins upper-cased", async () => {
    const { adapter } = createAdapter();

    expect((await adapter.getAvailableAssets())._unsafeUnwrap()).toEqual(["BTC", "ETH", "KPEPE"]);
  });
});

describe("HyperliquidAdapter account queries", () => {
  const account = { address: "0x0000000000000000000000000000000000000001" };

  it("requires a configured address", async () => {
    const { adapter } = createAdapter();

    expect((await adapter.getPositions())._unsafeUnwrapErr()).toEqual({
      type: "config_error",
      message: "no hyperliquid address configured",
    });
  });

  it("maps clearinghouse positions and skips flat ones", async () => {
    const fake = createFakeFetch(() =>
      jsonResponse({
        assetPositions: [
          {
            type: "oneWay",
            position: {
              coin: "ETH",
              szi: "-1.5",
              entryPx: "3010.0",
              liquidationPx: "3500.0",
              unrealizedPnl: "12.3",
              marginUsed: "450.0",
              leverage: { type: "cross", value: 10 },
            },
          },
          { type: "oneWay", position: { coin: "BTC", szi: "0.0" } },
        ],
        withdrawable: "1000.0",
      }),
    );
    const { adapter } = createAdapter({ fetch: fake.fetch, account });

    const positions = (await adapter.getPositions())._unsafeUnwrap();

    expect(fake.requests[0]?.body).toEqual({ type: "clearinghouseState", user: account.address });
    expect(positions).toEqual([
      {
        venue: "hyperliquid",
        symbol: "ETH",
        size: "-1.5",
        entryPrice: "3010.0",
        liquidationPrice: "3500.0",
        unrealizedPnl: "12.3",
        marginUsed: "450.0",
        leverage: 10,
      },
    ]);
  });

  it("maps open orders", async () => {
    const fake = createFakeFetch(() =>
      jsonResponse([{ coin: "BTC", limitPx: "49000.0", oid: 91490942, side: "B", sz: "0.01", timestamp: 1 }]),
    );
    const { adapter } = createAdapter({ fetch: fake.fetch, account });

    expect((await adapter.getOpenOrders())._unsafeUnwrap()).toEqual([
      { venue: "hyperliquid", orderId: "91490942", symbol: "BTC", side: "buy", price: "49000.0", size: "0.01", status: "open" },
    ]);
  });
});

describe("HyperliquidAdapter trading", () => {
  class RecordingGateway implements OrderGateway {
    readonly orders: VenueOrder[] = [];

    async submitOrder(order: VenueOrder): Promise<VenueReceipt> {
      this.orders.push(order);
      return { ...order, orderId: String(order.clientId), status: "resting" };
    }

    async cancelOrder(): Promise<void> {}
  }

  it("rounds a limit price to five significant figures", async () => {
    const gateway = new RecordingGateway();
    const { adapter } = createAdapter({ gateway });

    const receipt = await adapter.placeOrder({
      asset: "BTC",
      side: "buy",
      kind: "limit",
      usdValue: "1000",
      limitPrice: "50012.34",
      leverage: 1,
      reduceOnly: false,
    });

    expect(receipt.isOk()).toBe(true);
    expect(gateway.orders[0]).toMatchObject({ price: "50012", size: "0.02000", timeInForce: "gtc", notionalUsd: "1000.24" });
  });

  it("sizes a market buy against the live ask", async () => {
    const gateway = new RecordingGateway();
    const { adapter, server } = createAdapter({ gateway });
    await adapter.startMarketUpdates("BTC");
    const connection = await streaming(adapter, server);
    connection.emitMessage(l2Frame("BTC", [["50011.0", "1", 1]], [["50012.0", "1", 1]]));
    await bookWhere(adapter, "BTC", "50011.0");

    await adapter.placeOrder({ asset: "BTC", side: "buy", kind: "market", usdValue: "100", leverage: 1, reduceOnly: false });

    expect(gateway.orders[0]).toMatchObject({ price: "50012.0", size: "0.00200", timeInForce: "ioc", notionalUsd: "100.02" });
  });

  it("refuses delisted coins", async () => {
    const gateway = new RecordingGateway();
    const { adapter } = createAdapter({ gateway });

    const result = await adapter.placeOrder({
      asset: "OLD",
      side: "sell",
      kind: "limit",
      usdValue: "50",
      limitPrice: "1",
      leverage: 1,
      reduceOnly: false,
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "rejected",
      reason: "venue",
      message: "hyperliquid perp OLD is delisted",
    });
    expect(gateway.orders).toHaveLength(0);
  });
});
