import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { parseUnits, type Address } from "viem";
import { HedgeStrategy, validateStrategyConfig } from "./engine.js";
import { CollaboratorFailure, ConfigurationError, NotFoundError } from "./errors.js";
import type {
  AmmPositionRecord,
  AmmPositionSource,
  CexPosition,
  FuturesOrderSink,
  FuturesPositionSource,
  Notifier,
  OrderResult,
  StrategyConfig,
} from "./types.js";

const OWNER: Address = "0x00000000000000000000000000000000000000aa";
const MANAGER: Address = "0x00000000000000000000000000000000000000bb";
const BASE: Address = "0x1111111111111111111111111111111111111111";
const USDT: Address = "0x2222222222222222222222222222222222222222";

const config: StrategyConfig = {
  ownerAddress: OWNER,
  positionManagerAddress: MANAGER,
  baseTokenAddress: BASE,
  usdtTokenAddress: USDT,
  symbol: "BNBUSDC",
  ratioThreshold: 0.05,
  deltaThreshold: 0.1,
};

const units = (v: string) => parseUnits(v, 18);

function lpPosition(base: string, usdt: string): AmmPositionRecord {
  return {
    tokenId: 7n,
    token0: BASE,
    token1: USDT,
    liquidity: 1n,
    withdrawable0: units(base),
    withdrawable1: units(usdt),
    collectable0: 0n,
    collectable1: 0n,
  };
}

function perp(positionAmt: string): CexPosition {
  return {
    symbol: "BNBUSDC",
    positionAmt,
    markPrice: "600",
    unrealizedPnl: "0",
    updateTime: 1_700_000_000_000,
  };
}

function order(side: "BUY" | "SELL", quantity: string): OrderResult {
  return {
    orderId: 1,
    symbol: "BNBUSDC",
    status: "NEW",
    side,
    price: "600.1",
    origQty: quantity,
    reduceOnly: side === "BUY",
  };
}

const calls: string[] = [];

function makeFakes(lp: AmmPositionRecord[], cex: CexPosition[]) {
  const amm = {
    sync: vi.fn(async (owner: Address) => {
      calls.push(`amm.sync ${owner}`);
    }),
    positions: vi.fn(() => {
      calls.push("amm.positions");
      return new Map(lp.map((p) => [p.tokenId, p]));
    }),
    currentBlock: vi.fn(async () => {
      calls.push("amm.currentBlock");
      return 500n;
    }),
  } satisfies AmmPositionSource;
  const futures = {
    getPosition: vi.fn(async (symbol: string) => {
      calls.push(`futures.getPosition ${symbol}`);
      return cex;
    }),
  } satisfies FuturesPositionSource;
  const orders = {
    openSell: vi.fn(async (_symbol: string, quantity: string) => order("SELL", quantity)),
    closeSell: vi.fn(async (_symbol: string, quantity: string) => order("BUY", quantity)),
  } satisfies FuturesOrderSink;
  const notifier = {
    push: vi.fn(async (_text: string) => {}),
  } satisfies Notifier;
  return { amm, futures, orders, notifier };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a rejection");
}

describe("HedgeStrategy", () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    calls.length = 0;
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("reads the venues in order and builds the snapshot", async () => {
    const fakes = makeFakes([lpPosition("12", "3000")], [perp("-5")]);
    const strategy = new HedgeStrategy(config, fakes);

    const snap = await strategy.status();

    expect(calls).toEqual([
      `amm.sync ${OWNER}`,
      "amm.positions",
      "amm.currentBlock",
      "futures.getPosition BNBUSDC",
    ]);
    expect(snap.blockNumber).toBe(500n);
    expect(snap.baseDelta).toBe(7);
    expect(snap.totalValueUsdt).toBe(10_200);
  });

  it("opens a sell when under-hedged and notifies", async () => {
    const fakes = makeFakes([lpPosition("12", "3000")], [perp("-5")]);
    const strategy = new HedgeStrategy(config, fakes, { label: "BNB" });

    const result = await strategy.runCycle();

    expect(result.action).toEqual({ kind: "increase", quantity: "7.0" });
    expect(fakes.orders.openSell).toHaveBeenCalledWith("BNBUSDC", "7.0");
    expect(fakes.orders.closeSell).not.toHaveBeenCalled();
    expect(result.order).toEqual(order("SELL", "7.0"));
    expect(fakes.notifier.push).toHaveBeenCalledTimes(1);
    expect(fakes.notifier.push).toHaveBeenCalledWith(result.message);
    expect(result.message.split("\n")[0]).toBe("[BNBUSDC] block 500");
    expect(log).toHaveBeenCalledWith(
      "[hedge:BNBUSDC] OPEN SELL 7.0 (delta 7.0000, ratio 0.5833)"
    );
    expect(log).toHaveBeenCalledWith("[hedge:BNBUSDC] Order 1 NEW: SELL 7.0 @ 600.1");
  });

  it("closes part of the short when over-hedged under a negative threshold", async () => {
    const fakes = makeFakes([lpPosition("3", "3000")], [perp("-10")]);
    const strategy = new HedgeStrategy({ ...config, ratioThreshold: -1 }, fakes);

    const result = await strategy.runCycle();

    expect(result.action).toEqual({ kind: "decrease", quantity: "7.0" });
    expect(fakes.orders.closeSell).toHaveBeenCalledWith("BNBUSDC", "7.0");
    expect(fakes.orders.openSell).not.toHaveBeenCalled();
    expect(result.order?.side).toBe("BUY");
  });

  it("leaves a hedged position alone but still notifies", async () => {
    const fakes = makeFakes([lpPosition("10", "3000")], [perp("-10")]);
    const strategy = new HedgeStrategy(config, fakes);

    const result = await strategy.runCycle();

    expect(result.action).toEqual({ kind: "none" });
    expect(result.order).toBeNull();
    expect(fakes.orders.openSell).not.toHaveBeenCalled();
    expect(fakes.orders.closeSell).not.toHaveBeenCalled();
    expect(fakes.notifier.push).toHaveBeenCalledTimes(1);
  });

  it("logs instead of ordering in dry-run mode", async () => {
    const fakes = makeFakes([lpPosition("12", "3000")], [perp("-5")]);
    const strategy = new HedgeStrategy(config, fakes, { dryRun: true });

    const result = await strategy.runCycle();

    expect(result.action).toEqual({ kind: "increase", quantity: "7.0" });
    expect(result.order).toBeNull();
    expect(fakes.orders.openSell).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith(
      "[hedge:BNBUSDC] [dry-run] OPEN SELL 7.0 (delta 7.0000, ratio 0.5833)"
    );
    expect(fakes.notifier.push).toHaveBeenCalledTimes(1);
  });

  it("runs without a notifier", async () => {
    const { amm, futures, orders } = makeFakes([lpPosition("12", "3000")], [perp("-5")]);
    const strategy = new HedgeStrategy(config, { amm, futures, orders });
    const result = await strategy.runCycle();
    expect(result.message).toContain("Delta: 7.0000 BNBUSDC (58.33%)");
  });

  it("stops before ordering or notifying when no futures position matches", async () => {
    const fakes = makeFakes([lpPosition("12", "3000")], []);
    const strategy = new HedgeStrategy(config, fakes);

    await expect(strategy.runCycle()).rejects.toThrow(NotFoundError);
    expect(fakes.orders.openSell).not.toHaveBeenCalled();
    expect(fakes.notifier.push).not.toHaveBeenCalled();
  });

  it("wraps a failed venue call with the operation and cause", async () => {
    const fakes = makeFakes([lpPosition("12", "3000")], [perp("-5")]);
    const cause = new Error("rpc down");
    fakes.amm.currentBlock.mockRejectedValueOnce(cause);
    const strategy = new HedgeStrategy(config, fakes);

    const err = await rejection(strategy.runCycle());

    if (!(err instanceof CollaboratorFailure)) throw err;
    expect(err.operation).toBe("amm.currentBlock");
    expect(err.cause).toBe(cause);
    expect(err.message).toBe("amm.currentBlock failed: rpc down");
    expect(fakes.futures.getPosition).not.toHaveBeenCalled();
  });

  it("does not notify when the order is rejected", async () => {
    const fakes = makeFakes([lpPosition("12", "3000")], [perp("-5")]);
    fakes.orders.openSell.mockRejectedValueOnce(new Error("Binance API error 400: margin"));
    const strategy = new HedgeStrategy(config, fakes);

    const err = await rejection(strategy.runCycle());

    if (!(err instanceof CollaboratorFailure)) throw err;
    expect(err.operation).toBe("orders.openSell");
    expect(fakes.notifier.push).not.toHaveBeenCalled();
  });

  it("reports a failed push", async () => {
    const fakes = makeFakes([lpPosition("12", "3000")], [perp("-5")]);
    fakes.notifier.push.mockRejectedValueOnce(new Error("chat not found"));
    const strategy = new HedgeStrategy(config, fakes);

    await expect(strategy.runCycle()).rejects.toThrow("notifier.push failed: chat not found");
    expect(fakes.orders.openSell).toHaveBeenCalledTimes(1);
  });

  it("exposes the symbol", () => {
    const strategy = new HedgeStrategy(config, makeFakes([], []));
    expect(strategy.symbol).toBe("BNBUSDC");
  });
});

describe("validateStrategyConfig", () => {
  it("accepts a valid config", () => {
    expect(() => validateStrategyConfig(config)).not.toThrow();
  });

  const invalid: Array<[string, Partial<StrategyConfig>, string]> = [
    ["a zero step", { deltaThreshold: 0 }, "deltaThreshold must be a positive number, got 0"],
    ["a negative step", { deltaThreshold: -0.1 }, "deltaThreshold must be a positive number, got -0.1"],
    ["a NaN ratio", { ratioThreshold: Number.NaN }, "ratioThreshold must be finite, got NaN"],
    ["an empty symbol", { symbol: " " }, "symbol must not be empty"],
    ["identical tokens", { usdtTokenAddress: BASE }, "baseTokenAddress and usdtTokenAddress must differ"],
  ];

  it.each(invalid)("rejects %s", (_name, overrides, message) => {
    expect(() => validateStrategyConfig({ ...config, ...overrides })).toThrow(message);
    expect(() => validateStrategyConfig({ ...config, ...overrides })).toThrow(ConfigurationError);
  });

  it("is applied by the constructor", () => {
    expect(() => new HedgeStrategy({ ...config, deltaThreshold: 0 }, makeFakes([], []))).toThrow(
      ConfigurationError
    );
  });
});
