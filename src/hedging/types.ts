import type { Address } from "viem";

// ─── Venue records ───

export interface AmmPositionRecord {
  tokenId: bigint;
  token0: Address;
  token1: Address;
  liquidity: bigint;
  withdrawable0: bigint;  // raw, 18 decimals
  withdrawable1: bigint;
  collectable0: bigint;   // uncollected fees, raw
  collectable1: bigint;
}

/** Futures position as reported by the venue. Numeric fields stay decimal strings. */
export interface CexPosition {
  symbol: string;
  positionAmt: string;
  markPrice: string;
  unrealizedPnl: string;
  updateTime: number;
}

export interface OrderResult {
  orderId: number;
  symbol: string;
  status: string;
  side: "BUY" | "SELL";
  price: string;
  origQty: string;
  reduceOnly: boolean;
}

// ─── Strategy ───

export interface StrategyConfig {
  ownerAddress: Address;
  positionManagerAddress: Address;
  baseTokenAddress: Address;
  usdtTokenAddress: Address;
  symbol: string;
  ratioThreshold: number;  // n
  deltaThreshold: number;  // m, also the order-size step
}

export interface PositionSnapshot {
  readonly blockNumber: bigint;
  readonly symbol: string;
  readonly ammBaseAmount: number;
  readonly ammUsdtAmount: number;
  readonly ammCollectableBase: number;
  readonly ammCollectableUsdt: number;
  readonly ammCollectableValueUsdt: number;
  readonly futuresPosition: number;     // positive = long, negative = short
  readonly unrealizedPnl: number;
  readonly futuresTimestamp: number;    // epoch ms
  readonly basePriceUsdt: number;
  readonly baseDelta: number;
  readonly baseDeltaRatio: number;
  readonly ammTotalValueUsdt: number;
  readonly totalValueUsdt: number;
}

export type RebalanceAction =
  | { kind: "none" }
  | { kind: "increase"; quantity: string }
  | { kind: "decrease"; quantity: string };

export interface CycleResult {
  snapshot: PositionSnapshot;
  action: RebalanceAction;
  order: OrderResult | null;
  message: string;
}

// ─── Collaborators ───

export interface AmmPositionSource {
  sync(owner: Address): Promise<void>;
  positions(): ReadonlyMap<bigint, AmmPositionRecord>;
  /** Height the last `sync` read at. */
  currentBlock(): Promise<bigint>;
}

export interface FuturesPositionSource {
  getPosition(symbol: string): Promise<CexPosition[]>;
}

export interface FuturesOrderSink {
  openSell(symbol: string, quantity: string): Promise<OrderResult>;
  /** Reduce-only. */
  closeSell(symbol: string, quantity: string): Promise<OrderResult>;
}

export interface Notifier {
  push(text: string): Promise<void>;
}
