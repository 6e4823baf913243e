import type { PositionSnapshot } from "./types.js";

/** Pre-formatted figures handed to a template. Amounts have 4 decimals, the ratio 2. */
export interface MessageParams {
  label: string;
  symbol: string;
  blockNumber: string;
  baseAmount: string;
  baseValueUsdt: string;
  futuresPosition: string;
  baseDelta: string;
  ratioPercent: string;
  unrealizedPnl: string;
  totalValueUsdt: string;
  collectableBase: string;
  collectableBaseValueUsdt: string;
  collectableUsdt: string;
  collectableValueUsdt: string;
}

export type MessageTemplate = (params: MessageParams) => string;

export const defaultTemplate: MessageTemplate = (p) =>
  [
    `[${p.symbol}] block ${p.blockNumber}`,
    `${p.label} holding: ${p.baseAmount} ${p.label} (${p.baseValueUsdt} USDT)`,
    `Futures position: ${p.futuresPosition} ${p.label}`,
    `Delta: ${p.baseDelta} ${p.label} (${p.ratioPercent}%)`,
    `Unrealized PnL: ${p.unrealizedPnl} USDT`,
    `Total value: ${p.totalValueUsdt} USDT`,
    `Collectable: ${p.collectableBase} ${p.label} (${p.collectableBaseValueUsdt} USDT) + ${p.collectableUsdt} USDT = ${p.collectableValueUsdt} USDT`,
  ].join("\n");

export function messageParams(snapshot: PositionSnapshot, label: string): MessageParams {
  return {
    label,
    symbol: snapshot.symbol,
    blockNumber: snapshot.blockNumber.toString(),
    baseAmount: fmt(snapshot.ammBaseAmount),
    baseValueUsdt: fmt(snapshot.ammBaseAmount * snapshot.basePriceUsdt),
    futuresPosition: fmt(snapshot.futuresPosition),
    baseDelta: fmt(snapshot.baseDelta),
    ratioPercent: (snapshot.baseDeltaRatio * 100).toFixed(2),
    unrealizedPnl: fmt(snapshot.unrealizedPnl),
    totalValueUsdt: fmt(snapshot.totalValueUsdt),
    collectableBase: fmt(snapshot.ammCollectableBase),
    collectableBaseValueUsdt: fmt(snapshot.ammCollectableBase * snapshot.basePriceUsdt),
    collectableUsdt: fmt(snapshot.ammCollectableUsdt),
    collectableValueUsdt: fmt(snapshot.ammCollectableValueUsdt),
  };
}

export function formatSnapshot(
  snapshot: PositionSnapshot,
  label: string,
  template: MessageTemplate = defaultTemplate
): string {
  return template(messageParams(snapshot, label));
}

function fmt(n: number): string {
  return n.toFixed(4);
}
