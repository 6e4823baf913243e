import { formatUnits } from "viem";
import type {
  AmmPositionRecord,
  CexPosition,
  PositionSnapshot,
  StrategyConfig,
} from "./types.js";
import { MalformedDataError, NotFoundError } from "./errors.js";

/** All AMM token amounts are read as 18-decimal fixed point, whatever the token. */
export const AMM_TOKEN_DECIMALS = 18;

/** Floor for the ratio denominator when both legs are near zero. */
export const RATIO_EPSILON = 1e-8;

const DECIMAL_RE = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

type SnapshotConfig = Pick<StrategyConfig, "symbol" | "baseTokenAddress" | "usdtTokenAddress">;

/**
 * Merge one AMM position and one futures position into a snapshot.
 *
 * Throws NotFoundError when the configured token pair or symbol does not match
 * exactly one record, and MalformedDataError when a venue number fails to parse.
 */
export function buildSnapshot(
  ammPositions: ReadonlyMap<bigint, AmmPositionRecord>,
  cexPositions: readonly CexPosition[],
  cfg: SnapshotConfig,
  blockNumber: bigint
): PositionSnapshot {
  // ── AMM leg ──
  const position = selectAmmPosition(ammPositions, cfg);
  const baseIsToken0 = sameAddress(position.token0, cfg.baseTokenAddress);

  const [baseRaw, usdtRaw] = baseIsToken0
    ? [position.withdrawable0, position.withdrawable1]
    : [position.withdrawable1, position.withdrawable0];
  const [collectableBaseRaw, collectableUsdtRaw] = baseIsToken0
    ? [position.collectable0, position.collectable1]
    : [position.collectable1, position.collectable0];

  const ammBaseAmount = fromFixed(baseRaw);
  const ammUsdtAmount = fromFixed(usdtRaw);
  const ammCollectableBase = fromFixed(collectableBaseRaw);
  const ammCollectableUsdt = fromFixed(collectableUsdtRaw);

  // ── Futures leg ──
  const futures = selectCexPosition(cexPositions, cfg.symbol);
  const futuresPosition = parseDecimal("positionAmt", futures.positionAmt);
  const unrealizedPnl = parseDecimal("unrealizedPnl", futures.unrealizedPnl);
  const basePriceUsdt = parseDecimal("markPrice", futures.markPrice);

  // ── Metrics ──
  const baseDelta = ammBaseAmount + futuresPosition;
  const baseDeltaRatio = deltaRatio(ammBaseAmount, futuresPosition);
  const ammTotalValueUsdt = ammBaseAmount * basePriceUsdt + ammUsdtAmount;
  const ammCollectableValueUsdt = ammCollectableBase * basePriceUsdt + ammCollectableUsdt;
  const totalValueUsdt = ammTotalValueUsdt + unrealizedPnl;

  return Object.freeze({
    blockNumber,
    symbol: cfg.symbol,
    ammBaseAmount,
    ammUsdtAmount,
    ammCollectableBase,
    ammCollectableUsdt,
    ammCollectableValueUsdt,
    futuresPosition,
    unrealizedPnl,
    futuresTimestamp: futures.updateTime,
    basePriceUsdt,
    baseDelta,
    baseDeltaRatio,
    ammTotalValueUsdt,
    totalValueUsdt,
  });
}

/**
 * Net exposure normalized by the larger leg: (a + p) / max(|a|, |p|, 1e-8).
 */
export function deltaRatio(ammBase: number, futuresPosition: number): number {
  const reference = Math.max(Math.abs(ammBase), Math.abs(futuresPosition), RATIO_EPSILON);
  return (ammBase + futuresPosition) / reference;
}

/** Strict decimal-string parse. Empty, partial or non-finite input is rejected. */
export function parseDecimal(field: string, value: string): number {
  const trimmed = value.trim();
  if (!DECIMAL_RE.test(trimmed)) {
    throw new MalformedDataError(field, value);
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new MalformedDataError(field, value);
  }
  return parsed;
}

export function fromFixed(raw: bigint): number {
  return Number(formatUnits(raw, AMM_TOKEN_DECIMALS));
}

function selectAmmPosition(
  positions: ReadonlyMap<bigint, AmmPositionRecord>,
  cfg: SnapshotConfig
): AmmPositionRecord {
  const matches = Array.from(positions.values()).filter(
    (p) =>
      (sameAddress(p.token0, cfg.baseTokenAddress) && sameAddress(p.token1, cfg.usdtTokenAddress)) ||
      (sameAddress(p.token0, cfg.usdtTokenAddress) && sameAddress(p.token1, cfg.baseTokenAddress))
  );

  if (matches.length === 0) {
    throw new NotFoundError(
      `No matching AMM position found for base_token=${cfg.baseTokenAddress} and usdt_token=${cfg.usdtTokenAddress}`
    );
  }
  if (matches.length > 1) {
    const ids = matches.map((p) => p.tokenId.toString()).join(", ");
    throw new NotFoundError(
      `Ambiguous AMM position: ${matches.length} positions match the token pair (token ids ${ids})`
    );
  }
  return matches[0];
}

function selectCexPosition(positions: readonly CexPosition[], symbol: string): CexPosition {
  const matches = positions.filter((p) => p.symbol === symbol);
  if (matches.length === 0) {
    throw new NotFoundError(`No matching futures position found for symbol=${symbol}`);
  }
  if (matches.length > 1) {
    throw new NotFoundError(
      `Ambiguous futures position: ${matches.length} entries for symbol=${symbol}`
    );
  }
  return matches[0];
}

function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
