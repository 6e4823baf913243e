import { formatUnits } from "viem";
import { AMM_TOKEN_DECIMALS } from "./hedging/snapshot.js";

export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().replace("T", " ").replace(/\.\d{3}Z$/, " UTC");
}

/** Exact decimal rendering of a raw 18-decimal amount. */
export function formatAmount18(raw: bigint): string {
  return formatUnits(raw, AMM_TOKEN_DECIMALS);
}

export function shortAddr(a: string): string {
  return a.length > 14 ? a.slice(0, 6) + ".." + a.slice(-4) : a;
}

/** JSON with bigints written as decimal strings. */
export function toJson(data: unknown): string {
  return JSON.stringify(data, (_key, value) => (typeof value === "bigint" ? value.toString() : value), 2);
}

export function printJson(label: string, data: unknown) {
  console.log(`\n${label}:`);
  console.log(toJson(data));
}
