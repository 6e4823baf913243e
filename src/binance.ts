import { createHmac } from "node:crypto";
import { z } from "zod";
import { BINANCE_FAPI_URL } from "./config.js";
import type {
  CexPosition,
  FuturesOrderSink,
  FuturesPositionSource,
  OrderResult,
} from "./hedging/types.js";

const RECV_WINDOW_MS = "5000";

export type HttpMethod = "GET" | "POST" | "DELETE";
export type Params = Record<string, string>;

export interface BinancePerpsClientConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl?: string;
}

// ─── Response schemas ───
// Binance encodes numbers as strings; they are kept as strings here.

const positionRiskSchema = z.array(
  z.object({
    symbol: z.string(),
    positionSide: z.string().optional(),
    positionAmt: z.string(),
    entryPrice: z.string(),
    markPrice: z.string(),
    unRealizedProfit: z.string(),
    liquidationPrice: z.string().optional(),
    notional: z.string().optional(),
    updateTime: z.number(),
  })
);

const bookTickerSchema = z.object({
  symbol: z.string(),
  bidPrice: z.string(),
  bidQty: z.string(),
  askPrice: z.string(),
  askQty: z.string(),
  time: z.number().optional(),
});

const orderSchema = z.object({
  orderId: z.number(),
  symbol: z.string(),
  status: z.string(),
  side: z.enum(["BUY", "SELL"]),
  price: z.string(),
  origQty: z.string(),
  reduceOnly: z.boolean(),
});

const fundingRateSchema = z.array(
  z.object({
    symbol: z.string(),
    fundingTime: z.number(),
    fundingRate: z.string(),
    markPrice: z.string(),
  })
);

export type BookTicker = z.infer<typeof bookTickerSchema>;
export type FundingRate = z.infer<typeof fundingRateSchema>[number];

// ─── Signing ───

export function buildQuery(params: Params): string {
  return new URLSearchParams(params).toString();
}

/** HMAC-SHA256(secret, query) as lowercase hex. */
export function signQuery(apiSecret: string, query: string): string {
  return createHmac("sha256", apiSecret).update(query).digest("hex");
}

/** Query string with `signature` appended last. */
export function signParams(apiSecret: string, params: Params): string {
  const query = buildQuery(params);
  return `${query}&signature=${signQuery(apiSecret, query)}`;
}

/**
 * Client for Binance USDⓈ-M perpetual futures.
 * Orders are plain limit orders at the top of book; nothing tracks their fills.
 */
export class BinancePerpsClient implements FuturesPositionSource, FuturesOrderSink {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly baseUrl: string;

  constructor(config: BinancePerpsClientConfig) {
    this.apiKey = config.apiKey;
    this.apiSecret = config.apiSecret;
    this.baseUrl = config.baseUrl ?? BINANCE_FAPI_URL;
  }

  async getPosition(symbol: string): Promise<CexPosition[]> {
    const data = await this.signedRequest("GET", "/fapi/v3/positionRisk", { symbol });
    return positionRiskSchema.parse(data).map((p) => ({
      symbol: p.symbol,
      positionAmt: p.positionAmt,
      markPrice: p.markPrice,
      unrealizedPnl: p.unRealizedProfit,
      updateTime: p.updateTime,
    }));
  }

  async getBookTicker(symbol: string): Promise<BookTicker> {
    const data = await this.publicRequest("/fapi/v1/ticker/bookTicker", { symbol });
    return bookTickerSchema.parse(data);
  }

  /** Limit sell at the best ask: opens or adds to a short. */
  async openSell(symbol: string, quantity: string): Promise<OrderResult> {
    const book = await this.getBookTicker(symbol);
    return this.placeOrder({
      symbol,
      side: "SELL",
      type: "LIMIT",
      timeInForce: "GTC",
      price: book.askPrice,
      quantity,
    });
  }

  /** Reduce-only limit buy at the best bid: shrinks an existing short. */
  async closeSell(symbol: string, quantity: string): Promise<OrderResult> {
    const book = await this.getBookTicker(symbol);
    return this.placeOrder({
      symbol,
      side: "BUY",
      type: "LIMIT",
      timeInForce: "GTC",
      price: book.bidPrice,
      quantity,
      reduceOnly: "true",
    });
  }

  async getFundingRates(symbol: string, limit = 10): Promise<FundingRate[]> {
    const data = await this.publicRequest("/fapi/v1/fundingRate", {
      symbol,
      limit: String(limit),
    });
    return fundingRateSchema.parse(data);
  }

  private async placeOrder(params: Params): Promise<OrderResult> {
    const data = await this.signedRequest("POST", "/fapi/v1/order", params);
    const order = orderSchema.parse(data);
    console.log(
      `[binance] ${order.side} ${order.origQty} ${order.symbol} @ ${order.price} → #${order.orderId} ${order.status}`
    );
    return order;
  }

  /**
   * Signed USDⓈ-M request. `timestamp` and `recvWindow` are added when missing.
   * GET and DELETE carry the query in the URL, POST in a form-encoded body.
   */
  async signedRequest(method: HttpMethod, path: string, params: Params = {}): Promise<unknown> {
    const full: Params = {
      timestamp: String(Date.now()),
      recvWindow: RECV_WINDOW_MS,
      ...params,
    };
    const signed = signParams(this.apiSecret, full);

    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { "X-MBX-APIKEY": this.apiKey };
    const init: RequestInit =
      method === "POST"
        ? {
            method,
            headers: { ...headers, "Content-Type": "application/x-www-form-urlencoded" },
            body: signed,
          }
        : { method, headers };

    return fetchJson(method === "POST" ? url : `${url}?${signed}`, init);
  }

  private async publicRequest(path: string, params: Params): Promise<unknown> {
    return fetchJson(`${this.baseUrl}${path}?${buildQuery(params)}`);
  }
}

async function fetchJson(url: string, init?: RequestInit): Promise<unknown> {
  const res = await fetch(url, init);
  if (!res.ok) {
    const body = await res.text();
    throw new Error(`Binance API error ${res.status}: ${body}`);
  }
  return res.json();
}
