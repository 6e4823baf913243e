import { config } from "dotenv";
import { createPublicClient, http, isAddress, type Address, type Chain, type PublicClient } from "viem";
import { arbitrum, bsc, mainnet } from "viem/chains";
import { z } from "zod";
import { ConfigurationError } from "./hedging/errors.js";
import type { StrategyConfig } from "./hedging/types.js";

config();

export const BINANCE_FAPI_URL = "https://fapi.binance.com";
export const WBNB_BSC = "0xbb4CdB9CBd36B01bD1cBaEBF2De08d9173bc095c" as const;
export const USDT_BSC = "0x55d398326f99059fF775485246999027B3197955" as const;

const CHAINS = { bsc, mainnet, arbitrum } satisfies Record<string, Chain>;

const address = z
  .string()
  .trim()
  .refine((v): v is Address => isAddress(v, { strict: false }), "invalid address");

/** `KEY=` lines in .env arrive as "". Treat them as unset so defaults apply. */
function unsetIfBlank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);
}

const settingsSchema = z.object({
  CHAIN: unsetIfBlank(z.enum(["bsc", "mainnet", "arbitrum"]).default("bsc")),
  RPC_URL: unsetIfBlank(z.string().url().optional()),
  POSITION_MANAGER_ADDRESS: unsetIfBlank(address.optional()),
  OWNER_ADDRESS: unsetIfBlank(address.optional()),
  BASE_TOKEN_ADDRESS: unsetIfBlank(address.default(WBNB_BSC)),
  USDT_TOKEN_ADDRESS: unsetIfBlank(address.default(USDT_BSC)),
  SYMBOL: unsetIfBlank(z.string().trim().min(1).default("BNBUSDC")),
  BASE_LABEL: unsetIfBlank(z.string().trim().min(1).default("BNB")),
  RATIO_THRESHOLD: unsetIfBlank(z.coerce.number().finite().default(0.05)),
  DELTA_THRESHOLD: unsetIfBlank(z.coerce.number().finite().positive().default(0.1)),
  BINANCE_API_KEY: z.string().default(""),
  BINANCE_API_SECRET: z.string().default(""),
  BINANCE_BASE_URL: unsetIfBlank(z.string().url().default(BINANCE_FAPI_URL)),
  TELEGRAM_BOT_TOKEN: z.string().default(""),
  TELEGRAM_CHAT_ID: z.string().default(""),
  POLL_INTERVAL_SECONDS: unsetIfBlank(z.coerce.number().int().positive().default(90)),
});

export type Settings = z.infer<typeof settingsSchema>;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export function toStrategyConfig(settings: Settings): StrategyConfig {
  const ownerAddress = settings.OWNER_ADDRESS;
  const positionManagerAddress = settings.POSITION_MANAGER_ADDRESS;
  if (!ownerAddress || !positionManagerAddress) {
    throw new ConfigurationError("Set OWNER_ADDRESS and POSITION_MANAGER_ADDRESS in .env");
  }
  return {
    ownerAddress,
    positionManagerAddress,
    baseTokenAddress: settings.BASE_TOKEN_ADDRESS,
    usdtTokenAddress: settings.USDT_TOKEN_ADDRESS,
    symbol: settings.SYMBOL,
    ratioThreshold: settings.RATIO_THRESHOLD,
    deltaThreshold: settings.DELTA_THRESHOLD,
  };
}

export function getChain(settings: Pick<Settings, "CHAIN">): Chain {
  return CHAINS[settings.CHAIN];
}

export function getPublicClient(settings: Pick<Settings, "CHAIN" | "RPC_URL">): PublicClient {
  return createPublicClient({
    chain: getChain(settings),
    transport: http(settings.RPC_URL),
  });
}
