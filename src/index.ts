#!/usr/bin/env node
import { Command } from "commander";
import { isAddress } from "viem";
import { errorMessage, isHedgeError } from "./hedging/errors.js";

const program = new Command();

program
  .name("lp-hedge")
  .description("Monitor and rebalance a Uniswap V3 LP position hedged with a Binance perp short")
  .version("0.1.0");

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`Expected a positive integer, got "${value}"`);
  return n;
}

async function buildStrategy(opts: { label?: string; dryRun?: boolean; notify: boolean }) {
  const { loadSettings, toStrategyConfig, getPublicClient } = await import("./config.js");
  const { UniswapV3PositionManager } = await import("./uniswap.js");
  const { BinancePerpsClient } = await import("./binance.js");
  const { createNotifier } = await import("./notify.js");
  const { HedgeStrategy } = await import("./hedging/engine.js");

  const settings = loadSettings();
  const config = toStrategyConfig(settings);
  const binance = new BinancePerpsClient({
    apiKey: settings.BINANCE_API_KEY,
    apiSecret: settings.BINANCE_API_SECRET,
    baseUrl: settings.BINANCE_BASE_URL,
  });
  const amm = new UniswapV3PositionManager(config.positionManagerAddress, getPublicClient(settings));

  const strategy = new HedgeStrategy(
    config,
    {
      amm,
      futures: binance,
      orders: binance,
      notifier: opts.notify
        ? createNotifier(settings.TELEGRAM_BOT_TOKEN, settings.TELEGRAM_CHAT_ID)
        : undefined,
    },
    { label: opts.label ?? settings.BASE_LABEL, dryRun: opts.dryRun }
  );
  return { settings, strategy };
}

function stopSignal(): AbortSignal {
  const controller = new AbortController();
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.once(sig, () => {
      console.log(`\n[lp-hedge] ${sig} received, stopping after the current cycle`);
      controller.abort();
    });
  }
  return controller.signal;
}

// --- Strategy commands ---

program
  .command("status")
  .description("Read both venues once and print the snapshot")
  .option("--label <asset>", "Base asset name used in the message")
  .action(async (opts: { label?: string }) => {
    const { printJson } = await import("./utils.js");
    const { strategy } = await buildStrategy({ label: opts.label, notify: false });
    const snapshot = await strategy.status();
    printJson("Snapshot", snapshot);
    console.log(`\n${strategy.format(snapshot)}`);
  });

program
  .command("monitor")
  .description("Poll both venues and push a status message every cycle (no orders)")
  .option("--interval <seconds>", "Seconds between cycles", parsePositive)
  .option("--label <asset>", "Base asset name used in the message")
  .option("--max-cycles <n>", "Stop after n cycles", parsePositive)
  .action(async (opts: { interval?: number; label?: string; maxCycles?: number }) => {
    const { runPolling } = await import("./scheduler.js");
    const { createNotifier } = await import("./notify.js");
    const { settings, strategy } = await buildStrategy({ label: opts.label, notify: false });
    const notifier = createNotifier(settings.TELEGRAM_BOT_TOKEN, settings.TELEGRAM_CHAT_ID);
    const intervalSec = opts.interval ?? settings.POLL_INTERVAL_SECONDS;

    console.log(`[lp-hedge] Monitoring ${strategy.symbol} every ${intervalSec}s`);
    await runPolling(
      async () => {
        const snapshot = await strategy.status();
        await notifier.push(strategy.format(snapshot));
      },
      { intervalMs: intervalSec * 1000, maxCycles: opts.maxCycles, signal: stopSignal() }
    );
  });

program
  .command("run")
  .description("Poll both venues, rebalance the futures leg and push a status message every cycle")
  .option("--interval <seconds>", "Seconds between cycles", parsePositive)
  .option("--label <asset>", "Base asset name used in the message")
  .option("--max-cycles <n>", "Stop after n cycles", parsePositive)
  .option("--dry-run", "Decide and log, but do not send orders")
  .action(
    async (opts: { interval?: number; label?: string; maxCycles?: number; dryRun?: boolean }) => {
      const { runPolling } = await import("./scheduler.js");
      const { settings, strategy } = await buildStrategy({
        label: opts.label,
        dryRun: opts.dryRun,
        notify: true,
      });
      const intervalSec = opts.interval ?? settings.POLL_INTERVAL_SECONDS;

      console.log(
        `[lp-hedge] Running ${strategy.symbol} every ${intervalSec}s` +
          ` (n=${settings.RATIO_THRESHOLD}, m=${settings.DELTA_THRESHOLD}${opts.dryRun ? ", dry run" : ""})`
      );
      await runPolling(
        async () => {
          const result = await strategy.runCycle();
          const a = result.action;
          console.log(
            `[lp-hedge] block ${result.snapshot.blockNumber}: delta ${result.snapshot.baseDelta.toFixed(4)}, ` +
              `ratio ${(result.snapshot.baseDeltaRatio * 100).toFixed(2)}% → ${a.kind === "none" ? "no action" : `${a.kind} ${a.quantity}`}`
          );
        },
        { intervalMs: intervalSec * 1000, maxCycles: opts.maxCycles, signal: stopSignal() }
      );
    }
  );

// --- Venue commands ---

program
  .command("positions <owner>")
  .description("List every Uniswap V3 position of an owner")
  .action(async (owner: string) => {
    if (!isAddress(owner, { strict: false })) throw new Error(`Invalid owner address: ${owner}`);
    const { loadSettings, getPublicClient } = await import("./config.js");
    const { UniswapV3PositionManager } = await import("./uniswap.js");
    const { formatAmount18 } = await import("./utils.js");

    const settings = loadSettings();
    const contract = settings.POSITION_MANAGER_ADDRESS;
    if (!contract) throw new Error("Set POSITION_MANAGER_ADDRESS in .env");

    const manager = new UniswapV3PositionManager(contract, getPublicClient(settings));
    await manager.sync(owner);

    const positions = manager.positions();
    console.log(`Owner: ${owner} | Positions: ${positions.size}`);
    for (const [tokenId, pos] of positions) {
      console.log("---");
      console.log(`  token_id:      ${tokenId}`);
      console.log(`  token0:        ${pos.token0}`);
      console.log(`  token1:        ${pos.token1}`);
      console.log(`  liquidity:     ${pos.liquidity}`);
      console.log(`  withdrawable0: ${formatAmount18(pos.withdrawable0)}`);
      console.log(`  withdrawable1: ${formatAmount18(pos.withdrawable1)}`);
      console.log(`  collectable0:  ${formatAmount18(pos.collectable0)}`);
      console.log(`  collectable1:  ${formatAmount18(pos.collectable1)}`);
    }
  });

async function getBinance() {
  const { loadSettings } = await import("./config.js");
  const { BinancePerpsClient } = await import("./binance.js");
  const settings = loadSettings();
  if (!settings.BINANCE_API_KEY || !settings.BINANCE_API_SECRET) {
    throw new Error("Set BINANCE_API_KEY and BINANCE_API_SECRET in .env");
  }
  return new BinancePerpsClient({
    apiKey: settings.BINANCE_API_KEY,
    apiSecret: settings.BINANCE_API_SECRET,
    baseUrl: settings.BINANCE_BASE_URL,
  });
}

program
  .command("open-sell <symbol> <quantity>")
  .description("Place a limit sell at the best ask (open or add to a short)")
  .action(async (symbol: string, quantity: string) => {
    const { printJson } = await import("./utils.js");
    const binance = await getBinance();
    printJson("Order", await binance.openSell(symbol.toUpperCase(), quantity));
  });

program
  .command("close-sell <symbol> <quantity>")
  .description("Place a reduce-only limit buy at the best bid (reduce a short)")
  .action(async (symbol: string, quantity: string) => {
    const { printJson } = await import("./utils.js");
    const binance = await getBinance();
    printJson("Order", await binance.closeSell(symbol.toUpperCase(), quantity));
  });

program
  .command("funding <symbol>")
  .description("Show recent funding rates for a perp symbol")
  .option("--limit <n>", "Number of funding periods", parsePositive, 10)
  .action(async (symbol: string, opts: { limit: number }) => {
    const { loadSettings } = await import("./config.js");
    const { BinancePerpsClient } = await import("./binance.js");
    const { formatTimestamp } = await import("./utils.js");

    const settings = loadSettings();
    const binance = new BinancePerpsClient({
      apiKey: settings.BINANCE_API_KEY,
      apiSecret: settings.BINANCE_API_SECRET,
      baseUrl: settings.BINANCE_BASE_URL,
    });
    const rates = await binance.getFundingRates(symbol.toUpperCase(), opts.limit);
    for (const rate of rates) {
      console.log(`Symbol:       ${rate.symbol}`);
      console.log(`Funding time: ${formatTimestamp(rate.fundingTime)}`);
      console.log(`Funding rate: ${rate.fundingRate}`);
      console.log(`Mark price:   ${rate.markPrice}`);
      console.log("---");
    }
  });

program.parseAsync().catch((err: unknown) => {
  const kind = isHedgeError(err) ? ` [${err.kind}]` : "";
  console.error(`Error${kind}: ${errorMessage(err)}`);
  process.exit(1);
});
