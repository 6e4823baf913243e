import { isAddress } from "viem";
import type {
  AmmPositionSource,
  CycleResult,
  FuturesOrderSink,
  FuturesPositionSource,
  Notifier,
  OrderResult,
  PositionSnapshot,
  RebalanceAction,
  StrategyConfig,
} from "./types.js";
import { CollaboratorFailure, ConfigurationError } from "./errors.js";
import { buildSnapshot } from "./snapshot.js";
import { decide } from "./rebalance.js";
import { formatSnapshot, type MessageTemplate } from "./message.js";

export interface HedgeCollaborators {
  amm: AmmPositionSource;
  futures: FuturesPositionSource;
  orders: FuturesOrderSink;
  notifier?: Notifier;
}

export interface HedgeStrategyOptions {
  /** Decide and log, but never send orders. */
  dryRun?: boolean;
  /** Base asset name used in status messages. Defaults to the symbol. */
  label?: string;
  template?: MessageTemplate;
}

export interface ExecuteResult {
  action: RebalanceAction;
  order: OrderResult | null;
}

/** Rejects configs the decision rule cannot work with. */
export function validateStrategyConfig(cfg: StrategyConfig): void {
  if (!Number.isFinite(cfg.deltaThreshold) || cfg.deltaThreshold <= 0) {
    throw new ConfigurationError(
      `deltaThreshold must be a positive number, got ${cfg.deltaThreshold}`
    );
  }
  if (!Number.isFinite(cfg.ratioThreshold)) {
    throw new ConfigurationError(`ratioThreshold must be finite, got ${cfg.ratioThreshold}`);
  }
  if (cfg.symbol.trim() === "") {
    throw new ConfigurationError("symbol must not be empty");
  }

  const addresses = {
    ownerAddress: cfg.ownerAddress,
    positionManagerAddress: cfg.positionManagerAddress,
    baseTokenAddress: cfg.baseTokenAddress,
    usdtTokenAddress: cfg.usdtTokenAddress,
  };
  for (const [name, value] of Object.entries(addresses)) {
    if (!isAddress(value, { strict: false })) {
      throw new ConfigurationError(`${name} is not a valid address: ${value}`);
    }
  }
  if (cfg.baseTokenAddress.toLowerCase() === cfg.usdtTokenAddress.toLowerCase()) {
    throw new ConfigurationError("baseTokenAddress and usdtTokenAddress must differ");
  }
}

/**
 * Drives one hedge pair: reads both venues, decides, places at most one order
 * and pushes a status message. Holds no state between cycles.
 */
export class HedgeStrategy {
  private readonly config: Readonly<StrategyConfig>;
  private readonly dryRun: boolean;
  private readonly label: string;
  private readonly template: MessageTemplate | undefined;

  constructor(
    config: StrategyConfig,
    private readonly collaborators: HedgeCollaborators,
    options: HedgeStrategyOptions = {}
  ) {
    validateStrategyConfig(config);
    this.config = Object.freeze({ ...config });
    this.dryRun = options.dryRun ?? false;
    this.label = options.label ?? config.symbol;
    this.template = options.template;
  }

  get symbol(): string {
    return this.config.symbol;
  }

  /** Read both venues and build the snapshot for this cycle. */
  async status(): Promise<PositionSnapshot> {
    const { amm, futures } = this.collaborators;
    const { ownerAddress, symbol } = this.config;

    await call("amm.sync", () => amm.sync(ownerAddress));
    const positions = amm.positions();
    const blockNumber = await call("amm.currentBlock", () => amm.currentBlock());
    const cexPositions = await call("futures.getPosition", () => futures.getPosition(symbol));

    return buildSnapshot(positions, cexPositions, this.config, blockNumber);
  }

  /** Apply the threshold rule and send the resulting order, if any. */
  async execute(ratio: number, delta: number): Promise<ExecuteResult> {
    const action = decide(ratio, delta, this.config);
    if (action.kind === "none") {
      return { action, order: null };
    }

    const { symbol } = this.config;
    const { quantity } = action;
    const verb = action.kind === "increase" ? "OPEN SELL" : "CLOSE SELL (reduce-only)";
    if (this.dryRun) {
      this.log(`[dry-run] ${verb} ${quantity} (delta ${delta.toFixed(4)}, ratio ${ratio.toFixed(4)})`);
      return { action, order: null };
    }

    this.log(`${verb} ${quantity} (delta ${delta.toFixed(4)}, ratio ${ratio.toFixed(4)})`);
    const { orders } = this.collaborators;
    const order =
      action.kind === "increase"
        ? await call("orders.openSell", () => orders.openSell(symbol, quantity))
        : await call("orders.closeSell", () => orders.closeSell(symbol, quantity));
    this.log(`Order ${order.orderId} ${order.status}: ${order.side} ${order.origQty} @ ${order.price}`);

    return { action, order };
  }

  /** Full cycle. Any failure aborts before the notifier is reached. */
  async runCycle(): Promise<CycleResult> {
    const snapshot = await this.status();
    const { action, order } = await this.execute(snapshot.baseDeltaRatio, snapshot.baseDelta);
    const message = this.format(snapshot);

    const { notifier } = this.collaborators;
    if (notifier) {
      await call("notifier.push", () => notifier.push(message));
    }

    return { snapshot, action, order, message };
  }

  format(snapshot: PositionSnapshot): string {
    return formatSnapshot(snapshot, this.label, this.template);
  }

  private log(message: string): void {
    console.log(`[hedge:${this.config.symbol}] ${message}`);
  }
}

async function call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new CollaboratorFailure(operation, err);
  }
}
