import { type Address, type PublicClient, maxUint128, maxUint256, parseAbi } from "viem";
import type { AmmPositionRecord, AmmPositionSource } from "./hedging/types.js";
import { errorMessage } from "./hedging/errors.js";
import { shortAddr } from "./utils.js";

export const positionManagerAbi = parseAbi([
  "function balanceOf(address owner) view returns (uint256)",
  "function tokenOfOwnerByIndex(address owner, uint256 index) view returns (uint256)",
  "function positions(uint256 tokenId) view returns (uint96 nonce, address operator, address token0, address token1, uint24 fee, int24 tickLower, int24 tickUpper, uint128 liquidity, uint256 feeGrowthInside0LastX128, uint256 feeGrowthInside1LastX128, uint128 tokensOwed0, uint128 tokensOwed1)",
  "function decreaseLiquidity((uint256 tokenId, uint128 liquidity, uint256 amount0Min, uint256 amount1Min, uint256 deadline) params) payable returns (uint256 amount0, uint256 amount1)",
  "function collect((uint256 tokenId, address recipient, uint128 amount0Max, uint128 amount1Max) params) payable returns (uint256 amount0, uint256 amount1)",
]);

/**
 * Reads every LP position of an owner from a Uniswap V3 NonfungiblePositionManager.
 *
 * Withdrawable and collectable amounts come from simulating decreaseLiquidity and
 * collect as the owner, pinned to one block so the whole table is consistent.
 */
export class UniswapV3PositionManager implements AmmPositionSource {
  private table = new Map<bigint, AmmPositionRecord>();
  private syncedAt: bigint | undefined;

  constructor(
    readonly address: Address,
    private readonly client: PublicClient
  ) {}

  positions(): ReadonlyMap<bigint, AmmPositionRecord> {
    return this.table;
  }

  /** Block the table was read at. Falls back to the chain head before the first sync. */
  async currentBlock(): Promise<bigint> {
    return this.syncedAt ?? this.client.getBlockNumber();
  }

  async sync(owner: Address): Promise<void> {
    const blockNumber = await this.client.getBlockNumber();
    const next = new Map<bigint, AmmPositionRecord>();

    const balance = await this.client.readContract({
      address: this.address,
      abi: positionManagerAbi,
      functionName: "balanceOf",
      args: [owner],
      blockNumber,
    });

    for (let index = 0n; index < balance; index++) {
      const tokenId = await this.client.readContract({
        address: this.address,
        abi: positionManagerAbi,
        functionName: "tokenOfOwnerByIndex",
        args: [owner, index],
        blockNumber,
      });

      const info = await this.client.readContract({
        address: this.address,
        abi: positionManagerAbi,
        functionName: "positions",
        args: [tokenId],
        blockNumber,
      });
      const token0 = info[2];
      const token1 = info[3];
      const liquidity = info[7];

      const [withdrawable0, withdrawable1] =
        liquidity > 0n
          ? await this.simulateDecrease(owner, tokenId, liquidity, blockNumber)
          : [0n, 0n];
      const [collectable0, collectable1] = await this.simulateCollect(owner, tokenId, blockNumber);

      next.set(tokenId, {
        tokenId,
        token0,
        token1,
        liquidity,
        withdrawable0,
        withdrawable1,
        collectable0,
        collectable1,
      });
    }

    this.table = next;
    this.syncedAt = blockNumber;
    console.log(`[uniswap] Synced ${next.size} position(s) for ${shortAddr(owner)} at block ${blockNumber}`);
  }

  private async simulateDecrease(
    owner: Address,
    tokenId: bigint,
    liquidity: bigint,
    blockNumber: bigint
  ): Promise<readonly [bigint, bigint]> {
    try {
      const { result } = await this.client.simulateContract({
        address: this.address,
        abi: positionManagerAbi,
        functionName: "decreaseLiquidity",
        args: [{ tokenId, liquidity, amount0Min: 0n, amount1Min: 0n, deadline: maxUint256 }],
        account: owner,
        blockNumber,
      });
      return result;
    } catch (err) {
      // amounts stay zero for this position
      console.warn(`[uniswap] decreaseLiquidity simulation failed for #${tokenId}: ${errorMessage(err)}`);
      return [0n, 0n];
    }
  }

  private async simulateCollect(
    owner: Address,
    tokenId: bigint,
    blockNumber: bigint
  ): Promise<readonly [bigint, bigint]> {
    try {
      const { result } = await this.client.simulateContract({
        address: this.address,
        abi: positionManagerAbi,
        functionName: "collect",
        args: [{ tokenId, recipient: owner, amount0Max: maxUint128, amount1Max: maxUint128 }],
        account: owner,
        blockNumber,
      });
      return result;
    } catch (err) {
      console.warn(`[uniswap] collect simulation failed for #${tokenId}: ${errorMessage(err)}`);
      return [0n, 0n];
    }
  }
}
