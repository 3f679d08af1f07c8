import { Observable } from "rxjs";
import { Address, Hex } from "viem";
import { RangeAccumulatorState } from "../accounting/RangeAccumulator";
import { PositionState } from "../accounting/PositionAccrual";
import { ClaimIndex } from "./ClaimIndex";

/// token => amount
export type TokenAmounts = Map<Address, bigint>;

export type PositionNotification = {
  positionKey: Hex;
  owner: Address;
  poolId: Hex;
  tickLower: number;
  tickUpper: number;
  liquidityDelta: bigint;
};

/// unsubscribe and burn always remove the whole liquidity of the position
export type PositionReference = Omit<PositionNotification, "liquidityDelta">;

export type PositionAction = "subscribe" | "modify" | "unsubscribe" | "burn";

export type DistributorEvent =
  | {
      type: "PoolInitialized";
      poolId: Hex;
      tickSpacing: number;
      activeTick: number;
      timestamp: bigint;
    }
  | {
      type: "PoolPoked";
      poolId: Hex;
      activeTick: number;
      activeLiquidity: bigint;
      timestamp: bigint;
    }
  | {
      type: "PositionUpdated";
      action: PositionAction;
      positionKey: Hex;
      owner: Address;
      poolId: Hex;
      liquidity: bigint;
    }
  | {
      type: "RewardsAdded";
      poolId: Hex;
      amount: bigint;
      activationDay: bigint;
    }
  | {
      type: "EpochRolled";
      poolId: Hex;
      day: bigint;
      streamRate: bigint;
      nextStreamRate: bigint;
      queuedStreamRate: bigint;
    }
  | { type: "TokenWhitelisted"; token: Address }
  | {
      type: "IncentiveCreated";
      poolId: Hex;
      token: Address;
      amount: bigint;
      ratePerSecond: bigint;
      finishTimestamp: bigint;
    }
  | {
      type: "RewardsClaimed";
      owner: Address;
      recipient: Address;
      token: Address;
      amount: bigint;
    };

export interface PoolRecord<S> {
  poolId: Hex;
  accumulator: RangeAccumulatorState;
  schedule: S; // how the pool's reward rates evolve over time
}

/**
 * Everything a distributor owns. Plain data: cloned for rollbacks and views,
 * persisted as is.
 */
export interface DistributorState<S> {
  pools: Map<Hex, PoolRecord<S>>;
  positions: Map<Hex, PositionState>;
  claimIndex: ClaimIndex;
  rewardTokens: Set<Address>;
}

export interface DistributorRoles {
  admin: Address; // initializes pools and manages incentives
  positionManager: Address; // sole sender of position notifications
}

export interface IRewardDistributor<S> {
  readonly events$: Observable<DistributorEvent>;

  initializePool(
    caller: Address,
    poolId: Hex,
    tickSpacing: number,
    activeTick: number
  ): void;
  pokePool(poolId: Hex, activeTick: number): void;

  notifySubscribe(caller: Address, notification: PositionNotification): void;
  notifyModifyLiquidity(
    caller: Address,
    notification: PositionNotification
  ): void;
  notifyUnsubscribe(caller: Address, notification: PositionReference): void;
  notifyBurn(caller: Address, notification: PositionReference): void;

  claim(caller: Address, positionKey: Hex, recipient?: Address): TokenAmounts;
  claimAllForOwner(
    caller: Address,
    poolIds?: readonly Hex[],
    recipient?: Address
  ): TokenAmounts;

  pendingRewards(positionKey: Hex): TokenAmounts;
  pendingRewardsOwner(owner: Address, poolIds?: readonly Hex[]): TokenAmounts;

  poolIds(): Hex[];
  snapshot(): DistributorState<S>;
}
