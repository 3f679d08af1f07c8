import { Address, Hex } from "viem";
import { checkedAdd, mulDiv, Q128, wrappingSub } from "./FixedPoint";

export interface PositionRewards {
  rewardsPerLiquidityLastX128: Map<Address, bigint>; // range value at the last accrue, per token
  rewardsAccrued: Map<Address, bigint>; // claimable balance, per token
}

export interface PositionState {
  positionKey: Hex;
  owner: Address;
  poolId: Hex;
  tickLower: number;
  tickUpper: number;
  liquidity: bigint;
  subscribed: boolean;
  burned: boolean;
  rewards: PositionRewards;
}

export function createPositionRewards(): PositionRewards {
  return { rewardsPerLiquidityLastX128: new Map(), rewardsAccrued: new Map() };
}

export function clonePosition(position: PositionState): PositionState {
  return {
    ...position,
    rewards: {
      rewardsPerLiquidityLastX128: new Map(
        position.rewards.rewardsPerLiquidityLastX128
      ),
      rewardsAccrued: new Map(position.rewards.rewardsAccrued),
    },
  };
}

function earnedSince(
  rewards: PositionRewards,
  token: Address,
  liquidity: bigint,
  currentRangeValue: bigint
): bigint {
  const last = rewards.rewardsPerLiquidityLastX128.get(token) ?? 0n;
  return mulDiv(wrappingSub(currentRangeValue, last), liquidity, Q128);
}

/**
 * Credits `liquidity` with the range growth since the last snapshot and moves
 * the snapshot to `currentRangeValue`.
 * `currentRangeValue` must be read from the live accumulator, after it was
 * synced; a stale value under-accrues silently.
 * Call before every liquidity change of the position.
 * @returns the amount newly credited
 */
export function accrue(
  rewards: PositionRewards,
  token: Address,
  liquidity: bigint,
  currentRangeValue: bigint
): bigint {
  const earned = earnedSince(rewards, token, liquidity, currentRangeValue);
  if (earned > 0n) {
    rewards.rewardsAccrued.set(
      token,
      checkedAdd(rewards.rewardsAccrued.get(token) ?? 0n, earned)
    );
  }
  rewards.rewardsPerLiquidityLastX128.set(token, currentRangeValue);
  return earned;
}

/**
 * Read-only projection of `accrue`: the balance the position could claim now
 */
export function pendingFor(
  rewards: PositionRewards,
  token: Address,
  liquidity: bigint,
  currentRangeValue: bigint
): bigint {
  return (
    (rewards.rewardsAccrued.get(token) ?? 0n) +
    earnedSince(rewards, token, liquidity, currentRangeValue)
  );
}

/**
 * Zeroes and returns the accrued balance; the snapshot is left as is.
 * Paying the amount out is up to the caller.
 */
export function claim(rewards: PositionRewards, token: Address): bigint {
  const amount = rewards.rewardsAccrued.get(token) ?? 0n;
  rewards.rewardsAccrued.delete(token);
  return amount;
}

export function hasAccrued(rewards: PositionRewards): boolean {
  for (const amount of rewards.rewardsAccrued.values()) {
    if (amount > 0n) return true;
  }
  return false;
}
