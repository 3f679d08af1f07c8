import { Address, getAddress, Hex, isAddressEqual } from "viem";
import { checkedAdd } from "../accounting/FixedPoint";
import { config } from "../config";
import { BaseTokenVault } from "../datasources/TokenVault";
import { InvalidArgumentError, UnauthorizedError } from "../errors";
import { Clock } from "../helpers";
import { BaseRewardDistributor, RewardRates } from "./BaseRewardDistributor";
import {
  DistributorRoles,
  DistributorState,
  PoolRecord,
} from "./IRewardDistributor";

/**
 * Day-quantized reward pipeline of one pool.
 *
 * Rewards deposited on day N land in `scheduledBucket[N + 2]` and are visible
 * as `queuedStreamRate` right away. They move to `nextStreamRate` at the start
 * of day N + 1 and stream as `streamRate` for the whole of day N + 2.
 */
export interface EpochInfo {
  windowStart: bigint; // start of the current day
  windowEnd: bigint; // windowStart + 1 day
  streamRate: bigint; // per second, streaming now
  nextStreamRate: bigint; // streams from windowEnd
  queuedStreamRate: bigint; // streams the day after
  scheduledBucket: Map<bigint, bigint>; // day => deposited amount not yet promoted
}

export function cloneEpochInfo(epoch: EpochInfo): EpochInfo {
  return { ...epoch, scheduledBucket: new Map(epoch.scheduledBucket) };
}

export function createEpochInfo(now: bigint): EpochInfo {
  const windowStart = (now / config.secondsPerDay) * config.secondsPerDay;
  return {
    windowStart,
    windowEnd: windowStart + config.secondsPerDay,
    streamRate: 0n,
    nextStreamRate: 0n,
    queuedStreamRate: 0n,
    scheduledBucket: new Map(),
  };
}

/**
 * Moves the pipeline one day forward, into the day starting at `windowEnd`
 * @returns the index of the new day
 */
export function rollEpoch(epoch: EpochInfo): bigint {
  const day = epoch.windowEnd / config.secondsPerDay;
  const queuedDay = day + config.epochActivationDelayDays;
  epoch.streamRate = epoch.nextStreamRate;
  epoch.nextStreamRate = epoch.queuedStreamRate;
  // the bucket behind the rate just promoted to next
  epoch.scheduledBucket.delete(queuedDay - 1n);
  epoch.queuedStreamRate =
    (epoch.scheduledBucket.get(queuedDay) ?? 0n) / config.secondsPerDay;
  epoch.windowStart = epoch.windowEnd;
  epoch.windowEnd += config.secondsPerDay;
  return day;
}

/**
 * Distributes a single reward token, deposited by one designated reward
 * source, through the delayed daily pipeline.
 */
export class EpochRewardDistributor extends BaseRewardDistributor<EpochInfo> {
  readonly rewardToken: Address;
  private readonly _rewardSource: Address;

  constructor(
    roles: DistributorRoles & { rewardSource: Address },
    rewardToken: Address,
    vault: BaseTokenVault,
    clock: Clock,
    account: Address,
    initialState?: DistributorState<EpochInfo>
  ) {
    super(roles, vault, clock, account, initialState);
    this.rewardToken = getAddress(rewardToken);
    this._rewardSource = roles.rewardSource;
    this._state.rewardTokens.add(this.rewardToken);
  }

  protected createSchedule(now: bigint): EpochInfo {
    return createEpochInfo(now);
  }

  protected cloneSchedule(schedule: EpochInfo): EpochInfo {
    return cloneEpochInfo(schedule);
  }

  protected currentRates(pool: PoolRecord<EpochInfo>): RewardRates {
    return {
      tokens: [this.rewardToken],
      ratesPerSecond: [pool.schedule.streamRate],
    };
  }

  /// @dev streams each elapsed day at its own rate, rolling once per day boundary crossed
  protected advance(pool: PoolRecord<EpochInfo>, now: bigint) {
    const epoch = pool.schedule;
    while (now >= epoch.windowEnd) {
      this.syncPool(pool, epoch.windowEnd);
      const day = rollEpoch(epoch);
      this.emit({
        type: "EpochRolled",
        poolId: pool.poolId,
        day,
        streamRate: epoch.streamRate,
        nextStreamRate: epoch.nextStreamRate,
        queuedStreamRate: epoch.queuedStreamRate,
      });
    }
    this.syncPool(pool, now);
  }

  /**
   * Rolls the pool's pipeline over every day boundary passed since it was last
   * touched, streaming each day at its rate. Idempotent.
   */
  rollIfNeeded(poolId: Hex) {
    this.atomic(() => {
      this.advance(this.requirePool(poolId), this._clock.now());
    });
  }

  /**
   * Pulls `amount` of the reward token from the reward source and schedules it
   * to stream two days from today
   */
  addRewards(caller: Address, poolId: Hex, amount: bigint) {
    if (!isAddressEqual(caller, this._rewardSource)) {
      throw new UnauthorizedError(caller, "addRewards");
    }
    if (amount <= 0n) {
      throw new InvalidArgumentError(`Reward amount must be positive: ${amount}`);
    }
    this.nonReentrant("addRewards", () => {
      const pool = this.requirePool(poolId);
      this.advance(pool, this._clock.now());

      const epoch = pool.schedule;
      const activationDay =
        epoch.windowStart / config.secondsPerDay +
        config.epochActivationDelayDays;
      const scheduled = checkedAdd(
        epoch.scheduledBucket.get(activationDay) ?? 0n,
        amount
      );
      epoch.scheduledBucket.set(activationDay, scheduled);
      epoch.queuedStreamRate = scheduled / config.secondsPerDay;

      this.emit({ type: "RewardsAdded", poolId, amount, activationDay });
      this._vault.transfer(this.rewardToken, caller, this.account, amount);
    });
  }

  /**
   * The pool's pipeline as it would be after rolling to now
   */
  epochInfo(poolId: Hex): EpochInfo {
    return this.dryRun(() => {
      const pool = this.requirePool(poolId);
      this.advance(pool, this._clock.now());
      return cloneEpochInfo(pool.schedule);
    });
  }

  /**
   * Total amount still waiting in day buckets, ie not yet promoted to `nextStreamRate`
   */
  scheduledAmount(poolId: Hex): bigint {
    let total = 0n;
    for (const amount of this.epochInfo(poolId).scheduledBucket.values()) {
      total += amount;
    }
    return total;
  }
}
