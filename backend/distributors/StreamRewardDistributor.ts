import { Address, getAddress, Hex } from "viem";
import { checkedAdd, checkedMul, checkedSub } from "../accounting/FixedPoint";
import { config } from "../config";
import { BaseTokenVault } from "../datasources/TokenVault";
import { InvalidArgumentError } from "../errors";
import { Clock } from "../helpers";
import { BaseRewardDistributor, RewardRates } from "./BaseRewardDistributor";
import {
  DistributorRoles,
  DistributorState,
  PoolRecord,
} from "./IRewardDistributor";

export interface IncentiveStream {
  ratePerSecond: bigint; // zero once finished
  finishTimestamp: bigint;
  remainingAmount: bigint; // deposited and not streamed yet; the rounding residue once finished
  lastUpdateTimestamp: bigint; // `remainingAmount` is exact as of this time
}

/// reward token => its stream in the pool
export type IncentiveStreams = Map<Address, IncentiveStream>;

/**
 * Runs down every stream of `streams` from its last update to `until`, which
 * must not be past the finish of any stream still running
 */
export function drainStreams(streams: IncentiveStreams, until: bigint) {
  for (const stream of streams.values()) {
    if (stream.ratePerSecond > 0n) {
      stream.remainingAmount = checkedSub(
        stream.remainingAmount,
        checkedMul(stream.ratePerSecond, until - stream.lastUpdateTimestamp)
      );
    }
    stream.lastUpdateTimestamp = until;
  }
}

/**
 * Earliest finish among the running streams within `(after, until]`
 */
export function nextFinish(
  streams: IncentiveStreams,
  after: bigint,
  until: bigint
): bigint | undefined {
  let next: bigint | undefined;
  for (const stream of streams.values()) {
    const finish = stream.finishTimestamp;
    if (
      stream.ratePerSecond > 0n &&
      finish > after &&
      finish <= until &&
      (next === undefined || finish < next)
    ) {
      next = finish;
    }
  }
  return next;
}

/**
 * Starts a stream of `remaining + amount` over `duration` from `now`. An active
 * stream is extended: its remaining value rolls into the new one, whose window
 * restarts at `now`.
 */
export function topUpStream(
  stream: IncentiveStream | undefined,
  amount: bigint,
  duration: bigint,
  now: bigint
): IncentiveStream {
  const remainingAmount = checkedAdd(stream?.remainingAmount ?? 0n, amount);
  const ratePerSecond = remainingAmount / duration;
  if (ratePerSecond === 0n) {
    throw new InvalidArgumentError(
      `${remainingAmount} over ${duration}s streams nothing per second`
    );
  }
  return {
    ratePerSecond,
    finishTimestamp: now + duration,
    remainingAmount,
    lastUpdateTimestamp: now,
  };
}

/**
 * Distributes any number of whitelisted tokens per pool, each through its own
 * constant-rate stream of fixed duration.
 */
export class StreamRewardDistributor extends BaseRewardDistributor<IncentiveStreams> {
  constructor(
    roles: DistributorRoles,
    vault: BaseTokenVault,
    clock: Clock,
    account: Address,
    readonly duration: bigint = config.incentiveDuration,
    initialState?: DistributorState<IncentiveStreams>
  ) {
    super(roles, vault, clock, account, initialState);
    if (duration <= 0n) {
      throw new InvalidArgumentError(`Invalid incentive duration ${duration}`);
    }
  }

  protected createSchedule(): IncentiveStreams {
    return new Map();
  }

  protected cloneSchedule(schedule: IncentiveStreams): IncentiveStreams {
    return new Map(
      [...schedule].map(([token, stream]): [Address, IncentiveStream] => [
        token,
        { ...stream },
      ])
    );
  }

  protected currentRates(pool: PoolRecord<IncentiveStreams>): RewardRates {
    const tokens: Address[] = [];
    const ratesPerSecond: bigint[] = [];
    for (const [token, stream] of pool.schedule) {
      tokens.push(token);
      ratesPerSecond.push(stream.ratePerSecond);
    }
    return { tokens, ratesPerSecond };
  }

  /// @dev every stream finish passed is a sync boundary, after which that stream's rate is zeroed
  protected advance(pool: PoolRecord<IncentiveStreams>, now: bigint) {
    const streams = pool.schedule;
    let finish = nextFinish(streams, pool.accumulator.lastSyncTimestamp, now);
    while (finish !== undefined) {
      this.streamTo(pool, finish);
      for (const stream of streams.values()) {
        if (stream.finishTimestamp <= finish) stream.ratePerSecond = 0n;
      }
      finish = nextFinish(streams, finish, now);
    }
    this.streamTo(pool, now);
  }

  private streamTo(pool: PoolRecord<IncentiveStreams>, until: bigint) {
    this.syncPool(pool, until);
    drainStreams(pool.schedule, until);
  }

  /**
   * Allows `token` to be streamed
   * @returns false when it already was
   */
  whitelistToken(caller: Address, token: Address): boolean {
    this.onlyAdmin(caller, "whitelistToken");
    token = getAddress(token);
    return this.atomic(() => {
      if (this._state.rewardTokens.has(token)) return false;
      this._state.rewardTokens.add(token);
      this.emit({ type: "TokenWhitelisted", token });
      return true;
    });
  }

  isWhitelisted(token: Address): boolean {
    return this._state.rewardTokens.has(getAddress(token));
  }

  /**
   * Pulls `amount` of `token` from the caller and streams it to the pool's
   * in-range liquidity over `duration`, starting now
   */
  createIncentive(caller: Address, poolId: Hex, token: Address, amount: bigint) {
    this.onlyAdmin(caller, "createIncentive");
    token = getAddress(token);
    if (!this._state.rewardTokens.has(token)) {
      throw new InvalidArgumentError(`Token ${token} is not whitelisted`);
    }
    if (amount <= 0n) {
      throw new InvalidArgumentError(`Incentive amount must be positive: ${amount}`);
    }
    return this.nonReentrant("createIncentive", () => {
      const pool = this.requirePool(poolId);
      const now = this._clock.now();
      this.advance(pool, now);

      const stream = topUpStream(
        pool.schedule.get(token),
        amount,
        this.duration,
        now
      );
      pool.schedule.set(token, stream);

      this.emit({
        type: "IncentiveCreated",
        poolId,
        token,
        amount,
        ratePerSecond: stream.ratePerSecond,
        finishTimestamp: stream.finishTimestamp,
      });
      this._vault.transfer(token, caller, this.account, amount);
      return { ...stream };
    });
  }

  /**
   * The stream of `token` in the pool, as it would be after a poke now
   */
  incentiveStream(poolId: Hex, token: Address): IncentiveStream | undefined {
    return this.dryRun(() => {
      const pool = this.requirePool(poolId);
      this.advance(pool, this._clock.now());
      const stream = pool.schedule.get(getAddress(token));
      return stream && { ...stream };
    });
  }
}
