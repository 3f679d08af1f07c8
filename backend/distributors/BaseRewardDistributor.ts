import { Observable, Subject } from "rxjs";
import { Address, getAddress, Hex, isAddressEqual } from "viem";
import { addDelta } from "../accounting/FixedPoint";
import {
  accrue,
  claim as claimAccrued,
  clonePosition,
  createPositionRewards,
  hasAccrued,
  pendingFor,
  PositionState,
} from "../accounting/PositionAccrual";
import {
  accumulatorTokens,
  cloneRangeAccumulator,
  createRangeAccumulator,
  modifyLiquidity,
  rangeValue,
  sync,
  validateRange,
} from "../accounting/RangeAccumulator";
import { BaseTokenVault } from "../datasources/TokenVault";
import {
  InsufficientBalanceError,
  InvalidArgumentError,
  NotFoundError,
  OperationInProgressError,
  UnauthorizedError,
} from "../errors";
import { addToMap, Clock } from "../helpers";
import {
  cloneClaimIndex,
  indexedPools,
  indexedPositions,
  indexPosition,
  unindexPosition,
} from "./ClaimIndex";
import {
  DistributorEvent,
  DistributorRoles,
  DistributorState,
  IRewardDistributor,
  PoolRecord,
  PositionAction,
  PositionNotification,
  PositionReference,
  TokenAmounts,
} from "./IRewardDistributor";

export type RewardRates = {
  tokens: Address[];
  ratesPerSecond: bigint[];
};

export function emptyDistributorState<S>(): DistributorState<S> {
  return {
    pools: new Map(),
    positions: new Map(),
    claimIndex: new Map(),
    rewardTokens: new Set(),
  };
}

/**
 * Shared machinery of the reward distributors: pools, positions, the owner
 * claim index, claims and position-manager notifications.
 *
 * Subclasses decide how a pool's reward rates evolve (`S` is their per-pool
 * schedule) by implementing `createSchedule`, `currentRates` and `advance`.
 *
 * Every mutating entry point is atomic: on failure the state, the vault
 * balances and the pending events are put back as they were. Token transfers
 * always come last, after the state is final.
 */
export abstract class BaseRewardDistributor<S>
  implements IRewardDistributor<S>
{
  protected _state: DistributorState<S>;
  private readonly _events = new Subject<DistributorEvent>();
  private _pendingEvents: DistributorEvent[] = [];
  private _depth = 0;
  private _inFlight?: string;

  readonly events$: Observable<DistributorEvent> = this._events.asObservable();

  constructor(
    private readonly _roles: DistributorRoles,
    protected readonly _vault: BaseTokenVault,
    protected readonly _clock: Clock,
    readonly account: Address, // holds the reward tokens being distributed
    initialState?: DistributorState<S>
  ) {
    this._state = initialState
      ? this.cloneState(initialState)
      : emptyDistributorState();
  }

  /**
   * Deep copy of a pool schedule, sharing nothing with `schedule`
   */
  protected abstract cloneSchedule(schedule: S): S;

  /**
   * A fresh schedule for a pool initialized at `now`
   */
  protected abstract createSchedule(now: bigint): S;

  /**
   * Reward tokens of the pool and their current per-second rates
   */
  protected abstract currentRates(pool: PoolRecord<S>): RewardRates;

  /**
   * Brings the pool's schedule and accumulator to `now`, at the pool's stored
   * active tick. Every time the rates change in between is a sync boundary.
   */
  protected abstract advance(pool: PoolRecord<S>, now: bigint): void;

  /**
   * Syncs the accumulator up to `until` with the pool's current rates
   */
  protected syncPool(pool: PoolRecord<S>, until: bigint) {
    const { tokens, ratesPerSecond } = this.currentRates(pool);
    sync(
      pool.accumulator,
      tokens,
      ratesPerSecond,
      pool.accumulator.activeTick,
      until
    );
  }

  /*//////////////////////////////////////////////////////////////
                              POOLS
  //////////////////////////////////////////////////////////////*/

  initializePool(
    caller: Address,
    poolId: Hex,
    tickSpacing: number,
    activeTick: number
  ) {
    this.onlyAdmin(caller, "initializePool");
    this.atomic(() => {
      if (this._state.pools.has(poolId)) {
        throw new InvalidArgumentError(`Pool ${poolId} already initialized`);
      }
      const now = this._clock.now();
      this._state.pools.set(poolId, {
        poolId,
        accumulator: createRangeAccumulator(tickSpacing, activeTick, now),
        schedule: this.createSchedule(now),
      });
      this.emit({
        type: "PoolInitialized",
        poolId,
        tickSpacing,
        activeTick,
        timestamp: now,
      });
    });
  }

  /**
   * Streams the pool's rewards up to now at the tick it was last seen at,
   * then moves it to `activeTick`. Idempotent; safe to call at any time.
   */
  pokePool(poolId: Hex, activeTick: number) {
    this.atomic(() => {
      const pool = this.requirePool(poolId);
      const now = this._clock.now();
      this.advance(pool, now);
      // no time elapses here, only the tick crossings apply
      sync(pool.accumulator, [], [], activeTick, now);
      this.emit({
        type: "PoolPoked",
        poolId,
        activeTick,
        activeLiquidity: pool.accumulator.activeLiquidity,
        timestamp: now,
      });
    });
  }

  /*//////////////////////////////////////////////////////////////
                      POSITION NOTIFICATIONS
  //////////////////////////////////////////////////////////////*/

  notifySubscribe(caller: Address, notification: PositionNotification) {
    this.onlyPositionManager(caller, "notifySubscribe");
    this.atomic(() => {
      if (notification.liquidityDelta < 0n) {
        throw new InvalidArgumentError(
          `Cannot subscribe with negative liquidity ${notification.liquidityDelta}`
        );
      }
      const position =
        this.findPosition(notification) ?? this.createPosition(notification);
      if (position.subscribed) {
        throw new InvalidArgumentError(
          `Position ${position.positionKey} is already subscribed`
        );
      }
      position.subscribed = true;
      this.updatePosition(position, notification.liquidityDelta, "subscribe");
    });
  }

  notifyModifyLiquidity(caller: Address, notification: PositionNotification) {
    this.onlyPositionManager(caller, "notifyModifyLiquidity");
    this.atomic(() => {
      const position = this.requireSubscribed(notification);
      this.updatePosition(position, notification.liquidityDelta, "modify");
    });
  }

  notifyUnsubscribe(caller: Address, notification: PositionReference) {
    this.onlyPositionManager(caller, "notifyUnsubscribe");
    this.atomic(() => {
      const position = this.requireSubscribed(notification);
      this.updatePosition(position, -position.liquidity, "unsubscribe");
      position.subscribed = false;
    });
  }

  notifyBurn(caller: Address, notification: PositionReference) {
    this.onlyPositionManager(caller, "notifyBurn");
    this.atomic(() => {
      const position = this.requireSubscribed(notification);
      this.updatePosition(position, -position.liquidity, "burn");
      position.subscribed = false;
      position.burned = true;
    });
  }

  /**
   * Syncs the pool, settles the position at its current liquidity, then
   * applies `liquidityDelta` to both.
   */
  private updatePosition(
    position: PositionState,
    liquidityDelta: bigint,
    action: PositionAction
  ) {
    const pool = this.requirePool(position.poolId);
    this.advance(pool, this._clock.now());
    this.accruePosition(pool, position);

    const liquidity = addDelta(position.liquidity, liquidityDelta);
    modifyLiquidity(
      pool.accumulator,
      position.tickLower,
      position.tickUpper,
      liquidityDelta
    );
    position.liquidity = liquidity;
    indexPosition(
      this._state.claimIndex,
      position.owner,
      position.poolId,
      position.positionKey
    );

    this.emit({
      type: "PositionUpdated",
      action,
      positionKey: position.positionKey,
      owner: position.owner,
      poolId: position.poolId,
      liquidity,
    });
  }

  /**
   * What the position could claim once `pool` is synced, leaving it untouched
   */
  private pendingOf(pool: PoolRecord<S>, position: PositionState) {
    const pending: TokenAmounts = new Map();
    for (const token of accumulatorTokens(pool.accumulator)) {
      const amount = pendingFor(
        position.rewards,
        token,
        position.liquidity,
        rangeValue(
          pool.accumulator,
          token,
          position.tickLower,
          position.tickUpper
        )
      );
      if (amount > 0n) pending.set(token, amount);
    }
    return pending;
  }

  private accruePosition(pool: PoolRecord<S>, position: PositionState) {
    for (const token of accumulatorTokens(pool.accumulator)) {
      accrue(
        position.rewards,
        token,
        position.liquidity,
        rangeValue(
          pool.accumulator,
          token,
          position.tickLower,
          position.tickUpper
        )
      );
    }
  }

  private createPosition(notification: PositionReference): PositionState {
    const pool = this.requirePool(notification.poolId);
    validateRange(
      pool.accumulator,
      notification.tickLower,
      notification.tickUpper
    );
    const position: PositionState = {
      positionKey: notification.positionKey,
      owner: getAddress(notification.owner),
      poolId: notification.poolId,
      tickLower: notification.tickLower,
      tickUpper: notification.tickUpper,
      liquidity: 0n,
      subscribed: false,
      burned: false,
      rewards: createPositionRewards(),
    };
    this._state.positions.set(position.positionKey, position);
    return position;
  }

  /**
   * The stored position `notification` refers to, checked against it
   */
  private findPosition(
    notification: PositionReference
  ): PositionState | undefined {
    const position = this._state.positions.get(notification.positionKey);
    if (!position) return undefined;
    if (
      !isAddressEqual(position.owner, notification.owner) ||
      position.poolId !== notification.poolId ||
      position.tickLower !== notification.tickLower ||
      position.tickUpper !== notification.tickUpper
    ) {
      throw new InvalidArgumentError(
        `Notification does not match position ${notification.positionKey}`
      );
    }
    if (position.burned) {
      throw new InvalidArgumentError(
        `Position ${notification.positionKey} was burned`
      );
    }
    return position;
  }

  private requireSubscribed(notification: PositionReference): PositionState {
    const position = this.findPosition(notification);
    if (!position || !position.subscribed) {
      throw new NotFoundError(
        `Position ${notification.positionKey} is not subscribed`
      );
    }
    return position;
  }

  /*//////////////////////////////////////////////////////////////
                              CLAIMS
  //////////////////////////////////////////////////////////////*/

  /**
   * Pays out everything `positionKey` has accrued to `recipient`.
   * Only the position's owner may claim it.
   */
  claim(caller: Address, positionKey: Hex, recipient: Address = caller) {
    return this.nonReentrant("claim", () => {
      const position = this.requirePosition(positionKey);
      if (!isAddressEqual(position.owner, caller)) {
        throw new UnauthorizedError(caller, "claim");
      }
      const pool = this.requirePool(position.poolId);
      this.advance(pool, this._clock.now());

      const totals: TokenAmounts = new Map();
      this.settle(pool, position, totals);
      this.payout(position.owner, recipient, totals);
      return totals;
    });
  }

  /**
   * Pays out everything the caller's positions in `poolIds` (all the pools the
   * caller has positions in, by default) have accrued, one transfer per token.
   */
  claimAllForOwner(
    caller: Address,
    poolIds?: readonly Hex[],
    recipient: Address = caller
  ) {
    return this.nonReentrant("claimAllForOwner", () => {
      const owner = getAddress(caller);
      const now = this._clock.now();
      const totals: TokenAmounts = new Map();

      const index = this._state.claimIndex;

      for (const poolId of poolIds ?? indexedPools(index, owner)) {
        const pool = this.requirePool(poolId);
        this.advance(pool, now);
        for (const key of indexedPositions(index, owner, poolId)) {
          this.settle(pool, this.requirePosition(key), totals);
        }
      }

      this.payout(owner, recipient, totals);
      return totals;
    });
  }

  /**
   * Accrues and zeroes the position's rewards into `totals`, then drops the
   * position from the claim index once nothing is left to claim for it
   */
  private settle(
    pool: PoolRecord<S>,
    position: PositionState,
    totals: TokenAmounts
  ) {
    this.accruePosition(pool, position);
    for (const token of [...position.rewards.rewardsAccrued.keys()]) {
      addToMap(totals, token, claimAccrued(position.rewards, token));
    }

    if (position.liquidity === 0n && !hasAccrued(position.rewards)) {
      unindexPosition(
        this._state.claimIndex,
        position.owner,
        position.poolId,
        position.positionKey
      );
      if (!position.subscribed) {
        this._state.positions.delete(position.positionKey);
      }
    }
  }

  private payout(owner: Address, recipient: Address, totals: TokenAmounts) {
    for (const [token, amount] of totals) {
      const available = this._vault.balanceOf(token, this.account);
      if (available < amount) {
        throw new InsufficientBalanceError(token, amount, available);
      }
    }
    for (const [token, amount] of totals) {
      if (amount === 0n) continue;
      this.emit({ type: "RewardsClaimed", owner, recipient, token, amount });
      this._vault.transfer(token, this.account, recipient, amount);
    }
  }

  /*//////////////////////////////////////////////////////////////
                              VIEWS
  //////////////////////////////////////////////////////////////*/

  /**
   * What `claim` would pay for the position now
   */
  pendingRewards(positionKey: Hex): TokenAmounts {
    return this.dryRun(() => {
      const position = this.requirePosition(positionKey);
      const pool = this.requirePool(position.poolId);
      this.advance(pool, this._clock.now());
      return this.pendingOf(pool, position);
    });
  }

  /**
   * What `claimAllForOwner` would pay the owner now
   */
  pendingRewardsOwner(owner: Address, poolIds?: readonly Hex[]): TokenAmounts {
    return this.dryRun(() => {
      const totals: TokenAmounts = new Map();
      const now = this._clock.now();
      const index = this._state.claimIndex;
      owner = getAddress(owner);
      for (const poolId of poolIds ?? indexedPools(index, owner)) {
        const pool = this.requirePool(poolId);
        this.advance(pool, now);
        for (const key of indexedPositions(index, owner, poolId)) {
          const pending = this.pendingOf(pool, this.requirePosition(key));
          for (const [token, amount] of pending) {
            addToMap(totals, token, amount);
          }
        }
      }
      return totals;
    });
  }

  poolInfo(poolId: Hex): PoolRecord<S> | undefined {
    const pool = this._state.pools.get(poolId);
    return pool && this.clonePool(pool);
  }

  positionInfo(positionKey: Hex): PositionState | undefined {
    const position = this._state.positions.get(positionKey);
    return position && clonePosition(position);
  }

  poolIds(): Hex[] {
    return [...this._state.pools.keys()];
  }

  rewardTokens(): Address[] {
    return [...this._state.rewardTokens];
  }

  snapshot(): DistributorState<S> {
    return this.cloneState(this._state);
  }

  /*//////////////////////////////////////////////////////////////
                            INTERNALS
  //////////////////////////////////////////////////////////////*/

  private clonePool(pool: PoolRecord<S>): PoolRecord<S> {
    return {
      poolId: pool.poolId,
      accumulator: cloneRangeAccumulator(pool.accumulator),
      schedule: this.cloneSchedule(pool.schedule),
    };
  }

  private cloneState(state: DistributorState<S>): DistributorState<S> {
    return {
      pools: new Map(
        [...state.pools].map(([poolId, pool]): [Hex, PoolRecord<S>] => [
          poolId,
          this.clonePool(pool),
        ])
      ),
      positions: new Map(
        [...state.positions].map(([key, position]): [Hex, PositionState] => [
          key,
          clonePosition(position),
        ])
      ),
      claimIndex: cloneClaimIndex(state.claimIndex),
      rewardTokens: new Set(state.rewardTokens),
    };
  }

  protected requirePool(poolId: Hex): PoolRecord<S> {
    const pool = this._state.pools.get(poolId);
    if (!pool) throw new NotFoundError(`Pool ${poolId} is not initialized`);
    return pool;
  }

  private requirePosition(positionKey: Hex): PositionState {
    const position = this._state.positions.get(positionKey);
    if (!position) throw new NotFoundError(`Unknown position ${positionKey}`);
    return position;
  }

  protected onlyAdmin(caller: Address, operation: string) {
    if (!isAddressEqual(caller, this._roles.admin)) {
      throw new UnauthorizedError(caller, operation);
    }
  }

  private onlyPositionManager(caller: Address, operation: string) {
    if (!isAddressEqual(caller, this._roles.positionManager)) {
      throw new UnauthorizedError(caller, operation);
    }
  }

  /**
   * Queues an event; it is published once the outermost operation commits
   */
  protected emit(event: DistributorEvent) {
    this._pendingEvents.push(event);
  }

  /**
   * Runs `operation` with all-or-nothing semantics
   */
  protected atomic<T>(operation: () => T): T {
    const state = this.cloneState(this._state);
    const restoreBalances = this._vault.checkpoint();
    const eventCount = this._pendingEvents.length;
    this._depth++;
    try {
      return operation();
    } catch (error) {
      this._state = state;
      restoreBalances();
      this._pendingEvents.length = eventCount;
      throw error;
    } finally {
      this._depth--;
      if (this._depth === 0) this.publishEvents();
    }
  }

  /**
   * `atomic`, refusing to start while another guarded operation is in flight,
   * ie when called back from one of its token transfers
   */
  protected nonReentrant<T>(name: string, operation: () => T): T {
    if (this._inFlight !== undefined) {
      throw new OperationInProgressError(name);
    }
    this._inFlight = name;
    try {
      return this.atomic(operation);
    } finally {
      this._inFlight = undefined;
    }
  }

  /**
   * Runs `view` against a throwaway copy of the state
   */
  protected dryRun<T>(view: () => T): T {
    const state = this._state;
    const eventCount = this._pendingEvents.length;
    this._state = this.cloneState(state);
    try {
      return view();
    } finally {
      this._state = state;
      this._pendingEvents.length = eventCount;
    }
  }

  private publishEvents() {
    const events = this._pendingEvents;
    this._pendingEvents = [];
    for (const event of events) {
      this._events.next(event);
    }
  }
}
