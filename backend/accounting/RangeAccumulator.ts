import { Address } from "viem";
import { ArithmeticError, InvalidArgumentError } from "../errors";
import {
  addDelta,
  checkedAdd,
  checkedMul,
  checkedSub,
  MAX_UINT128,
  mulDiv,
  Q128,
  wrappingSub,
} from "./FixedPoint";
import {
  flipTick,
  initializedTicksCrossed,
  TickBitmap,
  validateTick,
  validateTickSpacing,
} from "./TickBitmap";

export interface TickInfo {
  liquidityGross: bigint; // total liquidity referencing this tick
  liquidityNet: bigint; // applied when the active tick crosses upward
  // per reward token, snapshot of the global accumulator on the side of the tick away from the active tick
  rewardsPerLiquidityOutsideX128: Map<Address, bigint>;
}

/**
 * Per-pool reward accumulator. Plain data so it can be cloned, persisted and
 * restored; every mutation goes through the functions of this module.
 */
export interface RangeAccumulatorState {
  tickSpacing: number;
  activeTick: number;
  activeLiquidity: bigint; // liquidity of all ranges straddling `activeTick`
  lastSyncTimestamp: bigint;
  cumulativeRplX128: Map<Address, bigint>; // rewards per unit of in-range liquidity since inception
  ticks: Map<number, TickInfo>;
  bitmap: TickBitmap;
}

export function createRangeAccumulator(
  tickSpacing: number,
  activeTick: number,
  timestamp: bigint
): RangeAccumulatorState {
  validateTickSpacing(tickSpacing);
  validateTick(activeTick);
  return {
    tickSpacing,
    activeTick,
    activeLiquidity: 0n,
    lastSyncTimestamp: timestamp,
    cumulativeRplX128: new Map(),
    ticks: new Map(),
    bitmap: new Map(),
  };
}

export function cloneRangeAccumulator(
  state: RangeAccumulatorState
): RangeAccumulatorState {
  return {
    ...state,
    cumulativeRplX128: new Map(state.cumulativeRplX128),
    ticks: new Map(
      [...state.ticks].map(([tick, info]): [number, TickInfo] => [
        tick,
        {
          ...info,
          rewardsPerLiquidityOutsideX128: new Map(
            info.rewardsPerLiquidityOutsideX128
          ),
        },
      ])
    ),
    bitmap: new Map(state.bitmap),
  };
}

export function cumulativeOf(
  state: RangeAccumulatorState,
  token: Address
): bigint {
  return state.cumulativeRplX128.get(token) ?? 0n;
}

/**
 * Reward tokens the accumulator has ever been synced with
 */
export function accumulatorTokens(state: RangeAccumulatorState): Address[] {
  return [...state.cumulativeRplX128.keys()];
}

/**
 * Advances the accumulator to `now`, then moves it to `activeTick`.
 *
 * The elapsed interval is credited to the liquidity that was active during it:
 * `rate * dt * Q128 / activeLiquidity` per token. With no active liquidity the
 * interval accrues nothing, yet `lastSyncTimestamp` still advances so idle time
 * is never credited retroactively once liquidity returns.
 * Every initialized tick crossed on the way to `activeTick` has its outside
 * snapshots flipped and its net liquidity applied.
 */
export function sync(
  state: RangeAccumulatorState,
  tokens: readonly Address[],
  ratesPerSecond: readonly bigint[],
  activeTick: number,
  now: bigint
) {
  if (tokens.length !== ratesPerSecond.length) {
    throw new InvalidArgumentError(
      `Got ${tokens.length} tokens but ${ratesPerSecond.length} rates`
    );
  }
  validateTick(activeTick);
  const negative = ratesPerSecond.findIndex((rate) => rate < 0n);
  if (negative !== -1) {
    throw new InvalidArgumentError(
      `Negative rate for ${tokens[negative]}: ${ratesPerSecond[negative]}`
    );
  }
  if (now < state.lastSyncTimestamp) {
    throw new InvalidArgumentError(
      `Sync at ${now} precedes last sync at ${state.lastSyncTimestamp}`
    );
  }

  const elapsed = now - state.lastSyncTimestamp;
  tokens.forEach((token, i) => {
    const rate = ratesPerSecond[i];
    const cumulative = cumulativeOf(state, token);
    if (elapsed === 0n || rate === 0n || state.activeLiquidity === 0n) {
      state.cumulativeRplX128.set(token, cumulative);
      return;
    }
    const growth = mulDiv(
      checkedMul(rate, elapsed),
      Q128,
      state.activeLiquidity
    );
    state.cumulativeRplX128.set(token, checkedAdd(cumulative, growth));
  });
  state.lastSyncTimestamp = now;

  crossTo(state, activeTick);
}

function crossTo(state: RangeAccumulatorState, activeTick: number) {
  const crossed = initializedTicksCrossed(
    state.bitmap,
    state.tickSpacing,
    state.activeTick,
    activeTick
  );
  const movingUp = activeTick > state.activeTick;

  let activeLiquidity = state.activeLiquidity;
  for (const tick of crossed) {
    const liquidityNet = crossTick(state, tick);
    activeLiquidity = addDelta(
      activeLiquidity,
      movingUp ? liquidityNet : -liquidityNet
    );
  }
  state.activeLiquidity = activeLiquidity;
  state.activeTick = activeTick;
}

/**
 * Flips the outside snapshots of `tick`: `outside = cumulative - outside`
 * @returns the tick's net liquidity
 */
function crossTick(state: RangeAccumulatorState, tick: number): bigint {
  const info = state.ticks.get(tick);
  if (!info) {
    throw new InvalidArgumentError(`Tick ${tick} is flagged but has no data`);
  }
  for (const [token, cumulative] of state.cumulativeRplX128) {
    const outside = info.rewardsPerLiquidityOutsideX128.get(token) ?? 0n;
    info.rewardsPerLiquidityOutsideX128.set(
      token,
      checkedSub(cumulative, outside)
    );
  }
  return info.liquidityNet;
}

/**
 * The outside value of `tick`; uninitialized ticks read as if initialized now
 */
function outsideOf(
  state: RangeAccumulatorState,
  token: Address,
  tick: number,
  cumulative: bigint
): bigint {
  const info = state.ticks.get(tick);
  if (info) return info.rewardsPerLiquidityOutsideX128.get(token) ?? 0n;
  return tick <= state.activeTick ? cumulative : 0n;
}

/**
 * Rewards per unit of liquidity accumulated inside `[tickLower, tickUpper)`,
 * relative to an arbitrary origin: only the difference between two readings of
 * the same range is meaningful. Computed modulo 2^256.
 */
export function rangeValue(
  state: RangeAccumulatorState,
  token: Address,
  tickLower: number,
  tickUpper: number
): bigint {
  const cumulative = cumulativeOf(state, token);
  const lowerOutside = outsideOf(state, token, tickLower, cumulative);
  const upperOutside = outsideOf(state, token, tickUpper, cumulative);

  const below =
    state.activeTick >= tickLower
      ? lowerOutside
      : wrappingSub(cumulative, lowerOutside);
  const above =
    state.activeTick < tickUpper
      ? upperOutside
      : wrappingSub(cumulative, upperOutside);

  return wrappingSub(wrappingSub(cumulative, below), above);
}

export function validateRange(
  state: RangeAccumulatorState,
  tickLower: number,
  tickUpper: number
) {
  validateTick(tickLower);
  validateTick(tickUpper);
  if (tickLower >= tickUpper) {
    throw new InvalidArgumentError(
      `tickLower ${tickLower} must be below tickUpper ${tickUpper}`
    );
  }
  if (
    tickLower % state.tickSpacing !== 0 ||
    tickUpper % state.tickSpacing !== 0
  ) {
    throw new InvalidArgumentError(
      `Range [${tickLower}, ${tickUpper}) is not aligned to spacing ${state.tickSpacing}`
    );
  }
}

/**
 * Applies `liquidityDelta` to both boundary ticks of `[tickLower, tickUpper)`,
 * keeping the bitmap in step with `liquidityGross`, and to the active liquidity
 * when the range straddles the active tick.
 * All updates are validated before any of them is written.
 */
export function modifyLiquidity(
  state: RangeAccumulatorState,
  tickLower: number,
  tickUpper: number,
  liquidityDelta: bigint
) {
  validateRange(state, tickLower, tickUpper);
  if (liquidityDelta === 0n) return;

  const lower = nextTickInfo(state, tickLower, liquidityDelta, false);
  const upper = nextTickInfo(state, tickUpper, liquidityDelta, true);
  const inRange =
    tickLower <= state.activeTick && state.activeTick < tickUpper;
  const activeLiquidity = inRange
    ? addDelta(state.activeLiquidity, liquidityDelta)
    : state.activeLiquidity;

  for (const [tick, update] of [
    [tickLower, lower],
    [tickUpper, upper],
  ] as const) {
    if (update.flipped) flipTick(state.bitmap, tick, state.tickSpacing);
    if (update.info.liquidityGross === 0n) {
      state.ticks.delete(tick);
    } else {
      state.ticks.set(tick, update.info);
    }
  }
  state.activeLiquidity = activeLiquidity;
}

function nextTickInfo(
  state: RangeAccumulatorState,
  tick: number,
  liquidityDelta: bigint,
  upper: boolean
): { info: TickInfo; flipped: boolean } {
  const existing = state.ticks.get(tick);
  const grossBefore = existing?.liquidityGross ?? 0n;
  const grossAfter = addDelta(grossBefore, liquidityDelta);

  const outside = new Map(existing?.rewardsPerLiquidityOutsideX128 ?? []);
  if (grossBefore === 0n && tick <= state.activeTick) {
    // by convention, all growth before a tick was initialized happened below it
    for (const [token, cumulative] of state.cumulativeRplX128) {
      outside.set(token, cumulative);
    }
  }

  const netBefore = existing?.liquidityNet ?? 0n;
  const liquidityNet = upper
    ? netBefore - liquidityDelta
    : netBefore + liquidityDelta;
  if (liquidityNet > MAX_UINT128 || liquidityNet < -MAX_UINT128) {
    throw new ArithmeticError(
      "overflow",
      `liquidityNet ${liquidityNet} of tick ${tick} exceeds int128`
    );
  }

  return {
    info: {
      liquidityGross: grossAfter,
      liquidityNet,
      rewardsPerLiquidityOutsideX128: outside,
    },
    flipped: (grossAfter === 0n) !== (grossBefore === 0n),
  };
}
