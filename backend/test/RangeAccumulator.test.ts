import { Q128 } from "../accounting/FixedPoint";
import {
  accumulatorTokens,
  createRangeAccumulator,
  cumulativeOf,
  modifyLiquidity,
  rangeValue,
  RangeAccumulatorState,
  sync,
} from "../accounting/RangeAccumulator";
import { isInitialized } from "../accounting/TickBitmap";
import { ArithmeticError, InvalidArgumentError } from "../errors";
import { TOKEN_A } from "./fixtures";

// one range [-120, 120) of liquidity 1000 around tick 0, at time 0
function poolWithRange(): RangeAccumulatorState {
  const state = createRangeAccumulator(60, 0, 0n);
  modifyLiquidity(state, -120, 120, 1000n);
  return state;
}

describe("modifyLiquidity", () => {
  it("initializes both ticks and the active liquidity of an in-range position", () => {
    const state = poolWithRange();

    expect(state.activeLiquidity).toBe(1000n);
    expect(state.ticks.get(-120)).toEqual({
      liquidityGross: 1000n,
      liquidityNet: 1000n,
      rewardsPerLiquidityOutsideX128: new Map(),
    });
    expect(state.ticks.get(120)?.liquidityNet).toBe(-1000n);
    expect(isInitialized(state.bitmap, -120, 60)).toBe(true);
    expect(isInitialized(state.bitmap, 120, 60)).toBe(true);
  });

  it("leaves the active liquidity alone for an out-of-range position", () => {
    const state = poolWithRange();
    modifyLiquidity(state, 120, 240, 500n);

    expect(state.activeLiquidity).toBe(1000n);
    expect(state.ticks.get(120)).toMatchObject({
      liquidityGross: 1500n,
      liquidityNet: -500n,
    });
  });

  it("clears ticks and bits once all liquidity is removed", () => {
    const state = poolWithRange();
    modifyLiquidity(state, -120, 120, -1000n);

    expect(state.activeLiquidity).toBe(0n);
    expect(state.ticks.size).toBe(0);
    expect(state.bitmap.size).toBe(0);
  });

  it("fails without side effects when removing more than present", () => {
    const state = poolWithRange();

    expect(() => modifyLiquidity(state, -120, 120, -1001n)).toThrow(
      ArithmeticError
    );
    expect(state.activeLiquidity).toBe(1000n);
    expect(state.ticks.get(-120)?.liquidityGross).toBe(1000n);
    expect(state.ticks.get(120)?.liquidityGross).toBe(1000n);
  });

  it("rejects ranges that are empty or off the spacing grid", () => {
    const state = poolWithRange();

    expect(() => modifyLiquidity(state, 120, 120, 1n)).toThrow(
      InvalidArgumentError
    );
    expect(() => modifyLiquidity(state, -90, 120, 1n)).toThrow(
      InvalidArgumentError
    );
  });

  it("snapshots the accumulator on ticks initialized at or below the active tick", () => {
    const state = poolWithRange();
    sync(state, [TOKEN_A], [10n], 0, 100n);
    modifyLiquidity(state, -60, 60, 1000n);

    expect(
      state.ticks.get(-60)?.rewardsPerLiquidityOutsideX128.get(TOKEN_A)
    ).toBe(Q128);
    expect(
      state.ticks.get(60)?.rewardsPerLiquidityOutsideX128.get(TOKEN_A)
    ).toBeUndefined();
    // a new range starts with nothing inside it
    expect(rangeValue(state, TOKEN_A, -60, 60)).toBe(0n);
  });
});

describe("sync", () => {
  it("spreads the streamed amount over the active liquidity", () => {
    const state = poolWithRange();
    sync(state, [TOKEN_A], [10n], 0, 100n);

    // 10/s over 100s to 1000 units of liquidity
    expect(cumulativeOf(state, TOKEN_A)).toBe(Q128);
    expect(rangeValue(state, TOKEN_A, -120, 120)).toBe(Q128);
    expect(state.lastSyncTimestamp).toBe(100n);
  });

  it("advances time without accruing while no liquidity is active", () => {
    const state = createRangeAccumulator(60, 0, 0n);
    sync(state, [TOKEN_A], [10n], 0, 100n);

    expect(cumulativeOf(state, TOKEN_A)).toBe(0n);
    expect(accumulatorTokens(state)).toEqual([TOKEN_A]);
    expect(state.lastSyncTimestamp).toBe(100n);
  });

  it("stalls ranges while they are out of range and resumes once crossed into", () => {
    const state = poolWithRange();
    modifyLiquidity(state, 120, 240, 500n);

    sync(state, [TOKEN_A], [10n], 0, 100n);
    expect(rangeValue(state, TOKEN_A, 120, 240)).toBe(0n);

    // the price moves up into [120, 240) within the same second
    sync(state, [TOKEN_A], [10n], 150, 100n);
    expect(state.activeLiquidity).toBe(500n);
    expect(
      state.ticks.get(120)?.rewardsPerLiquidityOutsideX128.get(TOKEN_A)
    ).toBe(Q128);

    sync(state, [TOKEN_A], [10n], 150, 200n);
    expect(cumulativeOf(state, TOKEN_A)).toBe(3n * Q128);
    expect(rangeValue(state, TOKEN_A, 120, 240)).toBe(2n * Q128);
    expect(rangeValue(state, TOKEN_A, -120, 120)).toBe(Q128);
  });

  it("restores the active liquidity when the price comes back down", () => {
    const state = poolWithRange();
    modifyLiquidity(state, 120, 240, 500n);

    sync(state, [TOKEN_A], [10n], 150, 100n);
    sync(state, [TOKEN_A], [10n], -30, 200n);

    expect(state.activeLiquidity).toBe(1000n);
    expect(state.activeTick).toBe(-30);
  });

  it("rejects time going backwards", () => {
    const state = poolWithRange();
    sync(state, [TOKEN_A], [10n], 0, 100n);

    expect(() => sync(state, [TOKEN_A], [10n], 0, 99n)).toThrow(
      InvalidArgumentError
    );
  });

  it("rejects negative rates without touching the state", () => {
    const state = poolWithRange();

    expect(() => sync(state, [TOKEN_A], [-1n], 0, 100n)).toThrow(
      InvalidArgumentError
    );
    expect(state.lastSyncTimestamp).toBe(0n);
    expect(accumulatorTokens(state)).toEqual([]);
  });

  it("rejects mismatched token and rate lists", () => {
    expect(() => sync(poolWithRange(), [TOKEN_A], [], 0, 100n)).toThrow(
      InvalidArgumentError
    );
  });
});
