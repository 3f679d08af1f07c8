import {
  compressTick,
  flipTick,
  initializedTicksCrossed,
  isInitialized,
  leastSignificantBit,
  mostSignificantBit,
  nextInitializedTickWithinOneWord,
  TickBitmap,
  tickPosition,
} from "../accounting/TickBitmap";
import { InvalidArgumentError } from "../errors";

function bitmapOf(ticks: number[], tickSpacing: number): TickBitmap {
  const bitmap: TickBitmap = new Map();
  for (const tick of ticks) flipTick(bitmap, tick, tickSpacing);
  return bitmap;
}

describe("tick compression", () => {
  it("rounds toward negative infinity", () => {
    expect(compressTick(59, 60)).toBe(0);
    expect(compressTick(-1, 60)).toBe(-1);
    expect(compressTick(-60, 60)).toBe(-1);
    expect(compressTick(-61, 60)).toBe(-2);
  });

  it("maps negative compressed ticks to the last bit of the previous word", () => {
    expect(tickPosition(-1)).toEqual({ wordPos: -1, bitPos: 255 });
    expect(tickPosition(256)).toEqual({ wordPos: 1, bitPos: 0 });
  });
});

describe("bit scans", () => {
  it("finds the most and least significant bits", () => {
    expect(mostSignificantBit(1n << 200n)).toBe(200);
    expect(mostSignificantBit(1n)).toBe(0);
    expect(leastSignificantBit(0b1010n)).toBe(1);
  });
});

describe("flipTick", () => {
  it("sets and clears a tick, dropping emptied words", () => {
    const bitmap: TickBitmap = new Map();
    flipTick(bitmap, -60, 60);
    expect(isInitialized(bitmap, -60, 60)).toBe(true);
    expect(bitmap.get(-1)).toBe(1n << 255n);

    flipTick(bitmap, -60, 60);
    expect(isInitialized(bitmap, -60, 60)).toBe(false);
    expect(bitmap.size).toBe(0);
  });

  it("rejects ticks off the spacing grid", () => {
    expect(() => flipTick(new Map(), 30, 60)).toThrow(InvalidArgumentError);
  });
});

describe("nextInitializedTickWithinOneWord", () => {
  const bitmap = bitmapOf([1200], 60);

  it("searches upward strictly above the tick", () => {
    expect(nextInitializedTickWithinOneWord(bitmap, 1020, 60, false)).toEqual({
      next: 1200,
      initialized: true,
    });
  });

  it("searches downward including the tick itself", () => {
    expect(nextInitializedTickWithinOneWord(bitmap, 1200, 60, true)).toEqual({
      next: 1200,
      initialized: true,
    });
  });

  it("stops at the word boundary when nothing is initialized", () => {
    expect(nextInitializedTickWithinOneWord(bitmap, 1199, 60, true)).toEqual({
      next: 0,
      initialized: false,
    });
    expect(nextInitializedTickWithinOneWord(new Map(), 0, 1, false)).toEqual({
      next: 255,
      initialized: false,
    });
  });
});

describe("initializedTicksCrossed", () => {
  const bitmap = bitmapOf([-60, 60, 120], 60);

  it("lists ticks crossed moving up, in ascending order", () => {
    expect(initializedTicksCrossed(bitmap, 60, -120, 60)).toEqual([-60, 60]);
  });

  it("lists ticks crossed moving down, in descending order", () => {
    expect(initializedTicksCrossed(bitmap, 60, 120, -60)).toEqual([120, 60]);
  });

  it("crosses ticks in other words", () => {
    expect(initializedTicksCrossed(bitmapOf([-60], 60), 60, 0, -120)).toEqual([
      -60,
    ]);
  });

  it("crosses nothing when the tick does not move", () => {
    expect(initializedTicksCrossed(bitmap, 60, 60, 60)).toEqual([]);
  });
});
