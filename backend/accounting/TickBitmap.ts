import { InvalidArgumentError } from "../errors";
import { MAX_UINT256 } from "./FixedPoint";

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;
export const MAX_TICK_SPACING = 32767;

/// word position (`compressedTick >> 8`) => 256-bit word; absent words are all zero
export type TickBitmap = Map<number, bigint>;

export function validateTickSpacing(tickSpacing: number) {
  if (
    !Number.isInteger(tickSpacing) ||
    tickSpacing < 1 ||
    tickSpacing > MAX_TICK_SPACING
  ) {
    throw new InvalidArgumentError(`Invalid tick spacing: ${tickSpacing}`);
  }
}

export function validateTick(tick: number) {
  if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
    throw new InvalidArgumentError(`Tick out of range: ${tick}`);
  }
}

/**
 * Compresses a tick by the pool's spacing, rounding toward negative infinity
 */
export function compressTick(tick: number, tickSpacing: number): number {
  return Math.floor(tick / tickSpacing);
}

/**
 * Convert a compressed tick to its word and bit position in the bitmap
 */
export function tickPosition(compressed: number): {
  wordPos: number;
  bitPos: number;
} {
  return { wordPos: compressed >> 8, bitPos: compressed & 255 };
}

export function mostSignificantBit(word: bigint): number {
  if (word <= 0n) throw new InvalidArgumentError("Word must be nonzero");
  return word.toString(2).length - 1;
}

export function leastSignificantBit(word: bigint): number {
  if (word <= 0n) throw new InvalidArgumentError("Word must be nonzero");
  return mostSignificantBit(word & -word);
}

/**
 * Flips the initialized state of `tick`, which must sit on the spacing grid
 */
export function flipTick(bitmap: TickBitmap, tick: number, tickSpacing: number) {
  if (tick % tickSpacing !== 0) {
    throw new InvalidArgumentError(
      `Tick ${tick} is not a multiple of spacing ${tickSpacing}`
    );
  }
  const { wordPos, bitPos } = tickPosition(tick / tickSpacing);
  const word = (bitmap.get(wordPos) ?? 0n) ^ (1n << BigInt(bitPos));
  if (word === 0n) {
    bitmap.delete(wordPos);
  } else {
    bitmap.set(wordPos, word);
  }
}

export function isInitialized(
  bitmap: TickBitmap,
  tick: number,
  tickSpacing: number
): boolean {
  if (tick % tickSpacing !== 0) return false;
  const { wordPos, bitPos } = tickPosition(tick / tickSpacing);
  return ((bitmap.get(wordPos) ?? 0n) & (1n << BigInt(bitPos))) !== 0n;
}

/**
 * Finds the next initialized tick contained in the same word as `tick`.
 * With `lte` the search runs downward and includes `tick` itself, otherwise it
 * runs upward starting strictly above `tick`.
 * When nothing is initialized in the word, the word's boundary tick is
 * returned with `initialized == false` so callers can continue from there.
 */
export function nextInitializedTickWithinOneWord(
  bitmap: TickBitmap,
  tick: number,
  tickSpacing: number,
  lte: boolean
): { next: number; initialized: boolean } {
  const compressed = compressTick(tick, tickSpacing);

  if (lte) {
    const { wordPos, bitPos } = tickPosition(compressed);
    // all the 1s at or to the right of the current bitPos
    const mask = (1n << BigInt(bitPos)) - 1n + (1n << BigInt(bitPos));
    const masked = (bitmap.get(wordPos) ?? 0n) & mask;
    const initialized = masked !== 0n;
    const next = initialized
      ? (compressed - (bitPos - mostSignificantBit(masked))) * tickSpacing
      : (compressed - bitPos) * tickSpacing;
    return { next, initialized };
  }

  // start from the word of the next tick, since the current tick state doesn't matter
  const { wordPos, bitPos } = tickPosition(compressed + 1);
  // all the 1s at or to the left of the bitPos
  const mask = MAX_UINT256 ^ ((1n << BigInt(bitPos)) - 1n);
  const masked = (bitmap.get(wordPos) ?? 0n) & mask;
  const initialized = masked !== 0n;
  const next = initialized
    ? (compressed + 1 + (leastSignificantBit(masked) - bitPos)) * tickSpacing
    : (compressed + 1 + (255 - bitPos)) * tickSpacing;
  return { next, initialized };
}

/**
 * Lists the initialized ticks crossed when the active tick moves from `fromTick`
 * to `toTick`, in crossing order: ascending `(fromTick, toTick]` when moving up,
 * descending `(toTick, fromTick]` when moving down.
 */
export function initializedTicksCrossed(
  bitmap: TickBitmap,
  tickSpacing: number,
  fromTick: number,
  toTick: number
): number[] {
  const crossed: number[] = [];
  if (bitmap.size === 0 || fromTick === toTick) return crossed;

  if (toTick > fromTick) {
    let cursor = fromTick;
    while (cursor < toTick) {
      const { next, initialized } = nextInitializedTickWithinOneWord(
        bitmap,
        cursor,
        tickSpacing,
        false
      );
      if (next > toTick) break;
      if (initialized) crossed.push(next);
      cursor = next;
    }
  } else {
    let cursor = fromTick;
    while (cursor > toTick) {
      const { next, initialized } = nextInitializedTickWithinOneWord(
        bitmap,
        cursor,
        tickSpacing,
        true
      );
      if (next <= toTick) break;
      if (initialized) crossed.push(next);
      cursor = next - 1;
    }
  }

  return crossed;
}
