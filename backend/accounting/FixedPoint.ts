import { ArithmeticError } from "../errors";

export const Q128 = 2n ** 128n;
export const MAX_UINT128 = 2n ** 128n - 1n;
export const MAX_UINT256 = 2n ** 256n - 1n;
const UINT256_MODULUS = 2n ** 256n;

export function checkedAdd(a: bigint, b: bigint, max = MAX_UINT256): bigint {
  const result = a + b;
  if (result > max) {
    throw new ArithmeticError("overflow", `${a} + ${b} exceeds ${max}`);
  }
  return result;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new ArithmeticError("underflow", `${a} - ${b} is negative`);
  }
  return a - b;
}

export function checkedMul(a: bigint, b: bigint, max = MAX_UINT256): bigint {
  const result = a * b;
  if (result > max) {
    throw new ArithmeticError("overflow", `${a} * ${b} exceeds ${max}`);
  }
  return result;
}

/**
 * Applies a signed liquidity delta to an unsigned uint128 liquidity amount.
 * Removing more liquidity than present is fatal, it never wraps.
 */
export function addDelta(liquidity: bigint, delta: bigint): bigint {
  const result = liquidity + delta;
  if (result < 0n) {
    throw new ArithmeticError(
      "underflow",
      `liquidity ${liquidity} cannot absorb delta ${delta}`
    );
  }
  if (result > MAX_UINT128) {
    throw new ArithmeticError(
      "overflow",
      `liquidity ${liquidity} + ${delta} exceeds uint128`
    );
  }
  return result;
}

/**
 * floor(a * b / denominator), the full-precision product never truncates
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new ArithmeticError("division-by-zero", `${a} * ${b} / 0`);
  }
  const result = (a * b) / denominator;
  if (result > MAX_UINT256) {
    throw new ArithmeticError(
      "overflow",
      `${a} * ${b} / ${denominator} exceeds uint256`
    );
  }
  return result;
}

// uint256 subtraction modulo 2^256, as fee-growth-inside arithmetic is done on-chain
export function wrappingSub(a: bigint, b: bigint): bigint {
  return (((a - b) % UINT256_MODULUS) + UINT256_MODULUS) % UINT256_MODULUS;
}
