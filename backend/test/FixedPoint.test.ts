import {
  addDelta,
  checkedAdd,
  checkedMul,
  checkedSub,
  MAX_UINT128,
  MAX_UINT256,
  mulDiv,
  Q128,
  wrappingSub,
} from "../accounting/FixedPoint";
import { ArithmeticError } from "../errors";

describe("checked arithmetic", () => {
  it("adds within bounds and rejects overflow", () => {
    expect(checkedAdd(2n, 3n)).toBe(5n);
    expect(() => checkedAdd(MAX_UINT256, 1n)).toThrow(ArithmeticError);
    expect(() => checkedAdd(MAX_UINT128, 1n, MAX_UINT128)).toThrow(
      "overflow"
    );
  });

  it("rejects subtraction below zero", () => {
    expect(checkedSub(5n, 5n)).toBe(0n);
    expect(() => checkedSub(1n, 2n)).toThrow("underflow");
  });

  it("rejects products above the bound", () => {
    expect(checkedMul(Q128, Q128 - 1n)).toBe(Q128 * (Q128 - 1n));
    expect(() => checkedMul(Q128, Q128)).toThrow("overflow");
  });
});

describe("addDelta", () => {
  it("applies signed deltas", () => {
    expect(addDelta(5n, -2n)).toBe(3n);
    expect(addDelta(5n, 2n)).toBe(7n);
  });

  it("never wraps when removing more liquidity than present", () => {
    expect(() => addDelta(5n, -6n)).toThrow("underflow");
  });

  it("caps liquidity at uint128", () => {
    expect(() => addDelta(MAX_UINT128, 1n)).toThrow("overflow");
  });
});

describe("mulDiv", () => {
  it("rounds down", () => {
    expect(mulDiv(7n, 3n, 2n)).toBe(10n);
  });

  it("keeps the full precision of the product", () => {
    expect(mulDiv(Q128, Q128, Q128)).toBe(Q128);
  });

  it("rejects a zero denominator", () => {
    let error: unknown;
    try {
      mulDiv(1n, 1n, 0n);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ArithmeticError);
    expect(error).toHaveProperty("fault", "division-by-zero");
  });

  it("rejects results above uint256", () => {
    expect(() => mulDiv(MAX_UINT256, 2n, 1n)).toThrow("overflow");
  });
});

describe("wrappingSub", () => {
  it("subtracts modulo 2^256", () => {
    expect(wrappingSub(5n, 3n)).toBe(2n);
    expect(wrappingSub(3n, 5n)).toBe(MAX_UINT256 - 1n);
    expect(wrappingSub(0n, MAX_UINT256)).toBe(1n);
  });
});
