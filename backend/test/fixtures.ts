import { Hex } from "viem";
import { generateMockHex } from "../helpers";
import { PositionNotification } from "../distributors/IRewardDistributor";

export const DAY = 86_400n;
export const Q64 = 2n ** 64n;

export const ADMIN = generateMockHex(20, 1);
export const POSITION_MANAGER = generateMockHex(20, 2);
export const REWARD_SOURCE = generateMockHex(20, 3);
export const DISTRIBUTOR = generateMockHex(20, 4);
export const ALICE = generateMockHex(20, 5);
export const BOB = generateMockHex(20, 6);
export const TOKEN_A = generateMockHex(20, 7);
export const TOKEN_B = generateMockHex(20, 8);

export const POOL = generateMockHex(32, 1);
export const OTHER_POOL = generateMockHex(32, 2);

// widest range on a spacing of 60
export const FULL_RANGE = { tickLower: -887220, tickUpper: 887220 };

export function notification(
  positionKey: Hex,
  owner: Hex,
  range: { tickLower: number; tickUpper: number },
  liquidityDelta: bigint,
  poolId: Hex = POOL
): PositionNotification {
  return { positionKey, owner, poolId, ...range, liquidityDelta };
}
