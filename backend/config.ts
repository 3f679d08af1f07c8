import * as dotenv from "dotenv";
import { Address, getAddress } from "viem";
import { base, polygon } from "viem/chains";
dotenv.config();

export enum ChainId {
  Polygon = 137,
  Base = 8453,
}

const rpcUrls: Record<ChainId, string> = {
  [ChainId.Polygon]:
    process.env.POLYGON_RPC_URL ?? polygon.rpcUrls.default.http[0],
  [ChainId.Base]: process.env.BASE_RPC_URL ?? base.rpcUrls.default.http[0],
};

// Uniswap v4 StateView lens, read for the active tick of each pool
const stateView: Record<ChainId, Address> = {
  [ChainId.Polygon]: getAddress("0x5ea1bd7974c8a611cbab0bdcafcb1d9cc9b3ba5a"),
  [ChainId.Base]: getAddress("0xa3c0c9b65bad0b08107aa264b0f3db444b867a71"),
};

export const config = {
  chains: [polygon, base],
  rpcUrls,
  stateView,
  secondsPerDay: 86_400n,
  // rewards deposited on day N stream on day N + 2
  epochActivationDelayDays: 2n,
  incentiveDuration: 7n * 86_400n,
  stateDbPath: process.env.REWARDS_STATE_DB ?? "db/rewards",
  keeperIntervalMs: Number(process.env.KEEPER_INTERVAL_MS ?? 60_000),
};
