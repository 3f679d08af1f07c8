import * as XLSX from "xlsx";
import { Address, formatUnits, getAddress } from "viem";
import { BaseRewardDistributor } from "./distributors/BaseRewardDistributor";

export type ReportToken = {
  address: Address;
  symbol: string;
  decimals: number;
};

type Row = Record<string, string | number | boolean>;

/**
 * Renders a distributor's pools, positions and the pending rewards of every
 * owner into a workbook with the sheets `Pools`, `Positions` and `Owners`.
 * Amounts of tokens missing from `tokens` are shown unscaled, under their address.
 */
export function buildRewardsWorkbook<S>(
  distributor: BaseRewardDistributor<S>,
  tokens: ReportToken[]
): XLSX.WorkBook {
  const tokenInfo = new Map(
    tokens.map((t) => [getAddress(t.address), t] as const)
  );
  const label = (token: Address) => tokenInfo.get(token)?.symbol ?? token;
  const format = (token: Address, amount: bigint) =>
    formatUnits(amount, tokenInfo.get(token)?.decimals ?? 0);

  const state = distributor.snapshot();

  const pools: Row[] = [...state.pools.values()].map(({ poolId, accumulator }) => ({
    poolId,
    tickSpacing: accumulator.tickSpacing,
    activeTick: accumulator.activeTick,
    activeLiquidity: accumulator.activeLiquidity.toString(),
    lastSyncTimestamp: accumulator.lastSyncTimestamp.toString(),
  }));

  const positions: Row[] = [...state.positions.values()].map((position) => {
    const row: Row = {
      positionKey: position.positionKey,
      owner: position.owner,
      poolId: position.poolId,
      tickLower: position.tickLower,
      tickUpper: position.tickUpper,
      liquidity: position.liquidity.toString(),
      subscribed: position.subscribed,
    };
    for (const [token, amount] of distributor.pendingRewards(position.positionKey)) {
      row[`pending ${label(token)}`] = format(token, amount);
    }
    return row;
  });

  const owners: Row[] = [];
  for (const owner of state.claimIndex.keys()) {
    for (const [token, amount] of distributor.pendingRewardsOwner(owner)) {
      owners.push({ owner, token: label(token), pending: format(token, amount) });
    }
  }

  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(pools), "Pools");
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(positions), "Positions");
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(owners), "Owners");
  return wb;
}

export function writeRewardsReport<S>(
  distributor: BaseRewardDistributor<S>,
  tokens: ReportToken[],
  outputFile: string
) {
  XLSX.writeFile(buildRewardsWorkbook(distributor, tokens), outputFile);
  console.log(`Rewards report saved to ${outputFile}`);
}
