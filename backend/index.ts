export * from "./accounting/FixedPoint";
export * from "./accounting/TickBitmap";
export * from "./accounting/RangeAccumulator";
export * from "./accounting/PositionAccrual";
export * from "./distributors/ClaimIndex";
export * from "./distributors/IRewardDistributor";
export * from "./distributors/BaseRewardDistributor";
export * from "./distributors/EpochRewardDistributor";
export * from "./distributors/StreamRewardDistributor";
export * from "./datasources/TokenVault";
export * from "./datasources/PoolStateReader";
export * from "./datasources/persistent/BaseDatabase";
export * from "./datasources/persistent/DistributorStateDatabase";
export * from "./keepers/PoolKeeper";
export * from "./rewardsReport";
export * from "./errors";
export * from "./helpers";
export { ChainId, config } from "./config";
