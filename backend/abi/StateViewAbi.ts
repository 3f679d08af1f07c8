import { parseAbi } from "viem";

// subset of the Uniswap v4 StateView lens read by the keeper
export default parseAbi([
  "function getSlot0(bytes32 poolId) external view returns (uint160 sqrtPriceX96, int24 tick, uint24 protocolFee, uint24 lpFee)",
]);
