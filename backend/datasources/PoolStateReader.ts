import { Address, Hex, PublicClient } from "viem";
import { StateViewAbi } from "../abi/abi";
import { ChainId, config } from "../config";
import { createRpcClient } from "../helpers";

/**
 * Source of the pools' current active ticks
 */
export abstract class BasePoolStateReader {
  abstract getActiveTick(poolId: Hex): Promise<number>;
}

/**
 * Reads the active tick of Uniswap v4 pools from the StateView lens
 */
export class StateViewPoolStateReader extends BasePoolStateReader {
  public client: PublicClient;
  readonly stateView: Address;

  constructor(readonly chain: ChainId, client?: PublicClient) {
    super();
    this.client = client ?? createRpcClient(this.chain);
    this.stateView = config.stateView[this.chain];
  }

  async getActiveTick(poolId: Hex): Promise<number> {
    const [, tick] = await this.client.readContract({
      address: this.stateView,
      abi: StateViewAbi,
      functionName: "getSlot0",
      args: [poolId],
    });
    return tick;
  }
}
