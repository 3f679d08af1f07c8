import { Hex } from "viem";
import { config } from "../config";
import { BasePoolStateReader } from "../datasources/PoolStateReader";
import { IRewardDistributor } from "../distributors/IRewardDistributor";

export type PokeResult =
  | { poolId: Hex; ok: true; activeTick: number }
  | { poolId: Hex; ok: false; error: unknown };

/**
 * Off-chain scheduler keeping the distributor's pools current: reads every
 * pool's active tick and pokes the pool with it.
 */
export class PoolKeeper {
  private _timer?: NodeJS.Timeout;
  private _running = false;

  constructor(
    private readonly _distributor: Pick<
      IRewardDistributor<unknown>,
      "pokePool" | "poolIds"
    >,
    private readonly _reader: BasePoolStateReader,
    readonly intervalMs: number = config.keeperIntervalMs
  ) {}

  get running() {
    return this._running;
  }

  /**
   * Pokes every pool once; a pool that fails is reported and does not stop the others
   */
  async pokeAll(): Promise<PokeResult[]> {
    const results: PokeResult[] = [];
    for (const poolId of this._distributor.poolIds()) {
      try {
        const activeTick = await this._reader.getActiveTick(poolId);
        this._distributor.pokePool(poolId, activeTick);
        results.push({ poolId, ok: true, activeTick });
      } catch (error) {
        console.error(`Error poking pool ${poolId}:`, error);
        results.push({ poolId, ok: false, error });
      }
    }
    const failed = results.filter((r) => !r.ok).length;
    console.log(
      `Poked ${results.length - failed} of ${results.length} pools` +
        (failed ? `, ${failed} failed` : "")
    );
    return results;
  }

  /**
   * Pokes all pools now, then again every `intervalMs` until `stop` is called
   */
  start() {
    if (this._running) return;
    this._running = true;
    this.loop();
  }

  stop() {
    this._running = false;
    clearTimeout(this._timer);
    this._timer = undefined;
  }

  private loop() {
    void this.pokeAll()
      .catch((error) => console.error("Keeper run failed:", error))
      .finally(() => {
        if (this._running) {
          this._timer = setTimeout(() => this.loop(), this.intervalMs);
        }
      });
  }
}
