import { Level } from "level";
import { emptyDistributorState } from "../../distributors/BaseRewardDistributor";
import {
  DistributorState,
  IRewardDistributor,
} from "../../distributors/IRewardDistributor";
import { config } from "../../config";
import { BaseDatabase } from "./BaseDatabase";

function isDistributorState<S>(value: unknown): value is DistributorState<S> {
  return (
    typeof value === "object" &&
    value !== null &&
    "pools" in value &&
    value.pools instanceof Map &&
    "positions" in value &&
    value.positions instanceof Map &&
    "claimIndex" in value &&
    value.claimIndex instanceof Map &&
    "rewardTokens" in value &&
    value.rewardTokens instanceof Set
  );
}

/**
 * Stores distributor states by distributor id.
 *
 * A distributor that was never saved loads as a fresh, empty state.
 */
export abstract class BaseDistributorStateDatabase<S> extends BaseDatabase<
  string,
  DistributorState<S>
> {
  protected fetchData(): Promise<DistributorState<S>> {
    return Promise.resolve(emptyDistributorState());
  }

  protected decode(value: unknown): DistributorState<S> {
    if (!isDistributorState<S>(value)) {
      throw new Error("Stored value is not a distributor state");
    }
    return value;
  }

  load(distributorId: string): Promise<DistributorState<S>> {
    return this.getValue(distributorId);
  }

  /// Persist a snapshot of `distributor` under `distributorId`
  save(distributorId: string, distributor: Pick<IRewardDistributor<S>, "snapshot">) {
    return this.putValue(distributorId, distributor.snapshot());
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "LEVEL_NOT_FOUND"
  );
}

export class DistributorStateDatabase<S> extends BaseDistributorStateDatabase<S> {
  readonly DB_NAME: string;
  private readonly _db: Level<string, string>;

  constructor(path: string = config.stateDbPath) {
    super();
    this.DB_NAME = path;
    this._db = new Level(this.DB_NAME, { valueEncoding: "utf8" });
  }

  protected async getFromStore(key: string): Promise<string | undefined> {
    try {
      return await this._db.get(key);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  protected putToStore(key: string, val: string): Promise<void> {
    return this._db.put(key, val);
  }

  /// Close the database connection.
  async close(): Promise<void> {
    try {
      await this._db.close();
    } catch (error) {
      console.error(`Error closing distributor state database ${this.DB_NAME}:`, error);
      throw error;
    }
  }
}
