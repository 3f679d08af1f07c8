import type { Hex, PublicClient } from "viem";
import { ChainId, config } from "../config";
import {
  BasePoolStateReader,
  StateViewPoolStateReader,
} from "../datasources/PoolStateReader";
import { PoolKeeper } from "../keepers/PoolKeeper";
import { OTHER_POOL, POOL } from "./fixtures";

class FakePoolStateReader extends BasePoolStateReader {
  constructor(private readonly _ticks: Map<Hex, number>) {
    super();
  }

  async getActiveTick(poolId: Hex): Promise<number> {
    const tick = this._ticks.get(poolId);
    if (tick === undefined) throw new Error(`no slot0 for ${poolId}`);
    return tick;
  }
}

function createFakeDistributor(poolIds: Hex[]) {
  return {
    pokePool: jest.fn<void, [Hex, number]>(),
    poolIds: () => poolIds,
  };
}

describe("PoolKeeper", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("pokes every pool with its current tick", async () => {
    const distributor = createFakeDistributor([POOL, OTHER_POOL]);
    const keeper = new PoolKeeper(
      distributor,
      new FakePoolStateReader(new Map([[POOL, -120], [OTHER_POOL, 300]]))
    );

    const results = await keeper.pokeAll();

    expect(distributor.pokePool.mock.calls).toEqual([
      [POOL, -120],
      [OTHER_POOL, 300],
    ]);
    expect(results).toEqual([
      { poolId: POOL, ok: true, activeTick: -120 },
      { poolId: OTHER_POOL, ok: true, activeTick: 300 },
    ]);
  });

  it("reports a failing pool and carries on with the others", async () => {
    const distributor = createFakeDistributor([POOL, OTHER_POOL]);
    const keeper = new PoolKeeper(
      distributor,
      new FakePoolStateReader(new Map([[OTHER_POOL, 300]]))
    );

    const results = await keeper.pokeAll();

    expect(results[0]).toMatchObject({ poolId: POOL, ok: false });
    expect(results[1]).toEqual({ poolId: OTHER_POOL, ok: true, activeTick: 300 });
    expect(distributor.pokePool).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("keeps poking until stopped", async () => {
    const distributor = createFakeDistributor([POOL]);
    const keeper = new PoolKeeper(
      distributor,
      new FakePoolStateReader(new Map([[POOL, 0]])),
      60_000
    );

    keeper.start();
    expect(keeper.running).toBe(true);
    await new Promise((resolve) => setImmediate(resolve));
    keeper.stop();

    expect(keeper.running).toBe(false);
    expect(distributor.pokePool).toHaveBeenCalledWith(POOL, 0);
  });
});

describe("StateViewPoolStateReader", () => {
  it("reads the tick from slot0", async () => {
    const readContractMock = jest.fn(async () => [2n ** 96n, -1200, 0, 3000]);
    const client = {
      readContract: readContractMock,
    } as unknown as PublicClient;

    const reader = new StateViewPoolStateReader(ChainId.Base, client);

    await expect(reader.getActiveTick(POOL)).resolves.toBe(-1200);
    expect(readContractMock).toHaveBeenCalledWith(
      expect.objectContaining({ functionName: "getSlot0", args: [POOL] })
    );
  });

  it("builds an RPC client for its chain when none is given", () => {
    const reader = new StateViewPoolStateReader(ChainId.Polygon);

    expect(reader.client.chain?.id).toBe(ChainId.Polygon);
    expect(reader.stateView).toBe(config.stateView[ChainId.Polygon]);
  });
});
