import { Address, Hex } from "viem";

/// owner => poolId => position keys the owner can claim for
export type ClaimIndex = Map<Address, Map<Hex, Set<Hex>>>;

export function cloneClaimIndex(index: ClaimIndex): ClaimIndex {
  return new Map(
    [...index].map(([owner, pools]): [Address, Map<Hex, Set<Hex>>] => [
      owner,
      new Map(
        [...pools].map(([poolId, keys]): [Hex, Set<Hex>] => [
          poolId,
          new Set(keys),
        ])
      ),
    ])
  );
}

export function indexPosition(
  index: ClaimIndex,
  owner: Address,
  poolId: Hex,
  positionKey: Hex
) {
  let pools = index.get(owner);
  if (!pools) {
    pools = new Map();
    index.set(owner, pools);
  }
  let keys = pools.get(poolId);
  if (!keys) {
    keys = new Set();
    pools.set(poolId, keys);
  }
  keys.add(positionKey);
}

/**
 * Drops `positionKey` from the owner's index, pruning emptied pool and owner entries
 * @returns whether the key was indexed
 */
export function unindexPosition(
  index: ClaimIndex,
  owner: Address,
  poolId: Hex,
  positionKey: Hex
): boolean {
  const pools = index.get(owner);
  const keys = pools?.get(poolId);
  if (!pools || !keys || !keys.delete(positionKey)) return false;
  if (keys.size === 0) pools.delete(poolId);
  if (pools.size === 0) index.delete(owner);
  return true;
}

export function indexedPositions(
  index: ClaimIndex,
  owner: Address,
  poolId: Hex
): Hex[] {
  return [...(index.get(owner)?.get(poolId) ?? [])];
}

export function indexedPools(index: ClaimIndex, owner: Address): Hex[] {
  return [...(index.get(owner)?.keys() ?? [])];
}
