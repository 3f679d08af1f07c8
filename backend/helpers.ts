import * as viem from "viem";
import {
  Address,
  Chain,
  encodeAbiParameters,
  Hex,
  keccak256,
  parseAbiParameters,
  PublicClient,
} from "viem";
import { ChainId, config } from "./config";

/**
 * Source of the current timestamp, in seconds
 */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/**
 * Clock that only moves when told to; used for deterministic replays and tests
 */
export class ManualClock implements Clock {
  constructor(private _now: bigint = 0n) {}

  now(): bigint {
    return this._now;
  }

  set(timestamp: bigint) {
    if (timestamp < this._now) {
      throw new Error(`Clock cannot go back from ${this._now} to ${timestamp}`);
    }
    this._now = timestamp;
  }

  advance(seconds: bigint) {
    this.set(this._now + seconds);
  }
}

type TaggedCollection =
  | { dataType: "Map"; entries: [unknown, unknown][] }
  | { dataType: "Set"; values: unknown[] };

function isTaggedCollection(value: unknown): value is TaggedCollection {
  if (typeof value !== "object" || value === null || !("dataType" in value)) {
    return false;
  }
  return (
    (value.dataType === "Map" && "entries" in value && Array.isArray(value.entries)) ||
    (value.dataType === "Set" && "values" in value && Array.isArray(value.values))
  );
}

export function jsonReviver(_key: string, value: unknown): unknown {
  if (typeof value === "string" && /^-?\d+n$/.test(value)) {
    return BigInt(value.slice(0, -1));
  }
  if (isTaggedCollection(value)) {
    return value.dataType === "Map"
      ? new Map(value.entries)
      : new Set(value.values);
  }
  return value;
}

export function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString() + "n";
  if (value instanceof Map) return { dataType: "Map", entries: [...value] };
  if (value instanceof Set) return { dataType: "Set", values: [...value] };
  return value;
}

export function jsonParse(s: string): unknown {
  return JSON.parse(s, jsonReviver);
}

export function jsonStringify(obj: unknown, space?: number): string {
  return JSON.stringify(obj, jsonReplacer, space);
}

export function getSupportedChain(chainId: string): ChainId {
  const chainIdNumber = parseInt(chainId, 10);
  const chain = config.chains.find((c) => c.id === chainIdNumber);
  if (!chain) {
    throw new Error(`Invalid chainId: ${chainId}`);
  }
  return chain.id;
}

export function createRpcClient(chain: ChainId): PublicClient {
  const chainObj: Chain | undefined = config.chains.find((c) => c.id === chain);
  if (!chainObj) {
    throw new Error(`Unsupported chain: ${chain}`);
  }
  return viem.createPublicClient({
    chain: chainObj,
    transport: viem.http(config.rpcUrls[chain]),
  });
}

export type PositionKeyParams = {
  owner: Address; // position owner, or the position manager holding it on behalf of an NFT
  poolId: Hex;
  tickLower: number;
  tickUpper: number;
  salt: Hex; // distinguishes several ranges of one owner, eg the NFT token id
};

/**
 * Stable identifier of a position: `keccak256(abi.encode(owner, poolId, tickLower, tickUpper, salt))`
 */
export function computePositionKey({
  owner,
  poolId,
  tickLower,
  tickUpper,
  salt,
}: PositionKeyParams): Hex {
  return keccak256(
    encodeAbiParameters(
      parseAbiParameters("address, bytes32, int24, int24, bytes32"),
      [owner, poolId, tickLower, tickUpper, salt]
    )
  );
}

/**
 * Adds `amount` to `map[key]`
 */
export function addToMap<K>(map: Map<K, bigint>, key: K, amount: bigint) {
  map.set(key, (map.get(key) ?? 0n) + amount);
}

/**
 * test helpers
 */

// can be used to generate hex types such as `bytes32` or `address`
export function generateMockHex(bytes: number, endDigits: number): Hex {
  return `0x${endDigits.toString(16).padStart(bytes * 2, "0")}`;
}
