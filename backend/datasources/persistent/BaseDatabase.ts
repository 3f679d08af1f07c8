import { jsonParse, jsonStringify } from "../../helpers";

export interface HasToString {
  toString(): string;
}

/**
 * This class serves as a base class for all databases that store data in a persistent store.
 *
 * It assumes a key-value store, where the key is a string and the value is a stringified JSON object.
 * Values are encoded with `jsonStringify`, so bigints, Maps and Sets survive the round trip.
 */
export abstract class BaseDatabase<K extends HasToString, V> {
  /**
   * Gets a value from the store, `undefined` when the key is absent
   */
  protected abstract getFromStore(key: string): Promise<string | undefined>;

  /**
   * Puts a key value pair into the store
   */
  protected abstract putToStore(key: string, val: string): Promise<void>;

  /**
   * Fetch data from the source
   */
  protected abstract fetchData(key: K): Promise<V>;

  /**
   * Checks that a parsed stored value has the shape of `V`
   */
  protected abstract decode(value: unknown): V;

  /**
   * Get a value either from the store or from the source.
   * If the value is fetched from the source, it is also stored in the store.
   */
  async getValue(key: K): Promise<V> {
    const stored = await this.getFromStore(key.toString());
    if (stored !== undefined) {
      return this.decode(jsonParse(stored));
    }
    // key is not in store, fetch it and store it
    const data = await this.fetchData(key);
    await this.putValue(key, data);
    return data;
  }

  /**
   * Overwrites the stored value of `key`
   */
  async putValue(key: K, value: V) {
    await this.putToStore(key.toString(), jsonStringify(value));
  }
}
