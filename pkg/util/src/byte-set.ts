import { toHex } from "./string";

/**
 * Set of byte arrays, compared by content.
 *
 * @remarks
 * Inserted arrays are copied, so that later changes to the caller's buffer do not affect the set.
 */
export class ByteSet implements Iterable<Uint8Array> {
  private readonly m = new Map<string, Uint8Array>();

  /**
   * Constructor.
   * @param items - Initial items. Duplicates are skipped.
   */
  constructor(items: Iterable<Uint8Array> = []) {
    for (const item of items) {
      this.add(item);
    }
  }

  /** Number of distinct items. */
  public get size() { return this.m.size; }

  public has(item: Uint8Array): boolean {
    return this.m.has(toHex(item));
  }

  /**
   * Add an item.
   * @returns Whether the item was new.
   */
  public add(item: Uint8Array): boolean {
    const key = toHex(item);
    if (this.m.has(key)) {
      return false;
    }
    this.m.set(key, Uint8Array.from(item));
    return true;
  }

  /** Iterate over items, in insertion order. */
  public [Symbol.iterator](): IterableIterator<Uint8Array> {
    return this.m.values();
  }
}
