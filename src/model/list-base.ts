import type { ListSchema } from '../codec/wire-schema.js';

export { ITEMS_ATTR } from '../codec/wire-schema.js';

/**
 * Base class for every collection envelope in the API.
 *
 * Holds the supplied sequence by reference and never mutates it. A
 * `null` or missing sequence is held as an empty one.
 */
export abstract class ApiListBase<T> implements Iterable<T> {
  protected readonly values: readonly T[];

  constructor(values?: readonly T[] | null) {
    this.values = values ?? [];
  }

  /** Wire schema of the concrete envelope, consumed by the codecs. */
  abstract get schema(): ListSchema<T, ApiListBase<T>>;

  /** The held sequence, unchanged. */
  get items(): readonly T[] {
    return this.values;
  }

  get size(): number {
    return this.values.length;
  }

  get(index: number): T | undefined {
    return this.values[index];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values[Symbol.iterator]();
  }
}
