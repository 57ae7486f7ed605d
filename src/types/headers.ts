/**
 * Case-insensitive, multi-valued header collection
 * @module types/headers
 */

export type HeaderInit =
  | HeaderMap
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * Immutable header map. Names are stored lower-cased; each name keeps its
 * values in the order they were added.
 */
export class HeaderMap implements Iterable<[string, readonly string[]]> {
  readonly #entries: ReadonlyMap<string, readonly string[]>;

  constructor(init?: HeaderInit) {
    const entries = new Map<string, string[]>();

    const append = (name: string, value: string) => {
      const key = name.toLowerCase();
      const values = entries.get(key);
      if (values) {
        values.push(value);
      } else {
        entries.set(key, [value]);
      }
    };

    if (init instanceof HeaderMap) {
      for (const [name, values] of init) {
        for (const value of values) append(name, value);
      }
    } else if (init && Symbol.iterator in init) {
      for (const [name, value] of init) append(name, value);
    } else if (init) {
      for (const [name, value] of Object.entries(init)) {
        if (value === undefined) continue;
        if (typeof value === 'string') {
          append(name, value);
        } else {
          for (const item of value) append(name, item);
        }
      }
    }

    const frozen = new Map<string, readonly string[]>();
    for (const [name, values] of entries) {
      frozen.set(name, Object.freeze(values));
    }
    this.#entries = frozen;
    Object.freeze(this);
  }

  /**
   * Build from Node's flat raw header list: [name, value, name, value, ...]
   */
  static fromRawHeaders(rawHeaders: readonly string[]): HeaderMap {
    const pairs: Array<[string, string]> = [];
    for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
      const name = rawHeaders[i];
      const value = rawHeaders[i + 1];
      if (name !== undefined && value !== undefined) pairs.push([name, value]);
    }
    return new HeaderMap(pairs);
  }

  /** First value for the header, if present */
  get(name: string): string | undefined {
    return this.#entries.get(name.toLowerCase())?.[0];
  }

  /** All values for the header in arrival order */
  getAll(name: string): readonly string[] {
    return this.#entries.get(name.toLowerCase()) ?? [];
  }

  has(name: string): boolean {
    return this.#entries.has(name.toLowerCase());
  }

  /** Return a new map with `value` appended to `name` */
  append(name: string, value: string): HeaderMap {
    return new HeaderMap([...this.pairs(), [name, value]]);
  }

  /** Return a new map where `name` holds exactly `values` */
  set(name: string, values: string | readonly string[]): HeaderMap {
    const key = name.toLowerCase();
    const replacement = typeof values === 'string' ? [values] : values;
    const pairs: Array<readonly [string, string]> = this.pairs().filter(([existing]) => existing !== key);
    for (const value of replacement) pairs.push([key, value]);
    return new HeaderMap(pairs);
  }

  names(): string[] {
    return [...this.#entries.keys()];
  }

  get size(): number {
    return this.#entries.size;
  }

  /** Flatten to [name, value] pairs, one pair per value */
  pairs(): Array<readonly [string, string]> {
    const result: Array<readonly [string, string]> = [];
    for (const [name, values] of this.#entries) {
      for (const value of values) result.push([name, value]);
    }
    return result;
  }

  toJSON(): Record<string, readonly string[]> {
    return Object.fromEntries(this.#entries);
  }

  [Symbol.iterator](): Iterator<[string, readonly string[]]> {
    return this.#entries.entries();
  }
}
