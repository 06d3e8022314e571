/**
 * Context - Shared state for the steps of a single request
 */

/**
 * Typed key-value store handed from step to step.
 * Keys are fixed by `T`; values appear as steps produce them.
 */
export class Context<T extends object> {
  private readonly values: Partial<T> = {};

  constructor(initial?: Partial<T>) {
    if (initial) {
      this.merge(initial);
    }
  }

  /**
   * Get a value from context
   */
  get<K extends keyof T>(key: K): T[K] | undefined {
    return this.values[key];
  }

  /**
   * Get a value that an earlier step must have produced
   */
  require<K extends keyof T>(key: K): T[K] {
    const value = this.get(key);
    if (value === undefined) {
      throw new Error(`Context is missing '${String(key)}'`);
    }
    return value;
  }

  /**
   * Set a value in context
   */
  set<K extends keyof T>(key: K, value: T[K]): this {
    this.values[key] = value;
    return this;
  }

  /**
   * Merge an object into context, ignoring undefined values
   */
  merge(data: Partial<T>): this {
    for (const key in data) {
      const value = data[key];
      if (value !== undefined) {
        this.values[key] = value;
      }
    }
    return this;
  }

  [Symbol.toStringTag] = 'Context';
}

/**
 * Create a new context instance
 */
export function createContext<T extends object>(initial?: Partial<T>): Context<T> {
  return new Context<T>(initial);
}
