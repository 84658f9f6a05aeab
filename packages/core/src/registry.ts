/**
 * Generic Registry<K, V>
 *
 * A keyed store with a configurable policy for duplicate keys, used for the
 * resolver's macro tables instead of ad-hoc Maps with hand-written
 * duplicate checks.
 */

/**
 * Duplicate handling strategy for registry entries.
 */
export type DuplicateStrategy =
  | "error" // Throw on duplicate (default)
  | "replace" // Replace existing entry
  | "merge"; // Combine with existing entry (requires a merge function)

export interface RegistryOptions<K, V> {
  /** How to handle duplicate entries (default: "error") */
  duplicateStrategy?: DuplicateStrategy;

  /** Merge function (required when duplicateStrategy is "merge") */
  merge?: (existing: V, incoming: V, key: K) => V;

  /** Name for error messages */
  name?: string;
}

/**
 * @example
 * ```typescript
 * // Built-in macros: registering a name twice is a bug
 * const builtins = createGenericRegistry<string, SyntaxExtension>({ name: "BuiltinMacros" });
 *
 * // Special derive flags per expansion: union on every add
 * const derives = createGenericRegistry<ExpnId, SpecialDerives>({
 *   duplicateStrategy: "merge",
 *   merge: (existing, incoming) => existing | incoming,
 * });
 * ```
 */
export interface GenericRegistry<K, V> extends Iterable<[K, V]> {
  set(key: K, value: V): void;
  get(key: K): V | undefined;
  has(key: K): boolean;
  delete(key: K): boolean;
  keys(): IterableIterator<K>;
  values(): IterableIterator<V>;
  readonly size: number;
  [Symbol.iterator](): IterableIterator<[K, V]>;
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private readonly store = new Map<K, V>();
  private readonly strategy: DuplicateStrategy;
  private readonly name: string;
  private readonly merge?: (existing: V, incoming: V, key: K) => V;

  constructor(options: RegistryOptions<K, V> = {}) {
    this.strategy = options.duplicateStrategy ?? "error";
    this.name = options.name ?? "Registry";
    this.merge = options.merge;

    if (this.strategy === "merge" && !this.merge) {
      throw new Error(`${this.name}: merge function is required when duplicateStrategy is "merge"`);
    }
  }

  set(key: K, value: V): void {
    const existing = this.store.get(key);
    if (existing === undefined || this.strategy === "replace") {
      this.store.set(key, value);
      return;
    }
    if (this.strategy === "merge" && this.merge) {
      this.store.set(key, this.merge(existing, value, key));
      return;
    }
    throw new Error(`${this.name}: entry for key '${String(key)}' already exists`);
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  keys(): IterableIterator<K> {
    return this.store.keys();
  }

  values(): IterableIterator<V> {
    return this.store.values();
  }

  get size(): number {
    return this.store.size;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store[Symbol.iterator]();
  }
}

export function createGenericRegistry<K, V>(options?: RegistryOptions<K, V>): GenericRegistry<K, V> {
  return new GenericRegistryImpl(options);
}

/**
 * Key for module-scoped lookup: `"outer::inner::name"`, or just `"name"` at
 * the crate root.
 */
export function moduleKey(modPath: readonly string[], name: string): string {
  return [...modPath, name].join("::");
}
