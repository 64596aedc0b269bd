/**
 * Generic Registry<K, V>
 *
 * A keyed store with a configurable duplicate policy and optional sealing.
 * The macro registry and the fragment oracle are both built on it.
 */

/**
 * Duplicate handling strategy for registry entries.
 */
export type DuplicateStrategy =
  | "error" // Throw error on duplicate (default)
  | "skip" // Keep the existing entry
  | "replace"; // Replace existing entry

export interface RegistryOptions<V> {
  /** How to handle duplicate entries (default: "error") */
  duplicateStrategy?: DuplicateStrategy;

  /** Custom equality check; equal re-registrations are ignored under "error" */
  valueEquals?: (a: V, b: V) => boolean;

  /** Name for error messages */
  name?: string;
}

/**
 * A generic, type-safe registry for key-value pairs.
 *
 * @example
 * ```typescript
 * const grammars = createGenericRegistry<string, FragmentGrammar>({ name: "FragmentOracle" });
 * grammars.set("expr", exprGrammar);
 * grammars.seal();
 * grammars.set("ty", tyGrammar); // throws: FragmentOracle is sealed
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
  /** Refuse every further mutation */
  seal(): void;
  readonly sealed: boolean;
  [Symbol.iterator](): IterableIterator<[K, V]>;
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private store = new Map<K, V>();
  private isSealed = false;
  private readonly duplicateStrategy: DuplicateStrategy;
  private readonly name: string;
  private readonly valueEquals?: (a: V, b: V) => boolean;

  constructor(options: RegistryOptions<V> = {}) {
    this.duplicateStrategy = options.duplicateStrategy ?? "error";
    this.name = options.name ?? "Registry";
    this.valueEquals = options.valueEquals;
  }

  private assertMutable(): void {
    if (this.isSealed) {
      throw new Error(`${this.name}: registry is sealed`);
    }
  }

  set(key: K, value: V): void {
    this.assertMutable();
    const existing = this.store.get(key);

    if (existing !== undefined) {
      switch (this.duplicateStrategy) {
        case "error":
          if (existing === value || this.valueEquals?.(existing, value)) return;
          throw new Error(`${this.name}: entry for key '${String(key)}' already exists`);

        case "skip":
          return;

        case "replace":
          this.store.set(key, value);
          return;
      }
    }

    this.store.set(key, value);
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  delete(key: K): boolean {
    this.assertMutable();
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

  seal(): void {
    this.isSealed = true;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store[Symbol.iterator]();
  }
}

export function createGenericRegistry<K, V>(options?: RegistryOptions<V>): GenericRegistry<K, V> {
  return new GenericRegistryImpl(options);
}
