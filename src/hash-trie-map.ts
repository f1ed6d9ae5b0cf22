/**
 * @module hash-trie-map
 * @description
 * Persistent associative map backed by the HAMT engine in `./trie`.
 *
 * * Contracts:
 * - Every "mutating" method returns a new map; the receiver never changes.
 * - Equality is by content only, independent of insertion history.
 * - Maps are not hashable: using one as a key throws `UnhashableError`.
 */

import { KeyNotFoundError } from './errors';
import { formatPairs } from './format';
import { areEqual, defaultKeyTraits, UNHASHABLE } from './hash';
import type { KeyTraits } from './hash';
import { decodeEntries, encodeSnapshot, readPairs, registerNested, unknownItem } from './snapshot';
import type { ItemSchema } from './snapshot';
import * as trie from './trie';
import type { LeafNode, TrieNode } from './trie';

/** Per-collection configuration. */
export interface CollectionOptions<K> {
    /** Hash/equality pair for keys. Defaults to {@link defaultKeyTraits}. */
    readonly traits?: KeyTraits<K>;
}

/** Anything that yields `[key, value]` pairs: another map, a native `Map`, an array of pairs. */
export type EntrySource<K, V> = Iterable<readonly [K, V]>;

// ============================================================================
// 1. VIEWS
// ============================================================================

/**
 * Lazy, restartable view over a map. Every iteration walks the trie afresh;
 * membership follows the parent map.
 */
abstract class MapView<K, V, T> implements Iterable<T> {
    constructor(protected readonly map: HashTrieMap<K, V>) {}

    get size(): number { return this.map.size; }

    abstract has(item: T): boolean;
    abstract [Symbol.iterator](): Iterator<T>;

    toArray(): T[] { return [...this]; }
}

export class KeysView<K, V> extends MapView<K, V, K> {
    has(key: K): boolean { return this.map.has(key); }

    *[Symbol.iterator](): Iterator<K> {
        for (const [k] of this.map) yield k;
    }
}

export class ValuesView<K, V> extends MapView<K, V, V> {
    /** Linear scan: values are not indexed. */
    has(value: V): boolean {
        for (const v of this) {
            if (areEqual(v, value)) return true;
        }
        return false;
    }

    *[Symbol.iterator](): Iterator<V> {
        for (const [, v] of this.map) yield v;
    }
}

export class ItemsView<K, V> extends MapView<K, V, readonly [K, V]> {
    has([key, value]: readonly [K, V]): boolean {
        return this.map.hasEntry(key, value);
    }

    [Symbol.iterator](): Iterator<readonly [K, V]> {
        return this.map[Symbol.iterator]();
    }
}

// ============================================================================
// 2. HASH TRIE MAP
// ============================================================================

/**
 * An immutable hash map with structural sharing.
 *
 * @example
 * const a = HashTrieMap.fromRecord({ x: 1 });
 * const b = a.insert('y', 2);
 * a.size; // 1
 * b.get('y'); // 2
 *
 * @template K Key type. Keys must be hashable under the map's traits.
 * @template V Value type.
 */
export class HashTrieMap<K, V> implements Iterable<readonly [K, V]> {
    private _root: TrieNode<K, V> | null = null;
    private _size = 0;
    private readonly _traits: KeyTraits<K>;

    /**
     * Builds a map from `[key, value]` pairs. Later pairs win on duplicate keys.
     * @throws {UnhashableError} if a key cannot be hashed.
     */
    constructor(source?: EntrySource<K, V>, options: CollectionOptions<K> = {}) {
        this._traits = options.traits ?? defaultKeyTraits;
        if (source === undefined) return;

        for (const [key, value] of source) {
            const res = trie.insert(this._root, 0, this.hashOf(key), key, value, this._traits);
            this._root = res.node;
            if (res.added) this._size++;
        }
    }

    static empty<K, V>(options?: CollectionOptions<K>): HashTrieMap<K, V> {
        return new HashTrieMap<K, V>(undefined, options);
    }

    /** Keyword form: `HashTrieMap.fromRecord({ a: 1 })`. */
    static fromRecord<V>(record: Readonly<Record<string, V>>): HashTrieMap<string, V> {
        return new HashTrieMap<string, V>(Object.entries(record));
    }

    /**
     * Returns `source` itself when it already is a `HashTrieMap`, otherwise a
     * new map holding its pairs.
     */
    static convert<K, V>(source: HashTrieMap<K, V> | EntrySource<K, V>): HashTrieMap<K, V> {
        if (source instanceof HashTrieMap) return source;
        return new HashTrieMap(source);
    }

    /**
     * Rebuilds a map written by {@link HashTrieMap.serialize}.
     * Pass schemas to validate and type the decoded keys and values.
     * @throws {MalformedSnapshotError}
     */
    static deserialize(bytes: Uint8Array): HashTrieMap<unknown, unknown>;
    static deserialize<K, V>(
        bytes: Uint8Array,
        schemas: { key: ItemSchema<K>; value: ItemSchema<V> },
        options?: CollectionOptions<K>
    ): HashTrieMap<K, V>;
    static deserialize<K, V>(
        bytes: Uint8Array,
        schemas?: { key: ItemSchema<K>; value: ItemSchema<V> },
        options?: CollectionOptions<K>
    ): HashTrieMap<K, V> | HashTrieMap<unknown, unknown> {
        if (schemas === undefined) {
            return new HashTrieMap(decodeEntries(bytes, unknownItem, unknownItem));
        }
        return new HashTrieMap(decodeEntries(bytes, schemas.key, schemas.value), options);
    }

    private hashOf(key: K): number {
        return this._traits.hash(key) | 0;
    }

    private derive(root: TrieNode<K, V> | null, size: number): HashTrieMap<K, V> {
        const map = new HashTrieMap<K, V>(undefined, { traits: this._traits });
        map._root = root;
        map._size = size;
        return map;
    }

    private entryOf(key: K): LeafNode<K, V> | undefined {
        return trie.lookup(this._root, this.hashOf(key), key, this._traits);
    }

    // --- Queries ---

    /** @complexity O(1) */
    get size(): number { return this._size; }
    isEmpty(): boolean { return this._size === 0; }

    has(key: K): boolean {
        return this.entryOf(key) !== undefined;
    }

    /**
     * Indexed lookup.
     * @throws {KeyNotFoundError} carrying `key` when it is absent.
     */
    get(key: K): V {
        const entry = this.entryOf(key);
        if (entry === undefined) throw new KeyNotFoundError(key);
        return entry.value;
    }

    /** Non-throwing lookup; `undefined` on a miss. */
    find(key: K): V | undefined {
        return this.entryOf(key)?.value;
    }

    getOrElse<D>(key: K, fallback: D): V | D {
        const entry = this.entryOf(key);
        return entry === undefined ? fallback : entry.value;
    }

    /** True if `key` is bound to a value equal to `value`. */
    hasEntry(key: K, value: V): boolean {
        const entry = this.entryOf(key);
        return entry !== undefined && areEqual(entry.value, value);
    }

    // --- Persistent Updates ---

    /**
     * Returns a map with `key` bound to `value`.
     * Rebinding a key to the value it already holds returns this map.
     * @complexity O(log32 N)
     */
    insert(key: K, value: V): HashTrieMap<K, V> {
        const res = trie.insert(this._root, 0, this.hashOf(key), key, value, this._traits);
        if (res.node === this._root) return this;
        return this.derive(res.node, res.added ? this._size + 1 : this._size);
    }

    /**
     * Returns a map without `key`.
     * @throws {KeyNotFoundError} when `key` is absent.
     */
    remove(key: K): HashTrieMap<K, V> {
        const root = trie.remove(this._root, 0, this.hashOf(key), key, this._traits);
        if (root === trie.NOT_FOUND) throw new KeyNotFoundError(key);
        return this.derive(root, this._size - 1);
    }

    /** Like {@link remove}, but an absent key returns this map. */
    discard(key: K): HashTrieMap<K, V> {
        const root = trie.remove(this._root, 0, this.hashOf(key), key, this._traits);
        if (root === trie.NOT_FOUND) return this;
        return this.derive(root, this._size - 1);
    }

    /**
     * Merges `sources` into this map from left to right; on conflicting keys
     * the rightmost source wins. No sources returns this map.
     */
    update(...sources: Array<EntrySource<K, V>>): HashTrieMap<K, V> {
        let root = this._root;
        let size = this._size;
        for (const source of sources) {
            for (const [key, value] of source) {
                const res = trie.insert(root, 0, this.hashOf(key), key, value, this._traits);
                root = res.node;
                if (res.added) size++;
            }
        }
        return root === this._root ? this : this.derive(root, size);
    }

    // --- Iteration ---

    keys(): KeysView<K, V> { return new KeysView(this); }
    values(): ValuesView<K, V> { return new ValuesView(this); }
    items(): ItemsView<K, V> { return new ItemsView(this); }

    *[Symbol.iterator](): Iterator<readonly [K, V]> {
        for (const leaf of trie.leaves(this._root)) yield [leaf.key, leaf.value];
    }

    forEach(fn: (value: V, key: K, map: this) => void): void {
        for (const leaf of trie.leaves(this._root)) fn(leaf.value, leaf.key, this);
    }

    /** Copies the entries into a native `Map` (keys compared by identity there). */
    toMap(): Map<K, V> {
        const out = new Map<K, V>();
        for (const leaf of trie.leaves(this._root)) out.set(leaf.key, leaf.value);
        return out;
    }

    // --- Equality & Rendering ---

    /**
     * Content equality. Never true for anything but another `HashTrieMap`,
     * whatever its contents.
     */
    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof HashTrieMap)) return false;
        if (this._size !== other._size) return false;
        if (this._root === other._root) return true;

        for (const leaf of trie.leaves(this._root)) {
            const entry = other.entryOf(leaf.key);
            if (entry === undefined || !areEqual(leaf.value, entry.value)) return false;
        }
        return true;
    }

    get [UNHASHABLE](): string { return 'HashTrieMap'; }

    /** Opaque snapshot of the map's content; see {@link HashTrieMap.deserialize}. */
    serialize(): Uint8Array {
        return encodeSnapshot('HashTrieMap', [...this]);
    }

    toString(): string {
        return `HashTrieMap({${formatPairs(this)}})`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

registerNested<HashTrieMap<unknown, unknown>>({
    kind: 'HashTrieMap',
    Class: HashTrieMap,
    write: map => [...map],
    read: items => new HashTrieMap(readPairs(items)),
});
