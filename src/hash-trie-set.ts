/**
 * @module hash-trie-set
 * @description
 * Persistent hash set over the same HAMT engine as `HashTrieMap`.
 * Elements are stored as keys bound to `true`.
 */

import { KeyNotFoundError } from './errors';
import { formatSequence } from './format';
import { defaultKeyTraits, UNHASHABLE } from './hash';
import type { KeyTraits } from './hash';
import type { CollectionOptions } from './hash-trie-map';
import { decodeElements, encodeSnapshot, registerNested, unknownItem } from './snapshot';
import type { ItemSchema } from './snapshot';
import * as trie from './trie';
import type { TrieNode } from './trie';

/**
 * An immutable hash set with structural sharing.
 * @template T Element type. Elements must be hashable under the set's traits.
 */
export class HashTrieSet<T> implements Iterable<T> {
    private _root: TrieNode<T, true> | null = null;
    private _size = 0;
    private readonly _traits: KeyTraits<T>;

    /**
     * Builds a set from `elements`; duplicates collapse.
     * @throws {UnhashableError} if an element cannot be hashed.
     */
    constructor(elements?: Iterable<T>, options: CollectionOptions<T> = {}) {
        this._traits = options.traits ?? defaultKeyTraits;
        if (elements === undefined) return;

        for (const e of elements) {
            const res = trie.insert(this._root, 0, this.hashOf(e), e, true, this._traits);
            this._root = res.node;
            if (res.added) this._size++;
        }
    }

    static of<T>(...elements: T[]): HashTrieSet<T> {
        return new HashTrieSet(elements);
    }

    /**
     * Rebuilds a set written by {@link HashTrieSet.serialize}.
     * @throws {MalformedSnapshotError}
     */
    static deserialize(bytes: Uint8Array): HashTrieSet<unknown>;
    static deserialize<T>(bytes: Uint8Array, element: ItemSchema<T>, options?: CollectionOptions<T>): HashTrieSet<T>;
    static deserialize<T>(
        bytes: Uint8Array,
        element?: ItemSchema<T>,
        options?: CollectionOptions<T>
    ): HashTrieSet<T> | HashTrieSet<unknown> {
        if (element === undefined) return new HashTrieSet(decodeElements(bytes, 'HashTrieSet', unknownItem));
        return new HashTrieSet(decodeElements(bytes, 'HashTrieSet', element), options);
    }

    private hashOf(element: T): number {
        return this._traits.hash(element) | 0;
    }

    private derive(root: TrieNode<T, true> | null, size: number): HashTrieSet<T> {
        const s = new HashTrieSet<T>(undefined, { traits: this._traits });
        s._root = root;
        s._size = size;
        return s;
    }

    get size(): number { return this._size; }
    isEmpty(): boolean { return this._size === 0; }

    has(element: T): boolean {
        return trie.lookup(this._root, this.hashOf(element), element, this._traits) !== undefined;
    }

    insert(element: T): HashTrieSet<T> {
        const res = trie.insert(this._root, 0, this.hashOf(element), element, true, this._traits);
        if (res.node === this._root) return this;
        return this.derive(res.node, this._size + 1);
    }

    /** @throws {KeyNotFoundError} when `element` is absent. */
    remove(element: T): HashTrieSet<T> {
        const root = trie.remove(this._root, 0, this.hashOf(element), element, this._traits);
        if (root === trie.NOT_FOUND) throw new KeyNotFoundError(element);
        return this.derive(root, this._size - 1);
    }

    discard(element: T): HashTrieSet<T> {
        const root = trie.remove(this._root, 0, this.hashOf(element), element, this._traits);
        if (root === trie.NOT_FOUND) return this;
        return this.derive(root, this._size - 1);
    }

    // --- Set Algebra ---

    /** Grows the larger operand so the smaller one is the only one walked. */
    union(other: HashTrieSet<T>): HashTrieSet<T> {
        const [small, large] = this._size < other._size ? [this, other] : [other, this];
        let res: HashTrieSet<T> = large;
        for (const item of small) res = res.insert(item);
        return res;
    }

    intersection(other: HashTrieSet<T>): HashTrieSet<T> {
        // Optimization: Iterate over the smaller set
        const [small, large] = this._size < other._size ? [this, other] : [other, this];
        let res = this.derive(null, 0);
        for (const item of small) {
            if (large.has(item)) res = res.insert(item);
        }
        return res;
    }

    difference(other: HashTrieSet<T>): HashTrieSet<T> {
        let res: HashTrieSet<T> = this;
        for (const item of other) res = res.discard(item);
        return res;
    }

    symmetricDifference(other: HashTrieSet<T>): HashTrieSet<T> {
        let res: HashTrieSet<T> = this;
        for (const item of other) {
            res = this.has(item) ? res.discard(item) : res.insert(item);
        }
        return res;
    }

    isSubset(other: HashTrieSet<T>): boolean {
        if (this._size > other._size) return false;
        for (const item of this) {
            if (!other.has(item)) return false;
        }
        return true;
    }

    isSuperset(other: HashTrieSet<T>): boolean { return other.isSubset(this); }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof HashTrieSet)) return false;
        if (this._size !== other._size) return false;
        if (this._root === other._root) return true;
        for (const item of this) {
            if (!other.has(item)) return false;
        }
        return true;
    }

    *[Symbol.iterator](): Iterator<T> {
        for (const leaf of trie.leaves(this._root)) yield leaf.key;
    }

    get [UNHASHABLE](): string { return 'HashTrieSet'; }

    serialize(): Uint8Array {
        return encodeSnapshot('HashTrieSet', [...this]);
    }

    toString(): string {
        return `HashTrieSet({${formatSequence(this)}})`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

registerNested<HashTrieSet<unknown>>({
    kind: 'HashTrieSet',
    Class: HashTrieSet,
    write: set => [...set],
    read: items => new HashTrieSet(items),
});
