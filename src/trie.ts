/**
 * @module trie
 * @description
 * Persistent Hash Array Mapped Trie (HAMT) engine.
 *
 * Nodes are immutable once built and are shared freely between collection
 * values. Every write copies the nodes on the path from the root to the
 * touched slot and reuses every sibling subtree.
 *
 * * Layout:
 * - {@link BranchNode}: 32-bit bitmap + packed children (one per set bit).
 * - {@link LeafNode}: a single entry with its cached full hash.
 * - {@link CollisionNode}: 2+ entries sharing the same full 32-bit hash.
 *
 * A key is addressed by successive 5-bit chunks of its hash, least
 * significant first. Levels sit at shifts 0, 5, ..., 30; two distinct hashes
 * always differ in a chunk at or before shift 30, so only identical hashes
 * ever need a collision node.
 */

import type { KeyTraits } from './hash';

// ============================================================================
// 1. CONSTANTS & BIT HELPERS
// ============================================================================

const BITS_PER_LEVEL = 5;
const BRANCH_WIDTH = 1 << BITS_PER_LEVEL;
const MASK = BRANCH_WIDTH - 1;

/** Returned by {@link remove} when the key is absent. */
export const NOT_FOUND: unique symbol = Symbol('not-found');

function chunk(hash: number, shift: number): number {
    return (hash >>> shift) & MASK;
}

/** Hamming weight of a 32-bit integer. */
function popcount(x: number): number {
    x = x - ((x >>> 1) & 0x55555555);
    x = (x & 0x33333333) + ((x >>> 2) & 0x33333333);
    x = (x + (x >>> 4)) & 0x0f0f0f0f;
    return Math.imul(x, 0x01010101) >>> 24;
}

/** Position of the child for `bit` inside the packed children array. */
function packedIndex(bitmap: number, bit: number): number {
    return popcount(bitmap & (bit - 1));
}

// ============================================================================
// 2. NODE TYPES
// ============================================================================

export class LeafNode<K, V> {
    readonly kind = 'leaf';

    constructor(
        readonly hash: number,
        readonly key: K,
        readonly value: V
    ) {}
}

export class CollisionNode<K, V> {
    readonly kind = 'collision';

    constructor(
        readonly hash: number,
        /** Insertion order; never fewer than two entries. */
        readonly entries: ReadonlyArray<LeafNode<K, V>>
    ) {}
}

export class BranchNode<K, V> {
    readonly kind = 'branch';

    constructor(
        readonly bitmap: number,
        readonly children: ReadonlyArray<TrieNode<K, V>>
    ) {}
}

export type TrieNode<K, V> = LeafNode<K, V> | CollisionNode<K, V> | BranchNode<K, V>;

export interface InsertResult<K, V> {
    node: TrieNode<K, V>;
    /** False when an existing key was overwritten (or left as it was). */
    added: boolean;
}

/**
 * Decides whether an overwrite can keep the existing leaf.
 * Only identity (SameValueZero) counts here: values are not required to be
 * hashable or comparable.
 */
function sameValue(a: unknown, b: unknown): boolean {
    return a === b || (a !== a && b !== b);
}

// ============================================================================
// 3. LOOKUP
// ============================================================================

/**
 * Finds the leaf holding `key`.
 * Returning the leaf rather than its value keeps a stored `undefined`
 * distinguishable from a miss.
 * @complexity O(log32 N)
 */
export function lookup<K, V>(
    root: TrieNode<K, V> | null,
    hash: number,
    key: K,
    traits: KeyTraits<K>
): LeafNode<K, V> | undefined {
    let node = root;
    let shift = 0;

    while (node !== null) {
        switch (node.kind) {
            case 'leaf':
                return node.hash === hash && traits.equals(node.key, key) ? node : undefined;

            case 'collision':
                if (node.hash !== hash) return undefined;
                for (const entry of node.entries) {
                    if (traits.equals(entry.key, key)) return entry;
                }
                return undefined;

            case 'branch': {
                const bit = 1 << chunk(hash, shift);
                if ((node.bitmap & bit) === 0) return undefined;
                node = node.children[packedIndex(node.bitmap, bit)];
                shift += BITS_PER_LEVEL;
                break;
            }
        }
    }
    return undefined;
}

// ============================================================================
// 4. INSERT (Path Copying)
// ============================================================================

/**
 * Builds the smallest subtree holding both `existing` and `incoming`.
 * Their hashes must differ; they share every chunk below `shift`.
 *
 * Transformation (chunks equal at `shift`, differ at `shift + 5`):
 *     existing        Branch{a}
 *               -->      |
 *                     Branch{b, c}
 *                      /      \
 *                existing   incoming
 */
function fork<K, V>(
    existing: LeafNode<K, V> | CollisionNode<K, V>,
    incoming: LeafNode<K, V>,
    shift: number
): BranchNode<K, V> {
    const a = chunk(existing.hash, shift);
    const b = chunk(incoming.hash, shift);

    if (a === b) {
        return new BranchNode(1 << a, [fork(existing, incoming, shift + BITS_PER_LEVEL)]);
    }
    const children = a < b ? [existing, incoming] : [incoming, existing];
    return new BranchNode((1 << a) | (1 << b), children);
}

/**
 * Associates `value` with `key` below `node`.
 * When the key is already bound to the very same value the original node is
 * returned, so callers can detect a no-op by reference.
 * @complexity O(log32 N)
 */
export function insert<K, V>(
    node: TrieNode<K, V> | null,
    shift: number,
    hash: number,
    key: K,
    value: V,
    traits: KeyTraits<K>
): InsertResult<K, V> {
    if (node === null) {
        return { node: new LeafNode(hash, key, value), added: true };
    }

    switch (node.kind) {
        case 'leaf': {
            if (node.hash === hash && traits.equals(node.key, key)) {
                if (sameValue(node.value, value)) return { node, added: false };
                return { node: new LeafNode(hash, node.key, value), added: false };
            }
            const leaf = new LeafNode(hash, key, value);
            if (node.hash === hash) {
                return { node: new CollisionNode(hash, [node, leaf]), added: true };
            }
            return { node: fork(node, leaf, shift), added: true };
        }

        case 'collision': {
            if (node.hash !== hash) {
                return { node: fork(node, new LeafNode(hash, key, value), shift), added: true };
            }
            const entries = node.entries;
            for (let i = 0; i < entries.length; i++) {
                if (!traits.equals(entries[i].key, key)) continue;
                if (sameValue(entries[i].value, value)) return { node, added: false };

                const next = entries.slice();
                next[i] = new LeafNode(hash, entries[i].key, value);
                return { node: new CollisionNode(hash, next), added: false };
            }
            return { node: new CollisionNode(hash, [...entries, new LeafNode(hash, key, value)]), added: true };
        }

        case 'branch': {
            const bit = 1 << chunk(hash, shift);
            const idx = packedIndex(node.bitmap, bit);

            if ((node.bitmap & bit) === 0) {
                const children = node.children.slice();
                children.splice(idx, 0, new LeafNode(hash, key, value));
                return { node: new BranchNode(node.bitmap | bit, children), added: true };
            }

            const child = node.children[idx];
            const res = insert(child, shift + BITS_PER_LEVEL, hash, key, value, traits);
            if (res.node === child) return { node, added: false };

            const children = node.children.slice();
            children[idx] = res.node;
            return { node: new BranchNode(node.bitmap, children), added: res.added };
        }
    }
}

// ============================================================================
// 5. REMOVE (Path Copying + Collapse)
// ============================================================================

/**
 * Removes `key` below `node`.
 * Branches left holding a single leaf or collision node are replaced by that
 * child, so the trie shape only depends on the keys it holds.
 * @returns The new subtree (`null` when it became empty) or {@link NOT_FOUND}.
 * @complexity O(log32 N)
 */
export function remove<K, V>(
    node: TrieNode<K, V> | null,
    shift: number,
    hash: number,
    key: K,
    traits: KeyTraits<K>
): TrieNode<K, V> | null | typeof NOT_FOUND {
    if (node === null) return NOT_FOUND;

    switch (node.kind) {
        case 'leaf':
            return node.hash === hash && traits.equals(node.key, key) ? null : NOT_FOUND;

        case 'collision': {
            if (node.hash !== hash) return NOT_FOUND;
            const idx = node.entries.findIndex(entry => traits.equals(entry.key, key));
            if (idx === -1) return NOT_FOUND;
            if (node.entries.length === 2) return node.entries[1 - idx];

            const entries = node.entries.slice();
            entries.splice(idx, 1);
            return new CollisionNode(hash, entries);
        }

        case 'branch': {
            const bit = 1 << chunk(hash, shift);
            if ((node.bitmap & bit) === 0) return NOT_FOUND;

            const idx = packedIndex(node.bitmap, bit);
            const res = remove(node.children[idx], shift + BITS_PER_LEVEL, hash, key, traits);
            if (res === NOT_FOUND) return NOT_FOUND;

            if (res === null) {
                const bitmap = node.bitmap ^ bit;
                if (bitmap === 0) return null;

                const children = node.children.slice();
                children.splice(idx, 1);
                if (children.length === 1 && children[0].kind !== 'branch') return children[0];
                return new BranchNode(bitmap, children);
            }

            if (node.children.length === 1 && res.kind !== 'branch') return res;

            const children = node.children.slice();
            children[idx] = res;
            return new BranchNode(node.bitmap, children);
        }
    }
}

// ============================================================================
// 6. TRAVERSAL
// ============================================================================

/**
 * Lazily walks every leaf below `node`, depth first, in bitmap order.
 * The order is stable for a given trie but is not part of any contract.
 */
export function* leaves<K, V>(node: TrieNode<K, V> | null): Generator<LeafNode<K, V>, void, undefined> {
    if (node === null) return;
    switch (node.kind) {
        case 'leaf':
            yield node;
            return;
        case 'collision':
            yield* node.entries;
            return;
        case 'branch':
            for (const child of node.children) yield* leaves(child);
            return;
    }
}

/** Depth of the deepest node below `node` (a lone leaf has depth 1). */
export function depth<K, V>(node: TrieNode<K, V> | null): number {
    if (node === null) return 0;
    if (node.kind !== 'branch') return 1;
    let max = 0;
    for (const child of node.children) {
        const d = depth(child);
        if (d > max) max = d;
    }
    return max + 1;
}
