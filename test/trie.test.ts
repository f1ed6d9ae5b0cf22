import { describe, it, expect } from 'vitest';
import type { KeyTraits } from '../src/hash';
import { depth, insert, leaves, lookup, NOT_FOUND, remove } from '../src/trie';
import type { TrieNode } from '../src/trie';

/** Numbers hash to themselves, so tests can place keys precisely. */
const identity: KeyTraits<number> = {
    hash: k => k | 0,
    equals: (a, b) => a === b,
};

/** Every key lands in the same collision node. */
const constant: KeyTraits<string> = {
    hash: () => 42,
    equals: (a, b) => a === b,
};

function build<K>(keys: K[], traits: KeyTraits<K>): TrieNode<K, string> | null {
    let root: TrieNode<K, string> | null = null;
    for (const k of keys) root = insert(root, 0, traits.hash(k), k, `v${String(k)}`, traits).node;
    return root;
}

function removeKey<K>(root: TrieNode<K, string> | null, key: K, traits: KeyTraits<K>) {
    return remove(root, 0, traits.hash(key), key, traits);
}

describe('trie insert', () => {
    it('starts with a single leaf', () => {
        const root = build([7], identity);
        expect(root?.kind).toBe('leaf');
        expect(depth(root)).toBe(1);
    });

    it('orders branch children by chunk regardless of insertion order', () => {
        const a = build([1, 2], identity);
        const b = build([2, 1], identity);
        for (const root of [a, b]) {
            expect(root?.kind).toBe('branch');
            if (root?.kind !== 'branch') continue;
            expect(root.bitmap).toBe(0b110);
            expect(root.children.map(c => (c.kind === 'leaf' ? c.key : -1))).toEqual([1, 2]);
        }
    });

    it('chains branches while the chunks agree', () => {
        // 0 and 32 share the first chunk and split on the second.
        const root = build([0, 32], identity);
        expect(root?.kind).toBe('branch');
        if (root?.kind !== 'branch') return;
        expect(root.bitmap).toBe(1);
        const child = root.children[0];
        expect(child.kind).toBe('branch');
        if (child.kind !== 'branch') return;
        expect(child.bitmap).toBe(0b11);
        expect(depth(root)).toBe(3);
    });

    it('uses every level down to the last two hash bits', () => {
        // Identical except for the top bit: only the chunk at shift 30 differs.
        const high = 0x80000000 | 0;
        const root = build([0, high], identity);
        expect(depth(root)).toBe(8);
        expect(lookup(root, 0, 0, identity)?.value).toBe('v0');
        expect(lookup(root, high, high, identity)?.value).toBe(`v${high}`);
    });

    it('puts fully colliding keys into one collision node', () => {
        const root = build(['a', 'b', 'c'], constant);
        expect(root?.kind).toBe('collision');
        if (root?.kind !== 'collision') return;
        expect(root.entries.map(e => e.key)).toEqual(['a', 'b', 'c']);
        expect(lookup(root, 42, 'b', constant)?.value).toBe('vb');
        expect(lookup(root, 42, 'z', constant)).toBeUndefined();
    });

    it('returns the same node when a key is rebound to its current value', () => {
        const root = build([1, 2, 33], identity);
        const res = insert(root, 0, 33, 33, 'v33', identity);
        expect(res.node).toBe(root);
        expect(res.added).toBe(false);
    });

    it('shares untouched subtrees', () => {
        const root = build([1, 2], identity);
        if (root?.kind !== 'branch') throw new Error('expected a branch');
        const next = insert(root, 0, 2, 2, 'changed', identity).node;
        if (next.kind !== 'branch') throw new Error('expected a branch');
        expect(next.children[0]).toBe(root.children[0]);
        expect(next.children[1]).not.toBe(root.children[1]);
    });
});

describe('trie remove', () => {
    it('reports a missing key', () => {
        expect(removeKey(build([1, 2], identity), 3, identity)).toBe(NOT_FOUND);
        expect(removeKey(null, 3, identity)).toBe(NOT_FOUND);
    });

    it('collapses a branch chain back into a leaf', () => {
        const root = removeKey(build([0, 32], identity), 32, identity);
        expect(root).not.toBe(NOT_FOUND);
        if (root === NOT_FOUND || root === null) throw new Error('expected a node');
        expect(root.kind).toBe('leaf');
        expect(depth(root)).toBe(1);
    });

    it('shrinks a collision node to a leaf at two entries', () => {
        const root = removeKey(build(['a', 'b'], constant), 'a', constant);
        if (root === NOT_FOUND || root === null) throw new Error('expected a node');
        expect(root.kind).toBe('leaf');
        expect(lookup(root, 42, 'b', constant)?.value).toBe('vb');
    });

    it('keeps larger collision nodes in order', () => {
        const root = removeKey(build(['a', 'b', 'c'], constant), 'b', constant);
        if (root === NOT_FOUND || root === null) throw new Error('expected a node');
        expect(root.kind).toBe('collision');
        expect([...leaves(root)].map(e => e.key)).toEqual(['a', 'c']);
    });

    it('returns null once the last key is gone', () => {
        expect(removeKey(build([5], identity), 5, identity)).toBeNull();
    });

    it('ends with the same shape whatever the history', () => {
        const direct = build([1, 65], identity);
        let detour = build([1, 33, 65, 97], identity);
        for (const k of [33, 97]) {
            const next = removeKey(detour, k, identity);
            if (next === NOT_FOUND) throw new Error(`missing ${k}`);
            detour = next;
        }
        expect(depth(detour)).toBe(depth(direct));
        expect([...leaves(detour)].map(e => e.key)).toEqual([...leaves(direct)].map(e => e.key));
    });
});
