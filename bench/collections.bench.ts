import { bench, describe } from 'vitest';
import { HashTrieMap } from '../src/hash-trie-map';
import { HashTrieSet } from '../src/hash-trie-set';
import { Stack } from '../src/stack';

const N = 10_000;
const keys = Array.from({ length: N }, (_, i) => `key-${i}`);
const filled = new HashTrieMap(keys.map((k, i) => [k, i] as const));

describe('HashTrieMap', () => {
    bench('insert 10k string keys', () => {
        let m = new HashTrieMap<string, number>();
        for (let i = 0; i < N; i++) m = m.insert(keys[i], i);
    });

    bench('native Map set (baseline)', () => {
        const m = new Map<string, number>();
        for (let i = 0; i < N; i++) m.set(keys[i], i);
    });

    bench('get 10k string keys', () => {
        for (const k of keys) filled.get(k);
    });

    bench('remove 10k string keys', () => {
        let m = filled;
        for (const k of keys) m = m.remove(k);
    });

    bench('iterate entries', () => {
        let total = 0;
        for (const [, v] of filled) total += v;
        if (total < 0) throw new Error('unreachable');
    });
});

describe('HashTrieSet', () => {
    const evens = new HashTrieSet(Array.from({ length: N }, (_, i) => i * 2));
    const threes = new HashTrieSet(Array.from({ length: N }, (_, i) => i * 3));

    bench('union', () => {
        evens.union(threes);
    });

    bench('intersection', () => {
        evens.intersection(threes);
    });
});

describe('Stack', () => {
    bench('push and pop 10k', () => {
        let s = new Stack<number>();
        for (let i = 0; i < N; i++) s = s.push(i);
        while (!s.isEmpty()) s = s.pop();
    });
});
