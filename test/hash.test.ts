import { describe, it, expect } from 'vitest';
import { areEqual, getHashCode, hashSequence, isHashable } from '../src/hash';
import type { Hashable } from '../src/hash';
import { UnhashableError } from '../src/errors';
import { HashTrieMap } from '../src/hash-trie-map';
import { HashTrieSet } from '../src/hash-trie-set';
import { Stack } from '../src/stack';

class Point implements Hashable {
    constructor(readonly x: number, readonly y: number) {}

    get hashCode(): number { return hashSequence([this.x, this.y]); }

    equals(other: unknown): boolean {
        return other instanceof Point && other.x === this.x && other.y === this.y;
    }
}

describe('getHashCode', () => {
    it('hashes strings by content', () => {
        const built = ['ab', 'c'].join('');
        expect(getHashCode(built)).toBe(getHashCode('abc'));
        expect(getHashCode('abc')).not.toBe(getHashCode('abd'));
    });

    it('treats -0 and 0 alike', () => {
        expect(getHashCode(-0)).toBe(getHashCode(0));
        expect(areEqual(-0, 0)).toBe(true);
    });

    it('hashes every NaN alike and considers NaN equal to itself', () => {
        expect(getHashCode(NaN)).toBe(getHashCode(0 / 0));
        expect(areEqual(NaN, NaN)).toBe(true);
    });

    it('hashes floats through their bit pattern', () => {
        expect(getHashCode(1.5)).toBe(getHashCode(3 / 2));
        expect(getHashCode(1.5)).not.toBe(getHashCode(2.5));
    });

    it('returns signed 32-bit integers', () => {
        for (const v of [0, 1, -1, 2 ** 40, 'x', true, null, undefined, 10n]) {
            const h = getHashCode(v);
            expect(h | 0).toBe(h);
        }
    });

    it('hashes plain objects by identity', () => {
        const a = {};
        const b = {};
        expect(getHashCode(a)).toBe(getHashCode(a));
        expect(areEqual(a, b)).toBe(false);
    });

    it('delegates to hashCode/equals for Hashable objects', () => {
        const p = new Point(1, 2);
        const q = new Point(1, 2);
        expect(isHashable(p)).toBe(true);
        expect(getHashCode(p)).toBe(getHashCode(q));
        expect(areEqual(p, q)).toBe(true);
        expect(areEqual(p, new Point(2, 1))).toBe(false);
    });

    it('rejects arrays', () => {
        expect(() => getHashCode([1, 2])).toThrow(UnhashableError);
        expect(() => getHashCode([1, 2])).toThrow('Unhashable type: Array');
    });

    it('rejects native Map and Set', () => {
        expect(() => getHashCode(new Map())).toThrow('Unhashable type: Map');
        expect(() => getHashCode(new Set())).toThrow('Unhashable type: Set');
    });

    it('rejects persistent maps and sets', () => {
        expect(() => getHashCode(new HashTrieMap())).toThrow('Unhashable type: HashTrieMap');
        expect(() => getHashCode(new HashTrieSet())).toThrow('Unhashable type: HashTrieSet');
    });

    it('accepts stacks', () => {
        expect(getHashCode(new Stack(1, 2))).toBe(getHashCode(new Stack(1, 2)));
    });

    it('reports the unhashable type on the error', () => {
        try {
            getHashCode([]);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(UnhashableError);
            if (error instanceof UnhashableError) {
                expect(error.typeName).toBe('Array');
                expect(error.code).toBe('ERR_UNHASHABLE');
                expect(error.name).toBe('UnhashableError');
            }
        }
    });
});

class EqualsOnly {
    constructor(readonly x: number) {}

    equals(other: unknown): boolean {
        return other instanceof EqualsOnly && other.x === this.x;
    }
}

describe('objects with equals but no hashCode', () => {
    it('are unhashable', () => {
        expect(() => getHashCode(new EqualsOnly(1))).toThrow(UnhashableError);
        expect(() => getHashCode(new EqualsOnly(1))).toThrow('Unhashable type: EqualsOnly');
        expect(() => getHashCode({ equals: () => true })).toThrow('Unhashable type: Object');
    });

    it('cannot become map keys', () => {
        expect(() => new HashTrieMap([[new EqualsOnly(1), 1], [new EqualsOnly(1), 2]])).toThrow(UnhashableError);
    });

    it('still compare by equals as map values', () => {
        const m = new HashTrieMap([['k', new EqualsOnly(1)]]);
        expect(m.hasEntry('k', new EqualsOnly(1))).toBe(true);
        expect(m.hasEntry('k', new EqualsOnly(2))).toBe(false);
    });
});

describe('symbol hashing', () => {
    it('hashes registered symbols by key', () => {
        expect(getHashCode(Symbol.for('k'))).toBe(getHashCode(Symbol.for('k')));
    });

    it('keeps distinct symbols with one description apart', () => {
        const a = Symbol('same');
        const b = Symbol('same');
        expect(getHashCode(a)).toBe(getHashCode(b));
        expect(areEqual(a, b)).toBe(false);

        const m = new HashTrieMap([[a, 1], [b, 2]]);
        expect(m.size).toBe(2);
        expect(m.get(a)).toBe(1);
        expect(m.get(b)).toBe(2);
    });
});

describe('hashSequence', () => {
    it('is order-sensitive', () => {
        expect(hashSequence([1, 2])).not.toBe(hashSequence([2, 1]));
        expect(hashSequence([1, 2])).toBe(hashSequence([1, 2]));
    });

    it('distinguishes lengths', () => {
        expect(hashSequence([])).not.toBe(hashSequence([0]));
    });
});
