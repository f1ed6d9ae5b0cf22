/**
 * @module hash
 * @description
 * Hash engine shared by every collection in the library.
 * * Architecture:
 * - Numbers: 32-bit integer mixing, FNV-1a over the IEEE-754 words for the rest.
 * - Strings: FNV-1a over UTF-16 code units.
 * - Objects: delegate to `.hashCode` (see {@link Hashable}), otherwise an identity
 *   hash. An object with `equals` but no `hashCode` is unhashable.
 * - Contract: `areEqual(a, b)` implies `getHashCode(a) === getHashCode(b)`.
 */

import { UnhashableError } from './errors';

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Objects that define their own notion of equality. */
export interface Equatable {
    equals(other: unknown): boolean;
}

/**
 * Interface for objects that support Value Semantics.
 * Any object implementing this is hashed and compared by content when used
 * as a key or element.
 */
export interface Hashable extends Equatable {
    /** Must stay stable for as long as the object is stored in a collection. */
    readonly hashCode: number;
}

/**
 * The capability pair a trie needs from its keys.
 * Collections take one through their options; {@link defaultKeyTraits} is
 * used when none is given.
 */
export interface KeyTraits<K> {
    hash(key: K): number;
    equals(a: K, b: K): boolean;
}

/**
 * Marks a type as unhashable. The property value is the type name reported
 * by {@link UnhashableError}.
 */
export const UNHASHABLE: unique symbol = Symbol.for('persistent-hamt.unhashable');

// ============================================================================
// 2. HASH ENGINE (FNV-1a)
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;

const NAN_HASH = 0x7ff80000;
const NULL_HASH = 0x811c9dc5 | 0;
const UNDEFINED_HASH = 0x165667b1;
const TRUE_HASH = 0x27d4eb2d;
const FALSE_HASH = 0x4cf5ad43;
const SYMBOL_SALT = 0x3c6ef372;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

const identityHashes = new WeakMap<object, number>();
let identitySeq = 1;

/**
 * Murmur3 finalizer. Spreads low-entropy inputs (small integers, sequence
 * ids) over all 32 bits so the trie's 5-bit chunks stay balanced.
 */
function mix32(h: number): number {
    h ^= h >>> 16;
    h = Math.imul(h, 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    h ^= h >>> 16;
    return h | 0;
}

/**
 * Hashes a number.
 * Integers in the 32-bit range are mixed directly, everything else goes
 * through the two 32-bit halves of its float64 representation.
 * `-0` lands on the integer path and hashes like `0`.
 */
function hashNumber(val: number): number {
    if ((val | 0) === val) return mix32(val);
    if (val !== val) return NAN_HASH;

    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h | 0;
}

/**
 * FNV-1a hash implementation for strings.
 */
function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h | 0;
}

function hashBigInt(val: bigint): number {
    return hashString(val.toString(16)) ^ 0x5bd1e995;
}

/**
 * Registered symbols hash by their registry key, others by description.
 * Distinct symbols sharing a description collide, which equality resolves.
 */
function hashSymbol(sym: symbol): number {
    return hashString(Symbol.keyFor(sym) ?? sym.description ?? '') ^ SYMBOL_SALT;
}

/** Assigned once per object, on first use, and held weakly. */
function identityHash(obj: object): number {
    let id = identityHashes.get(obj);
    if (id === undefined) {
        id = identitySeq++;
        identityHashes.set(obj, id);
    }
    return mix32(id);
}

export function isEquatable(val: unknown): val is Equatable {
    return typeof val === 'object' && val !== null && 'equals' in val && typeof val.equals === 'function';
}

export function isHashable(val: unknown): val is Hashable {
    return isEquatable(val) && 'hashCode' in val && typeof val.hashCode === 'number';
}

/**
 * Computes a signed 32-bit hash code for any hashable value.
 * * Arrays, native `Map`/`Set`, types marked with {@link UNHASHABLE} and
 * objects that define `equals` without `hashCode` are rejected.
 * @throws {UnhashableError}
 */
export function getHashCode(val: unknown): number {
    if (typeof val === 'number') return hashNumber(val);
    if (typeof val === 'string') return hashString(val);
    if (typeof val === 'boolean') return val ? TRUE_HASH : FALSE_HASH;
    if (typeof val === 'undefined') return UNDEFINED_HASH;
    if (typeof val === 'bigint') return hashBigInt(val);
    if (typeof val === 'symbol') return hashSymbol(val);
    if (typeof val === 'function') return identityHash(val);
    if (typeof val === 'object' && val !== null) return hashObject(val);
    return NULL_HASH;
}

function hashObject(val: object): number {
    if (Array.isArray(val)) throw new UnhashableError('Array');
    if (val instanceof Map) throw new UnhashableError('Map');
    if (val instanceof Set) throw new UnhashableError('Set');
    if (UNHASHABLE in val) throw new UnhashableError(String(val[UNHASHABLE]));
    if (isHashable(val)) return val.hashCode | 0;
    // `equals` without `hashCode` could not keep equal objects on equal hashes.
    if (isEquatable(val)) throw new UnhashableError(typeNameOf(val));
    return identityHash(val);
}

function typeNameOf(val: object): string {
    const name: unknown = val.constructor?.name;
    return typeof name === 'string' && name !== '' ? name : 'Object';
}

/**
 * Determines equality between two keys or values.
 * SameValueZero for primitives, `.equals` for objects that define it,
 * identity for everything else.
 */
export function areEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return a !== a && b !== b;
    if (isEquatable(a)) return a.equals(b);
    return false;
}

/**
 * Order-sensitive hash over a sequence of values.
 * @throws {UnhashableError} if any element is unhashable.
 */
export function hashSequence(values: Iterable<unknown>): number {
    let h = 1;
    let len = 0;
    for (const v of values) {
        h = (Math.imul(h, 31) + getHashCode(v)) | 0;
        len++;
    }
    return mix32(h ^ len);
}

export const defaultKeyTraits: KeyTraits<unknown> = {
    hash: getHashCode,
    equals: areEqual,
};
