/**
 * Snapshot codec for the persistent collections.
 * Uses the msgpackr library for the binary encoding and zod to check the
 * decoded payload before anything is rebuilt from it.
 *
 * Only logical content is stored (entries or elements in iteration order),
 * never the trie layout, so a snapshot stays valid across hashing changes.
 * Collections nested as keys, values or elements travel as MessagePack
 * extensions registered by each collection module through {@link registerNested}.
 */

import { addExtension, pack, unpack } from 'msgpackr';
import { z } from 'zod';
import type { ZodError } from 'zod';
import { MalformedSnapshotError } from './errors';

export const SNAPSHOT_FORMAT = 'persistent-hamt';
export const SNAPSHOT_VERSION = 1;

const SNAPSHOT_KINDS = ['HashTrieMap', 'HashTrieSet', 'Stack'] as const;
export type SnapshotKind = (typeof SNAPSHOT_KINDS)[number];

/** Schema for one decoded key, value or element. */
export type ItemSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const unknownItem: ItemSchema<unknown> = z.unknown();

const envelopeSchema = z.object({
    format: z.literal(SNAPSHOT_FORMAT),
    version: z.literal(SNAPSHOT_VERSION),
    kind: z.enum(SNAPSHOT_KINDS),
    items: z.array(z.unknown()),
});

const pairSchema = z.tuple([z.unknown(), z.unknown()]);
const nestedSchema = z.array(z.unknown());

/** Extension type codes; 0x72 and the negative codes belong to msgpackr itself. */
const EXTENSION_TYPES: Readonly<Record<SnapshotKind, number>> = {
    HashTrieMap: 0x31,
    HashTrieSet: 0x32,
    Stack: 0x33,
};

/** How a collection is written when it sits inside another snapshot. */
export interface NestedCodec<T> {
    readonly kind: SnapshotKind;
    readonly Class: new (...args: never[]) => unknown;
    write(value: T): unknown[];
    read(items: unknown[]): T;
}

function describeIssues(error: ZodError, prefix: string): string[] {
    return error.issues.map(issue => {
        const path = [prefix, ...issue.path].filter(part => part !== '').join('.');
        return `${path || '(root)'}: ${issue.message}`;
    });
}

/**
 * Teaches msgpackr to write instances of `codec.Class` as their logical
 * content and to rebuild them on decode.
 */
export function registerNested<T>(codec: NestedCodec<T>): void {
    addExtension({
        Class: codec.Class,
        type: EXTENSION_TYPES[codec.kind],
        write: (value: T) => codec.write(value),
        read: (datum: unknown) => {
            const res = nestedSchema.safeParse(datum);
            if (!res.success) {
                throw new MalformedSnapshotError(`Invalid nested ${codec.kind}`, describeIssues(res.error, ''));
            }
            return codec.read(res.data);
        },
    });
}

/**
 * Checks that every item of a nested map is a `[key, value]` pair.
 * @throws {MalformedSnapshotError}
 */
export function readPairs(items: readonly unknown[]): Array<[unknown, unknown]> {
    return items.map((raw, i) => {
        const pair = pairSchema.safeParse(raw);
        if (!pair.success) {
            throw new MalformedSnapshotError('Invalid nested HashTrieMap', describeIssues(pair.error, `items.${i}`));
        }
        return pair.data;
    });
}

/**
 * Packs `items` into a snapshot of the given kind.
 * Items must be representable in MessagePack or be registered collections.
 */
export function encodeSnapshot(kind: SnapshotKind, items: readonly unknown[]): Uint8Array {
    return pack({
        format: SNAPSHOT_FORMAT,
        version: SNAPSHOT_VERSION,
        kind,
        items,
    });
}

function decodeEnvelope(bytes: Uint8Array, kind: SnapshotKind): unknown[] {
    let decoded: unknown;
    try {
        decoded = unpack(bytes);
    } catch (error) {
        if (error instanceof MalformedSnapshotError) throw error;
        const message = error instanceof Error ? error.message : String(error);
        throw new MalformedSnapshotError(`Failed to decode ${kind} snapshot: ${message}`, [], { cause: error });
    }

    const result = envelopeSchema.safeParse(decoded);
    if (!result.success) {
        throw new MalformedSnapshotError(`Invalid ${kind} snapshot`, describeIssues(result.error, ''), {
            cause: result.error,
        });
    }
    if (result.data.kind !== kind) {
        throw new MalformedSnapshotError(`Expected a ${kind} snapshot, got ${result.data.kind}`);
    }
    return result.data.items;
}

/**
 * Unpacks a snapshot of single elements (set or stack) and validates each
 * element against `element`.
 * @throws {MalformedSnapshotError}
 */
export function decodeElements<T>(bytes: Uint8Array, kind: SnapshotKind, element: ItemSchema<T>): T[] {
    const out: T[] = [];
    const issues: string[] = [];

    decodeEnvelope(bytes, kind).forEach((raw, i) => {
        const res = element.safeParse(raw);
        if (res.success) out.push(res.data);
        else issues.push(...describeIssues(res.error, `items.${i}`));
    });

    if (issues.length > 0) throw new MalformedSnapshotError(`Invalid ${kind} snapshot`, issues);
    return out;
}

/**
 * Unpacks a map snapshot; every item must be a `[key, value]` pair.
 * @throws {MalformedSnapshotError}
 */
export function decodeEntries<K, V>(bytes: Uint8Array, key: ItemSchema<K>, value: ItemSchema<V>): Array<[K, V]> {
    const out: Array<[K, V]> = [];
    const issues: string[] = [];

    decodeEnvelope(bytes, 'HashTrieMap').forEach((raw, i) => {
        const pair = pairSchema.safeParse(raw);
        if (!pair.success) {
            issues.push(...describeIssues(pair.error, `items.${i}`));
            return;
        }
        const k = key.safeParse(pair.data[0]);
        const v = value.safeParse(pair.data[1]);
        if (!k.success) issues.push(...describeIssues(k.error, `items.${i}.0`));
        if (!v.success) issues.push(...describeIssues(v.error, `items.${i}.1`));
        if (k.success && v.success) out.push([k.data, v.data]);
    });

    if (issues.length > 0) throw new MalformedSnapshotError('Invalid HashTrieMap snapshot', issues);
    return out;
}
