/**
 * @module persistent-hamt
 * Persistent, structurally shared collections: a hash array mapped trie map
 * and set, and a linked stack.
 */

export { HashTrieMap, KeysView, ValuesView, ItemsView } from './hash-trie-map';
export type { CollectionOptions, EntrySource } from './hash-trie-map';
export { HashTrieSet } from './hash-trie-set';
export { Stack } from './stack';

export { getHashCode, areEqual, hashSequence, isHashable, isEquatable, defaultKeyTraits, UNHASHABLE } from './hash';
export type { Hashable, Equatable, KeyTraits } from './hash';

export {
    CollectionError,
    KeyNotFoundError,
    EmptyStackError,
    UnhashableError,
    MalformedSnapshotError,
} from './errors';

export { SNAPSHOT_FORMAT, SNAPSHOT_VERSION } from './snapshot';
export type { ItemSchema, SnapshotKind } from './snapshot';
