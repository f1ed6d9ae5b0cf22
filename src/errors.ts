import { formatValue } from './format';

/**
 * Base class of every error thrown by the collections.
 * `code` is stable across releases; match on it rather than on `message`.
 */
export class CollectionError extends Error {
    public readonly code: string;

    constructor(code: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Thrown by indexed lookup and by `remove` when the key is absent. */
export class KeyNotFoundError<K = unknown> extends CollectionError {
    constructor(public readonly key: K) {
        super('ERR_KEY_NOT_FOUND', `Key not found: ${formatValue(key)}`);
    }
}

/** Thrown by `peek()` and `pop()` on an empty stack. */
export class EmptyStackError extends CollectionError {
    constructor(public readonly operation: 'peek' | 'pop') {
        super('ERR_EMPTY_STACK', `Cannot ${operation}() an empty Stack`);
    }
}

/** Thrown when a key or element cannot take part in hashing. */
export class UnhashableError extends CollectionError {
    constructor(public readonly typeName: string) {
        super('ERR_UNHASHABLE', `Unhashable type: ${typeName}`);
    }
}

/**
 * Thrown by `deserialize()` when the bytes do not hold a snapshot of the
 * requested collection. `issues` lists the schema violations, if decoding
 * got that far.
 */
export class MalformedSnapshotError extends CollectionError {
    constructor(message: string, public readonly issues: readonly string[] = [], options?: ErrorOptions) {
        super('ERR_MALFORMED_SNAPSHOT', message, options);
    }
}
