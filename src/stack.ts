/**
 * @module stack
 * @description
 * Persistent LIFO stack as a singly linked list. Stacks derived from a common
 * one share its cells, so `push` and `pop` are O(1) and never copy.
 */

import { EmptyStackError } from './errors';
import { formatSequence } from './format';
import { areEqual, hashSequence } from './hash';
import type { Hashable } from './hash';
import { decodeElements, encodeSnapshot, registerNested, unknownItem } from './snapshot';
import type { ItemSchema } from './snapshot';

/** One cell of the list. `rest` is shared by every stack built on top of it. */
class Cons<T> {
    constructor(
        readonly value: T,
        readonly rest: Cons<T> | null
    ) {}
}

/**
 * An immutable stack. Iteration runs from the top (last pushed) down.
 * Equality and hashing are order-sensitive, which makes stacks usable as map
 * keys as long as their elements are hashable.
 * @template T Element type.
 */
export class Stack<T> implements Hashable, Iterable<T> {
    private _head: Cons<T> | null = null;
    private _size = 0;
    private _hashCode: number | null = null;

    /**
     * `new Stack(1, 2, 3)` pushes 1, then 2, then 3; 3 ends on top.
     */
    constructor(...elements: T[]) {
        for (const e of elements) {
            this._head = new Cons(e, this._head);
            this._size++;
        }
    }

    static empty<T>(): Stack<T> { return new Stack<T>(); }

    /** Same as pushing every element of `iterable` in order; consumed in one pass. */
    static from<T>(iterable: Iterable<T>): Stack<T> {
        const s = new Stack<T>();
        for (const e of iterable) {
            s._head = new Cons(e, s._head);
            s._size++;
        }
        return s;
    }

    /**
     * Rebuilds a stack written by {@link Stack.serialize}.
     * @throws {MalformedSnapshotError}
     */
    static deserialize(bytes: Uint8Array): Stack<unknown>;
    static deserialize<T>(bytes: Uint8Array, element: ItemSchema<T>): Stack<T>;
    static deserialize<T>(bytes: Uint8Array, element?: ItemSchema<T>): Stack<T> | Stack<unknown> {
        // Snapshots hold the elements bottom to top.
        if (element === undefined) return Stack.from(decodeElements(bytes, 'Stack', unknownItem));
        return Stack.from(decodeElements(bytes, 'Stack', element));
    }

    private static fromHead<T>(head: Cons<T> | null, size: number): Stack<T> {
        const s = new Stack<T>();
        s._head = head;
        s._size = size;
        return s;
    }

    get size(): number { return this._size; }
    get length(): number { return this._size; }
    isEmpty(): boolean { return this._head === null; }

    /** @complexity O(1) */
    push(value: T): Stack<T> {
        return Stack.fromHead(new Cons(value, this._head), this._size + 1);
    }

    /**
     * The stack below the top element.
     * @throws {EmptyStackError}
     */
    pop(): Stack<T> {
        if (this._head === null) throw new EmptyStackError('pop');
        return Stack.fromHead(this._head.rest, this._size - 1);
    }

    /**
     * The top element.
     * @throws {EmptyStackError}
     */
    peek(): T {
        if (this._head === null) throw new EmptyStackError('peek');
        return this._head.value;
    }

    *[Symbol.iterator](): Iterator<T> {
        for (let cell = this._head; cell !== null; cell = cell.rest) yield cell.value;
    }

    /** Elements from the top down, like iteration. */
    toArray(): T[] { return [...this]; }

    /**
     * Order-sensitive and cached after the first call.
     * @throws {UnhashableError} if an element is unhashable.
     */
    get hashCode(): number {
        if (this._hashCode === null) this._hashCode = hashSequence(this);
        return this._hashCode;
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Stack)) return false;
        if (this._size !== other._size) return false;

        let a = this._head;
        let b = other._head;
        while (a !== null && b !== null) {
            if (a === b) return true; // shared tail
            if (!areEqual(a.value, b.value)) return false;
            a = a.rest;
            b = b.rest;
        }
        return true;
    }

    serialize(): Uint8Array {
        return encodeSnapshot('Stack', this.toArray().reverse());
    }

    /** Bottom to top, so the output reads like the constructor call. */
    toString(): string {
        return `Stack([${formatSequence(this.toArray().reverse())}])`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// Bottom to top, like a top-level snapshot.
registerNested<Stack<unknown>>({
    kind: 'Stack',
    Class: Stack,
    write: stack => stack.toArray().reverse(),
    read: items => Stack.from(items),
});
