import type { Decimal } from 'decimal.js';

/**
 * A leaf value. Numbers keep the representation they were written with:
 * `number` for 32/64-bit integers and floats, `bigint` for arbitrary-precision
 * integers, `Decimal` for arbitrary-precision decimals.
 */
export type TreeScalar = string | boolean | number | bigint | Decimal;

/**
 * Any value that can sit in a tree. `null` is an explicit null marker,
 * distinct from an absent field.
 */
export type TreeValue = TreeMap | TreeSequence | TreeScalar | null;

export type TreeComposite = TreeMap | TreeSequence;

/**
 * Keyed node. Keys are unique and iterate in insertion order; putting an
 * existing key replaces its value in place.
 */
export class TreeMap implements Iterable<[string, TreeValue]> {
    private readonly fields = new Map<string, TreeValue>();

    put(name: string, value: TreeValue): this {
        this.fields.set(name, value);
        return this;
    }

    get(name: string): TreeValue | undefined {
        return this.fields.get(name);
    }

    has(name: string): boolean {
        return this.fields.has(name);
    }

    get size(): number {
        return this.fields.size;
    }

    keys(): string[] {
        return [...this.fields.keys()];
    }

    [Symbol.iterator](): Iterator<[string, TreeValue]> {
        return this.fields.entries();
    }
}

/**
 * Ordered node.
 */
export class TreeSequence implements Iterable<TreeValue> {
    private readonly items: TreeValue[] = [];

    add(value: TreeValue): this {
        this.items.push(value);
        return this;
    }

    get(index: number): TreeValue | undefined {
        return this.items[index];
    }

    get length(): number {
        return this.items.length;
    }

    [Symbol.iterator](): Iterator<TreeValue> {
        return this.items[Symbol.iterator]();
    }
}

export type PlainValue =
    | { [key: string]: PlainValue }
    | PlainValue[]
    | TreeScalar
    | null;

/**
 * Convert a tree into plain objects and arrays. Scalars are passed through
 * untouched, so `bigint` and `Decimal` leaves survive the conversion.
 */
export function toPlain(value: TreeValue): PlainValue {
    if (value instanceof TreeMap) {
        const obj: { [key: string]: PlainValue } = {};
        for (const [key, child] of value) {
            obj[key] = toPlain(child);
        }
        return obj;
    }
    if (value instanceof TreeSequence) {
        return [...value].map(toPlain);
    }
    return value;
}
