import { Decimal } from 'decimal.js';
import type { BinaryAlphabet, GeneratorOptions } from './types.js';
import type { TreeComposite } from './tree.js';
import { TreeGenerator } from './generator.js';
import { alphabetByName } from './alphabet.js';
import { ArgumentError } from './errors.js';
import { loadConfig } from './config.js';

export interface WriteValueOptions {
    /** Alphabet for Uint8Array values (default: TREEGEN_BINARY_ALPHABET, else base64) */
    alphabet?: BinaryAlphabet;
}

export interface ToTreeOptions extends GeneratorOptions, WriteValueOptions {}

/**
 * Walk a plain JavaScript value and build a tree from it. The value must be
 * an object, array or Map: a bare scalar has no composite to live in and is
 * rejected by the generator.
 */
export function toTree(value: unknown, options: ToTreeOptions = {}): TreeComposite {
    const generator = new TreeGenerator(options);
    writeValue(generator, value, options);

    const root = generator.get();
    if (root === null) {
        throw new ArgumentError('value produced no tree');
    }
    return root;
}

/**
 * Issue the write calls describing `value` to `generator`, in document order.
 *
 * Object members that are `undefined` are skipped; `undefined` elsewhere is
 * written as null. Dates are written as ISO-8601 text.
 */
export function writeValue(generator: TreeGenerator, value: unknown, options: WriteValueOptions = {}): void {
    const alphabet = options.alphabet ?? alphabetByName(loadConfig().binaryAlphabet);
    walk(generator, value, alphabet, new Set());
}

function walk(generator: TreeGenerator, value: unknown, alphabet: BinaryAlphabet, seen: Set<object>): void {
    if (value === null || value === undefined) {
        generator.writeNull();
        return;
    }

    switch (typeof value) {
        case 'string':
            generator.writeText(value);
            return;
        case 'boolean':
            generator.writeBoolean(value);
            return;
        case 'number':
        case 'bigint':
            generator.writeNumber(value);
            return;
        case 'object':
            break;
        default:
            throw new ArgumentError(`can not represent a value of type ${typeof value}`);
    }

    if (Decimal.isDecimal(value)) {
        generator.writeNumber(value);
        return;
    }
    if (value instanceof Uint8Array) {
        generator.writeBinary(alphabet, value);
        return;
    }
    if (value instanceof Date) {
        generator.writeText(value.toISOString());
        return;
    }

    if (seen.has(value)) {
        throw new ArgumentError('can not represent a cyclic value');
    }
    seen.add(value);

    if (Array.isArray(value)) {
        generator.writeStartSequence();
        for (const item of value) {
            walk(generator, item, alphabet, seen);
        }
        generator.writeEndSequence();
    } else if (value instanceof Map) {
        generator.writeStartMap();
        for (const [key, item] of value) {
            if (typeof key !== 'string') {
                throw new ArgumentError(`map keys must be strings, got ${typeof key}`);
            }
            generator.writeFieldName(key);
            walk(generator, item, alphabet, seen);
        }
        generator.writeEndMap();
    } else {
        generator.writeStartMap();
        for (const [key, item] of Object.entries(value)) {
            if (item === undefined) continue;
            generator.writeFieldName(key);
            walk(generator, item, alphabet, seen);
        }
        generator.writeEndMap();
    }

    seen.delete(value);
}
