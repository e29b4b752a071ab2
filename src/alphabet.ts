import type { BinaryAlphabet } from './types.js';
import { ArgumentError } from './errors.js';

function toBuffer(bytes: Uint8Array): Buffer {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** RFC 4648 base64 with padding and no line breaks. */
export const BASE64: BinaryAlphabet = {
    name: 'base64',
    encode: (bytes) => toBuffer(bytes).toString('base64'),
};

/** RFC 4648 URL- and filename-safe base64, unpadded. */
export const BASE64_URL: BinaryAlphabet = {
    name: 'base64url',
    encode: (bytes) => toBuffer(bytes).toString('base64url'),
};

export function alphabetByName(name: string): BinaryAlphabet {
    switch (name) {
        case 'base64':
            return BASE64;
        case 'base64url':
            return BASE64_URL;
        default:
            throw new ArgumentError(`unknown binary alphabet "${name}"`);
    }
}

/**
 * Encode `bytes[offset, offset + length)`. The range is viewed, not copied;
 * the result equals encoding a copy of the same range.
 */
export function encodeRange(alphabet: BinaryAlphabet, bytes: Uint8Array, offset: number, length: number): string {
    if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0 || offset + length > bytes.length) {
        throw new ArgumentError(`byte range [${offset}, ${offset + length}) is out of bounds for length ${bytes.length}`);
    }
    return alphabet.encode(bytes.subarray(offset, offset + length));
}
