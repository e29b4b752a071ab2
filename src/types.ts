import type { Logger } from 'pino';

/**
 * Structural state of a generator.
 *
 * - `Empty`: nothing is open (not started, or the root has been closed)
 * - `InMap`: a map is open and expects a field name or its end
 * - `InSequence`: a sequence is open and expects a value, a nested composite or its end
 * - `FieldPending`: a field name has been written and its value is required
 */
export type State = 'Empty' | 'InMap' | 'InSequence' | 'FieldPending';

/**
 * A binary-to-text encoding used to embed bytes as a text scalar.
 */
export interface BinaryAlphabet {
    readonly name: string;
    encode(bytes: Uint8Array): string;
}

/**
 * Options for creating a TreeGenerator.
 */
export interface GeneratorOptions {
    /** Receives trace output for opened/closed composites and debug output for rejected calls */
    logger?: Logger;
}
