import type { Decimal } from 'decimal.js';
import type { Logger } from 'pino';
import type { BinaryAlphabet, GeneratorOptions, State } from './types.js';
import type { TreeComposite } from './tree.js';
import { type Action, type Context, type Event, createContext, depth, mutate } from './core/statemachine.js';
import { type ResultState, createResultState, reduce } from './core/reducer.js';
import { encodeRange } from './alphabet.js';
import { ArgumentError, TreeGeneratorError, UnsupportedOperationError } from './errors.js';
import { defaultLogger } from './logger.js';

/**
 * Event sink that assembles an in-memory tree of TreeMap / TreeSequence
 * nodes from a flat sequence of write calls.
 *
 * Every call is checked against the current structural state. A rejected
 * call throws and leaves the tree untouched; the generator makes no attempt
 * to recover, so the document being built should be discarded.
 *
 * Not safe for use by more than one caller at a time.
 */
export class TreeGenerator {
    private logger: Logger;
    private ctx: Context;
    private result: ResultState;

    constructor(options: GeneratorOptions = {}) {
        this.logger = options.logger ?? defaultLogger();
        this.ctx = createContext();
        this.result = createResultState();
    }

    /**
     * The root of the document, or null if nothing has been written yet.
     * Available at any time, including while composites are still open.
     */
    get(): TreeComposite | null {
        return this.result.root;
    }

    getState(): State {
        return this.ctx.state;
    }

    /** Number of composites currently open. */
    getDepth(): number {
        return depth(this.ctx);
    }

    // ============ Structure ============

    writeStartMap(): void {
        this.dispatch({ type: 'start_map' });
    }

    writeEndMap(): void {
        this.dispatch({ type: 'end_map' });
    }

    writeStartSequence(): void {
        this.dispatch({ type: 'start_sequence' });
    }

    writeEndSequence(): void {
        this.dispatch({ type: 'end_sequence' });
    }

    /**
     * Name the next field of the open map. `null` is rejected with an
     * ArgumentError regardless of state.
     */
    writeFieldName(name: string | null): void {
        if (name === null) {
            return this.reject(new ArgumentError('field name must not be null'));
        }
        this.dispatch({ type: 'field_name', name });
    }

    // ============ Scalars ============

    writeText(text: string): void {
        this.dispatch({ type: 'value', value: text, operation: 'write text' });
    }

    /**
     * Write `text.slice(offset, offset + length)` as a text scalar.
     */
    writeTextRange(text: string, offset: number, length: number): void {
        if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0 || offset + length > text.length) {
            return this.reject(new ArgumentError(`text range [${offset}, ${offset + length}) is out of bounds for length ${text.length}`));
        }
        this.writeText(text.slice(offset, offset + length));
    }

    writeNumber(value: number | bigint | Decimal): void {
        this.dispatch({ type: 'value', value, operation: 'write number' });
    }

    writeBoolean(value: boolean): void {
        this.dispatch({ type: 'value', value, operation: 'write boolean' });
    }

    writeNull(): void {
        this.dispatch({ type: 'value', value: null, operation: 'write null' });
    }

    /**
     * Encode `data[offset, offset + length)` with `alphabet` and write the
     * result as a text scalar.
     */
    writeBinary(alphabet: BinaryAlphabet, data: Uint8Array, offset = 0, length = data.length - offset): void {
        const text = this.guard(() => encodeRange(alphabet, data, offset, length));
        this.dispatch({ type: 'value', value: text, operation: 'write binary' });
    }

    // ============ Fields ============

    writeTextField(name: string, text: string): void {
        this.writeFieldName(name);
        this.writeText(text);
    }

    writeNumberField(name: string, value: number | bigint | Decimal): void {
        this.writeFieldName(name);
        this.writeNumber(value);
    }

    writeBooleanField(name: string, value: boolean): void {
        this.writeFieldName(name);
        this.writeBoolean(value);
    }

    writeNullField(name: string): void {
        this.writeFieldName(name);
        this.writeNull();
    }

    writeBinaryField(name: string, alphabet: BinaryAlphabet, data: Uint8Array): void {
        const text = this.guard(() => encodeRange(alphabet, data, 0, data.length));
        this.writeFieldName(name);
        this.dispatch({ type: 'value', value: text, operation: 'write binary' });
    }

    writeMapFieldStart(name: string): void {
        this.writeFieldName(name);
        this.writeStartMap();
    }

    writeSequenceFieldStart(name: string): void {
        this.writeFieldName(name);
        this.writeStartSequence();
    }

    // ============ Unsupported ============

    writeRaw(_text: string): never {
        return this.reject(new UnsupportedOperationError('write raw text', this.ctx.state));
    }

    writeRawUtf8Text(_bytes: Uint8Array, _offset: number, _length: number): never {
        return this.reject(new UnsupportedOperationError('write raw UTF-8 text', this.ctx.state));
    }

    writeUtf8Text(_bytes: Uint8Array, _offset: number, _length: number): never {
        return this.reject(new UnsupportedOperationError('write UTF-8 text', this.ctx.state));
    }

    writeRawNumber(_encoded: string): never {
        return this.reject(new UnsupportedOperationError('write raw number', this.ctx.state));
    }

    // ============ Lifecycle ============

    /** Nothing is buffered outside the tree. */
    flush(): void {}

    /** No resources are held. The tree stays available through get(). */
    close(): void {}

    // ============ Internals ============

    private dispatch(event: Event): void {
        const action = this.guard(() => mutate({ ctx: this.ctx, event }));
        reduce({ state: this.result, action });
        this.trace(action);
    }

    private guard<T>(fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            if (err instanceof TreeGeneratorError) {
                this.reject(err);
            }
            throw err;
        }
    }

    private reject(err: TreeGeneratorError): never {
        this.logger.debug({ err, state: this.ctx.state }, 'rejected write');
        throw err;
    }

    private trace(action: Action): void {
        if (action.type === 'open') {
            this.logger.trace({ depth: this.getDepth() }, `opened ${action.kind}`);
        } else if (action.type === 'close') {
            this.logger.trace({ depth: this.getDepth() }, `closed ${action.kind}`);
        }
    }
}
