import type { State } from './types.js';

/**
 * Base class for every error raised while generating a tree.
 */
export class TreeGeneratorError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TreeGeneratorError';
    }
}

/**
 * The caller passed an argument the generator cannot accept.
 */
export class ArgumentError extends TreeGeneratorError {
    constructor(message: string) {
        super(message);
        this.name = 'ArgumentError';
    }
}

/**
 * The requested operation is not legal in the generator's current state.
 */
export class StructuralViolationError extends TreeGeneratorError {
    readonly operation: string;
    readonly state: State;

    constructor(operation: string, state: State, message: string = formatViolation(operation, state)) {
        super(message);
        this.name = 'StructuralViolationError';
        this.operation = operation;
        this.state = state;
    }
}

/**
 * The operation has no meaning for an in-memory tree and is always rejected.
 */
export class UnsupportedOperationError extends StructuralViolationError {
    constructor(operation: string, state: State) {
        super(operation, state, `${operation} is not supported when generating a tree (state <${state}>)`);
        this.name = 'UnsupportedOperationError';
    }
}

export function formatViolation(operation: string, state: State, detail?: string): string {
    const message = `can not ${operation} in state <${state}>`;
    return detail === undefined ? message : `${message}: ${detail}`;
}
