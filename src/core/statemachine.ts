/**
 * Tree Generator State Machine
 *
 *                   start map / start sequence
 *     ┌─────────┐ ─────────────────────────────▶ ┌────────────┐
 *     │  Empty  │                                │ InMap      │
 *     └─────────┘ ◀───────────────────────────── │ InSequence │
 *                     end (last one closed)      └─────┬──────┘
 *                                                  ▲   │ field name
 *                     value / start map /          │   │ (InMap only)
 *                     start sequence               │   ▼
 *                                              ┌──────────────┐
 *                                              │ FieldPending │
 *                                              └──────────────┘
 *
 * The stack holds one entry per open composite on top of an `Empty`
 * sentinel. `FieldPending` is never pushed: it overlays the `InMap` entry
 * of the map whose field is awaiting its value, so closing a composite that
 * was opened as a field value lands back in `InMap`.
 *
 * Every handler validates before it touches the context, so a rejected
 * event leaves the context exactly as it was.
 */

import type { State } from '../types.js';
import type { TreeValue } from '../tree.js';
import { StructuralViolationError, formatViolation } from '../errors.js';

// ============ Event Types ============

export type CompositeKind = 'map' | 'sequence';

export type Event =
    | { type: 'start_map' }
    | { type: 'end_map' }
    | { type: 'start_sequence' }
    | { type: 'end_sequence' }
    | { type: 'field_name'; name: string }
    | { type: 'value'; value: TreeValue; operation: string };

// ============ Context ============

export type StackState = Exclude<State, 'FieldPending'>;

export interface Context {
    state: State;
    stack: StackState[];
}

/**
 * Create initial context
 */
export function createContext(): Context {
    return {
        state: 'Empty',
        stack: ['Empty'],
    };
}

// ============ Mutate Function ============

export type Action =
    | { type: 'open'; kind: CompositeKind }
    | { type: 'close'; kind: CompositeKind }
    | { type: 'set_key'; key: string }
    | { type: 'set_value'; value: TreeValue };

/**
 * Validate `event` against the current state, advance the context and
 * return the action the tree has to apply. Throws a
 * StructuralViolationError, without touching the context, when the event is
 * not legal in the current state.
 */
export function mutate({ ctx, event }: { ctx: Context; event: Event }): Action {
    switch (event.type) {
        case 'start_map':
            return handleStart(ctx, 'map');
        case 'start_sequence':
            return handleStart(ctx, 'sequence');
        case 'end_map':
            return handleEnd(ctx, 'map');
        case 'end_sequence':
            return handleEnd(ctx, 'sequence');
        case 'field_name':
            return handleFieldName(ctx, event.name);
        case 'value':
            return handleValue(ctx, event.value, event.operation);
    }
}

/**
 * Depth of the open composites, not counting the sentinel.
 */
export function depth(ctx: Context): number {
    return ctx.stack.length - 1;
}

// ============ State Handlers ============

function stateFor(kind: CompositeKind): StackState {
    return kind === 'map' ? 'InMap' : 'InSequence';
}

function handleStart(ctx: Context, kind: CompositeKind): Action {
    const operation = `write start ${kind}`;

    switch (ctx.state) {
        case 'InMap':
            throw new StructuralViolationError(
                operation,
                ctx.state,
                formatViolation(operation, ctx.state, `a field name must be written before a nested ${kind}`),
            );
        case 'Empty':
        case 'InSequence':
        case 'FieldPending': {
            const opened = stateFor(kind);
            ctx.stack.push(opened);
            ctx.state = opened;
            return { type: 'open', kind };
        }
    }
}

function handleEnd(ctx: Context, kind: CompositeKind): Action {
    if (ctx.state !== stateFor(kind)) {
        throw new StructuralViolationError(`write end ${kind}`, ctx.state);
    }

    ctx.stack.pop();
    ctx.state = ctx.stack[ctx.stack.length - 1];
    return { type: 'close', kind };
}

function handleFieldName(ctx: Context, name: string): Action {
    switch (ctx.state) {
        case 'InMap':
            ctx.state = 'FieldPending';
            return { type: 'set_key', key: name };
        case 'Empty':
        case 'InSequence':
        case 'FieldPending':
            throw new StructuralViolationError('write field name', ctx.state);
    }
}

function handleValue(ctx: Context, value: TreeValue, operation: string): Action {
    switch (ctx.state) {
        case 'InSequence':
            return { type: 'set_value', value };
        case 'FieldPending':
            ctx.state = 'InMap';
            return { type: 'set_value', value };
        case 'Empty':
        case 'InMap':
            throw new StructuralViolationError(operation, ctx.state);
    }
}
