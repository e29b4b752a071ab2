import { describe, it, expect } from 'vitest';
import { type Context, type Event, createContext, depth, mutate } from '../src/core/statemachine.js';
import { StructuralViolationError } from '../src/errors.js';
import type { State } from '../src/types.js';

/**
 * Helper to feed events and collect the emitted action types
 */
function run(ctx: Context, events: Event[]): string[] {
    return events.map((event) => mutate({ ctx, event }).type);
}

const text: Event = { type: 'value', value: 'x', operation: 'write text' };

describe('State machine', () => {
    it('starts empty with a sentinel', () => {
        const ctx = createContext();
        expect(ctx.state).toBe('Empty');
        expect(ctx.stack).toEqual(['Empty']);
        expect(depth(ctx)).toBe(0);
    });

    it('emits actions for a well-nested document', () => {
        const ctx = createContext();
        const actions = run(ctx, [
            { type: 'start_map' },
            { type: 'field_name', name: 'a' },
            { type: 'start_sequence' },
            text,
            { type: 'end_sequence' },
            { type: 'end_map' },
        ]);

        expect(actions).toEqual(['open', 'set_key', 'open', 'set_value', 'close', 'close']);
        expect(ctx.state).toBe('Empty');
        expect(ctx.stack).toEqual(['Empty']);
    });

    it('never pushes FieldPending', () => {
        const ctx = createContext();
        run(ctx, [
            { type: 'start_map' },
            { type: 'field_name', name: 'a' },
        ]);
        expect(ctx.state).toBe('FieldPending');
        expect(ctx.stack).toEqual(['Empty', 'InMap']);

        run(ctx, [{ type: 'start_map' }]);
        expect(ctx.stack).toEqual(['Empty', 'InMap', 'InMap']);
    });

    it('carries the payload in its actions', () => {
        const ctx = createContext();
        expect(mutate({ ctx, event: { type: 'start_sequence' } })).toEqual({ type: 'open', kind: 'sequence' });
        expect(mutate({ ctx, event: { type: 'value', value: 5, operation: 'write number' } }))
            .toEqual({ type: 'set_value', value: 5 });
        expect(mutate({ ctx, event: { type: 'end_sequence' } })).toEqual({ type: 'close', kind: 'sequence' });
    });

    describe('rejections', () => {
        const cases: { name: string; setup: Event[]; event: Event; state: State; operation: string }[] = [
            { name: 'value while empty', setup: [], event: text, state: 'Empty', operation: 'write text' },
            { name: 'value in a map', setup: [{ type: 'start_map' }], event: text, state: 'InMap', operation: 'write text' },
            { name: 'start map in a map', setup: [{ type: 'start_map' }], event: { type: 'start_map' }, state: 'InMap', operation: 'write start map' },
            { name: 'end map while empty', setup: [], event: { type: 'end_map' }, state: 'Empty', operation: 'write end map' },
            { name: 'end sequence in a map', setup: [{ type: 'start_map' }], event: { type: 'end_sequence' }, state: 'InMap', operation: 'write end sequence' },
            {
                name: 'end map with a pending field',
                setup: [{ type: 'start_map' }, { type: 'field_name', name: 'a' }],
                event: { type: 'end_map' },
                state: 'FieldPending',
                operation: 'write end map',
            },
            { name: 'field name in a sequence', setup: [{ type: 'start_sequence' }], event: { type: 'field_name', name: 'a' }, state: 'InSequence', operation: 'write field name' },
        ];

        it.each(cases)('rejects $name without touching the context', ({ setup, event, state, operation }) => {
            const ctx = createContext();
            run(ctx, setup);
            const before = { state: ctx.state, stack: [...ctx.stack] };

            let caught: unknown;
            try {
                mutate({ ctx, event });
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(StructuralViolationError);
            if (caught instanceof StructuralViolationError) {
                expect(caught.state).toBe(state);
                expect(caught.operation).toBe(operation);
            }
            expect({ state: ctx.state, stack: ctx.stack }).toEqual(before);
        });
    });
});
