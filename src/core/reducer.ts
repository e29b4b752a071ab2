import type { Action } from './statemachine.js';
import { TreeMap, TreeSequence, type TreeComposite, type TreeValue } from '../tree.js';

// ============ Result State ============

export interface ResultState {
    root: TreeComposite | null;
    stack: ResultFrame[];
    key: string | null;  // Pending field name for the map on top, cleared once its value is attached
}

type ResultFrame =
    | { type: 'map'; ref: TreeMap }
    | { type: 'sequence'; ref: TreeSequence };

/**
 * Create initial result state
 */
export function createResultState(): ResultState {
    return {
        root: null,
        stack: [],
        key: null,
    };
}

// ============ Reduce Function ============

/**
 * Apply an action produced by the state machine. The machine has already
 * validated it, so this only mutates the tree and the position stack.
 */
export function reduce({ state, action }: { state: ResultState; action: Action }): void {
    switch (action.type) {
        case 'open':
            handleOpen(state, action.kind === 'map'
                ? { type: 'map', ref: new TreeMap() }
                : { type: 'sequence', ref: new TreeSequence() });
            return;
        case 'close':
            state.stack.pop();
            state.key = null;
            return;
        case 'set_key':
            state.key = action.key;
            return;
        case 'set_value':
            attachToParent(state, action.value);
            return;
    }
}

// ============ Action Handlers ============

function handleOpen(state: ResultState, frame: ResultFrame): void {
    if (state.stack.length > 0) {
        attachToParent(state, frame.ref);
    }
    if (state.root === null) {
        state.root = frame.ref;
    }
    state.stack.push(frame);
}

function attachToParent(state: ResultState, value: TreeValue): void {
    const top = state.stack[state.stack.length - 1];

    if (top.type === 'sequence') {
        top.ref.add(value);
        return;
    }

    if (state.key === null) {
        throw new Error('no pending field name for the open map');
    }
    top.ref.put(state.key, value);
    state.key = null;
}
