/**
 * Interaction Session State Machine
 *
 * Tracks the one drag-and-drop or resize session the host's input layer may
 * have open at a time.
 *
 * Key invariants:
 * 1. Only ONE session can be active at a time (drag OR resize, not both)
 * 2. A session always names the item it acts on
 * 3. Phases: idle → dragging → idle, idle → resizing → idle
 */

import type { Direction } from './types';

// ============================================================================
// State Types
// ============================================================================

export type InteractionPhase = 'idle' | 'dragging' | 'resizing';

export interface InteractionState<T> {
	phase: InteractionPhase;
	/** The item being dragged or resized */
	item: T | null;
	/** The edge being moved (resize sessions only) */
	direction: Direction | null;
}

// ============================================================================
// State Machine
// ============================================================================

export type SessionTransition<T> =
	| { type: 'START_DRAG'; item: T }
	| { type: 'START_RESIZE'; item: T; direction: Direction }
	| { type: 'FINISH' }
	| { type: 'CANCEL' }
	| { type: 'ITEM_REMOVED'; item: T };

export interface InteractionStateMachine<T> {
	getState(): InteractionState<T>;
	transition(action: SessionTransition<T>): InteractionState<T>;
	/** Check if a transition is valid from current state */
	canTransition(action: SessionTransition<T>): boolean;
}

export function createInitialState<T>(): InteractionState<T> {
	return {
		phase: 'idle',
		item: null,
		direction: null,
	};
}

/**
 * Pure state reducer - computes next state from current state and action
 */
export function reducer<T>(state: InteractionState<T>, action: SessionTransition<T>): InteractionState<T> {
	switch (action.type) {
		case 'START_DRAG': {
			if (state.phase !== 'idle') {
				return state;
			}
			return {
				phase: 'dragging',
				item: action.item,
				direction: null,
			};
		}

		case 'START_RESIZE': {
			if (state.phase !== 'idle') {
				return state;
			}
			return {
				phase: 'resizing',
				item: action.item,
				direction: action.direction,
			};
		}

		case 'FINISH':
		case 'CANCEL': {
			if (state.phase === 'idle') {
				return state;
			}
			return createInitialState();
		}

		case 'ITEM_REMOVED': {
			// Removing the session's item ends the session
			if (state.phase === 'idle' || state.item !== action.item) {
				return state;
			}
			return createInitialState();
		}

		default:
			return state;
	}
}

export function canTransition<T>(state: InteractionState<T>, action: SessionTransition<T>): boolean {
	return reducer(state, action) !== state;
}

/**
 * Create a state machine instance
 */
export function createStateMachine<T>(): InteractionStateMachine<T> {
	let state: InteractionState<T> = createInitialState();

	return {
		getState() {
			return state;
		},

		transition(action: SessionTransition<T>) {
			const nextState = reducer(state, action);
			if (nextState !== state) {
				state = nextState;
			}
			return state;
		},

		canTransition(action: SessionTransition<T>) {
			return canTransition(state, action);
		},
	};
}

export function isDragging<T>(state: InteractionState<T>): boolean {
	return state.phase === 'dragging';
}

export function isResizing<T>(state: InteractionState<T>): boolean {
	return state.phase === 'resizing';
}
