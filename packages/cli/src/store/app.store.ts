import { useReducer, type Dispatch } from 'react';
import type { CoordinatorState, IconName, Presentation, Status } from '@auditray/shared';
import { CHECK_FOR_UPDATES, CHECKING, STARTING, present } from '@auditray/core';
import type { AppAction } from './app.actions.js';

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface AppState {
  /** Latest Status from the daemon; null until the first one arrives. */
  status: Status | null;
  coordinatorState: CoordinatorState;
  /** Set by a click on "Check for updates", cleared by the next Status. */
  checkRequested: boolean;
  /** Index into the update list, or -1 when nothing is selected. */
  selected: number;
  messages: string[];
}

export const initialState: AppState = {
  status: null,
  coordinatorState: 'idle',
  checkRequested: false,
  selected: -1,
  messages: [],
};

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

export function reducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case 'STATUS_RECEIVED': {
      const count = present(action.status).updates.length;
      return {
        ...state,
        status: action.status,
        checkRequested: false,
        selected: Math.min(state.selected, count - 1),
      };
    }

    case 'COORDINATOR_STATE':
      return { ...state, coordinatorState: action.state };

    case 'CHECK_REQUESTED':
      return { ...state, checkRequested: true };

    case 'MOVE_SELECTION': {
      const count = state.status ? present(state.status).updates.length : 0;
      if (count === 0) return { ...state, selected: -1 };
      const next = state.selected + action.delta;
      return { ...state, selected: Math.max(0, Math.min(count - 1, next)) };
    }

    case 'ADD_MESSAGE':
      return { ...state, messages: [...state.messages.slice(-4), action.message] };

    default:
      return state;
  }
}

// ---------------------------------------------------------------------------
// Selectors
// ---------------------------------------------------------------------------

export function checkLabel(state: AppState): string {
  return state.checkRequested ? CHECKING : CHECK_FOR_UPDATES;
}

/** What the menu shows; STARTING until the first Status. */
export function presentation(state: AppState): Presentation {
  if (!state.status) return { text: STARTING, icon: 'check', updates: [] };
  return present(state.status);
}

export function headerIcon(state: AppState, debugIcon: IconName | null): IconName {
  return debugIcon ?? presentation(state).icon;
}

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

export function useAppStore(): [AppState, Dispatch<AppAction>] {
  return useReducer(reducer, initialState);
}
