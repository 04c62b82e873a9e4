import { describe, it, expect } from 'vitest';
import type { Status, Update } from '@auditray/shared';
import {
  reducer,
  initialState,
  checkLabel,
  presentation,
  headerIcon,
  type AppState,
} from './app.store.js';
import type { AppAction } from './app.actions.js';

const UPDATES: Update[] = [
  { text: 'openssl: arbitrary code execution (High)', link: 'https://example.test/AVG-1' },
  { text: 'zlib: denial of service (Medium)', link: 'https://example.test/AVG-2' },
];

const MISSING: Status = { kind: 'missing_updates', updates: UPDATES };

function apply(...actions: AppAction[]): AppState {
  return actions.reduce(reducer, initialState);
}

describe('app store', () => {
  it('shows "Starting..." until the first status arrives', () => {
    expect(presentation(initialState)).toEqual({ text: 'Starting...', icon: 'check', updates: [] });
    expect(checkLabel(initialState)).toBe('Check for updates');
  });

  it('shows "Checking..." after a click until the next status', () => {
    const clicked = apply({ type: 'CHECK_REQUESTED' });
    expect(checkLabel(clicked)).toBe('Checking...');

    const answered = reducer(clicked, { type: 'STATUS_RECEIVED', status: { kind: 'up_to_date' } });
    expect(checkLabel(answered)).toBe('Check for updates');
    expect(presentation(answered).text).toBe('No vulnerable packages');
  });

  it('lists the updates of a missing_updates status', () => {
    const state = apply({ type: 'STATUS_RECEIVED', status: MISSING });
    expect(presentation(state)).toEqual({
      text: '2 vulnerable packages',
      icon: 'alert',
      updates: UPDATES,
    });
  });

  it('presents errors with the cross icon', () => {
    const state = apply({
      type: 'STATUS_RECEIVED',
      status: { kind: 'error', message: 'tool not found' },
    });
    expect(presentation(state).text).toBe('Error: tool not found');
    expect(headerIcon(state, null)).toBe('cross');
  });

  it('moves the selection within the update list', () => {
    const received = apply({ type: 'STATUS_RECEIVED', status: MISSING });
    expect(received.selected).toBe(-1);

    const down = reducer(received, { type: 'MOVE_SELECTION', delta: 1 });
    expect(down.selected).toBe(0);

    const bottom = [1, 1, 1].reduce(
      (s, delta) => reducer(s, { type: 'MOVE_SELECTION', delta }),
      down,
    );
    expect(bottom.selected).toBe(1);

    const top = reducer(bottom, { type: 'MOVE_SELECTION', delta: -5 });
    expect(top.selected).toBe(0);
  });

  it('clears the selection when there is nothing to select', () => {
    expect(apply({ type: 'MOVE_SELECTION', delta: 1 }).selected).toBe(-1);

    const selected = apply(
      { type: 'STATUS_RECEIVED', status: MISSING },
      { type: 'MOVE_SELECTION', delta: 1 },
    );
    const cleared = reducer(selected, { type: 'STATUS_RECEIVED', status: { kind: 'up_to_date' } });
    expect(cleared.selected).toBe(-1);
  });

  it('keeps the selection inside a shorter list', () => {
    const atSecond = apply(
      { type: 'STATUS_RECEIVED', status: MISSING },
      { type: 'MOVE_SELECTION', delta: 1 },
      { type: 'MOVE_SELECTION', delta: 1 },
    );
    expect(atSecond.selected).toBe(1);

    const shorter = reducer(atSecond, {
      type: 'STATUS_RECEIVED',
      status: { kind: 'missing_updates', updates: [UPDATES[0]] },
    });
    expect(shorter.selected).toBe(0);
  });

  it('tracks the coordinator state', () => {
    const state = apply({ type: 'COORDINATOR_STATE', state: 'running' });
    expect(state.coordinatorState).toBe('running');
  });

  it('keeps only the last five messages', () => {
    const state = apply(
      ...['a', 'b', 'c', 'd', 'e', 'f'].map(
        (message): AppAction => ({ type: 'ADD_MESSAGE', message }),
      ),
    );
    expect(state.messages).toEqual(['b', 'c', 'd', 'e', 'f']);
  });

  it('lets a debug icon override the status icon', () => {
    const state = apply({ type: 'STATUS_RECEIVED', status: MISSING });
    expect(headerIcon(state, null)).toBe('alert');
    expect(headerIcon(state, 'cross')).toBe('cross');
  });
});
