/**
 * Something asked for an advisory check. Triggers carry no payload: any two
 * are interchangeable, so a burst of them collapses into a single check.
 */
export type TriggerEvent = 'file_changed' | 'user_click' | 'startup';

export type CoordinatorState = 'idle' | 'running';
