import type { CoordinatorState, Status } from '@auditray/shared';

// ---------------------------------------------------------------------------
// Action Types
// ---------------------------------------------------------------------------

export type AppAction =
  | { type: 'STATUS_RECEIVED'; status: Status }
  | { type: 'COORDINATOR_STATE'; state: CoordinatorState }
  | { type: 'CHECK_REQUESTED' }
  | { type: 'MOVE_SELECTION'; delta: number }
  | { type: 'ADD_MESSAGE'; message: string };
