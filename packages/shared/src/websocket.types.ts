import type { Status } from './status.types.js';
import type { CoordinatorState } from './trigger.types.js';

// ---- Client → Server messages ----

export type ClientMessage = { type: 'CHECK_NOW'; payload: Record<string, never> };

// ---- Server → Client messages ----

export type ServerMessage =
  | { type: 'STATUS'; payload: Status }
  | { type: 'COORDINATOR_STATE'; payload: { state: CoordinatorState } }
  | { type: 'ERROR'; payload: { message: string } };
