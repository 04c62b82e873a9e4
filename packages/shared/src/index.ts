// @auditray/shared: barrel export
export type { TriggerEvent, CoordinatorState } from './trigger.types.js';
export type {
  Update,
  Status,
  StatusKind,
  IconName,
  CheckOutcome,
  Presentation,
} from './status.types.js';
export type { AuditrayConfig, LogLevel } from './config.types.js';
export type { ClientMessage, ServerMessage } from './websocket.types.js';
