import type {
  CheckOutcome,
  IconName,
  Presentation,
  Status,
  Update,
} from '@auditray/shared';
import { ValidationError } from '../errors.js';

export const CHECK_FOR_UPDATES = 'Check for updates';
export const CHECKING = 'Checking...';
export const STARTING = 'Starting...';
export const QUIT = 'Quit';

const ICON_NAMES: readonly IconName[] = ['check', 'alert', 'cross'];

/** Turn a raw checker outcome into a Status. Empty update lists are `up_to_date`. */
export function classify(outcome: CheckOutcome): Status {
  if (!outcome.ok) {
    return { kind: 'error', message: outcome.message };
  }
  if (outcome.updates.length === 0) {
    return { kind: 'up_to_date' };
  }
  return {
    kind: 'missing_updates',
    updates: Object.freeze(outcome.updates.map(createUpdate)),
  };
}

/** Build an immutable Update record. */
export function createUpdate(update: Update): Update {
  return Object.freeze({ text: update.text, link: update.link });
}

export function statusText(status: Status): string {
  switch (status.kind) {
    case 'checking':
      return CHECKING;
    case 'up_to_date':
      return 'No vulnerable packages';
    case 'missing_updates': {
      const count = status.updates.length;
      if (count === 0) return 'No vulnerable packages';
      return count === 1 ? '1 vulnerable package' : `${count} vulnerable packages`;
    }
    case 'error':
      return status.message ? `Error: ${status.message}` : 'Error: check failed';
  }
}

export function statusIcon(status: Status): IconName {
  switch (status.kind) {
    case 'checking':
    case 'up_to_date':
      return 'check';
    case 'missing_updates':
      return status.updates.length > 0 ? 'alert' : 'check';
    case 'error':
      return 'cross';
  }
}

/** Everything a display needs to render `status`. */
export function present(status: Status): Presentation {
  return {
    text: statusText(status),
    icon: statusIcon(status),
    updates: status.kind === 'missing_updates' ? status.updates : [],
  };
}

export function isIconName(value: string): value is IconName {
  return ICON_NAMES.some((name) => name === value);
}

export function parseIcon(raw: string): IconName {
  if (!isIconName(raw)) {
    throw new ValidationError(`Invalid icon name: ${JSON.stringify(raw)}`);
  }
  return raw;
}
