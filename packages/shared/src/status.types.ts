/** One affected package and the advisory that covers it. */
export interface Update {
  readonly text: string;
  readonly link: string;
}

export type Status =
  | { kind: 'checking' }
  | { kind: 'up_to_date' }
  | { kind: 'missing_updates'; updates: readonly Update[] }
  | { kind: 'error'; message: string };

export type StatusKind = Status['kind'];

export type IconName = 'check' | 'alert' | 'cross';

/** What the Checker produced for one attempt, before classification. */
export type CheckOutcome =
  | { ok: true; updates: readonly Update[] }
  | { ok: false; message: string };

export interface Presentation {
  text: string;
  icon: IconName;
  /** Entries for the expandable submenu; empty when there is nothing to list. */
  updates: readonly Update[];
}
