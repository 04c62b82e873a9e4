/** Display palette: neutral frame, status colours from the icon theme. */
export const THEME = {
  /** Blue: product name, selection marker */
  primary: '#60A5FA',
  /** Slate: borders */
  accent: '#475569',
  /** Gray: inactive text, key hints */
  dim: '#6B7280',
  /** Green: up to date */
  success: '#22C55E',
  /** Red: errors */
  error: '#EF4444',
  /** Amber: pending check, connection warnings */
  warning: '#F59E0B',
  /** White: primary text */
  text: 'white',
  /** Light gray: secondary text */
  textDim: '#9CA3AF',
} as const;
