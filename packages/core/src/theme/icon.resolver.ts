import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import type { IconName } from '@auditray/shared';
import { IconTheme } from './icon.theme.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../errors.js';

const log = createLogger('icons');

export interface IconGlyph {
  glyph: string;
  color: string;
}

export type IconSet = Record<IconName, IconGlyph>;

export interface ResolvedIconSet {
  /** Theme that was actually loaded, or null for the built-in set. */
  theme: IconTheme | null;
  /** Directory holding the theme's icons.yaml, or null for the built-in set. */
  directory: string | null;
  icons: IconSet;
}

const ICON_FILE = 'icons.yaml';

/** Icons shipped with this package, next to `src/`. */
export const BUNDLED_ICONS_DIR = fileURLToPath(new URL('../../icons', import.meta.url));

export const DEFAULT_ICON_PATHS: readonly string[] = [
  './icons',
  '/usr/share/auditray/icons',
  BUNDLED_ICONS_DIR,
];

export const BUILTIN_ICON_SET: IconSet = {
  check: { glyph: '✔', color: 'green' },
  alert: { glyph: '!', color: 'yellow' },
  cross: { glyph: '✘', color: 'red' },
};

/**
 * Find the icon set for `theme`. Each search path is tried in order; within a
 * path the requested theme is preferred and `default` is the fallback. When no
 * path has a usable icons.yaml the built-in set is returned.
 */
export function resolveIconSet(
  theme: IconTheme,
  searchPaths: readonly string[] = DEFAULT_ICON_PATHS,
): ResolvedIconSet {
  const candidates = theme.isDefault() ? [theme] : [theme, IconTheme.default()];

  for (const base of searchPaths) {
    for (const candidate of candidates) {
      const directory = path.resolve(base, candidate.value);
      const file = path.join(directory, ICON_FILE);
      if (!fs.existsSync(file)) continue;

      try {
        const icons = parseIconSet(fs.readFileSync(file, 'utf8'));
        return { theme: candidate, directory, icons };
      } catch (err) {
        log.warn(`Ignoring ${file}: ${errorMessage(err)}`);
      }
    }
  }

  log.debug(`No icon theme found for "${theme.value}", using built-in icons`);
  return { theme: null, directory: null, icons: BUILTIN_ICON_SET };
}

/** Parse an icons.yaml document. Every icon needs a non-empty glyph and color. */
export function parseIconSet(source: string): IconSet {
  const parsed = yaml.load(source);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('icons.yaml must be a mapping');
  }

  const entries = new Map(Object.entries(parsed));
  return {
    check: readGlyph(entries.get('check'), 'check'),
    alert: readGlyph(entries.get('alert'), 'alert'),
    cross: readGlyph(entries.get('cross'), 'cross'),
  };
}

function readGlyph(value: unknown, name: IconName): IconGlyph {
  if (value === null || typeof value !== 'object') {
    throw new Error(`missing icon "${name}"`);
  }
  const glyph: unknown = Reflect.get(value, 'glyph');
  const color: unknown = Reflect.get(value, 'color');
  if (typeof glyph !== 'string' || glyph.length === 0) {
    throw new Error(`icon "${name}" needs a glyph`);
  }
  if (typeof color !== 'string' || color.length === 0) {
    throw new Error(`icon "${name}" needs a color`);
  }
  return { glyph, color };
}
