import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import yaml from 'js-yaml';
import type { AuditrayConfig } from '@auditray/shared';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { IconTheme } from '../theme/icon.theme.js';
import { ValidationError, errorMessage } from '../errors.js';
import { createLogger, isLogLevel } from '../logging/logger.js';

const log = createLogger('config');

const AUDITRAY_DIR = path.join(os.homedir(), '.auditray');
const CONFIG_PATH = path.join(AUDITRAY_DIR, 'config.yaml');

/** Config after validation: the theme name has become an IconTheme. */
export interface ResolvedConfig extends Omit<AuditrayConfig, 'icon_theme'> {
  icon_theme: IconTheme;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toRecord(value: unknown): Record<string, unknown> {
  return isPlainObject(value) ? { ...value } : {};
}

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...base };
  for (const key of Object.keys(override)) {
    const overrideVal = override[key];
    const baseVal = base[key];
    if (isPlainObject(overrideVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else if (overrideVal !== undefined && overrideVal !== null) {
      result[key] = overrideVal;
    }
  }
  return result;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (!isPlainObject(value)) {
    throw new ValidationError(`Config validation failed: ${key} must be a mapping`);
  }
  return value;
}

function nonEmptyString(value: unknown, key: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`Config validation failed: ${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Check every key of a merged config and narrow it to AuditrayConfig.
 * The icon theme is not checked here; see resolveIconTheme.
 */
function validateConfig(raw: Record<string, unknown>): AuditrayConfig {
  const watcher = section(raw, 'watcher');
  const checker = section(raw, 'checker');
  const server = section(raw, 'server');
  const logSection = section(raw, 'log');

  const args = checker['args'];
  if (!Array.isArray(args) || args.some((a) => typeof a !== 'string')) {
    throw new ValidationError('Config validation failed: checker.args must be a list of strings');
  }

  const port = server['port'];
  if (typeof port !== 'number' || !Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ValidationError(
      'Config validation failed: server.port must be a valid port number (1-65535)',
    );
  }

  const level = logSection['level'];
  if (!isLogLevel(level)) {
    throw new ValidationError(
      'Config validation failed: log.level must be one of debug, info, warn, error, silent',
    );
  }

  return {
    icon_theme: typeof raw['icon_theme'] === 'string' ? raw['icon_theme'] : DEFAULT_CONFIG.icon_theme,
    watcher: { path: nonEmptyString(watcher['path'], 'watcher.path') },
    checker: {
      command: nonEmptyString(checker['command'], 'checker.command'),
      args: args.map(String),
      advisory_base_url: nonEmptyString(checker['advisory_base_url'], 'checker.advisory_base_url'),
    },
    server: { port },
    log: { level },
  };
}

/**
 * Validate the configured theme name, falling back to the default theme
 * (with a warning) when it is missing or invalid.
 */
export function resolveIconTheme(raw: unknown): IconTheme {
  if (raw === undefined || raw === null) return IconTheme.default();
  if (typeof raw !== 'string') {
    log.warn(`icon_theme must be a string, using "${IconTheme.DEFAULT_NAME}"`);
    return IconTheme.default();
  }
  try {
    return IconTheme.parse(raw);
  } catch (err) {
    log.warn(`${errorMessage(err)}, using "${IconTheme.DEFAULT_NAME}"`);
    return IconTheme.default();
  }
}

export async function loadConfig(): Promise<ResolvedConfig> {
  // Ensure ~/.auditray/ exists
  if (!fs.existsSync(AUDITRAY_DIR)) {
    fs.mkdirSync(AUDITRAY_DIR, { recursive: true });
  }

  let userConfig: Record<string, unknown> = {};

  if (fs.existsSync(CONFIG_PATH)) {
    const raw = await fs.promises.readFile(CONFIG_PATH, 'utf8');
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (err) {
      throw new ValidationError(`Config at ${CONFIG_PATH} is not valid YAML: ${errorMessage(err)}`);
    }
    if (isPlainObject(parsed)) {
      userConfig = parsed;
    }
  } else {
    fs.writeFileSync(CONFIG_PATH, yaml.dump(DEFAULT_CONFIG), 'utf8');
    log.info(`Created default config at ${CONFIG_PATH}`);
  }

  const merged = deepMerge(toRecord(DEFAULT_CONFIG), userConfig);
  const config = validateConfig(merged);

  return { ...config, icon_theme: resolveIconTheme(userConfig['icon_theme']) };
}

export { AUDITRAY_DIR, CONFIG_PATH };
