import { spawn } from 'node:child_process';
import type { Update } from '@auditray/shared';
import type { Checker } from '../coordinator/update.coordinator.js';
import { createUpdate } from '../status/status.model.js';
import { CheckerError } from '../errors.js';

const MAX_STDERR_CHARS = 2_000;

export const DEFAULT_ADVISORY_BASE_URL = 'https://security.archlinux.org/';

export interface ArchAuditCheckerOptions {
  command: string;
  args: string[];
  /** Prefix joined with each advisory group name to build its link. */
  advisoryBaseUrl?: string;
}

/**
 * Runs `arch-audit --json` (or whatever command is configured) and turns its
 * advisory groups into Update records.
 *
 * Every failure rejects with a CheckerError: the command cannot be started,
 * it exits non-zero, or its output is not the expected JSON.
 */
export class ArchAuditChecker implements Checker {
  private readonly command: string;
  private readonly args: string[];
  private readonly advisoryBaseUrl: string;

  constructor(options: ArchAuditCheckerOptions) {
    this.command = options.command;
    this.args = options.args;
    this.advisoryBaseUrl = options.advisoryBaseUrl ?? DEFAULT_ADVISORY_BASE_URL;
  }

  async check(): Promise<Update[]> {
    const stdout = await this.execute();
    return parseAdvisories(stdout, this.advisoryBaseUrl);
  }

  private execute(): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const proc = spawn(this.command, this.args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      proc.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      let settled = false;

      proc.on('error', (err: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        if (err.code === 'ENOENT') {
          reject(new CheckerError(`${this.command}: tool not found`));
        } else {
          reject(new CheckerError(`${this.command}: ${err.message}`));
        }
      });

      // 'close' rather than 'exit' so stdout is complete before parsing.
      proc.on('close', (code, signal) => {
        if (settled) return;
        settled = true;

        if (code === 0) {
          resolve(stdout);
          return;
        }

        const reason = code === null ? `killed by ${signal ?? 'signal'}` : `exit code ${code}`;
        const detail = stderr.trim().slice(0, MAX_STDERR_CHARS);
        reject(new CheckerError(`${this.command} failed (${reason})${detail ? `: ${detail}` : ''}`));
      });
    });
  }
}

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

/** One advisory group as printed by `arch-audit --json`. */
export interface AdvisoryRecord {
  name: string;
  packages: string[];
  severity: string;
  type: string;
  fixed: string | null;
}

/**
 * Parse the checker's stdout. Blank output means nothing is affected.
 * Record order is kept as printed.
 */
export function parseAdvisories(stdout: string, advisoryBaseUrl: string): Update[] {
  if (stdout.trim() === '') return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    throw new CheckerError('Malformed checker output: not valid JSON');
  }

  if (!Array.isArray(parsed)) {
    throw new CheckerError('Malformed checker output: expected a JSON array');
  }

  return parsed.map((entry: unknown, i) => {
    const record = readAdvisory(entry, i);
    return createUpdate({
      text: formatAdvisory(record),
      link: `${advisoryBaseUrl}${encodeURIComponent(record.name)}`,
    });
  });
}

/** e.g. `openssl, lib32-openssl: arbitrary code execution (High) → fixed in 3.1.2-1` */
export function formatAdvisory(record: AdvisoryRecord): string {
  const text = `${record.packages.join(', ')}: ${record.type} (${record.severity})`;
  return record.fixed ? `${text} → fixed in ${record.fixed}` : text;
}

function readAdvisory(entry: unknown, index: number): AdvisoryRecord {
  if (entry === null || typeof entry !== 'object') {
    throw new CheckerError(`Malformed checker output: entry ${index} is not an object`);
  }

  const field = (key: string): unknown => Reflect.get(entry, key);
  const name = field('name');
  const packages = field('packages');
  const severity = field('severity');
  const type = field('type');
  const fixed = field('fixed');

  if (typeof name !== 'string' || name === '') {
    throw new CheckerError(`Malformed checker output: entry ${index} has no name`);
  }
  if (!Array.isArray(packages) || packages.some((p) => typeof p !== 'string')) {
    throw new CheckerError(`Malformed checker output: entry ${index} has no package list`);
  }

  return {
    name,
    packages: packages.map(String),
    severity: typeof severity === 'string' ? severity : 'Unknown',
    type: typeof type === 'string' ? type : 'unknown',
    fixed: typeof fixed === 'string' && fixed !== '' ? fixed : null,
  };
}
