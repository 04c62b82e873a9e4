import { spawn } from 'node:child_process';

export type LinkOpener = (url: string) => Promise<void>;

/**
 * Open `url` with the desktop's handler. The opener is detached so it outlives
 * the display; only a failure to start it is reported.
 */
export function openLink(url: string, command = 'xdg-open'): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [url], { detached: true, stdio: 'ignore' });
    child.once('error', (err) => {
      reject(new Error(`Cannot open ${url}: ${err.message}`));
    });
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
