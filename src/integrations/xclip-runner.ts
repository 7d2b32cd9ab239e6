/**
 * xclip Runner
 *
 * Feeds text to xclip's stdin to set the X clipboard selection.
 */

import { spawn } from 'node:child_process';
import { PlacemarksError, hasErrorCode, toErrorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('xclip');

export const XCLIP_COMMAND = 'xclip';

// Something on most desktops reads the clipboard as soon as it changes, so
// xclip has to serve two requests before the user's paste gets one.
// -verbose keeps xclip in the foreground until then.
export const XCLIP_ARGS: readonly string[] = [
  '-target',
  'UTF8_STRING',
  '-in',
  '-verbose',
  '-selection',
  'clipboard',
  '-loops',
  '2',
];

/**
 * Run xclip with `text` on stdin. Resolves once xclip exits 0, which with
 * `-loops 2` is after the clipboard has been pasted from.
 */
export function runXclip(text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    let stderr = '';
    let stdinError: Error | null = null;
    let settled = false;

    const fail = (message: string) => {
      if (settled) return;
      settled = true;
      reject(
        new PlacemarksError('clipboard_unavailable', message, `Install ${XCLIP_COMMAND}, or omit --clipboard.`, {
          command: XCLIP_COMMAND,
        })
      );
    };

    log.debug(`Running ${XCLIP_COMMAND} ${XCLIP_ARGS.join(' ')}`);
    const proc = spawn(XCLIP_COMMAND, [...XCLIP_ARGS], { stdio: ['pipe', 'ignore', 'pipe'] });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    // EPIPE when xclip dies before reading; the exit code reports the failure
    proc.stdin.on('error', (err) => {
      stdinError = err;
    });

    proc.on('error', (err) => {
      const reason = hasErrorCode(err, 'ENOENT') ? 'command not found' : toErrorMessage(err);
      fail(`Cannot start ${XCLIP_COMMAND}: ${reason}`);
    });

    proc.on('close', (code) => {
      if (code === 0) {
        if (!settled) {
          settled = true;
          resolve();
        }
        return;
      }
      const detail = stderr.trim() || (stdinError ? toErrorMessage(stdinError) : '') || `exit code ${code ?? 'unknown'}`;
      fail(`${XCLIP_COMMAND} failed: ${detail}`);
    });

    proc.stdin.end(text, 'utf-8');
  });
}
