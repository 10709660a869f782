/**
 * XDG Base Directory compliant paths for watchtower.
 *
 * - Config: ~/.config/watchtower/ (or $XDG_CONFIG_HOME/watchtower/)
 * - State: ~/.local/state/watchtower/ (or $XDG_STATE_HOME/watchtower/)
 *   The default tool trace log lives here.
 * - Project: .watchtower/ in the working directory
 *
 * Follows the XDG Base Directory layout.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_NAME = 'watchtower';

/**
 * Uses $XDG_CONFIG_HOME if set, otherwise ~/.config/watchtower/
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_NAME) : join(homedir(), '.config', APP_NAME);
}

/**
 * Uses $XDG_STATE_HOME if set, otherwise ~/.local/state/watchtower/
 */
export function getStateDir(): string {
  const xdg = process.env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_NAME) : join(homedir(), '.local', 'state', APP_NAME);
}

export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_NAME}`);
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Where the post-tool hook appends entries unless configured otherwise.
 */
export function getTraceLogPath(): string {
  return join(getStateDir(), 'tool-trace.jsonl');
}
