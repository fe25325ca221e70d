/**
 * Shared utility functions.
 *
 * Avoids duplicate implementations scattered across modules.
 */

import { randomBytes } from 'node:crypto';
import { readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

function readPackageVersion(): string {
  // src/utils.ts under tsx, dist/src/utils.js after a build.
  for (const rel of ['../package.json', '../../package.json']) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(new URL(rel, import.meta.url), 'utf8'));
      if (parsed && typeof parsed === 'object' && 'version' in parsed) {
        const v = parsed.version;
        if (typeof v === 'string') return v;
      }
    } catch {
      /* try next */
    }
  }
  return '0.0.0';
}

/** Package version read once at startup. Falls back to '0.0.0'. */
export const PKG_VERSION: string = readPackageVersion();

/**
 * XDG-compatible state directory for persistent app data.
 * `~/.local/state/redline`
 */
export function stateDir(): string {
  if (process.env.XDG_STATE_HOME) return path.join(process.env.XDG_STATE_HOME, 'redline');
  const base =
    process.platform === 'win32'
      ? process.env.LOCALAPPDATA || path.join(os.homedir(), 'AppData', 'Local')
      : path.join(os.homedir(), '.local', 'state');
  return path.join(base, 'redline');
}

/**
 * XDG-compatible config directory.
 * `~/.config/redline`
 * Can be overridden with REDLINE_CONFIG_DIR environment variable.
 */
export function configDir(): string {
  if (process.env.REDLINE_CONFIG_DIR) return process.env.REDLINE_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'redline');
  const base =
    process.platform === 'win32'
      ? process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming')
      : path.join(os.homedir(), '.config');
  return path.join(base, 'redline');
}

/**
 * Generate a short random hex ID.
 * @param bytes - Number of random bytes (default 6 = 12 hex chars)
 */
export function randomId(bytes = 6): string {
  return randomBytes(bytes).toString('hex');
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Session ids look like `redline_20260119_143005_1a2b3c4d` so they sort by creation time
 * and stay readable in `--session-id` invocations.
 */
export function newSessionId(now = new Date()): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `redline_${date}_${time}_${randomId(4)}`;
}

export function nowIso(): string {
  return new Date().toISOString();
}

/** Message text of anything thrown. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Node system error code (`ENOENT`, `EACCES`, ...) if the value carries one. */
export function errorCode(e: unknown): string | undefined {
  if (e && typeof e === 'object' && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}
