/**
 * Workspace confinement for mutating tools.
 *
 * A candidate path is accepted only if, after `..` normalization and symlink resolution,
 * it is the workspace root or lies beneath it. Nothing is read except link structure.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { errorCode } from '../utils.js';
import { ToolError } from './tool-error.js';

export type GuardResult = { ok: true; path: string } | { ok: false; reason: string };

/**
 * Check if a resolved target path resides within a directory.
 * Handles the classic root directory edge case: when dir is `/`, every absolute path is valid.
 */
export function isWithinDir(target: string, dir: string): boolean {
  if (dir === path.parse(dir).root) return path.isAbsolute(target);
  const rel = path.relative(dir, target);
  if (rel === '') return true;
  // `..draft.docx` is a file name, not a parent reference.
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * realpath() of the deepest existing ancestor, with the missing tail re-attached.
 * Lets the guard follow symlinks for paths that are about to be created.
 */
async function realpathLenient(p: string): Promise<string> {
  const missing: string[] = [];
  let cur = p;
  for (;;) {
    try {
      const real = await fs.realpath(cur);
      return missing.length ? path.join(real, ...missing.reverse()) : real;
    } catch (e: unknown) {
      const code = errorCode(e);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw e;
      const parent = path.dirname(cur);
      if (parent === cur) return p;
      missing.push(path.basename(cur));
      cur = parent;
    }
  }
}

/**
 * Resolve a candidate path against the workspace root.
 * Relative candidates are taken relative to the root.
 */
export async function resolveInWorkspace(
  root: string | undefined,
  candidate: string
): Promise<GuardResult> {
  if (!root || !root.trim()) {
    return { ok: false, reason: 'no workspace root is configured' };
  }
  if (typeof candidate !== 'string' || !candidate.trim()) {
    return { ok: false, reason: 'empty path' };
  }
  if (candidate.includes('\0')) {
    return { ok: false, reason: 'path contains a NUL byte' };
  }

  const absRoot = path.resolve(root);
  const lexical = path.resolve(absRoot, candidate);
  if (!isWithinDir(lexical, absRoot)) {
    return { ok: false, reason: `"${candidate}" is outside the workspace root "${absRoot}"` };
  }

  const realRoot = await realpathLenient(absRoot);
  const realTarget = await realpathLenient(lexical);
  if (!isWithinDir(realTarget, realRoot)) {
    return {
      ok: false,
      reason: `"${candidate}" resolves to "${realTarget}", outside the workspace root "${realRoot}"`,
    };
  }
  return { ok: true, path: realTarget };
}

/**
 * Throwing form used by the mutation pipeline: returns the confined absolute path
 * or raises a `blocked` ToolError.
 */
export async function enforceWithinWorkspace(
  tool: string,
  root: string | undefined,
  candidate: string
): Promise<string> {
  const res = await resolveInWorkspace(root, candidate);
  if (!res.ok) {
    throw new ToolError(
      'blocked',
      `${tool}: BLOCKED — ${res.reason}`,
      false,
      'use a path inside the workspace root'
    );
  }
  return res.path;
}

/**
 * Show paths inside the workspace relative to it; outside paths are reduced to
 * `[outside-workspace]/basename`.
 */
export function redactPath(filePath: string, root: string): string {
  const resolved = path.resolve(filePath);
  const absRoot = path.resolve(root);
  if (isWithinDir(resolved, absRoot)) {
    return path.relative(absRoot, resolved) || '.';
  }
  return `[outside-workspace]/${path.basename(resolved)}`;
}
