import path from 'node:path';

import type { ToolContext } from './registry.js';
import { ToolError } from './tool-error.js';

/**
 * Resolve a read-tool path against the workspace root.
 * Reads are not confined; only mutating tools go through the workspace guard.
 */
export function resolveReadPath(ctx: ToolContext, p: string): string {
  if (!p.trim()) throw new ToolError('invalid_args', 'missing file_path');
  return path.resolve(ctx.workspaceRoot, p);
}

export function requireExtension(file: string, allowed: string[]): void {
  const ext = path.extname(file).toLowerCase();
  if (!allowed.includes(ext)) {
    throw new ToolError(
      'unsupported',
      `${path.basename(file)}: expected ${allowed.join(' or ')} file, got "${ext || '(no extension)'}"`
    );
  }
}
