/**
 * Structured tool error taxonomy.
 * Every failure a tool can hit is turned into one of these at the dispatch boundary,
 * so the model always sees the same `ERROR: code=...` shape.
 */

import type { ZodIssue } from 'zod';

import { errorCode, errorMessage } from '../utils.js';

export type ToolErrorCode =
  | 'invalid_args'     // Bad JSON, wrong types, missing params
  | 'unknown_tool'     // No tool registered under that name
  | 'not_found'        // File, sheet or text doesn't exist
  | 'blocked'          // Workspace confinement rejected a path
  | 'permission'       // Filesystem permission denied
  | 'timeout'          // Operation timed out
  | 'transient'        // Temporary failure, retryable
  | 'unsupported'      // File type or operation not handled
  | 'internal';        // Unexpected error in tool implementation

export class ToolError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    public readonly retryable: boolean = false,
    public readonly hint?: string
  ) {
    super(message);
    this.name = 'ToolError';
  }

  /**
   * Format as a concise tool result content string
   */
  toToolResult(): string {
    const lines = [`ERROR: code=${this.code} retryable=${this.retryable}`, `msg=${this.message}`];
    if (this.hint) {
      lines.push(`hint=${this.hint}`);
    }
    return lines.join('\n');
  }

  /**
   * Create from a generic error (with code inference from Node error codes and message text)
   */
  static fromError(err: unknown, defaultCode: ToolErrorCode = 'internal'): ToolError {
    if (err instanceof ToolError) return err;

    const message = errorMessage(err);
    const sysCode = errorCode(err);

    if (sysCode === 'ENOENT' || message.includes('ENOENT')) {
      return new ToolError('not_found', message);
    }
    if (sysCode === 'EACCES' || sysCode === 'EPERM' || message.includes('permission denied')) {
      return new ToolError('permission', message);
    }
    if (sysCode === 'ETIMEDOUT' || /timed? ?out/i.test(message)) {
      return new ToolError('timeout', message, true);
    }
    if (sysCode === 'ECONNREFUSED' || sysCode === 'ECONNRESET') {
      return new ToolError('transient', message, true);
    }
    return new ToolError(defaultCode, message);
  }
}

/**
 * Validation error with field-level details
 */
export class ValidationError extends ToolError {
  constructor(
    public readonly tool: string,
    public readonly errors: Array<{ field: string; message: string }>
  ) {
    super('invalid_args', `Validation failed: ${errors.map((e) => e.message).join('; ')}`);
    this.name = 'ValidationError';
  }

  static fromIssues(tool: string, issues: ZodIssue[]): ValidationError {
    return new ValidationError(
      tool,
      issues.map((i) => ({ field: i.path.length ? i.path.join('.') : '(root)', message: i.message }))
    );
  }

  toToolResult(): string {
    const lines = [`ERROR: code=invalid_args retryable=false`, `msg=invalid arguments for ${this.tool}`];
    for (const err of this.errors) {
      lines.push(`- ${err.field}: ${err.message}`);
    }
    return lines.join('\n');
  }
}
