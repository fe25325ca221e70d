import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { z } from 'zod';

import { ToolError, ValidationError } from '../src/tools/tool-error.js';

function sysError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('ToolError', () => {
  it('formats a tool result with and without a hint', () => {
    assert.equal(
      new ToolError('not_found', 'sheet not found: "Q4"', false, 'available: Q1, Q2').toToolResult(),
      'ERROR: code=not_found retryable=false\nmsg=sheet not found: "Q4"\nhint=available: Q1, Q2'
    );
    assert.equal(
      new ToolError('transient', 'busy', true).toToolResult(),
      'ERROR: code=transient retryable=true\nmsg=busy'
    );
  });

  it('passes ToolErrors through unchanged', () => {
    const e = new ToolError('blocked', 'no');
    assert.equal(ToolError.fromError(e), e);
  });

  it('maps Node error codes', () => {
    assert.equal(ToolError.fromError(sysError("ENOENT: no such file, open 'a.docx'", 'ENOENT')).code, 'not_found');
    assert.equal(ToolError.fromError(sysError('EACCES: permission denied', 'EACCES')).code, 'permission');
    assert.equal(ToolError.fromError(sysError('EPERM: operation not permitted', 'EPERM')).code, 'permission');

    const refused = ToolError.fromError(sysError('connect ECONNREFUSED 127.0.0.1:9', 'ECONNREFUSED'));
    assert.equal(refused.code, 'transient');
    assert.equal(refused.retryable, true);
  });

  it('recognises timeouts from the message', () => {
    const e = ToolError.fromError(new Error('MCP request timed out: tools/call after 30000ms'));
    assert.equal(e.code, 'timeout');
    assert.equal(e.retryable, true);
  });

  it('falls back to internal, or the given default', () => {
    const e = ToolError.fromError('boom');
    assert.equal(e.code, 'internal');
    assert.equal(e.message, 'boom');
    assert.equal(ToolError.fromError(new Error('odd'), 'unsupported').code, 'unsupported');
  });
});

describe('ValidationError', () => {
  it('lists each invalid field', () => {
    const schema = z.object({ file_path: z.string(), max_rows: z.number().int() });
    const parsed = schema.safeParse({ max_rows: 'ten' });
    assert.equal(parsed.success, false);
    if (parsed.success) return;

    const err = ValidationError.fromIssues('read_sheet', parsed.error.issues);
    assert.equal(err.code, 'invalid_args');
    assert.deepEqual(
      err.errors.map((e) => e.field),
      ['file_path', 'max_rows']
    );
    assert.equal(
      err.toToolResult().split('\n').slice(0, 3).join('\n'),
      'ERROR: code=invalid_args retryable=false\nmsg=invalid arguments for read_sheet\n- file_path: Required'
    );
  });

  it('labels root-level issues', () => {
    const parsed = z.object({}).strict().safeParse('nope');
    assert.equal(parsed.success, false);
    if (parsed.success) return;
    assert.equal(ValidationError.fromIssues('t', parsed.error.issues).errors[0]?.field, '(root)');
  });
});
