/**
 * Formula recalculation. exceljs stores formulas but cannot evaluate them, so cached results
 * come from an external spreadsheet engine behind the FormulaEngine interface.
 */

import { execFile as execFileCb } from 'node:child_process';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { promisify } from 'node:util';

import { ToolError } from '../tools/tool-error.js';
import { errorCode, errorMessage } from '../utils.js';

const execFile = promisify(execFileCb);

export interface FormulaEngine {
  readonly name: string;
  /** Return the bytes of `inputPath` with every formula result recalculated. Never writes `inputPath`. */
  recalculate(inputPath: string, opts: { timeoutMs: number; signal?: AbortSignal }): Promise<Buffer>;
}

function killedByTimeout(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'killed' in e && e.killed === true;
}

/** Headless LibreOffice: converts the workbook to .xlsx in a scratch directory, which recalculates on load. */
export class LibreOfficeEngine implements FormulaEngine {
  readonly name = 'LibreOffice';

  constructor(private readonly binary = 'soffice') {}

  async recalculate(inputPath: string, opts: { timeoutMs: number; signal?: AbortSignal }): Promise<Buffer> {
    const outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'redline-recalc-'));
    try {
      try {
        await execFile(
          this.binary,
          ['--headless', '--norestore', '--calc', '--convert-to', 'xlsx', '--outdir', outDir, inputPath],
          { timeout: opts.timeoutMs, signal: opts.signal }
        );
      } catch (e: unknown) {
        if (errorCode(e) === 'ENOENT') {
          throw new ToolError(
            'unsupported',
            `formula engine not available: ${this.binary} was not found`,
            false,
            'install LibreOffice or set soffice_path (REDLINE_SOFFICE_PATH)'
          );
        }
        if (killedByTimeout(e)) {
          throw new ToolError('timeout', `${this.name} did not finish within ${Math.round(opts.timeoutMs / 1000)}s`, true);
        }
        throw new ToolError('internal', `${this.name} failed: ${errorMessage(e)}`);
      }
      const converted = path.join(outDir, `${path.parse(inputPath).name}.xlsx`);
      try {
        return await fs.readFile(converted);
      } catch (e: unknown) {
        throw new ToolError('internal', `${this.name} produced no workbook: ${errorMessage(e)}`);
      }
    } finally {
      await fs.rm(outDir, { recursive: true, force: true });
    }
  }
}
