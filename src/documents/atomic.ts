import fs from 'node:fs/promises';
import path from 'node:path';

import { errorMessage } from '../utils.js';

/**
 * Write a whole file via temp-file + rename so readers never observe a half-written document.
 * Keeps the original file's mode bits when it is being replaced.
 */
export async function atomicWrite(absPath: string, data: string | Uint8Array): Promise<void> {
  const dir = path.dirname(absPath);
  await fs.mkdir(dir, { recursive: true });

  const origStat = await fs.stat(absPath).catch(() => null);
  const origMode = origStat?.mode;

  const tmp = path.join(dir, `.${path.basename(absPath)}.redline.tmp.${process.pid}.${Date.now()}`);
  try {
    await fs.writeFile(tmp, data);
    if (origMode != null) {
      await fs.chmod(tmp, origMode & 0o7777).catch((e: unknown) => {
        console.warn(`[warn] could not keep file mode on ${absPath}: ${errorMessage(e)}`);
      });
    }
    await fs.rename(tmp, absPath);
  } catch (e: unknown) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}
