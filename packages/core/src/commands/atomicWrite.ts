/**
 * Write a file so that readers see either the old content or the complete
 * new content: write and fsync a temp file beside the target, then rename.
 */

import { randomBytes } from 'crypto';
import { closeSync, existsSync, fsyncSync, openSync, renameSync, unlinkSync, writeSync } from 'fs';

export function atomicWriteFileSync(filePath: string, content: string): void {
  const tmp = `${filePath}.tmp-${randomBytes(4).toString('hex')}`;

  try {
    const fd = openSync(tmp, 'wx', 0o644);
    try {
      writeSync(fd, content, null, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmp, filePath);
  } catch (error) {
    if (existsSync(tmp)) {
      unlinkSync(tmp);
    }
    throw error;
  }
}
