import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';

export interface TempFile {
  readonly path: string;
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower && !lower.startsWith('.') ? `.${lower}` : lower;
}

/**
 * Reserve a new empty file in the OS temp dir and optionally fill it.
 * If `writer` fails the file is removed before the error propagates.
 */
export async function createTempFile(ext = '', writer?: (filePath: string) => Promise<void>): Promise<TempFile> {
  const file: TempFile = {
    path: path.join(os.tmpdir(), `gdcm-${randomUUID()}${normalizeExtension(ext)}`),
  };
  await fs.writeFile(file.path, '', { flag: 'wx' });

  if (writer) {
    try {
      await writer(file.path);
    } catch (err) {
      await removeTempFile(file);
      throw err;
    }
  }
  return file;
}

// Safe to call more than once. An .mpc temp file has a companion .cache file holding its pixels.
export async function removeTempFile(file: TempFile): Promise<void> {
  if (file.path.endsWith('.mpc')) {
    await fs.rm(file.path.replace(/mpc$/, 'cache'), { force: true });
  }
  await fs.rm(file.path, { force: true });
}
