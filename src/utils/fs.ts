import { copyFile, mkdir, rename, rm, stat, utimes, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';

// Excel owner files (~$book.xlsx) and LibreOffice locks (.~lock.book.xlsx#)
const LOCK_FILE_PATTERN = /^(~\$|\.~lock)/;

export function isLockFile(name: string): boolean {
  return LOCK_FILE_PATTERN.test(name);
}

function tempPathFor(destination: string): string {
  return join(dirname(destination), `.${basename(destination)}.${uuidv4()}.tmp`);
}

/**
 * Write `data` to `destination` via a sibling temp file and a rename, so readers never
 * observe a partially written file.
 */
export async function writeFileAtomic(destination: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
  const tmp = tempPathFor(destination);
  try {
    await writeFile(tmp, data);
    await rename(tmp, destination);
  } catch (e) {
    await rm(tmp, { force: true });
    throw e;
  }
}

/**
 * Copy `source` to `destination` atomically, carrying over the source's modification time.
 */
export async function copyFileAtomic(source: string, destination: string): Promise<void> {
  const sourceStat = await stat(source);
  await mkdir(dirname(destination), { recursive: true });
  const tmp = tempPathFor(destination);
  try {
    await copyFile(source, tmp);
    await utimes(tmp, sourceStat.atime, sourceStat.mtime);
    await rename(tmp, destination);
  } catch (e) {
    await rm(tmp, { force: true });
    throw e;
  }
}
