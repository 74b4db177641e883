// src/util/fs-utils.ts

import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * Get file stats (following symlinks) if they exist, otherwise null.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * Plain code-unit ordering, the same for every locale.
 */
export function compareStrings(a: string, b: string): number {
   if (a < b) return -1;
   if (a > b) return 1;
   return 0;
}

/**
 * Write a file, creating parent directories if needed.
 */
export function writeFileSafeSync(filePath: string, contents: string | Uint8Array): void {
   ensureDirSync(path.dirname(filePath));
   fs.writeFileSync(filePath, contents);
}

/**
 * Run `fn` with a fresh private directory under the OS temp dir. The
 * directory and everything in it is removed once `fn` settles, whether it
 * resolved or threw.
 */
export async function withTempDir<T>(
   label: string,
   fn: (dir: string) => Promise<T>,
): Promise<T> {
   const dir = fs.mkdtempSync(path.join(os.tmpdir(), `${label}-`));
   try {
      return await fn(dir);
   } finally {
      fs.rmSync(dir, { recursive: true, force: true });
   }
}
