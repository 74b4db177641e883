// src/core/path-expander.ts

import fs from 'fs';
import path from 'path';

import { compareStrings, statSafeSync } from '../util/fs-utils';
import { silentLogger, type Logger } from '../util/logger';

/**
 * Expand a path from the config into the concrete files it stands for.
 *
 * - missing path → [] (warning)
 * - file → [file]
 * - directory → its regular files, sorted
 * - directory + recursive → every directory of the tree in sorted path
 *   order, each contributing its own sorted files. The result is grouped
 *   per directory, so it is not a global sort of the file paths:
 *   `imgs/z.png` comes before `imgs/a/m.png`.
 */
export function expandPath(
   target: string,
   recursive = false,
   logger: Logger = silentLogger(),
): string[] {
   const stat = statSafeSync(target);
   if (!stat) {
      logger.warn(`Path does not exist: ${target}`);
      return [];
   }

   if (stat.isFile()) {
      logger.debug(`Single file path: ${target}`);
      return [path.normalize(target)];
   }

   if (!stat.isDirectory()) {
      logger.debug(`Skipping special file: ${target}`);
      return [];
   }

   logger.info(
      `Processing directory: ${target} ${recursive ? 'recursively' : 'non-recursively'}`,
   );

   if (!recursive) {
      const files = listDirectory(path.normalize(target), logger).files;
      logger.debug(`Found ${files.length} files in directory ${target}`);
      return files;
   }

   const directories = collectDirectories(path.normalize(target), logger);
   directories.sort(compareStrings);

   const files: string[] = [];
   for (const dir of directories) {
      files.push(...listDirectory(dir, logger).files);
   }

   logger.debug(`Found ${files.length} files recursively in ${target}`);
   return files;
}

interface DirectoryListing {
   files: string[];
   subdirectories: string[];
}

/**
 * Sorted regular files of one directory, plus the real (non-symlinked)
 * subdirectories to descend into.
 */
function listDirectory(dir: string, logger: Logger): DirectoryListing {
   let dirents: fs.Dirent[];
   try {
      dirents = fs.readdirSync(dir, { withFileTypes: true });
   } catch (err) {
      logger.warn(`Could not read directory ${dir}:`, err);
      return { files: [], subdirectories: [] };
   }

   const files: string[] = [];
   const subdirectories: string[] = [];

   for (const dirent of dirents) {
      const absPath = path.join(dir, dirent.name);

      if (dirent.isDirectory()) {
         subdirectories.push(absPath);
      } else if (dirent.isFile()) {
         files.push(absPath);
      } else if (dirent.isSymbolicLink() && statSafeSync(absPath)?.isFile()) {
         // links to files count as files; links to directories are not walked
         files.push(absPath);
      }
   }

   files.sort(compareStrings);
   subdirectories.sort(compareStrings);
   return { files, subdirectories };
}

function collectDirectories(root: string, logger: Logger): string[] {
   const out: string[] = [];

   function walk(dir: string) {
      out.push(dir);
      for (const sub of listDirectory(dir, logger).subdirectories) {
         walk(sub);
      }
   }

   walk(root);
   return out;
}
