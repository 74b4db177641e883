// src/core/resolve-entries.ts

import { RECURSIVE_OPTION, type ResolvedFileEntry } from '../schema';
import { compareStrings } from '../util/fs-utils';
import { silentLogger, type Logger } from '../util/logger';
import { expandPath } from './path-expander';

export type PathExpanderFn = (
   target: string,
   recursive: boolean,
   logger: Logger,
) => string[];

export interface ResolveEntriesOptions {
   logger?: Logger;
   /**
    * Override directory expansion (tests use an in-memory tree).
    */
   expand?: PathExpanderFn;
}

/**
 * Append the options of `own` that `inherited` does not already carry.
 * Order is first-seen; duplicates inside `own` collapse too.
 */
export function mergeOptions(
   inherited: readonly string[],
   own: readonly string[] = [],
): string[] {
   const merged = [...inherited];
   for (const opt of own) {
      if (!merged.includes(opt)) merged.push(opt);
   }
   return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringsOf(value: unknown, what: string, logger: Logger): string[] {
   if (value === undefined) return [];
   if (!Array.isArray(value)) {
      logger.warn(`Ignoring ${what}: expected an array, got ${typeof value}`);
      return [];
   }

   const out: string[] = [];
   for (const item of value) {
      if (typeof item === 'string') {
         out.push(item);
      } else {
         logger.warn(`Ignoring non-string value in ${what}: ${JSON.stringify(item)}`);
      }
   }
   return out;
}

function entryOf(path: string, options: readonly string[]): ResolvedFileEntry {
   return Object.freeze({ path, options: Object.freeze([...options]) });
}

/**
 * Flatten a `files` array into the ordered list of input files, each with
 * its effective options.
 *
 * Plain strings are expanded non-recursively with the inherited options.
 * Objects merge their `options` into the inherited ones, then expand their
 * own `files` (sorted as strings first), recursively when the merged options
 * contain "recursive". Anything else is skipped with a warning.
 */
export function resolveEntries(
   entries: readonly unknown[],
   inheritedOptions: readonly string[] = [],
   options: ResolveEntriesOptions = {},
): ResolvedFileEntry[] {
   const logger = options.logger ?? silentLogger();
   const expand = options.expand ?? expandPath;
   const result: ResolvedFileEntry[] = [];

   if (inheritedOptions.length) {
      logger.info(`Processing with inherited options: ${inheritedOptions.join(', ')}`);
   }

   for (const [index, item] of entries.entries()) {
      if (typeof item === 'string') {
         logger.info(`Processing path entry: ${item}`);
         for (const file of expand(item, false, logger)) {
            result.push(entryOf(file, inheritedOptions));
         }
         continue;
      }

      if (!isRecord(item)) {
         logger.warn(
            `Skipping entry #${index}: expected a path or an object, got ${JSON.stringify(item)}`,
         );
         continue;
      }

      const ownOptions = stringsOf(item.options, `options of entry #${index}`, logger);
      const currentOptions = mergeOptions(inheritedOptions, ownOptions);
      const added = currentOptions.slice(inheritedOptions.length);
      if (added.length) {
         logger.info(`Adding new options: ${added.join(', ')}`);
      }

      const isRecursive = currentOptions.includes(RECURSIVE_OPTION);
      logger.info(`Processing group entry with options: [${currentOptions.join(', ')}]`);

      const paths = stringsOf(item.files, `files of entry #${index}`, logger).sort(
         compareStrings,
      );
      logger.debug(`Processing files in order: ${paths.join(', ')}`);

      for (const p of paths) {
         for (const file of expand(p, isRecursive, logger)) {
            result.push(entryOf(file, currentOptions));
         }
      }
   }

   return result;
}
