// src/core/output-path.ts

import fs from 'fs';
import path from 'path';

import { silentLogger, type Logger } from '../util/logger';

export type ConflictChoice =
   | { kind: 'overwrite' }
   | { kind: 'rename'; path: string }
   | { kind: 'abort' };

export interface ConflictContext {
   outputPath: string;
   /** First free `<name>_<n><ext>` next to the output. */
   suggestedPath: string;
}

/**
 * Decides what to do when the output file already exists.
 */
export interface ConflictStrategy {
   ask(ctx: ConflictContext): Promise<ConflictChoice>;
}

export type ConflictMode = 'ask' | 'overwrite' | 'rename' | 'abort';

/**
 * Strategies that answer without asking anyone.
 */
export const fixedConflictStrategies: Record<Exclude<ConflictMode, 'ask'>, ConflictStrategy> = {
   overwrite: { ask: async () => ({ kind: 'overwrite' }) },
   rename: { ask: async (ctx) => ({ kind: 'rename', path: ctx.suggestedPath }) },
   abort: { ask: async () => ({ kind: 'abort' }) },
};

/**
 * `out.pdf` → `out_1.pdf`, `out_2.pdf`, ... whichever is free first.
 */
export function nextAvailablePath(filePath: string): string {
   const { dir, name, ext } = path.parse(filePath);

   for (let counter = 1; ; counter++) {
      const candidate = path.join(dir, `${name}_${counter}${ext}`);
      if (!fs.existsSync(candidate)) return candidate;
   }
}

/**
 * Final output path, or null when the run should stop.
 */
export async function resolveOutputPath(
   outputPath: string,
   strategy: ConflictStrategy,
   logger: Logger = silentLogger(),
): Promise<string | null> {
   if (!fs.existsSync(outputPath)) return outputPath;

   logger.warn(`Output file already exists: ${outputPath}`);
   const suggestedPath = nextAvailablePath(outputPath);
   const choice = await strategy.ask({ outputPath, suggestedPath });

   switch (choice.kind) {
      case 'overwrite':
         logger.info('Overwriting existing file');
         return outputPath;
      case 'rename':
         logger.info(`Using alternative filename: ${choice.path}`);
         return choice.path;
      case 'abort':
         logger.info('Stopping at user request');
         return null;
   }
}
