// src/core/assembler.ts

import { PDFDocument } from 'pdf-lib';

import type { ResolvedFileEntry } from '../schema';
import { writeFileSafeSync } from '../util/fs-utils';
import { silentLogger, type Logger } from '../util/logger';
import { loadMergeConfig } from './config-loader';
import type { ImageConverter } from './image-converter';
import { fixedConflictStrategies, resolveOutputPath, type ConflictStrategy } from './output-path';
import { resolveEntries, type PathExpanderFn } from './resolve-entries';
import { loadSource } from './source-loader';
import { applyTransforms, pdfLibPage } from './transform-engine';

export type AssemblyState =
   | 'init'
   | 'output-resolved'
   | 'config-loaded'
   | 'files-resolved'
   | 'assembling'
   | 'written'
   | 'aborted'
   | 'failed';

export interface AssemblerOptions {
   configPath: string;
   outputPath: string;

   /**
    * What to do when `outputPath` exists. Defaults to aborting, so nothing
    * is ever overwritten without a strategy that says so.
    */
   conflictStrategy?: ConflictStrategy;

   logger?: Logger;

   converter?: ImageConverter;

   /**
    * Override directory expansion (tests).
    */
   expand?: PathExpanderFn;
}

/**
 * One run: resolve the output path, load the config, flatten it, then
 * append every page of every input (transformed) to a new document.
 */
export class PdfAssembler {
   private currentState: AssemblyState = 'init';
   private finalOutputPath: string | null = null;
   private pages = 0;
   private readonly logger: Logger;

   constructor(private readonly options: AssemblerOptions) {
      this.logger = options.logger ?? silentLogger();
   }

   get state(): AssemblyState {
      return this.currentState;
   }

   /** Where the document went (or would have gone); null until resolved. */
   get outputPath(): string | null {
      return this.finalOutputPath;
   }

   get pageCount(): number {
      return this.pages;
   }

   /**
    * Never throws: every failure is logged and reported as `false`.
    */
   async process(): Promise<boolean> {
      if (this.currentState !== 'init') {
         this.logger.error(`Assembler already ran (state: ${this.currentState})`);
         return false;
      }

      try {
         return await this.run();
      } catch (err) {
         this.logger.error(`Error during processing: ${err instanceof Error ? err.message : String(err)}`);
         this.currentState = 'failed';
         return false;
      }
   }

   private async run(): Promise<boolean> {
      const { configPath, outputPath } = this.options;

      const resolved = await resolveOutputPath(
         outputPath,
         this.options.conflictStrategy ?? fixedConflictStrategies.abort,
         this.logger.child('[output]'),
      );
      if (resolved === null) {
         this.logger.info('Processing stopped due to output file handling');
         this.currentState = 'aborted';
         return false;
      }
      this.finalOutputPath = resolved;
      this.currentState = 'output-resolved';

      const config = await loadMergeConfig(configPath, this.logger.child('[config]'));
      this.currentState = 'config-loaded';

      const entries = resolveEntries(config.files, [], {
         logger: this.logger.child('[resolve]'),
         expand: this.options.expand,
      });
      this.currentState = 'files-resolved';
      this.logger.info(`Processing ${entries.length} files in total`);

      this.currentState = 'assembling';
      const output = await PDFDocument.create();
      let loaded = 0;
      for (const entry of entries) {
         // eslint-disable-next-line no-await-in-loop
         const added = await this.appendFile(output, entry);
         if (added === null) continue;
         loaded++;
         this.pages += added;
      }

      if (entries.length > 0 && loaded === 0) {
         this.logger.error('None of the input files could be read; nothing written');
         this.currentState = 'failed';
         return false;
      }

      this.logger.info(`Writing final PDF to: ${resolved}`);
      writeFileSafeSync(resolved, await output.save());
      this.currentState = 'written';
      this.logger.info(`PDF creation completed successfully (${this.pages} pages)`);
      return true;
   }

   /**
    * Pages appended for one input, or null when the file could not be read.
    */
   private async appendFile(
      output: PDFDocument,
      entry: ResolvedFileEntry,
   ): Promise<number | null> {
      const fileLogger = this.logger.child('[file]');
      fileLogger.info(`Processing file: ${entry.path}`);
      if (entry.options.length) {
         fileLogger.info(`  With options: ${entry.options.join(', ')}`);
      }

      const source = await loadSource(entry.path, {
         converter: this.options.converter,
         logger: fileLogger,
      });
      if (!source) {
         fileLogger.error(`Failed to convert file: ${entry.path}`);
         return null;
      }

      const copied = await output.copyPages(source, source.getPageIndices());
      fileLogger.debug(`Loaded ${copied.length} pages`);

      copied.forEach((page, i) => {
         fileLogger.debug(`Processing page ${i + 1}`);
         applyTransforms(pdfLibPage(page), entry.options, fileLogger);
         output.addPage(page);
      });

      return copied.length;
   }
}

/**
 * Convenience wrapper around `new PdfAssembler(options).process()`.
 */
export async function assemblePdf(options: AssemblerOptions): Promise<boolean> {
   return new PdfAssembler(options).process();
}
