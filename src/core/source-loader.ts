// src/core/source-loader.ts

import fs from 'fs';
import path from 'path';
import { PDFDocument } from 'pdf-lib';

import { IMAGE_EXTENSIONS, PDF_EXTENSION } from '../schema';
import { silentLogger, type Logger } from '../util/logger';
import { jimpImageConverter, loadImageAsPdf, type ImageConverter } from './image-converter';

export type SourceKind = 'pdf' | 'image' | 'unsupported';

export function sourceKindOf(filePath: string): SourceKind {
   const ext = path.extname(filePath).toLowerCase();
   if (ext === PDF_EXTENSION) return 'pdf';
   if (IMAGE_EXTENSIONS.includes(ext)) return 'image';
   return 'unsupported';
}

export interface LoadSourceOptions {
   converter?: ImageConverter;
   logger?: Logger;
}

/**
 * Open an input file as a PDF document. Returns null, after logging, for
 * unsupported extensions and for files that fail to load.
 */
export async function loadSource(
   filePath: string,
   options: LoadSourceOptions = {},
): Promise<PDFDocument | null> {
   const logger = options.logger ?? silentLogger();
   const kind = sourceKindOf(filePath);

   try {
      switch (kind) {
         case 'pdf':
            logger.debug(`Processing PDF file directly: ${filePath}`);
            return await PDFDocument.load(fs.readFileSync(filePath));
         case 'image':
            return await loadImageAsPdf(
               filePath,
               options.converter ?? jimpImageConverter,
               logger,
            );
         case 'unsupported':
            logger.error(`Unsupported file type: ${filePath}`);
            return null;
      }
   } catch (err) {
      logger.error(`Failed to read ${kind === 'pdf' ? 'PDF' : 'image'} ${filePath}:`, err);
      return null;
   }
}
