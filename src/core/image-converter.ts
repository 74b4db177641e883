// src/core/image-converter.ts

import fs from 'fs';
import path from 'path';
import { Jimp } from 'jimp';
import { PDFDocument } from 'pdf-lib';

import { withTempDir } from '../util/fs-utils';
import { silentLogger, type Logger } from '../util/logger';

/**
 * Turns one raster image into a single-page PDF file at `outPath`.
 */
export interface ImageConverter {
   convert(imagePath: string, outPath: string, logger: Logger): Promise<void>;
}

/**
 * Force every pixel opaque (RGBA → RGB). Returns whether any pixel had
 * transparency.
 */
export function dropAlpha(rgba: Uint8Array): boolean {
   let hadAlpha = false;
   for (let i = 3; i < rgba.length; i += 4) {
      if (rgba[i] !== 255) {
         hadAlpha = true;
         rgba[i] = 255;
      }
   }
   return hadAlpha;
}

/**
 * Decodes with jimp (png, jpeg, tiff, bmp, gif) and lays the image out on a
 * page of the same size, one pixel per point.
 */
export const jimpImageConverter: ImageConverter = {
   async convert(imagePath, outPath, logger) {
      const image = await Jimp.read(imagePath);
      if (dropAlpha(image.bitmap.data)) {
         logger.debug('Converting RGBA image to RGB');
      }

      const png = await image.getBuffer('image/png');
      const doc = await PDFDocument.create();
      const embedded = await doc.embedPng(png);
      const page = doc.addPage([embedded.width, embedded.height]);
      page.drawImage(embedded, {
         x: 0,
         y: 0,
         width: embedded.width,
         height: embedded.height,
      });

      fs.writeFileSync(outPath, await doc.save());
   },
};

/**
 * Convert an image and load the result. The intermediate PDF lives in a
 * private temp directory that is gone when this returns or throws.
 */
export async function loadImageAsPdf(
   imagePath: string,
   converter: ImageConverter = jimpImageConverter,
   logger: Logger = silentLogger(),
): Promise<PDFDocument> {
   logger.info(`Converting image to PDF: ${imagePath}`);

   return withTempDir('pdf-assemble', async (dir) => {
      const tempPdf = path.join(dir, `${path.parse(imagePath).name}.temp.pdf`);
      await converter.convert(imagePath, tempPdf, logger);
      return PDFDocument.load(fs.readFileSync(tempPdf));
   });
}
