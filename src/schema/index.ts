// src/schema/index.ts

export * from './config';
export * from './transforms';

/**
 * Raster formats converted to a single PDF page.
 */
export const IMAGE_EXTENSIONS: readonly string[] = ['.png', '.jpg', '.jpeg', '.tiff', '.bmp'];

export const PDF_EXTENSION = '.pdf';

export const DEFAULT_CONFIG_FILE = 'pdf-assemble.json';
