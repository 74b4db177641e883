// src/core/transform-engine.ts

import { degrees, type PDFPage } from 'pdf-lib';

import {
   TRANSFORM_OPTIONS,
   type FlipAxis,
   type PageTransform,
   type RotationDegrees,
} from '../schema';
import { silentLogger, type Logger } from '../util/logger';

export interface MediaBox {
   x: number;
   y: number;
   width: number;
   height: number;
}

/**
 * The part of a page the transformations touch.
 *
 * `scaleContent` / `translateContent` wrap the existing content, so the
 * most recent call is the outermost operation on content coordinates.
 */
export interface TransformablePage {
   /** Clockwise `/Rotate` value in degrees. */
   getRotation(): number;
   setRotation(angle: number): void;
   getMediaBox(): MediaBox;
   scaleContent(x: number, y: number): void;
   translateContent(x: number, y: number): void;
}

export function pdfLibPage(page: PDFPage): TransformablePage {
   return {
      getRotation: () => page.getRotation().angle,
      setRotation: (angle) => page.setRotation(degrees(angle)),
      getMediaBox: () => page.getMediaBox(),
      scaleContent: (x, y) => page.scaleContent(x, y),
      translateContent: (x, y) => page.translateContent(x, y),
   };
}

function hasOwn(name: string): name is keyof typeof TRANSFORM_OPTIONS {
   return Object.prototype.hasOwnProperty.call(TRANSFORM_OPTIONS, name);
}

export function parseTransform(name: string): PageTransform {
   if (hasOwn(name)) return TRANSFORM_OPTIONS[name];
   return { kind: 'unknown', name };
}

function normalizeAngle(angle: number): number {
   return ((angle % 360) + 360) % 360;
}

/**
 * Rotate counter-clockwise. `/Rotate` turns pages clockwise, hence the
 * complement.
 */
function rotate(page: TransformablePage, ccw: RotationDegrees) {
   page.setRotation(normalizeAngle(page.getRotation() + 360 - ccw));
}

/**
 * Mirror the content inside the media box: negate one axis, then shift it
 * back over the box (x' = 2·x0 + width - x).
 */
function flip(page: TransformablePage, axis: FlipAxis) {
   const box = page.getMediaBox();
   if (axis === 'horizontal') {
      page.scaleContent(-1, 1);
      page.translateContent(2 * box.x + box.width, 0);
   } else {
      page.scaleContent(1, -1);
      page.translateContent(0, 2 * box.y + box.height);
   }
}

/**
 * Apply option names to a page, left to right, each on the result of the
 * previous one. Returns the same page.
 */
export function applyTransforms<P extends TransformablePage>(
   page: P,
   options: readonly string[],
   logger: Logger = silentLogger(),
): P {
   if (!options.length) return page;

   logger.debug(`Applying transformations: ${options.join(', ')}`);
   for (const option of options) {
      const transform = parseTransform(option);
      switch (transform.kind) {
         case 'rotate':
            logger.debug(`Rotating page ${transform.degrees} degrees counter-clockwise`);
            rotate(page, transform.degrees);
            break;
         case 'flip':
            logger.debug(`Flipping page ${transform.axis === 'horizontal' ? 'horizontally' : 'vertically'}`);
            flip(page, transform.axis);
            break;
         case 'directive':
            break;
         case 'unknown':
            logger.warn(`Unknown transformation option: ${transform.name}`);
            break;
         default: {
            const exhaustive: never = transform;
            return exhaustive;
         }
      }
   }

   return page;
}
