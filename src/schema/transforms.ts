// src/schema/transforms.ts

/**
 * Option that turns on recursive directory expansion for a group.
 * It travels with the other options but never changes a page.
 */
export const RECURSIVE_OPTION = 'recursive';

export type RotationDegrees = 90 | 180 | 270;

export type FlipAxis = 'horizontal' | 'vertical';

export type PageTransform =
    | { kind: 'rotate'; name: string; degrees: RotationDegrees }
    | { kind: 'flip'; name: string; axis: FlipAxis }
    | { kind: 'directive'; name: string }
    | { kind: 'unknown'; name: string };

export const TRANSFORM_OPTIONS = {
    rotate90: { kind: 'rotate', name: 'rotate90', degrees: 90 },
    rotate180: { kind: 'rotate', name: 'rotate180', degrees: 180 },
    rotate270: { kind: 'rotate', name: 'rotate270', degrees: 270 },
    flipV: { kind: 'flip', name: 'flipV', axis: 'vertical' },
    flipH: { kind: 'flip', name: 'flipH', axis: 'horizontal' },
    [RECURSIVE_OPTION]: { kind: 'directive', name: RECURSIVE_OPTION },
} as const satisfies Record<string, PageTransform>;

export type KnownOption = keyof typeof TRANSFORM_OPTIONS;
