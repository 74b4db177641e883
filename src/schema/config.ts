// src/schema/config.ts

/**
 * Object form of a `files` entry: a group of paths sharing options.
 */
export interface EntryObject {
    /**
     * Files or directories for this group. Sorted as plain strings before
     * expansion, so declaration order inside one group does not matter.
     */
    files?: string[];

    /**
     * Option names applied to every page of every file in the group, after
     * the options inherited from the enclosing scope.
     *
     * Example: ["recursive", "rotate90", "flipH"]
     */
    options?: string[];
}

/**
 * One element of a `files` array: a path (file or directory) or a group.
 */
export type ConfigEntry = string | EntryObject;

/**
 * Root configuration object for pdf-assemble.
 *
 * Usually a JSON file; a `.ts` / `.js` module default-exporting this shape
 * works too.
 */
export interface MergeConfig {
    /**
     * Inputs in output order. Paths are resolved relative to the working
     * directory of the run.
     */
    files: ConfigEntry[];
}

/**
 * A single input file and the options that apply to its pages.
 * Produced by `resolveEntries` and never mutated afterwards.
 */
export interface ResolvedFileEntry {
    readonly path: string;
    readonly options: readonly string[];
}
