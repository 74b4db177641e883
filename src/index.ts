// src/index.ts

export * from './schema';
export { expandPath } from './core/path-expander';
export {
   mergeOptions,
   resolveEntries,
   type PathExpanderFn,
   type ResolveEntriesOptions,
} from './core/resolve-entries';
export {
   applyTransforms,
   parseTransform,
   pdfLibPage,
   type MediaBox,
   type TransformablePage,
} from './core/transform-engine';
export {
   dropAlpha,
   jimpImageConverter,
   loadImageAsPdf,
   type ImageConverter,
} from './core/image-converter';
export { loadSource, sourceKindOf, type SourceKind } from './core/source-loader';
export {
   fixedConflictStrategies,
   nextAvailablePath,
   resolveOutputPath,
   type ConflictChoice,
   type ConflictContext,
   type ConflictMode,
   type ConflictStrategy,
} from './core/output-path';
export {
   ConfigError,
   loadMergeConfig,
   validateConfig,
   type LoadedConfig,
} from './core/config-loader';
export { initConfig, type InitConfigOptions } from './core/init-config';
export {
   assemblePdf,
   PdfAssembler,
   type AssemblerOptions,
   type AssemblyState,
} from './core/assembler';
export { Logger, consoleSink, silentLogger, type LogLevel, type LogSink, type LoggerOptions } from './util/logger';
