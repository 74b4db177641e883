// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { pathToFileURL } from 'url';
import { transform } from 'esbuild';

import { ensureDirSync } from '../util/fs-utils';
import { silentLogger, type Logger } from '../util/logger';

/**
 * A config as loaded from disk: the `files` array is known to exist, its
 * entries are checked one by one during resolution.
 */
export interface LoadedConfig {
   files: readonly unknown[];
}

export class ConfigError extends Error {
   constructor(
      message: string,
      readonly configPath: string,
      options?: { cause?: unknown },
   ) {
      super(message, options);
      this.name = 'ConfigError';
   }
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateConfig(raw: unknown, configPath: string): LoadedConfig {
   if (!isRecord(raw) || !('files' in raw)) {
      throw new ConfigError(
         `Config must be an object with a "files" key (${configPath})`,
         configPath,
      );
   }

   const files: unknown = raw.files;
   if (!Array.isArray(files)) {
      throw new ConfigError(`"files" must be an array (${configPath})`, configPath);
   }

   return { files };
}

/**
 * Load the merge configuration.
 *
 * - `.json` and unknown extensions are parsed as JSON.
 * - `.js` / `.mjs` / `.cjs` are imported directly.
 * - `.ts` / `.mts` / `.cts` are transpiled with esbuild first.
 *
 * The module's default export (or the module itself) is the config.
 */
export async function loadMergeConfig(
   configPath: string,
   logger: Logger = silentLogger(),
): Promise<LoadedConfig> {
   const absPath = path.resolve(configPath);

   if (!fs.existsSync(absPath)) {
      throw new ConfigError(`Configuration file not found: ${configPath}`, configPath);
   }

   const raw = await importConfig(absPath, configPath);
   const config = validateConfig(raw, configPath);

   logger.info(`Successfully loaded configuration from ${configPath}`);
   logger.debug(`Config has ${config.files.length} top-level entries`);
   return config;
}

async function importConfig(absPath: string, configPath: string): Promise<unknown> {
   const ext = path.extname(absPath).toLowerCase();

   switch (ext) {
      case '.ts':
      case '.mts':
      case '.cts':
         return importTsConfig(absPath);
      case '.js':
      case '.mjs':
      case '.cjs':
         return importModule(absPath);
      default:
         return parseJsonConfig(absPath, configPath);
   }
}

function parseJsonConfig(absPath: string, configPath: string): unknown {
   const source = fs.readFileSync(absPath, 'utf8');
   try {
      return JSON.parse(source);
   } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError(
         `Error decoding JSON config ${configPath}: ${reason}`,
         configPath,
         { cause: err },
      );
   }
}

async function importModule(filePath: string): Promise<unknown> {
   const mod: unknown = await import(pathToFileURL(filePath).href);
   if (isRecord(mod) && 'default' in mod) return mod.default;
   return mod;
}

/**
 * Compiled copies of TS configs live under the OS temp dir, one file per
 * (path, size, mtime) so an edited config is compiled again.
 */
function compiledConfigPath(configPath: string, stat: fs.Stats): string {
   const key = crypto
      .createHash('sha1')
      .update(`${path.resolve(configPath)}:${stat.size}:${stat.mtimeMs}`)
      .digest('hex')
      .slice(0, 16);
   return path.join(os.tmpdir(), 'pdf-assemble-config', `${key}.mjs`);
}

async function importTsConfig(configPath: string): Promise<unknown> {
   const compiled = compiledConfigPath(configPath, fs.statSync(configPath));

   if (!fs.existsSync(compiled)) {
      const { code } = await transform(fs.readFileSync(configPath, 'utf8'), {
         loader: 'ts',
         format: 'esm',
         target: 'node20',
         sourcefile: configPath,
      });
      ensureDirSync(path.dirname(compiled));
      fs.writeFileSync(compiled, code, 'utf8');
   }

   return importModule(compiled);
}
