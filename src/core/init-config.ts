// src/core/init-config.ts

import fs from 'fs';
import path from 'path';

import { DEFAULT_CONFIG_FILE } from '../schema';
import { writeFileSafeSync } from '../util/fs-utils';
import { silentLogger, type Logger } from '../util/logger';

export interface InitConfigOptions {
    /**
     * Config file to write, relative to cwd.
     * Default: "pdf-assemble.json"
     */
    fileName?: string;

    /**
     * Overwrite an existing config file.
     */
    force?: boolean;

    logger?: Logger;
}

// Plain paths first, then a group per kind of treatment. Groups sort their
// own `files` before expanding them.
const STARTER_CONFIG = {
    files: [
        'cover.pdf',
        {
            files: ['scans'],
            options: ['rotate90'],
        },
        {
            files: ['photos'],
            options: ['recursive', 'flipH'],
        },
        'appendix',
    ],
};

/**
 * Write a starter config into `cwd`.
 */
export function initConfig(
    cwd: string,
    options: InitConfigOptions = {},
): { configPath: string; created: boolean } {
    const logger = options.logger ?? silentLogger();
    const configPath = path.resolve(cwd, options.fileName ?? DEFAULT_CONFIG_FILE);

    if (fs.existsSync(configPath) && !options.force) {
        logger.info(`Config already exists at ${configPath} (use --force to overwrite).`);
        return { configPath, created: false };
    }

    const existed = fs.existsSync(configPath);
    writeFileSafeSync(configPath, `${JSON.stringify(STARTER_CONFIG, null, 2)}\n`);
    logger.info(`${existed ? 'Overwrote' : 'Created'} config at ${configPath}`);

    return { configPath, created: true };
}
