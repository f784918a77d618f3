// src/logger.ts

import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Application logger (JSON lines on stdout)
 */
export function createLogger(level: string = 'info'): Logger {
    return pino({
        name: 'lb-sim',
        level
    });
}

/**
 * Statistics logger bound to a file
 *
 * One record per periodic sample; appends to an existing file.
 * Synchronous writes so the file is complete when the run ends.
 */
export function createStatsLogger(file: string): Logger {
    return pino(
        {
            name: 'lb-sim-stats',
            base: null
        },
        pino.destination({ dest: file, sync: true, append: true, mkdir: true })
    );
}
