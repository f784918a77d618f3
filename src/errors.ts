// src/errors.ts

/**
 * Raised for invalid construction options or environment values.
 * Runtime outcomes (full queue, blocked origin, pool bounds) are never errors.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
