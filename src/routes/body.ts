// src/routes/body.ts

import type { Request } from 'express';

/**
 * Parsed JSON body as a plain record; anything else reads as empty
 */
export function readBody(req: Request): Record<string, unknown> {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return {};
    }
    return Object.fromEntries(Object.entries(body));
}
