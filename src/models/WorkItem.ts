// src/models/WorkItem.ts

/**
 * Request methods the synthetic generator draws from.
 * The category field itself is free-form.
 */
export enum RequestMethod {
    GET = 'GET',
    POST = 'POST',
    PUT = 'PUT',
    DELETE = 'DELETE'
}

/**
 * WorkItem model - one simulated request
 *
 * Data only, no methods. Only remainingTime changes after creation,
 * and only the worker holding the item changes it.
 *
 * Ownership moves: admission queue → exactly one worker → completed or discarded
 */
export interface WorkItem {
    id: number;
    originAddress: string;
    category: string;

    // 1-10, carried through but never used for placement
    priority: number;

    // Timing, in whole cycles
    processingTime: number;
    remainingTime: number;
    arrivalCycle: number;
}
