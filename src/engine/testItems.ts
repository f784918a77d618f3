// src/engine/testItems.ts

import type { WorkItem } from '../models/WorkItem';

/**
 * Work item factory shared by the engine tests
 */
export function makeItem(
    id: number,
    processingTime: number = 3,
    originAddress: string = '10.0.0.1',
    arrivalCycle: number = 0
): WorkItem {
    return {
        id,
        originAddress,
        category: 'GET',
        priority: 5,
        processingTime,
        remainingTime: processingTime,
        arrivalCycle
    };
}
