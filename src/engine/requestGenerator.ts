// src/engine/requestGenerator.ts

import { RequestMethod } from '../models/WorkItem';
import type { WorkItem } from '../models/WorkItem';

const METHODS: RequestMethod[] = [
    RequestMethod.GET,
    RequestMethod.POST,
    RequestMethod.PUT,
    RequestMethod.DELETE
];

export const MIN_PROCESSING_TIME = 5;
export const MAX_PROCESSING_TIME = 50;

export interface Draw {
    value: number;
    seed: number;
}

/**
 * One step of mulberry32
 *
 * Pure function - same seed always produces the same value and next seed
 *
 * @returns Uniform value in [0, 1) and the seed for the next draw
 */
export function nextRandom(seed: number): Draw {
    const next = (seed + 0x6d2b79f5) | 0;
    let t = next;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const value = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    return { value, seed: next };
}

/**
 * Uniform integer in [min, max], inclusive
 */
export function nextInt(seed: number, min: number, max: number): Draw {
    const draw = nextRandom(seed);
    return {
        value: min + Math.floor(draw.value * (max - min + 1)),
        seed: draw.seed
    };
}

/**
 * Generate one synthetic request
 *
 * Pure function - no shared state; thread the returned seed into the next call
 *
 * - origin: dotted quad, each octet 1-254
 * - category: GET / POST / PUT / DELETE
 * - priority: 1-10
 * - processing time: 5-50 cycles
 *
 * @param seed Generator state
 * @param id Identity for the new item
 * @param arrivalCycle Cycle at which the item arrives
 * @returns The item and the next generator state
 */
export function generateRequest(
    seed: number,
    id: number,
    arrivalCycle: number
): { item: WorkItem; seed: number } {
    let state = seed;
    const octets: number[] = [];
    for (let i = 0; i < 4; i++) {
        const draw = nextInt(state, 1, 254);
        octets.push(draw.value);
        state = draw.seed;
    }

    const method = nextInt(state, 0, METHODS.length - 1);
    const priority = nextInt(method.seed, 1, 10);
    const duration = nextInt(priority.seed, MIN_PROCESSING_TIME, MAX_PROCESSING_TIME);

    const item: WorkItem = {
        id,
        originAddress: octets.join('.'),
        category: METHODS[method.value],
        priority: priority.value,
        processingTime: duration.value,
        remainingTime: duration.value,
        arrivalCycle
    };

    return { item, seed: duration.seed };
}

export interface RequestGenerator {
    /** Next request with a sequential id */
    next(arrivalCycle: number): WorkItem;
    /** Uniform value in [0, 1), from the same stream */
    chance(): number;
}

/**
 * Stateful wrapper around generateRequest for driver loops
 *
 * @param seed Initial generator state
 * @param firstId Id given to the first request
 */
export function createRequestGenerator(seed: number, firstId: number = 1): RequestGenerator {
    let state = seed;
    let nextId = firstId;

    return {
        next(arrivalCycle: number): WorkItem {
            const result = generateRequest(state, nextId++, arrivalCycle);
            state = result.seed;
            return result.item;
        },
        chance(): number {
            const draw = nextRandom(state);
            state = draw.seed;
            return draw.value;
        }
    };
}
