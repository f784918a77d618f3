// src/events/trafficBurstHandler.ts

import type { LoadBalancer } from '../engine/loadBalancer';
import type { RequestGenerator } from '../engine/requestGenerator';
import type { WorkItem } from '../models/WorkItem';

export interface BurstResult {
    accepted: WorkItem[];
    rejected: WorkItem[];
}

/**
 * Handle a burst of synthetic traffic
 *
 * Generates `count` requests arriving at the current cycle and submits them
 * in order. With stopOnRejection, the burst ends at the first rejected
 * request (used to fill the queue before a run).
 *
 * Accepted items belong to the load balancer once submitted, so the
 * result carries copies.
 *
 * @param loadBalancer Target load balancer
 * @param generator Source of synthetic requests
 * @param count Number of requests to generate
 * @param stopOnRejection Stop at the first rejection
 * @returns Accepted and rejected requests
 */
export function handleTrafficBurst(
    loadBalancer: LoadBalancer,
    generator: RequestGenerator,
    count: number,
    stopOnRejection: boolean = false
): BurstResult {
    const result: BurstResult = { accepted: [], rejected: [] };
    const arrivalCycle = loadBalancer.getCurrentCycle();

    for (let i = 0; i < count; i++) {
        const item = generator.next(arrivalCycle);

        if (loadBalancer.submit(item)) {
            result.accepted.push({ ...item });
            continue;
        }

        result.rejected.push(item);
        if (stopOnRejection) {
            break;
        }
    }

    return result;
}
