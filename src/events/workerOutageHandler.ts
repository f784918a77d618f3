// src/events/workerOutageHandler.ts

import type { LoadBalancer } from '../engine/loadBalancer';

export interface OutageResult {
    workerId: number;
    active: boolean;
    frozenItems: number;
}

/**
 * Handle a worker outage
 *
 * State transition: active → inactive
 *
 * The worker keeps its in-flight items but they stop advancing, and
 * round robin skips it until recovery.
 *
 * @returns Outcome, or null if no worker has that id
 */
export function handleWorkerOutage(
    loadBalancer: LoadBalancer,
    workerId: number
): OutageResult | null {
    if (!loadBalancer.setWorkerActive(workerId, false)) {
        return null;
    }

    return describe(loadBalancer, workerId, false);
}

/**
 * Handle a worker coming back
 *
 * State transition: inactive → active. Frozen items resume next cycle.
 *
 * @returns Outcome, or null if no worker has that id
 */
export function handleWorkerRecovery(
    loadBalancer: LoadBalancer,
    workerId: number
): OutageResult | null {
    if (!loadBalancer.setWorkerActive(workerId, true)) {
        return null;
    }

    return describe(loadBalancer, workerId, true);
}

function describe(loadBalancer: LoadBalancer, workerId: number, active: boolean): OutageResult {
    const worker = loadBalancer.getWorkerSnapshots().find(w => w.id === workerId);
    return {
        workerId,
        active,
        frozenItems: active || !worker ? 0 : worker.load
    };
}
