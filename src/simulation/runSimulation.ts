// src/simulation/runSimulation.ts

import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import { LoadBalancer } from '../engine/loadBalancer';
import { createRequestGenerator } from '../engine/requestGenerator';
import { handleTrafficBurst } from '../events/trafficBurstHandler';
import type { LoadBalancerConfig, LoadBalancerSnapshot } from '../models/LoadBalancerConfig';
import { formatStatusReport, formatSummary, logStatistics } from './reporting';

/**
 * Full load balancer run
 *
 * - Fills the admission queue with initialWorkers × 100 requests
 * - Each cycle: maybe one random arrival, then one load balancer cycle
 * - Periodic statistics to the stats log, periodic status to the console
 * - Final summary with per-worker lines
 */

export interface SimulationOptions {
    loadBalancer: LoadBalancerConfig;
    cycles: number;
    seed: number;
    cycleDelayMs?: number;
    requestsPerWorker?: number;
    arrivalChance?: number;
    arrivalCutoff?: number;
    statsInterval?: number;
    statusInterval?: number;
}

export interface SimulationDeps {
    logger: Logger;
    statsLogger: Logger;
    print?: (line: string) => void;
}

export interface SimulationResult {
    cycles: number;
    initialQueued: number;
    arrivalsAccepted: number;
    arrivalsRejected: number;
    completed: number;
    discarded: number;
    snapshot: LoadBalancerSnapshot;
}

// Arrival ids start here so they read apart from the initial fill
const ARRIVAL_FIRST_ID = 1001;

export async function runSimulation(
    options: SimulationOptions,
    deps: SimulationDeps
): Promise<SimulationResult> {
    const print = deps.print ?? ((line: string) => console.log(line));
    const requestsPerWorker = options.requestsPerWorker ?? 100;
    const arrivalChance = options.arrivalChance ?? 0.05;
    const arrivalCutoff = options.arrivalCutoff ?? 0.8;
    const statsInterval = options.statsInterval ?? 100;
    const statusInterval = options.statusInterval ?? 1000;
    const cycleDelayMs = options.cycleDelayMs ?? 0;

    const logSection = (title: string): void => {
        print('');
        print('='.repeat(60));
        print(title);
        print('='.repeat(60));
    };

    const loadBalancer = new LoadBalancer(options.loadBalancer, deps.logger);

    // Separate streams so the arrival pattern does not depend on the fill size
    const fillGenerator = createRequestGenerator(options.seed, 1);
    const initialCount = options.loadBalancer.initialWorkers * requestsPerWorker;
    const arrivalGenerator = createRequestGenerator(
        options.seed ^ 0x5bd1e995,
        Math.max(ARRIVAL_FIRST_ID, initialCount + 1)
    );

    logSection('LOAD BALANCER SIMULATION - START');
    print(`Servers: ${options.loadBalancer.initialWorkers} (min ${options.loadBalancer.minWorkers}, max ${options.loadBalancer.maxWorkers})`);
    print(`Cycles: ${options.cycles}`);
    print(`Initial queue size: ${initialCount} requests`);
    print(`Seed: ${options.seed}`);

    const fill = handleTrafficBurst(loadBalancer, fillGenerator, initialCount, true);
    if (fill.rejected.length > 0) {
        deps.logger.warn(
            { requested: initialCount, queued: fill.accepted.length },
            'admission queue rejected part of the initial fill'
        );
    }
    print(`Queue initialized with ${loadBalancer.getQueueSize()} requests`);

    let arrivalsAccepted = 0;
    let arrivalsRejected = 0;

    for (let cycle = 1; cycle <= options.cycles; cycle++) {
        // Stop adding requests near the end so the pool can drain
        if (cycle < options.cycles * arrivalCutoff && arrivalGenerator.chance() < arrivalChance) {
            const burst = handleTrafficBurst(loadBalancer, arrivalGenerator, 1);
            arrivalsAccepted += burst.accepted.length;
            arrivalsRejected += burst.rejected.length;
            for (const item of burst.accepted) {
                deps.logger.debug({ cycle, requestId: item.id, origin: item.originAddress }, 'request arrived');
            }
        }

        loadBalancer.advanceOneCycle();

        const isLast = cycle === options.cycles;
        if (cycle % statsInterval === 0 || isLast) {
            logStatistics(deps.statsLogger, loadBalancer, cycle);
        }
        if (cycle % statusInterval === 0 || isLast) {
            print('');
            formatStatusReport(loadBalancer, cycle).forEach(line => print(line));
        }

        if (cycleDelayMs > 0) {
            await sleep(cycleDelayMs);
        }
    }

    logSection('SIMULATION COMPLETE');
    formatSummary(loadBalancer).forEach(line => print(line));

    const result: SimulationResult = {
        cycles: options.cycles,
        initialQueued: fill.accepted.length,
        arrivalsAccepted,
        arrivalsRejected,
        completed: loadBalancer.getTotalRequestsProcessed(),
        discarded: loadBalancer.getDiscardedCount(),
        snapshot: loadBalancer.getSnapshot()
    };

    deps.logger.info(
        {
            cycles: result.cycles,
            completed: result.completed,
            discarded: result.discarded,
            poolSize: result.snapshot.poolSize
        },
        'simulation finished'
    );

    return result;
}
