// src/engine/loadBalancer.ts

import type { Logger } from 'pino';
import type { WorkItem } from '../models/WorkItem';
import {
    DEFAULT_QUEUE_CAPACITY,
    DEFAULT_WORKER_CAPACITY
} from '../models/LoadBalancerConfig';
import type {
    LoadBalancerConfig,
    LoadBalancerSnapshot,
    WorkerSnapshot
} from '../models/LoadBalancerConfig';
import { AdmissionQueue } from './admissionQueue';
import { validateLoadBalancerConfig } from './configValidation';
import { Worker } from './worker';
import { shouldScaleDown, shouldScaleUp } from './scalingPolicy';

/**
 * Core dispatcher - owns the worker pool and the admission queue
 *
 * One advanceOneCycle() call is one simulated time step:
 * 1. Advance every active worker (frees capacity first)
 * 2. Drain the admission queue into workers, round robin
 * 3. Grow or shrink the pool
 *
 * Only the constructor throws (ConfigurationError). Every other
 * failure is a false / null result the caller must check.
 */
export class LoadBalancer {
    private readonly workers: Worker[];
    private readonly queue: AdmissionQueue;
    private readonly minWorkers: number;
    private readonly maxWorkers: number;
    private readonly scaleThreshold: number;
    private readonly workerCapacity: number;
    private readonly logger?: Logger;

    private rotationCursor: number;
    private currentCycle: number;
    private totalRequestsProcessed: number;
    private totalProcessingTime: number;
    private totalDiscarded: number;
    private totalQueueWait: number;
    private totalDispatched: number;

    constructor(config: LoadBalancerConfig, logger?: Logger) {
        validateLoadBalancerConfig(config);

        this.workers = [];
        this.queue = new AdmissionQueue(config.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
        this.minWorkers = config.minWorkers;
        this.maxWorkers = config.maxWorkers;
        this.scaleThreshold = config.scaleThreshold;
        this.workerCapacity = config.workerCapacity ?? DEFAULT_WORKER_CAPACITY;
        this.logger = logger;

        this.rotationCursor = 0;
        this.currentCycle = 0;
        this.totalRequestsProcessed = 0;
        this.totalProcessingTime = 0;
        this.totalDiscarded = 0;
        this.totalQueueWait = 0;
        this.totalDispatched = 0;

        for (let i = 0; i < config.initialWorkers; i++) {
            this.growPool();
        }
    }

    /**
     * Admit a work item into the admission queue
     *
     * @returns False if the origin is blocked or the queue is full
     */
    submit(item: WorkItem): boolean {
        return this.queue.enqueue(item);
    }

    /**
     * Run one simulated cycle
     *
     * @returns Number of work items completed this cycle
     */
    advanceOneCycle(): number {
        this.currentCycle++;
        let completed = 0;

        for (const worker of this.workers) {
            if (!worker.isActive()) {
                continue;
            }
            const before = worker.getTotalProcessingTime();
            completed += worker.advanceOneCycle();
            this.totalProcessingTime += worker.getTotalProcessingTime() - before;
        }
        this.totalRequestsProcessed += completed;

        this.distributeRequests();
        this.applyScaling();

        return completed;
    }

    /**
     * Add one active worker at the tail of the rotation
     *
     * @returns False if the pool is already at its maximum
     */
    growPool(): boolean {
        if (this.workers.length >= this.maxWorkers) {
            return false;
        }

        const worker = new Worker(this.workers.length + 1, this.workerCapacity);
        this.workers.push(worker);

        this.logger?.debug({ workerId: worker.id, poolSize: this.workers.length }, 'worker added');
        return true;
    }

    /**
     * Remove the most recently added worker
     *
     * Its in-flight items are discarded, not requeued
     *
     * @returns False if the pool is already at its minimum
     */
    shrinkPool(): boolean {
        if (this.workers.length <= this.minWorkers) {
            return false;
        }

        const removed = this.workers.pop();
        if (!removed) {
            return false;
        }

        const dropped = removed.drain();
        this.totalDiscarded += dropped.length;

        // Keep the cursor a valid index into the shrunk pool
        this.rotationCursor = this.workers.length > 0
            ? this.rotationCursor % this.workers.length
            : 0;

        if (dropped.length > 0) {
            this.logger?.info(
                { workerId: removed.id, discarded: dropped.length },
                'worker removed with in-flight work discarded'
            );
        } else {
            this.logger?.debug({ workerId: removed.id, poolSize: this.workers.length }, 'worker removed');
        }
        return true;
    }

    /**
     * Place queued items on workers, round robin
     *
     * Bounded at 2 × pool size placements per cycle. Stops early when a
     * full scan from the cursor finds no worker that can accept.
     *
     * @returns Number of items placed
     */
    private distributeRequests(): number {
        const poolSize = this.workers.length;
        const maxAttempts = poolSize * 2;
        let placed = 0;

        while (!this.queue.isEmpty() && placed < maxAttempts) {
            const index = this.findNextAvailable();
            if (index === null) {
                break;
            }

            const item = this.queue.dequeueNext();
            if (!item) {
                break;
            }

            this.workers[index].accept(item);
            // Submitted after cycle N, first placeable in cycle N + 1
            this.totalQueueWait += this.currentCycle - item.arrivalCycle - 1;
            this.totalDispatched++;
            this.rotationCursor = (index + 1) % poolSize;
            placed++;
        }

        return placed;
    }

    blockOrigin(address: string): void {
        this.queue.blockOrigin(address);
    }

    unblockOrigin(address: string): void {
        this.queue.unblockOrigin(address);
    }

    isOriginBlocked(address: string): boolean {
        return this.queue.isBlocked(address);
    }

    getBlockedOrigins(): string[] {
        return this.queue.getBlockedOrigins();
    }

    /**
     * Take a worker offline or bring it back
     *
     * In-flight items on an inactive worker are frozen, not evicted
     *
     * @returns False if no worker has that id
     */
    setWorkerActive(workerId: number, active: boolean): boolean {
        const worker = this.workers.find(w => w.id === workerId);
        if (!worker) {
            return false;
        }

        worker.setActive(active);
        this.logger?.info({ workerId, active }, 'worker activity changed');
        return true;
    }

    getPoolSize(): number {
        return this.workers.length;
    }

    getActiveWorkerCount(): number {
        return this.workers.filter(w => w.isActive()).length;
    }

    getQueueSize(): number {
        return this.queue.size();
    }

    getQueueCapacity(): number {
        return this.queue.getCapacity();
    }

    getCurrentCycle(): number {
        return this.currentCycle;
    }

    getTotalRequestsProcessed(): number {
        return this.totalRequestsProcessed;
    }

    /**
     * Items lost because their worker was removed by a shrink
     */
    getDiscardedCount(): number {
        return this.totalDiscarded;
    }

    getInFlightCount(): number {
        return this.workers.reduce((sum, w) => sum + w.getLoad(), 0);
    }

    /**
     * Mean original processing time of completed items, in cycles
     */
    getAverageProcessingTime(): number {
        if (this.totalRequestsProcessed === 0) {
            return 0;
        }
        return this.totalProcessingTime / this.totalRequestsProcessed;
    }

    /**
     * Mean cycles spent in the admission queue by dispatched items
     *
     * An item placed in the first cycle after its arrival waited 0 cycles
     */
    getAverageQueueWait(): number {
        if (this.totalDispatched === 0) {
            return 0;
        }
        return this.totalQueueWait / this.totalDispatched;
    }

    /**
     * Mean utilization of active workers, as a percentage (0-100)
     */
    getSystemUtilization(): number {
        const active = this.workers.filter(w => w.isActive());
        if (active.length === 0) {
            return 0;
        }
        const total = active.reduce((sum, w) => sum + w.utilization(), 0);
        return total / active.length;
    }

    /**
     * Admission queue fill level, as a percentage (0-100)
     */
    getQueueUtilization(): number {
        return this.queue.utilization() * 100;
    }

    isOverloaded(): boolean {
        return this.getSystemUtilization() > 90 || this.getQueueUtilization() > 80;
    }

    /**
     * Copies of the queued items, head first
     */
    getQueuedItems(): WorkItem[] {
        return this.queue.peekAll().map(item => ({ ...item }));
    }

    getWorkerStats(): string[] {
        return this.workers.map(w => w.describe());
    }

    getWorkerSnapshots(): WorkerSnapshot[] {
        return this.workers.map(w => w.snapshot());
    }

    getSnapshot(): LoadBalancerSnapshot {
        return {
            cycle: this.currentCycle,
            poolSize: this.workers.length,
            activeWorkers: this.getActiveWorkerCount(),
            minWorkers: this.minWorkers,
            maxWorkers: this.maxWorkers,
            queueSize: this.queue.size(),
            queueCapacity: this.queue.getCapacity(),
            inFlight: this.getInFlightCount(),
            totalProcessed: this.totalRequestsProcessed,
            totalDiscarded: this.totalDiscarded,
            averageProcessingTime: this.getAverageProcessingTime(),
            averageQueueWait: this.getAverageQueueWait(),
            systemUtilization: this.getSystemUtilization(),
            queueUtilization: this.getQueueUtilization(),
            overloaded: this.isOverloaded(),
            workers: this.getWorkerSnapshots()
        };
    }

    /**
     * Scan once around the pool from the cursor
     *
     * @returns Index of the first worker that can accept, or null
     */
    private findNextAvailable(): number | null {
        const poolSize = this.workers.length;
        for (let offset = 0; offset < poolSize; offset++) {
            const index = (this.rotationCursor + offset) % poolSize;
            if (this.workers[index].canAccept()) {
                return index;
            }
        }
        return null;
    }

    /**
     * Asymmetric hysteresis: scale-up is checked first, then scale-down
     * against the (possibly grown) pool
     */
    private applyScaling(): void {
        const input = {
            meanUtilization: this.getSystemUtilization() / 100,
            queueSize: this.queue.size(),
            poolSize: this.workers.length,
            minWorkers: this.minWorkers,
            maxWorkers: this.maxWorkers,
            threshold: this.scaleThreshold
        };

        if (shouldScaleUp(input) && this.growPool()) {
            this.logger?.info(
                { cycle: this.currentCycle, poolSize: this.workers.length, queueSize: input.queueSize },
                'scaled up'
            );
        }

        if (shouldScaleDown({ ...input, poolSize: this.workers.length }) && this.shrinkPool()) {
            this.logger?.info(
                { cycle: this.currentCycle, poolSize: this.workers.length },
                'scaled down'
            );
        }
    }
}
