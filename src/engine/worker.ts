// src/engine/worker.ts

import type { WorkItem } from '../models/WorkItem';
import type { WorkerSnapshot } from '../models/LoadBalancerConfig';

/**
 * Derive a worker's address from its identity
 */
export function workerAddress(id: number): string {
    return `192.168.1.${id}`;
}

/**
 * Capacity-limited processor of work items
 *
 * Every in-flight item advances one cycle per advanceOneCycle() call,
 * no matter how many items share the worker (cooperative time-slicing).
 *
 * Invariant: load === inFlight.length, 0 <= load <= capacity
 */
export class Worker {
    readonly id: number;
    readonly address: string;
    readonly capacity: number;

    private inFlight: WorkItem[];
    private active: boolean;
    private totalCompleted: number;
    private totalProcessingTime: number;

    constructor(id: number, capacity: number, address: string = workerAddress(id)) {
        this.id = id;
        this.address = address;
        this.capacity = capacity;
        this.inFlight = [];
        this.active = true;
        this.totalCompleted = 0;
        this.totalProcessingTime = 0;
    }

    /**
     * Take ownership of an item
     *
     * @returns False if inactive or at capacity
     */
    accept(item: WorkItem): boolean {
        if (!this.canAccept()) {
            return false;
        }

        this.inFlight.push(item);
        return true;
    }

    /**
     * Advance every in-flight item by one cycle
     *
     * Items are visited once each in FIFO order. Survivors keep their order.
     *
     * @returns Number of items completed this cycle
     */
    advanceOneCycle(): number {
        if (!this.active || this.inFlight.length === 0) {
            return 0;
        }

        let completed = 0;
        const stillInFlight: WorkItem[] = [];

        for (const item of this.inFlight) {
            item.remainingTime -= 1;

            if (item.remainingTime <= 0) {
                completed++;
                this.totalCompleted++;
                this.totalProcessingTime += item.processingTime;
            } else {
                stillInFlight.push(item);
            }
        }

        this.inFlight = stillInFlight;
        return completed;
    }

    canAccept(): boolean {
        return this.active && this.inFlight.length < this.capacity;
    }

    /**
     * Deactivating keeps in-flight items; they stop advancing until reactivated
     */
    setActive(active: boolean): void {
        this.active = active;
    }

    isActive(): boolean {
        return this.active;
    }

    getLoad(): number {
        return this.inFlight.length;
    }

    /**
     * @returns load / capacity as a percentage (0-100), 0 for a zero-capacity worker
     */
    utilization(): number {
        if (this.capacity === 0) {
            return 0;
        }
        return (this.inFlight.length / this.capacity) * 100;
    }

    getTotalCompleted(): number {
        return this.totalCompleted;
    }

    getTotalProcessingTime(): number {
        return this.totalProcessingTime;
    }

    getAverageProcessingTime(): number {
        if (this.totalCompleted === 0) {
            return 0;
        }
        return this.totalProcessingTime / this.totalCompleted;
    }

    /**
     * Give up every in-flight item (used when the worker is removed)
     *
     * @returns The items the worker held, in FIFO order
     */
    drain(): WorkItem[] {
        const dropped = this.inFlight;
        this.inFlight = [];
        return dropped;
    }

    /**
     * One-line human-readable status
     */
    describe(): string {
        return `Server ${this.id} (${this.address}): ` +
            `Load: ${this.inFlight.length}/${this.capacity} (${this.utilization().toFixed(1)}%)` +
            ` | Processed: ${this.totalCompleted}` +
            ` | Active: ${this.active ? 'Yes' : 'No'}`;
    }

    snapshot(): WorkerSnapshot {
        return {
            id: this.id,
            address: this.address,
            capacity: this.capacity,
            load: this.inFlight.length,
            utilization: this.utilization(),
            active: this.active,
            totalCompleted: this.totalCompleted,
            totalProcessingTime: this.totalProcessingTime,
            averageProcessingTime: this.getAverageProcessingTime()
        };
    }
}
