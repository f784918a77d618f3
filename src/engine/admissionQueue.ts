// src/engine/admissionQueue.ts

import type { WorkItem } from '../models/WorkItem';
import { DEFAULT_QUEUE_CAPACITY } from '../models/LoadBalancerConfig';

/**
 * Bounded FIFO admission queue with an origin blocklist
 *
 * Insertion order is service order. Nothing here throws:
 * rejections come back as false / null.
 *
 * Performance:
 * - enqueue: O(1) append
 * - dequeueNext: O(1) amortized (head index, compacted lazily)
 * - block/unblock: O(1) set membership
 */
export class AdmissionQueue {
    private items: WorkItem[];
    private head: number;
    private readonly capacity: number;
    private readonly blockedOrigins: Set<string>;
    private totalAdmitted: number;
    private totalRemoved: number;

    constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
        this.items = [];
        this.head = 0;
        this.capacity = capacity;
        this.blockedOrigins = new Set();
        this.totalAdmitted = 0;
        this.totalRemoved = 0;
    }

    /**
     * Admit an item at the tail
     *
     * @returns False if the origin is blocked or the queue is full
     */
    enqueue(item: WorkItem): boolean {
        if (this.blockedOrigins.has(item.originAddress)) {
            return false;
        }

        if (this.isFull()) {
            return false;
        }

        this.items.push(item);
        this.totalAdmitted++;
        return true;
    }

    /**
     * Remove and return the head of the queue
     *
     * @returns Oldest admitted item or null if queue empty
     */
    dequeueNext(): WorkItem | null {
        if (this.isEmpty()) {
            return null;
        }

        const item = this.items[this.head];
        this.head++;
        this.totalRemoved++;

        // Compact once the consumed prefix dominates the backing array
        if (this.head > 64 && this.head * 2 > this.items.length) {
            this.items = this.items.slice(this.head);
            this.head = 0;
        }

        return item;
    }

    blockOrigin(address: string): void {
        this.blockedOrigins.add(address);
    }

    unblockOrigin(address: string): void {
        this.blockedOrigins.delete(address);
    }

    isBlocked(address: string): boolean {
        return this.blockedOrigins.has(address);
    }

    getBlockedOrigins(): string[] {
        return Array.from(this.blockedOrigins);
    }

    size(): number {
        return this.items.length - this.head;
    }

    isEmpty(): boolean {
        return this.size() === 0;
    }

    isFull(): boolean {
        return this.size() >= this.capacity;
    }

    getCapacity(): number {
        return this.capacity;
    }

    getTotalAdmitted(): number {
        return this.totalAdmitted;
    }

    getTotalRemoved(): number {
        return this.totalRemoved;
    }

    /**
     * Fill level as a fraction
     *
     * @returns size / capacity in [0, 1], or 0 for a zero-capacity queue
     */
    utilization(): number {
        if (this.capacity === 0) {
            return 0;
        }
        return this.size() / this.capacity;
    }

    /**
     * Copy of the queued items, head first (for display/debugging)
     */
    peekAll(): WorkItem[] {
        return this.items.slice(this.head);
    }
}
