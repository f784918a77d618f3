import { describe, it, expect } from 'vitest';
import { Worker, workerAddress } from './worker';
import { makeItem } from './testItems';

describe('Worker', () => {

    it('should derive its address from its id', () => {
        const worker = new Worker(3, 5);
        expect(worker.address).toBe('192.168.1.3');
        expect(workerAddress(12)).toBe('192.168.1.12');
    });

    describe('accept', () => {
        it('should accept until capacity is reached', () => {
            const worker = new Worker(1, 2);
            expect(worker.accept(makeItem(1))).toBe(true);
            expect(worker.accept(makeItem(2))).toBe(true);
            expect(worker.accept(makeItem(3))).toBe(false);
            expect(worker.getLoad()).toBe(2);
            expect(worker.canAccept()).toBe(false);
        });

        it('should refuse work while inactive', () => {
            const worker = new Worker(1, 2);
            worker.setActive(false);
            expect(worker.canAccept()).toBe(false);
            expect(worker.accept(makeItem(1))).toBe(false);
            expect(worker.getLoad()).toBe(0);
        });
    });

    describe('advanceOneCycle', () => {
        it('should complete an item after exactly its processing time', () => {
            const worker = new Worker(1, 1);
            worker.accept(makeItem(1, 3));

            expect(worker.advanceOneCycle()).toBe(0);
            expect(worker.advanceOneCycle()).toBe(0);
            expect(worker.advanceOneCycle()).toBe(1);
            expect(worker.getLoad()).toBe(0);
            expect(worker.advanceOneCycle()).toBe(0);
        });

        it('should advance every in-flight item each cycle', () => {
            const worker = new Worker(1, 5);
            worker.accept(makeItem(1, 2));
            worker.accept(makeItem(2, 1));
            worker.accept(makeItem(3, 2));

            expect(worker.advanceOneCycle()).toBe(1);
            expect(worker.getLoad()).toBe(2);
            expect(worker.advanceOneCycle()).toBe(2);
            expect(worker.getLoad()).toBe(0);
        });

        it('should accumulate the original processing time of completed items', () => {
            const worker = new Worker(1, 5);
            worker.accept(makeItem(1, 2));
            worker.accept(makeItem(2, 4));

            for (let i = 0; i < 4; i++) {
                worker.advanceOneCycle();
            }

            expect(worker.getTotalCompleted()).toBe(2);
            expect(worker.getTotalProcessingTime()).toBe(6);
            expect(worker.getAverageProcessingTime()).toBe(3);
            expect(worker.snapshot()).toEqual({
                id: 1,
                address: '192.168.1.1',
                capacity: 5,
                load: 0,
                utilization: 0,
                active: true,
                totalCompleted: 2,
                totalProcessingTime: 6,
                averageProcessingTime: 3
            });
        });

        it('should complete items whose remaining time is already zero', () => {
            const worker = new Worker(1, 1);
            const item = makeItem(1, 0);
            worker.accept(item);

            expect(worker.advanceOneCycle()).toBe(1);
            expect(item.remainingTime).toBe(-1);
        });

        it('should freeze in-flight items while inactive', () => {
            const worker = new Worker(1, 2);
            const item = makeItem(1, 2);
            worker.accept(item);
            worker.setActive(false);

            expect(worker.advanceOneCycle()).toBe(0);
            expect(worker.advanceOneCycle()).toBe(0);
            expect(item.remainingTime).toBe(2);
            expect(worker.getLoad()).toBe(1);

            worker.setActive(true);
            expect(worker.advanceOneCycle()).toBe(0);
            expect(worker.advanceOneCycle()).toBe(1);
        });
    });

    describe('utilization', () => {
        it('should report load over capacity as a percentage', () => {
            const worker = new Worker(1, 4);
            worker.accept(makeItem(1));
            expect(worker.utilization()).toBe(25);
        });

        it('should report 0 for a zero-capacity worker', () => {
            const worker = new Worker(1, 0);
            expect(worker.utilization()).toBe(0);
            expect(worker.accept(makeItem(1))).toBe(false);
        });
    });

    it('should hand back every in-flight item on drain', () => {
        const worker = new Worker(2, 3);
        worker.accept(makeItem(7));
        worker.accept(makeItem(8));

        const dropped = worker.drain();
        expect(dropped.map(item => item.id)).toEqual([7, 8]);
        expect(worker.getLoad()).toBe(0);
    });

    it('should describe its status on one line', () => {
        const worker = new Worker(2, 5);
        worker.accept(makeItem(1, 1));
        worker.accept(makeItem(2, 4));
        worker.advanceOneCycle();

        expect(worker.describe()).toBe(
            'Server 2 (192.168.1.2): Load: 1/5 (20.0%) | Processed: 1 | Active: Yes'
        );

        worker.setActive(false);
        expect(worker.describe()).toBe(
            'Server 2 (192.168.1.2): Load: 1/5 (20.0%) | Processed: 1 | Active: No'
        );
    });
});
