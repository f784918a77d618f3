import { describe, it, expect } from 'vitest';
import { LoadBalancer } from '../engine/loadBalancer';
import { createRequestGenerator } from '../engine/requestGenerator';
import { makeItem } from '../engine/testItems';
import { handleTrafficBurst } from './trafficBurstHandler';
import { handleWorkerOutage, handleWorkerRecovery } from './workerOutageHandler';

function smallPool(queueCapacity: number): LoadBalancer {
    return new LoadBalancer({
        initialWorkers: 2,
        minWorkers: 2,
        maxWorkers: 2,
        scaleThreshold: 0.8,
        queueCapacity
    });
}

describe('handleTrafficBurst', () => {
    it('should submit every generated request and split the outcomes', () => {
        const lb = smallPool(3);
        const result = handleTrafficBurst(lb, createRequestGenerator(5), 5);

        expect(result.accepted.map(item => item.id)).toEqual([1, 2, 3]);
        expect(result.rejected.map(item => item.id)).toEqual([4, 5]);
        expect(lb.getQueueSize()).toBe(3);
    });

    it('should stop at the first rejection when asked', () => {
        const lb = smallPool(3);
        const result = handleTrafficBurst(lb, createRequestGenerator(5), 5, true);

        expect(result.accepted).toHaveLength(3);
        expect(result.rejected.map(item => item.id)).toEqual([4]);
    });

    it('should return copies of the admitted requests', () => {
        const lb = smallPool(3);
        const result = handleTrafficBurst(lb, createRequestGenerator(5), 1);

        result.accepted[0].remainingTime = 0;

        expect(lb.getQueuedItems()[0].remainingTime).toBe(result.accepted[0].processingTime);
    });

    it('should stamp requests with the current cycle', () => {
        const lb = smallPool(10);
        lb.advanceOneCycle();
        lb.advanceOneCycle();

        const result = handleTrafficBurst(lb, createRequestGenerator(5), 2);
        expect(result.accepted.map(item => item.arrivalCycle)).toEqual([2, 2]);
    });
});

describe('worker outage', () => {
    it('should freeze a worker and report its stranded items', () => {
        const lb = smallPool(10);
        lb.submit(makeItem(1, 4));
        lb.submit(makeItem(2, 4));
        lb.advanceOneCycle();

        expect(handleWorkerOutage(lb, 2)).toEqual({ workerId: 2, active: false, frozenItems: 1 });
        expect(lb.getActiveWorkerCount()).toBe(1);

        // Worker 1 finishes on schedule, worker 2 does not advance
        lb.advanceOneCycle();
        lb.advanceOneCycle();
        lb.advanceOneCycle();
        expect(lb.advanceOneCycle()).toBe(1);
        expect(lb.getInFlightCount()).toBe(1);
    });

    it('should resume a recovered worker', () => {
        const lb = smallPool(10);
        lb.submit(makeItem(1, 1));
        lb.submit(makeItem(2, 1));
        lb.advanceOneCycle();
        handleWorkerOutage(lb, 2);
        lb.advanceOneCycle();

        expect(handleWorkerRecovery(lb, 2)).toEqual({ workerId: 2, active: true, frozenItems: 0 });
        expect(lb.advanceOneCycle()).toBe(1);
        expect(lb.getInFlightCount()).toBe(0);
    });

    it('should return null for an unknown worker', () => {
        const lb = smallPool(10);
        expect(handleWorkerOutage(lb, 42)).toBeNull();
        expect(handleWorkerRecovery(lb, 42)).toBeNull();
    });
});
