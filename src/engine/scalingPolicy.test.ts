import { describe, it, expect } from 'vitest';
import { shouldScaleDown, shouldScaleUp } from './scalingPolicy';
import type { ScalingInput } from './scalingPolicy';

const base: ScalingInput = {
    meanUtilization: 0.5,
    queueSize: 0,
    poolSize: 5,
    minWorkers: 1,
    maxWorkers: 10,
    threshold: 0.8
};

describe('scalingPolicy', () => {

    describe('shouldScaleUp', () => {
        it('should grow when utilization exceeds the threshold', () => {
            expect(shouldScaleUp({ ...base, meanUtilization: 0.81 })).toBe(true);
        });

        it('should not grow at exactly the threshold', () => {
            expect(shouldScaleUp({ ...base, meanUtilization: 0.8 })).toBe(false);
        });

        it('should grow on a queue backlog above 10 even when idle', () => {
            expect(shouldScaleUp({ ...base, meanUtilization: 0, queueSize: 11 })).toBe(true);
            expect(shouldScaleUp({ ...base, meanUtilization: 0, queueSize: 10 })).toBe(false);
        });

        it('should not grow past the maximum', () => {
            expect(shouldScaleUp({ ...base, meanUtilization: 1, poolSize: 10 })).toBe(false);
        });
    });

    describe('shouldScaleDown', () => {
        it('should shrink when nearly idle with an empty queue and slack', () => {
            // floor is 0.8 * 0.05 = 0.04
            expect(shouldScaleDown({ ...base, meanUtilization: 0.03 })).toBe(true);
        });

        it('should not shrink at or above the floor', () => {
            expect(shouldScaleDown({ ...base, meanUtilization: 0.2 })).toBe(false);
        });

        it('should not shrink while anything is queued', () => {
            expect(shouldScaleDown({ ...base, meanUtilization: 0, queueSize: 1 })).toBe(false);
        });

        it('should keep three workers of slack above the minimum', () => {
            expect(shouldScaleDown({ ...base, meanUtilization: 0, poolSize: 4 })).toBe(false);
            expect(shouldScaleDown({ ...base, meanUtilization: 0, poolSize: 5 })).toBe(true);
        });

        it('should never agree with scale-up on the same input', () => {
            const inputs: ScalingInput[] = [
                { ...base, meanUtilization: 0 },
                { ...base, meanUtilization: 0.9 },
                { ...base, meanUtilization: 0, queueSize: 20 },
                { ...base, meanUtilization: 0.01, poolSize: 9 }
            ];
            for (const input of inputs) {
                expect(shouldScaleUp(input) && shouldScaleDown(input)).toBe(false);
            }
        });
    });
});
