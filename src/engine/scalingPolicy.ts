// src/engine/scalingPolicy.ts

/**
 * Inputs to one scaling evaluation
 *
 * meanUtilization is a fraction (0-1) over active workers only
 */
export interface ScalingInput {
    meanUtilization: number;
    queueSize: number;
    poolSize: number;
    minWorkers: number;
    maxWorkers: number;
    threshold: number;
}

/** Queue backlog that forces a scale-up regardless of utilization */
export const QUEUE_BACKLOG_LIMIT = 10;

/** Scale-down floor, as a fraction of the scale-up threshold */
export const SCALE_DOWN_FACTOR = 0.05;

/** Workers that must remain above the minimum before shrinking */
export const SCALE_DOWN_SLACK = 3;

/**
 * Pure function - grow on a single excursion above threshold or a queue backlog
 */
export function shouldScaleUp(input: ScalingInput): boolean {
    const underPressure =
        input.meanUtilization > input.threshold ||
        input.queueSize > QUEUE_BACKLOG_LIMIT;

    return underPressure && input.poolSize < input.maxWorkers;
}

/**
 * Pure function - shrink only when nearly idle, queue empty, and
 * more than SCALE_DOWN_SLACK workers above the minimum
 */
export function shouldScaleDown(input: ScalingInput): boolean {
    return (
        input.meanUtilization < input.threshold * SCALE_DOWN_FACTOR &&
        input.queueSize === 0 &&
        input.poolSize > input.minWorkers + SCALE_DOWN_SLACK
    );
}
