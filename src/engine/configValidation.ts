// src/engine/configValidation.ts

import { ConfigurationError } from '../errors';
import {
    DEFAULT_QUEUE_CAPACITY,
    DEFAULT_WORKER_CAPACITY
} from '../models/LoadBalancerConfig';
import type { LoadBalancerConfig } from '../models/LoadBalancerConfig';

/**
 * Reject option sets that cannot produce a valid pool
 *
 * Must pass before a LoadBalancer is constructed
 *
 * @throws ConfigurationError describing the first violated rule
 */
export function validateLoadBalancerConfig(config: LoadBalancerConfig): void {
    const { initialWorkers, maxWorkers, minWorkers, scaleThreshold } = config;
    const queueCapacity = config.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    const workerCapacity = config.workerCapacity ?? DEFAULT_WORKER_CAPACITY;

    const integers: Array<[string, number]> = [
        ['initialWorkers', initialWorkers],
        ['maxWorkers', maxWorkers],
        ['minWorkers', minWorkers],
        ['queueCapacity', queueCapacity],
        ['workerCapacity', workerCapacity]
    ];
    for (const [name, value] of integers) {
        if (!Number.isInteger(value) || value < 0) {
            throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
        }
    }

    if (minWorkers > maxWorkers) {
        throw new ConfigurationError(`minWorkers (${minWorkers}) exceeds maxWorkers (${maxWorkers})`);
    }

    if (initialWorkers < minWorkers || initialWorkers > maxWorkers) {
        throw new ConfigurationError(
            `initialWorkers (${initialWorkers}) must be within [${minWorkers}, ${maxWorkers}]`
        );
    }

    if (!Number.isFinite(scaleThreshold) || scaleThreshold < 0 || scaleThreshold > 1) {
        throw new ConfigurationError(`scaleThreshold must be within [0, 1], got ${scaleThreshold}`);
    }
}
