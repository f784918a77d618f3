// src/models/LoadBalancerConfig.ts

/**
 * Construction options for a load balancer
 *
 * scaleThreshold is a fraction (0-1) of mean worker utilization
 */
export interface LoadBalancerConfig {
    initialWorkers: number;
    maxWorkers: number;
    minWorkers: number;
    scaleThreshold: number;
    queueCapacity?: number;
    workerCapacity?: number;
}

export const DEFAULT_QUEUE_CAPACITY = 1000;
export const DEFAULT_WORKER_CAPACITY = 5;

/**
 * Point-in-time view of one worker (for HTTP responses and reports)
 */
export interface WorkerSnapshot {
    id: number;
    address: string;
    capacity: number;
    load: number;
    utilization: number;
    active: boolean;
    totalCompleted: number;
    totalProcessingTime: number;
    averageProcessingTime: number;
}

/**
 * Point-in-time view of the whole system
 *
 * Utilizations are percentages (0-100)
 */
export interface LoadBalancerSnapshot {
    cycle: number;
    poolSize: number;
    activeWorkers: number;
    minWorkers: number;
    maxWorkers: number;
    queueSize: number;
    queueCapacity: number;
    inFlight: number;
    totalProcessed: number;
    totalDiscarded: number;
    averageProcessingTime: number;
    averageQueueWait: number;
    systemUtilization: number;
    queueUtilization: number;
    overloaded: boolean;
    workers: WorkerSnapshot[];
}
