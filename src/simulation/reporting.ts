// src/simulation/reporting.ts

import type { Logger } from 'pino';
import type { LoadBalancer } from '../engine/loadBalancer';

function pad(value: number | string, width: number): string {
    return String(value).padStart(width);
}

/**
 * Fixed-width one-line statistics sample
 */
export function formatStatsLine(loadBalancer: LoadBalancer, cycle: number): string {
    return `Cycle ${pad(cycle, 5)} | ` +
        `Servers: ${pad(loadBalancer.getActiveWorkerCount(), 2)} | ` +
        `Queue: ${pad(loadBalancer.getQueueSize(), 4)} | ` +
        `Processed: ${pad(loadBalancer.getTotalRequestsProcessed(), 6)} | ` +
        `System Util: ${pad(loadBalancer.getSystemUtilization().toFixed(1), 5)}% | ` +
        `Queue Util: ${pad(loadBalancer.getQueueUtilization().toFixed(1), 5)}%`;
}

/**
 * Write one periodic sample to the statistics log
 */
export function logStatistics(statsLogger: Logger, loadBalancer: LoadBalancer, cycle: number): void {
    statsLogger.info(
        {
            cycle,
            servers: loadBalancer.getActiveWorkerCount(),
            queueSize: loadBalancer.getQueueSize(),
            processed: loadBalancer.getTotalRequestsProcessed(),
            systemUtilization: Number(loadBalancer.getSystemUtilization().toFixed(1)),
            queueUtilization: Number(loadBalancer.getQueueUtilization().toFixed(1))
        },
        formatStatsLine(loadBalancer, cycle)
    );
}

/**
 * Status block shown periodically during a run
 */
export function formatStatusReport(loadBalancer: LoadBalancer, cycle: number): string[] {
    const lines = [
        `=== Cycle ${cycle} Status ===`,
        `Active Servers: ${loadBalancer.getActiveWorkerCount()}`,
        `Queue Size: ${loadBalancer.getQueueSize()}`,
        `Total Processed: ${loadBalancer.getTotalRequestsProcessed()}`,
        `System Utilization: ${loadBalancer.getSystemUtilization().toFixed(1)}%`,
        `Queue Utilization: ${loadBalancer.getQueueUtilization().toFixed(1)}%`
    ];

    if (loadBalancer.isOverloaded()) {
        lines.push('*** SYSTEM OVERLOADED ***');
    }

    return lines;
}

/**
 * End-of-run summary, one line per worker at the end
 */
export function formatSummary(loadBalancer: LoadBalancer): string[] {
    return [
        `Total requests processed: ${loadBalancer.getTotalRequestsProcessed()}`,
        `Average processing time: ${loadBalancer.getAverageProcessingTime().toFixed(2)} cycles`,
        `Average queue wait: ${loadBalancer.getAverageQueueWait().toFixed(2)} cycles`,
        `Final system utilization: ${loadBalancer.getSystemUtilization().toFixed(1)}%`,
        `Final queue size: ${loadBalancer.getQueueSize()}`,
        `Discarded on scale-down: ${loadBalancer.getDiscardedCount()}`,
        'Server Statistics:',
        ...loadBalancer.getWorkerStats().map(stat => `  ${stat}`)
    ];
}
