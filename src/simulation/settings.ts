// src/simulation/settings.ts

import type { LoadBalancerConfig } from '../models/LoadBalancerConfig';

export const DEFAULT_SERVERS = 5;
export const DEFAULT_CYCLES = 10000;

export interface RunSettings {
    servers: number;
    cycles: number;
    notices: string[];
}

function parseWhole(raw: string): number | null {
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) {
        return null;
    }
    return Number(trimmed);
}

/**
 * Validate answers from the interactive prompt
 *
 * Out-of-range or non-numeric answers fall back to defaults with a notice
 *
 * - servers: 1-50, default 5
 * - cycles: 100-50000, default 10000
 */
export function resolveSettings(rawServers: string, rawCycles: string): RunSettings {
    const notices: string[] = [];

    let servers = parseWhole(rawServers);
    if (servers === null || servers < 1 || servers > 50) {
        notices.push(`Invalid number of servers. Using default value of ${DEFAULT_SERVERS}.`);
        servers = DEFAULT_SERVERS;
    }

    let cycles = parseWhole(rawCycles);
    if (cycles === null || cycles < 100 || cycles > 50000) {
        notices.push(`Invalid simulation time. Using default value of ${DEFAULT_CYCLES}.`);
        cycles = DEFAULT_CYCLES;
    }

    return { servers, cycles, notices };
}

/**
 * Pool shape used for prompted runs: up to twice the starting size, never below one
 */
export function poolForServers(
    servers: number
): Pick<LoadBalancerConfig, 'initialWorkers' | 'maxWorkers' | 'minWorkers' | 'scaleThreshold'> {
    return {
        initialWorkers: servers,
        maxWorkers: servers * 2,
        minWorkers: 1,
        scaleThreshold: 0.8
    };
}
