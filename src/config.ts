// src/config.ts

import { ConfigurationError } from './errors';
import {
    DEFAULT_QUEUE_CAPACITY,
    DEFAULT_WORKER_CAPACITY
} from './models/LoadBalancerConfig';
import type { LoadBalancerConfig } from './models/LoadBalancerConfig';
import { validateLoadBalancerConfig } from './engine/configValidation';

export interface AppConfig {
    port: number;
    logLevel: string;
    loadBalancer: Required<LoadBalancerConfig>;
    simulation: {
        cycles: number;
        seed: number;
        cycleDelayMs: number;
        logFile: string;
    };
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function readInteger(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
    }
    return value;
}

function readNumber(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
    }
    return value;
}

/**
 * Build application config from environment variables
 *
 * @param env Environment (defaults to process.env)
 * @throws ConfigurationError on malformed or inconsistent values
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const logLevel = env.LOG_LEVEL ?? 'info';
    if (!LOG_LEVELS.includes(logLevel)) {
        throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }

    const port = readInteger(env, 'PORT', 3000);
    if (port < 0 || port > 65535) {
        throw new ConfigurationError(`PORT out of range: ${port}`);
    }

    const loadBalancer: Required<LoadBalancerConfig> = {
        initialWorkers: readInteger(env, 'LB_INITIAL_WORKERS', 5),
        maxWorkers: readInteger(env, 'LB_MAX_WORKERS', 10),
        minWorkers: readInteger(env, 'LB_MIN_WORKERS', 1),
        scaleThreshold: readNumber(env, 'LB_SCALE_THRESHOLD', 0.8),
        queueCapacity: readInteger(env, 'LB_QUEUE_CAPACITY', DEFAULT_QUEUE_CAPACITY),
        workerCapacity: readInteger(env, 'LB_WORKER_CAPACITY', DEFAULT_WORKER_CAPACITY)
    };
    validateLoadBalancerConfig(loadBalancer);

    const cycles = readInteger(env, 'SIM_CYCLES', 10000);
    if (cycles < 1) {
        throw new ConfigurationError(`SIM_CYCLES must be positive, got ${cycles}`);
    }

    const cycleDelayMs = readInteger(env, 'SIM_CYCLE_DELAY_MS', 0);
    if (cycleDelayMs < 0) {
        throw new ConfigurationError(`SIM_CYCLE_DELAY_MS must not be negative, got ${cycleDelayMs}`);
    }

    return {
        port,
        logLevel,
        loadBalancer,
        simulation: {
            cycles,
            seed: readInteger(env, 'SIM_SEED', Date.now() % 2147483647),
            cycleDelayMs,
            logFile: env.SIM_LOG_FILE ?? 'loadbalancer_log.txt'
        }
    };
}
