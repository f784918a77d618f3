#!/usr/bin/env node
// src/simulation/cli.ts

import { createInterface } from 'node:readline/promises';
import { loadConfig } from '../config';
import type { AppConfig } from '../config';
import { createLogger, createStatsLogger } from '../logger';
import { runSimulation } from './runSimulation';
import { poolForServers, resolveSettings } from './settings';

/**
 * Command-line entry for a full run
 *
 * Usage: node dist/simulation/cli.js [--interactive]
 *
 * Without --interactive every setting comes from the environment (see config.ts)
 */

async function promptSettings(config: AppConfig): Promise<AppConfig> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        const servers = await rl.question('Enter the number of servers (1-50): ');
        const cycles = await rl.question('Enter the simulation time in clock cycles (100-50000): ');
        const settings = resolveSettings(servers, cycles);
        settings.notices.forEach(notice => console.log(notice));

        return {
            ...config,
            loadBalancer: {
                ...poolForServers(settings.servers),
                queueCapacity: config.loadBalancer.queueCapacity,
                workerCapacity: config.loadBalancer.workerCapacity
            },
            simulation: { ...config.simulation, cycles: settings.cycles }
        };
    } finally {
        rl.close();
    }
}

async function main(): Promise<void> {
    let config = loadConfig();
    if (process.argv.includes('--interactive')) {
        config = await promptSettings(config);
    }

    const logger = createLogger(config.logLevel);
    const statsLogger = createStatsLogger(config.simulation.logFile);
    logger.info({ logFile: config.simulation.logFile }, 'writing statistics');

    await runSimulation(
        {
            loadBalancer: config.loadBalancer,
            cycles: config.simulation.cycles,
            seed: config.simulation.seed,
            cycleDelayMs: config.simulation.cycleDelayMs
        },
        { logger, statsLogger }
    );
}

main().catch((err: unknown) => {
    console.error('Simulation failed:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
