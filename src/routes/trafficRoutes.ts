// src/routes/trafficRoutes.ts

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { LoadBalancer } from '../engine/loadBalancer';
import type { WorkItem } from '../models/WorkItem';
import { readBody } from './body';

const MAX_CYCLES_PER_CALL = 10000;

function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Traffic routes - HTTP mapping only
 * Admission, stepping and blocklist logic stays in the load balancer
 */
export function createTrafficRoutes(loadBalancer: LoadBalancer): Router {
    const router = Router();
    let nextRequestId = 1;

    /**
     * Submit a request
     * POST /requests
     * Body: { originAddress, category, priority, processingTime }
     */
    router.post('/requests', (req: Request, res: Response) => {
        const { originAddress, category, priority, processingTime } = readBody(req);

        if (typeof originAddress !== 'string' || originAddress === '' ||
            typeof category !== 'string' || category === '') {
            res.status(400).json({ error: 'originAddress and category are required' });
            return;
        }

        if (!isPositiveInteger(priority) || priority > 10) {
            res.status(400).json({ error: 'priority must be an integer between 1 and 10' });
            return;
        }

        if (!isPositiveInteger(processingTime)) {
            res.status(400).json({ error: 'processingTime must be a positive integer' });
            return;
        }

        const item: WorkItem = {
            id: nextRequestId++,
            originAddress,
            category,
            priority,
            processingTime,
            remainingTime: processingTime,
            arrivalCycle: loadBalancer.getCurrentCycle()
        };

        if (!loadBalancer.submit(item)) {
            const reason = loadBalancer.isOriginBlocked(originAddress) ? 'origin blocked' : 'queue full';
            res.status(503).json({ accepted: false, reason });
            return;
        }

        res.status(202).json({ accepted: true, item });
    });

    /**
     * Advance the simulation
     * POST /cycles
     * Body: { count? } (default 1)
     */
    router.post('/cycles', (req: Request, res: Response) => {
        const { count = 1 } = readBody(req);

        if (!isPositiveInteger(count) || count > MAX_CYCLES_PER_CALL) {
            res.status(400).json({ error: `count must be an integer between 1 and ${MAX_CYCLES_PER_CALL}` });
            return;
        }

        let completed = 0;
        for (let i = 0; i < count; i++) {
            completed += loadBalancer.advanceOneCycle();
        }

        res.json({ completed, cycle: loadBalancer.getCurrentCycle() });
    });

    /**
     * Current telemetry
     * GET /status
     */
    router.get('/status', (_req: Request, res: Response) => {
        res.json(loadBalancer.getSnapshot());
    });

    /**
     * Queued requests, head first
     * GET /queue
     */
    router.get('/queue', (_req: Request, res: Response) => {
        res.json({
            size: loadBalancer.getQueueSize(),
            capacity: loadBalancer.getQueueCapacity(),
            items: loadBalancer.getQueuedItems()
        });
    });

    /**
     * GET /blocklist
     */
    router.get('/blocklist', (_req: Request, res: Response) => {
        res.json({ blocked: loadBalancer.getBlockedOrigins() });
    });

    /**
     * Block an origin address
     * POST /blocklist
     * Body: { address }
     */
    router.post('/blocklist', (req: Request, res: Response) => {
        const { address } = readBody(req);
        if (typeof address !== 'string' || address === '') {
            res.status(400).json({ error: 'address is required' });
            return;
        }

        loadBalancer.blockOrigin(address);
        res.json({ blocked: loadBalancer.getBlockedOrigins() });
    });

    /**
     * Unblock an origin address
     * DELETE /blocklist/:address
     */
    router.delete('/blocklist/:address', (req: Request, res: Response) => {
        loadBalancer.unblockOrigin(req.params.address);
        res.json({ blocked: loadBalancer.getBlockedOrigins() });
    });

    return router;
}
