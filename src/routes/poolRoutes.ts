// src/routes/poolRoutes.ts

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { LoadBalancer } from '../engine/loadBalancer';
import { handleWorkerOutage, handleWorkerRecovery } from '../events/workerOutageHandler';

/**
 * Worker pool routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createPoolRoutes(loadBalancer: LoadBalancer): Router {
    const router = Router();

    /**
     * List workers
     * GET /workers
     */
    router.get('/', (_req: Request, res: Response) => {
        res.json({
            workers: loadBalancer.getWorkerSnapshots(),
            stats: loadBalancer.getWorkerStats()
        });
    });

    /**
     * Add a worker
     * POST /workers/grow
     */
    router.post('/grow', (_req: Request, res: Response) => {
        if (!loadBalancer.growPool()) {
            res.status(409).json({ error: 'Pool is at its maximum size' });
            return;
        }
        res.json({ poolSize: loadBalancer.getPoolSize() });
    });

    /**
     * Remove the newest worker (its in-flight work is discarded)
     * POST /workers/shrink
     */
    router.post('/shrink', (_req: Request, res: Response) => {
        if (!loadBalancer.shrinkPool()) {
            res.status(409).json({ error: 'Pool is at its minimum size' });
            return;
        }
        res.json({
            poolSize: loadBalancer.getPoolSize(),
            totalDiscarded: loadBalancer.getDiscardedCount()
        });
    });

    /**
     * Take a worker offline
     * POST /workers/:id/deactivate
     */
    router.post('/:id/deactivate', (req: Request, res: Response) => {
        const result = handleWorkerOutage(loadBalancer, Number(req.params.id));
        if (!result) {
            res.status(404).json({ error: 'Worker not found' });
            return;
        }
        res.json(result);
    });

    /**
     * Bring a worker back
     * POST /workers/:id/activate
     */
    router.post('/:id/activate', (req: Request, res: Response) => {
        const result = handleWorkerRecovery(loadBalancer, Number(req.params.id));
        if (!result) {
            res.status(404).json({ error: 'Worker not found' });
            return;
        }
        res.json(result);
    });

    return router;
}
