// src/app.ts

import express from 'express';
import type { Logger } from 'pino';
import type { LoadBalancer } from './engine/loadBalancer';
import { createTrafficRoutes } from './routes/trafficRoutes';
import { createPoolRoutes } from './routes/poolRoutes';

/**
 * Express application setup
 *
 * One in-memory load balancer per app. Every mutating route runs
 * synchronously inside its handler, so calls are serialized and each
 * cycle stays indivisible.
 */
export function createApp(loadBalancer: LoadBalancer, logger: Logger): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use('/', createTrafficRoutes(loadBalancer));
    app.use('/workers', createPoolRoutes(loadBalancer));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: loadBalancer.isOverloaded() ? 'overloaded' : 'healthy',
            cycle: loadBalancer.getCurrentCycle(),
            workers: loadBalancer.getPoolSize()
        });
    });

    // Error handling
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        logger.error({ err }, 'request failed');
        res.status(500).json({ error: err.message });
    });

    return app;
}
