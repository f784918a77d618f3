// src/server.ts

import { loadConfig } from './config';
import { LoadBalancer } from './engine/loadBalancer';
import { createLogger } from './logger';
import { createApp } from './app';

const config = loadConfig();
const logger = createLogger(config.logLevel);
const loadBalancer = new LoadBalancer(config.loadBalancer, logger.child({ component: 'load-balancer' }));
const app = createApp(loadBalancer, logger);

app.listen(config.port, () => {
    logger.info({ port: config.port, workers: loadBalancer.getPoolSize() }, 'load balancer simulator listening');
});
