// regroup-server/src/main.ts — 服务入口

import { createLogger, logger as engineLogger } from 'libregroup';
import { createApp } from './app.js';
import { loadServerConfig } from './config.js';
import { createSubscriptionFetcher } from './fetch.js';

function main(): void {
    const config = loadServerConfig(process.env);
    const logger = createLogger({ level: config.logLevel, label: 'regroup-server' });
    engineLogger.level = config.logLevel;

    const app = createApp({
        fetchSubscription: createSubscriptionFetcher(config),
        logger,
    });

    const server = app.listen(config.port, config.host, () => {
        logger.info(`Listening on http://${config.host}:${config.port}`);
    });
    server.on('error', (err: Error) => {
        logger.error(`Server error: ${err.message}`);
        process.exitCode = 1;
    });
}

main();
