// src/server.ts

import dotenv from 'dotenv';
dotenv.config();

import http from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { loadHelpdeskContext } from './context';
import { JsonFilePersistence, NoopPersistence } from './store/persistence';
import { createLogger } from './utils/logger';

async function startServer(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);
    const persistence = config.persist ? new JsonFilePersistence(config.dataFile) : new NoopPersistence();

    const context = await loadHelpdeskContext({ config, logger, persistence });
    await context.state.persist();
    logger.info(config.persist ? `State persisted to ${config.dataFile}` : 'Persistence disabled, state is in-memory only');

    const server = http.createServer(createApp(context));
    server.listen(config.port, () => {
        logger.info(`Campus helpdesk running on port ${config.port}`);
    });

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close(err => {
            if (err) {
                logger.error('Error while closing server', err);
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch(err => {
    console.error('Failed to start server:', err);
    process.exit(1);
});
