// src/index.ts
import { createServer } from './api/server';
import { createAppContext } from './app';
import config from './config/config';
import { logger } from './utils/logger';

logger.info('Starting Constitution Reader API...');
logger.info(`Environment: ${config.nodeEnv}`);

async function start() {
    const ctx = createAppContext();
    try {
        const server = await createServer(ctx);

        await server.listen({ port: config.port, host: '0.0.0.0' });

        logger.info(`Server is running on port ${config.port}`);
        logger.info(`Swagger documentation: http://localhost:${config.port}/documentation`);
        logger.info(`Cache backend: ${config.redis.url ? 'redis' : 'in-process memory'}`);

        const shutdown = async () => {
            logger.info('Shutting down server...');
            await server.close();
            await ctx.close();
            process.exit(0);
        };

        const onSignal = () => {
            shutdown().catch(error => {
                logger.error({ err: error }, 'Error during shutdown');
                process.exit(1);
            });
        };

        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);

    } catch (err) {
        logger.error({ err }, 'Error starting server');
        await ctx.close();
        process.exit(1);
    }
}

void start();
