import { buildApp } from './app';
import { config } from './config';
import { logger } from './utils/logger';
import { createRequestDispatcher } from './services/dispatch';

async function main() {
    // ─── Initialize Services ───
    logger.info('Initializing services...');

    if (!config.secretName) {
        logger.warn('SECRET_NAME is not set, every dispatch will fail with a 500 until it is configured');
    }

    const dispatcher = createRequestDispatcher(config);
    const app = await buildApp({ dispatcher, appConfig: config });

    // ─── Start Server ───
    try {
        await app.listen({ port: config.port, host: '0.0.0.0' });
        logger.info({ port: config.port, env: config.nodeEnv, mode: config.providerMode }, 'Prompt router started');
    } catch (err) {
        logger.error({ err }, 'Failed to start server');
        process.exit(1);
    }

    // ─── Graceful Shutdown ───
    const shutdown = async () => {
        logger.info('Shutting down...');
        await app.close();
        process.exit(0);
    };
    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
});
