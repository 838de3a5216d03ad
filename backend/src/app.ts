import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppConfig, config } from './config';
import { dispatchRoutes } from './routes/dispatch.routes';
import { RequestDispatcher } from './services/dispatch';
import { TARGET_MODELS } from './types';
import { v4 as uuid } from 'uuid';

export interface BuildAppOptions {
    dispatcher: RequestDispatcher;
    appConfig?: AppConfig;
}

export async function buildApp({ dispatcher, appConfig = config }: BuildAppOptions): Promise<FastifyInstance> {
    const app = Fastify({
        logger: false, // We use pino directly
        genReqId: () => uuid(),
    });

    // ─── Plugins ───
    // CORS headers only; OPTIONS reaches the dispatcher like any other non-POST method
    await app.register(cors, {
        preflight: false,
        origin: appConfig.corsOrigin ? appConfig.corsOrigin.split(',').map((o) => o.trim()) : true,
    });

    // ─── Register Routes ───
    await app.register(dispatchRoutes(dispatcher));

    // ─── Health Check ───
    app.get('/health', async () => {
        return {
            status: 'ok',
            timestamp: new Date().toISOString(),
            providers: [...TARGET_MODELS],
            mode: appConfig.providerMode,
        };
    });

    return app;
}
