import { FastifyInstance, HTTPMethods } from 'fastify';
import { RequestDispatcher } from '../services/dispatch';

const ROUTED_METHODS: HTTPMethods[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

export function dispatchRoutes(dispatcher: RequestDispatcher) {
    return async function (fastify: FastifyInstance) {
        // The validator owns JSON parsing, so every body reaches it as raw text
        fastify.removeAllContentTypeParsers();
        fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
            done(null, body);
        });

        // ─── Dispatch a prompt to a provider ───
        fastify.route({
            method: ROUTED_METHODS,
            url: '/',
            handler: async (request, reply) => {
                const result = await dispatcher.dispatch(
                    {
                        method: request.method,
                        body: typeof request.body === 'string' ? request.body : undefined,
                    },
                    request.id,
                );

                reply.code(result.statusCode).headers(result.headers);
                return result.body;
            },
        });
    };
}
