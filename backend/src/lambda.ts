import type { APIGatewayProxyEvent, APIGatewayProxyEventV2, APIGatewayProxyResult } from 'aws-lambda';
import { RequestDispatcher, createRequestDispatcher } from './services/dispatch';
import { InboundMessage } from './types';

/**
 * The fields read from an API Gateway proxy event. REST (v1) events carry
 * `httpMethod`; HTTP API (v2) events carry `requestContext.http.method`.
 */
export interface GatewayEvent {
    httpMethod?: string;
    requestContext: { requestId: string; http?: { method: string } };
    body?: string | null;
    isBase64Encoded?: boolean;
}

export function toInboundMessage(event: GatewayEvent): InboundMessage {
    const method = event.httpMethod ?? event.requestContext.http?.method ?? '';

    let body = event.body ?? undefined;
    if (body !== undefined && event.isBase64Encoded) {
        body = Buffer.from(body, 'base64').toString('utf8');
    }

    return { method, body };
}

export function createLambdaHandler(dispatcher: RequestDispatcher) {
    return async function (event: GatewayEvent): Promise<APIGatewayProxyResult> {
        const result = await dispatcher.dispatch(toInboundMessage(event), event.requestContext.requestId);
        return {
            statusCode: result.statusCode,
            headers: result.headers,
            body: result.body,
        };
    };
}

// Built once per container; credentials are still resolved per invocation
export const handler: (event: APIGatewayProxyEvent | APIGatewayProxyEventV2) => Promise<APIGatewayProxyResult> =
    createLambdaHandler(createRequestDispatcher());
