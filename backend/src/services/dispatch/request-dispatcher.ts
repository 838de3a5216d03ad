import { CredentialResolver } from '../secrets/credential-resolver';
import { ProviderRegistry, selectProvider } from '../providers';
import { validateRequest } from './request-validator';
import { formatError, formatSuccess } from './response-formatter';
import { DispatchResult, InboundMessage, ProviderResponse } from '../../types';
import { errorMessage, isDispatchError } from '../../errors';
import { Logger, logger as rootLogger } from '../../utils/logger';
import { v4 as uuid } from 'uuid';

export interface RequestDispatcherDeps {
    credentialResolver: CredentialResolver;
    providers: ProviderRegistry;
    logger?: Logger;
}

/**
 * Request Dispatcher.
 * One activation per inbound message:
 *   1. Validate method and body
 *   2. Resolve credentials from the secret store
 *   3. Invoke the selected provider
 *   4. Format the envelope
 * Every failure is caught here, logged once and reported once.
 */
export class RequestDispatcher {
    private readonly logger: Logger;

    constructor(private readonly deps: RequestDispatcherDeps) {
        this.logger = deps.logger ?? rootLogger;
    }

    async dispatch(message: InboundMessage, requestId: string = uuid()): Promise<DispatchResult> {
        const log = this.logger.child({ requestId });
        const startTime = Date.now();

        try {
            const request = validateRequest(message);
            const credentials = await this.deps.credentialResolver.resolve();

            const provider = selectProvider(this.deps.providers, request.target);
            const reply = await provider.invoke(request.prompt, credentials);

            const response: ProviderResponse = Object.freeze({ model: provider.name, reply });
            log.info({ target: request.target, model: provider.name, latency: Date.now() - startTime }, 'Request dispatched');
            return formatSuccess(response);
        } catch (err) {
            const result = formatError(err);
            if (result.statusCode === 500) {
                log.error({ err, errorType: isDispatchError(err) ? err.name : 'UnclassifiedError' }, 'Dispatch failed');
            } else {
                log.warn({ statusCode: result.statusCode, method: message.method, reason: errorMessage(err) }, 'Request rejected');
            }
            return result;
        }
    }
}
