export { RequestDispatcher } from './request-dispatcher';
export {
    validateRequest,
    MISSING_FIELDS_MESSAGE,
    INVALID_TARGET_MESSAGE,
    INVALID_JSON_MESSAGE,
} from './request-validator';

import { RequestDispatcher } from './request-dispatcher';
import { CredentialResolver, createSecretStore } from '../secrets';
import { createProviderRegistry } from '../providers';
import { AppConfig, config } from '../../config';

/**
 * Composition root shared by the HTTP server and the serverless handler.
 */
export function createRequestDispatcher(appConfig: AppConfig = config): RequestDispatcher {
    return new RequestDispatcher({
        credentialResolver: new CredentialResolver(createSecretStore(appConfig), appConfig.secretName),
        providers: createProviderRegistry(appConfig),
    });
}
