export type { SecretStore } from './secret-store.interface';
export { AwsSecretsManagerAdapter } from './aws-secrets-manager.adapter';
export { CredentialResolver, parseCredentialPayload } from './credential-resolver';

import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { SecretStore } from './secret-store.interface';
import { AwsSecretsManagerAdapter } from './aws-secrets-manager.adapter';
import { AppConfig, config } from '../../config';

/**
 * Factory: create the process-wide secret store client.
 */
export function createSecretStore(appConfig: AppConfig = config): SecretStore {
    return new AwsSecretsManagerAdapter(new SecretsManagerClient({ region: appConfig.awsRegion }));
}
