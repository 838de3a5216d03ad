import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { SecretStore } from './secret-store.interface';
import { config } from '../../config';
import { logger } from '../../utils/logger';

export class AwsSecretsManagerAdapter implements SecretStore {
    readonly name = 'aws-secrets-manager';
    private client: SecretsManagerClient;

    constructor(client?: SecretsManagerClient) {
        this.client = client ?? new SecretsManagerClient({ region: config.awsRegion });
    }

    async getSecretString(secretId: string): Promise<string> {
        const startTime = Date.now();

        try {
            const response = await this.client.send(new GetSecretValueCommand({ SecretId: secretId }));
            logger.debug({ store: this.name, latency: Date.now() - startTime }, 'Secret fetched');

            if (response.SecretString === undefined) {
                throw new Error(`Secret ${secretId} has no string value`);
            }
            return response.SecretString;
        } catch (error) {
            logger.error({ err: error, store: this.name, secretId }, 'Error retrieving secret');
            throw error;
        }
    }
}
