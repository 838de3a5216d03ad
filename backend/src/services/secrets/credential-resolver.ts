import { z } from 'zod';
import { SecretStore } from './secret-store.interface';
import { CredentialSet } from '../../types';
import { CredentialFormatError, CredentialLookupError, errorMessage } from '../../errors';

const secretPayloadSchema = z.object({
    bedrock_api_key: z.string().min(1),
    azure_api_key: z.string().min(1),
    azure_endpoint: z.string().min(1),
});

/**
 * Credential Resolver.
 * Reads the provider credentials from the secret store on every call.
 * Nothing is cached here; the store is only a connection object.
 */
export class CredentialResolver {
    constructor(
        private readonly store: SecretStore,
        private readonly secretId: string | undefined,
    ) {}

    async resolve(): Promise<CredentialSet> {
        if (!this.secretId) {
            throw new CredentialLookupError('SECRET_NAME is not configured');
        }

        let raw: string;
        try {
            raw = await this.store.getSecretString(this.secretId);
        } catch (err) {
            throw new CredentialLookupError(`Secret lookup failed: ${errorMessage(err)}`, err);
        }

        return parseCredentialPayload(raw);
    }
}

/**
 * Decode the serialized secret mapping into a CredentialSet.
 */
export function parseCredentialPayload(raw: string): CredentialSet {
    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch (err) {
        throw new CredentialFormatError('Secret payload is not valid JSON', err);
    }

    const parsed = secretPayloadSchema.safeParse(decoded);
    if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
        throw new CredentialFormatError(`Secret payload is missing or has invalid fields: ${fields.join(', ')}`);
    }

    return {
        bedrockApiKey: parsed.data.bedrock_api_key,
        azureApiKey: parsed.data.azure_api_key,
        azureEndpoint: parsed.data.azure_endpoint,
    };
}
