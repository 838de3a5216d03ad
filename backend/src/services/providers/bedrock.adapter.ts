import { BedrockRuntimeClient, ConverseCommand } from '@aws-sdk/client-bedrock-runtime';
import { ModelProvider, ProviderOptions } from './provider.interface';
import { CredentialSet } from '../../types';
import { ProviderInvocationError, errorMessage } from '../../errors';
import { logger } from '../../utils/logger';

export interface BedrockProviderOptions extends ProviderOptions {
    region: string;
    modelId: string;
}

export class BedrockProvider implements ModelProvider {
    readonly name = 'bedrock';

    constructor(private readonly options: BedrockProviderOptions) {}

    async invoke(prompt: string, credentials: CredentialSet): Promise<string> {
        const startTime = Date.now();

        try {
            const reply = this.options.mode === 'live'
                ? await this.converse(prompt, credentials.bedrockApiKey)
                : `Simulated Bedrock response to '${prompt}'`;

            logger.info(
                { provider: this.name, mode: this.options.mode, latency: Date.now() - startTime, promptLength: prompt.length },
                'Provider call completed',
            );
            return reply;
        } catch (error) {
            logger.error({ err: error, provider: this.name }, 'Bedrock call failed');
            if (error instanceof ProviderInvocationError) throw error;
            throw new ProviderInvocationError(this.name, errorMessage(error), error);
        }
    }

    private async converse(prompt: string, apiKey: string): Promise<string> {
        // Bedrock API keys authenticate as bearer tokens
        const client = new BedrockRuntimeClient({
            region: this.options.region,
            maxAttempts: 1,
            token: { token: apiKey },
            authSchemePreference: ['httpBearerAuth'],
        });

        try {
            const result = await client.send(
                new ConverseCommand({
                    modelId: this.options.modelId,
                    messages: [{ role: 'user', content: [{ text: prompt }] }],
                    inferenceConfig: { maxTokens: this.options.maxTokens },
                }),
                { abortSignal: AbortSignal.timeout(this.options.timeoutMs) },
            );

            const text = (result.output?.message?.content ?? [])
                .map((block) => block.text ?? '')
                .join('')
                .trim();
            if (!text) {
                throw new ProviderInvocationError(this.name, 'Empty reply from Bedrock');
            }
            return text;
        } finally {
            client.destroy();
        }
    }
}
