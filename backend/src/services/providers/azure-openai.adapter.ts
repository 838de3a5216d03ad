import { AzureOpenAI } from 'openai';
import { ModelProvider, ProviderOptions } from './provider.interface';
import { CredentialSet } from '../../types';
import { ProviderInvocationError, errorMessage } from '../../errors';
import { logger } from '../../utils/logger';

export interface AzureOpenAIProviderOptions extends ProviderOptions {
    deployment: string;
    apiVersion: string;
}

export class AzureOpenAIProvider implements ModelProvider {
    readonly name = 'azure_openai';

    constructor(private readonly options: AzureOpenAIProviderOptions) {}

    async invoke(prompt: string, credentials: CredentialSet): Promise<string> {
        const startTime = Date.now();

        try {
            const reply = this.options.mode === 'live'
                ? await this.complete(prompt, credentials)
                : `Simulated Azure OpenAI response to '${prompt}'`;

            logger.info(
                { provider: this.name, mode: this.options.mode, latency: Date.now() - startTime, promptLength: prompt.length },
                'Provider call completed',
            );
            return reply;
        } catch (error) {
            logger.error({ err: error, provider: this.name }, 'Azure OpenAI call failed');
            if (error instanceof ProviderInvocationError) throw error;
            throw new ProviderInvocationError(this.name, errorMessage(error), error);
        }
    }

    private async complete(prompt: string, credentials: CredentialSet): Promise<string> {
        const client = new AzureOpenAI({
            apiKey: credentials.azureApiKey,
            endpoint: credentials.azureEndpoint,
            apiVersion: this.options.apiVersion,
            deployment: this.options.deployment,
            maxRetries: 0,
            timeout: this.options.timeoutMs,
        });

        const completion = await client.chat.completions.create({
            model: this.options.deployment,
            messages: [{ role: 'user', content: prompt }],
            max_tokens: this.options.maxTokens,
        });

        const text = completion.choices[0]?.message?.content?.trim() || '';
        if (!text) {
            throw new ProviderInvocationError(this.name, 'Empty reply from Azure OpenAI');
        }
        return text;
    }
}
