import { ModelProvider } from './provider.interface';
import { BedrockProvider } from './bedrock.adapter';
import { AzureOpenAIProvider } from './azure-openai.adapter';
import { TargetModel } from '../../types';
import { AppConfig, config } from '../../config';

export type { ModelProvider } from './provider.interface';
export { BedrockProvider } from './bedrock.adapter';
export { AzureOpenAIProvider } from './azure-openai.adapter';

/** Reply length cap shared by both providers. */
export const DEFAULT_MAX_TOKENS = 100;

export type ProviderRegistry = Readonly<Record<TargetModel, ModelProvider>>;

/**
 * Factory: one provider per target model, built once per process.
 */
export function createProviderRegistry(appConfig: AppConfig = config): ProviderRegistry {
    const shared = {
        mode: appConfig.providerMode,
        timeoutMs: appConfig.providerTimeoutMs,
        maxTokens: DEFAULT_MAX_TOKENS,
    };

    return {
        bedrock: new BedrockProvider({
            ...shared,
            region: appConfig.awsRegion,
            modelId: appConfig.bedrockModelId,
        }),
        azure: new AzureOpenAIProvider({
            ...shared,
            deployment: appConfig.azureDeployment,
            apiVersion: appConfig.azureApiVersion,
        }),
    };
}

/**
 * Pick the provider for a target. Every TargetModel has exactly one variant.
 */
export function selectProvider(registry: ProviderRegistry, target: TargetModel): ModelProvider {
    switch (target) {
        case 'bedrock':
            return registry.bedrock;
        case 'azure':
            return registry.azure;
        default: {
            const unknownTarget: never = target;
            throw new Error(`Unknown target model: ${String(unknownTarget)}`);
        }
    }
}
