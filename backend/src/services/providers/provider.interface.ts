import { CredentialSet, ProviderModelName } from '../../types';

/**
 * Abstract model provider interface.
 * Implement this for each AI backend (Bedrock, Azure OpenAI).
 */
export interface ModelProvider {
    readonly name: ProviderModelName;

    /**
     * Send a single prompt and return the reply text. No retries.
     */
    invoke(prompt: string, credentials: CredentialSet): Promise<string>;
}

export type ProviderMode = 'simulated' | 'live';

export interface ProviderOptions {
    mode: ProviderMode;
    timeoutMs: number;
    maxTokens: number;
}
